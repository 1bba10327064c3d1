import { RerankError } from "./errors";
import { toMetadataRecord } from "./indexer";
import type { Judge } from "./openai";
import { parseRelevanceScore, rerank } from "./reranker";
import type { SearchHit } from "../types/schemas";
import { makeAlignment, verdict } from "./__fixtures__/corpus";

function hit(vectorId: number, score: number, srcText: string): SearchHit {
  return {
    vector_id: vectorId,
    score,
    record: toMetadataRecord(makeAlignment(srcText, srcText, { validation: verdict(true, 1) }), vectorId),
  };
}

const candidates = [
  hit(4, 0.9, "alpha"),
  hit(1, 0.8, "bravo"),
  hit(7, 0.7, "charlie"),
];

function scoringJudge(scores: Record<string, number | Error>): Judge {
  return async (prompt) => {
    const key = Object.keys(scores).find((text) => prompt.includes(text));
    const score = key === undefined ? undefined : scores[key];
    if (score === undefined) return "no idea";
    if (score instanceof Error) throw score;
    return JSON.stringify({ score });
  };
}

describe("parseRelevanceScore", () => {
  it("reads the score field of a JSON reply", () => {
    expect(parseRelevanceScore('Here you go: {"score": 0.7}')).toBe(0.7);
    expect(parseRelevanceScore('{"score": "0.25"}')).toBe(0.25);
  });

  it("falls back to the first number in the reply", () => {
    expect(parseRelevanceScore("Relevance: 0.4 out of 1")).toBe(0.4);
  });

  it("rejects scores outside [0, 1] and replies without a number", () => {
    expect(parseRelevanceScore('{"score": 1.5}')).toBeUndefined();
    expect(parseRelevanceScore("-0.2")).toBeUndefined();
    expect(parseRelevanceScore("not relevant")).toBeUndefined();
  });
});

describe("rerank", () => {
  beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("orders candidates by judge score", async () => {
    const judge = scoringJudge({ alpha: 0.2, bravo: 0.9, charlie: 0.5 });

    const { hits, failures } = await rerank("query", candidates, judge);

    expect(hits.map((h) => h.vector_id)).toEqual([1, 7, 4]);
    expect(hits.map((h) => h.similarity_rank)).toEqual([1, 2, 0]);
    expect(hits[0]).toMatchObject({ score: 0.8, judge_score: 0.9 });
    expect(failures).toEqual([]);
  });

  it("keeps similarity order for equal judge scores", async () => {
    const judge = scoringJudge({ alpha: 0.5, bravo: 0.5, charlie: 0.5 });

    const { hits } = await rerank("query", candidates, judge);

    expect(hits.map((h) => h.vector_id)).toEqual([4, 1, 7]);
  });

  it("returns at most topN candidates, all taken from the input", async () => {
    const judge = scoringJudge({ alpha: 0.1, bravo: 0.2, charlie: 0.3 });

    const { hits } = await rerank("query", candidates, judge, { topN: 2 });

    expect(hits.map((h) => h.vector_id)).toEqual([7, 1]);
    const inputIds = candidates.map((c) => c.vector_id);
    hits.forEach((h) => expect(inputIds).toContain(h.vector_id));
  });

  it("keeps scoring the other candidates when one judge call throws", async () => {
    const judge = scoringJudge({ alpha: 0.3, bravo: new Error("connection reset"), charlie: 0.6 });

    const { hits, failures } = await rerank("query", candidates, judge);

    expect(hits.map((h) => h.vector_id)).toEqual([7, 4]);
    expect(failures).toEqual([{ vector_id: 1, error: "connection reset" }]);
  });

  it("records a timed-out judge call as a failure", async () => {
    const judge: Judge = (prompt) =>
      prompt.includes("bravo") ? new Promise<string>(() => undefined) : Promise.resolve('{"score": 0.5}');

    const { hits, failures } = await rerank("query", candidates, judge, { timeoutMs: 20 });

    expect(hits.map((h) => h.vector_id)).toEqual([4, 7]);
    expect(failures).toEqual([
      { vector_id: 1, error: "Relevance judge for vector 1 timed out after 20ms" },
    ]);
  });

  it("aborts the judge request that timed out", async () => {
    const signals: Record<string, AbortSignal | undefined> = {};
    const judge: Judge = (prompt, options) => {
      const name = prompt.includes("bravo") ? "bravo" : "other";
      signals[name] = options?.signal;
      return name === "bravo" ? new Promise<string>(() => undefined) : Promise.resolve('{"score": 0.5}');
    };

    await rerank("query", candidates, judge, { timeoutMs: 20 });

    expect(signals.bravo?.aborted).toBe(true);
    expect(signals.other?.aborted).toBe(false);
  });

  it("records an unparsable reply as a failure", async () => {
    const judge = scoringJudge({ alpha: 0.3, charlie: 0.6 });

    const { failures } = await rerank("query", candidates, judge);

    expect(failures).toEqual([{ vector_id: 1, error: "Unparsable judge score: no idea" }]);
  });

  it("fails when fewer than minCandidates were scored", async () => {
    const judge = scoringJudge({ alpha: 0.3 });

    const error = await rerank("query", candidates, judge, { minCandidates: 2 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RerankError);
    expect(error).toMatchObject({
      message: "Only 1 of 3 candidates were scored (minimum 2)",
      scored: 1,
      required: 2,
    });
  });

  it("limits judge calls in flight", async () => {
    let active = 0;
    let peak = 0;
    const judge: Judge = async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return '{"score": 0.5}';
    };

    await rerank("query", [...candidates, hit(9, 0.1, "delta")], judge, { maxConcurrency: 2 });

    expect(peak).toBe(2);
  });
});
