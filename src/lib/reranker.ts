import { buildRelevancePrompt, extractJsonObject } from "./aiPrompts";
import { errorMessage, RerankError } from "./errors";
import type { Judge } from "./openai";
import { mapWithConcurrency, withTimeout } from "./utils";
import type { RerankedHit, RerankFailure, SearchHit } from "../types/schemas";

export interface RerankOptions {
  /** Results to keep; defaults to every scored candidate */
  topN?: number;
  /** Fewer successful judge scores than this fails the rerank */
  minCandidates?: number;
  maxConcurrency?: number;
  timeoutMs?: number;
}

export interface RerankResult {
  hits: RerankedHit[];
  failures: RerankFailure[];
}

/**
 * Read a [0,1] relevance score from a judge reply.
 * Accepts {"score": x} or falls back to the first number in the text.
 */
export function parseRelevanceScore(reply: string): number | undefined {
  let value: unknown;

  const parsed = extractJsonObject(reply);
  if (typeof parsed === "object" && parsed !== null && "score" in parsed) {
    value = typeof parsed.score === "string" ? Number(parsed.score) : parsed.score;
  } else {
    const match = reply.match(/-?\d+(?:\.\d+)?/);
    value = match ? Number(match[0]) : undefined;
  }

  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 1) {
    return undefined;
  }
  return value;
}

/**
 * Score each candidate with the judge and reorder by judge score.
 * A failed or unparsable call drops that candidate only.
 *
 * @throws RerankError when fewer than `minCandidates` candidates were scored
 */
export async function rerank(
  query: string,
  candidates: readonly SearchHit[],
  judge: Judge,
  options: RerankOptions = {}
): Promise<RerankResult> {
  const {
    topN = candidates.length,
    minCandidates = 1,
    maxConcurrency = 4,
    timeoutMs = 30_000,
  } = options;

  const outcomes = await mapWithConcurrency(
    candidates,
    maxConcurrency,
    async (hit, rank): Promise<RerankedHit | RerankFailure> => {
      const prompt = buildRelevancePrompt({
        query,
        srcText: hit.record.src_text,
        tgtText: hit.record.tgt_text,
      });

      try {
        const reply = await withTimeout(
          (signal) => judge(prompt, { signal }),
          timeoutMs,
          `Relevance judge for vector ${hit.vector_id}`
        );
        const judgeScore = parseRelevanceScore(reply);
        if (judgeScore === undefined) {
          return { vector_id: hit.vector_id, error: `Unparsable judge score: ${reply.slice(0, 80)}` };
        }
        return { ...hit, judge_score: judgeScore, similarity_rank: rank };
      } catch (error) {
        return { vector_id: hit.vector_id, error: errorMessage(error) };
      }
    }
  );

  const hits: RerankedHit[] = [];
  const failures: RerankFailure[] = [];
  for (const outcome of outcomes) {
    if ("judge_score" in outcome) hits.push(outcome);
    else failures.push(outcome);
  }

  for (const failure of failures) {
    console.warn(`Rerank skipped vector ${failure.vector_id}: ${failure.error}`);
  }

  if (hits.length < minCandidates) {
    throw new RerankError(
      `Only ${hits.length} of ${candidates.length} candidates were scored (minimum ${minCandidates})`,
      hits.length,
      minCandidates
    );
  }

  hits.sort(
    (a, b) =>
      b.judge_score - a.judge_score ||
      a.similarity_rank - b.similarity_rank ||
      a.vector_id - b.vector_id
  );

  return { hits: hits.slice(0, Math.max(0, topN)), failures };
}
