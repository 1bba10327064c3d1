import { ConfigMismatchError, ValidationError } from "./errors";
import { buildIndex, LoadedIndex } from "./indexer";
import { assertCompatible, partFilter, search } from "./searcher";
import type { Alignment } from "../types/schemas";
import { alignments, makeAlignment, verdict, vocabularyEmbedder } from "./__fixtures__/corpus";

const VOCABULARY = ["an", "emergency", "passenger", "train", "introduction", "lost", "text"];

async function loadedFrom(input: Alignment[]): Promise<LoadedIndex> {
  const { index, metadata, config } = await buildIndex(input, vocabularyEmbedder(VOCABULARY));
  return { dir: "memory", index, metadata, config };
}

describe("search", () => {
  const embedder = vocabularyEmbedder(VOCABULARY);

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("ranks the matching alignment first", async () => {
    const loaded = await loadedFrom([
      makeAlignment("AN EMERGENCY", "UN'EMERGENZA", { validation: verdict(true, 0.9) }),
      makeAlignment("PASSENGER TRAIN", "TRENO PASSEGGERI", { validation: verdict(true, 0.9) }),
    ]);

    const hits = await search("emergency", loaded, embedder);

    expect(hits.map((hit) => hit.vector_id)).toEqual([0, 1]);
    expect(hits[0].score).toBeCloseTo(Math.SQRT1_2);
    expect(hits[1].score).toBe(0);
    expect(hits[0].record.tgt_text).toBe("UN'EMERGENZA");
  });

  it("never returns alignments without a successful verdict", async () => {
    const loaded = await loadedFrom(alignments);

    const hits = await search("passenger train", loaded, embedder);

    expect(hits.map((hit) => hit.vector_id)).toEqual([0, 2]);
  });

  it("returns unvalidated alignments when asked", async () => {
    const loaded = await loadedFrom(alignments);

    const hits = await search("passenger train", loaded, embedder, { includeUnvalidated: true });

    expect(hits[0].vector_id).toBe(1);
    expect(hits).toHaveLength(4);
  });

  it("breaks equal scores by ascending vector id", async () => {
    const loaded = await loadedFrom(
      ["AN EMERGENCY", "PASSENGER TRAIN", "AN EMERGENCY", "AN EMERGENCY"].map((text) =>
        makeAlignment(text, text, { validation: verdict(true, 1) })
      )
    );

    const hits = await search("emergency", loaded, embedder, { k: 3 });

    expect(hits.map((hit) => hit.vector_id)).toEqual([0, 2, 3]);
  });

  it("clamps k to maxTopK", async () => {
    const loaded = await loadedFrom(alignments);

    const hits = await search("text", loaded, embedder, { k: 500, maxTopK: 1, includeUnvalidated: true });

    expect(hits).toHaveLength(1);
    expect(hits[0].vector_id).toBe(3);
  });

  it("drops hits below the similarity threshold", async () => {
    const loaded = await loadedFrom(alignments);

    const hits = await search("emergency", loaded, embedder, { similarityThreshold: 0.5 });

    expect(hits.map((hit) => hit.vector_id)).toEqual([0]);
  });

  it.each(["pre", "post"] as const)("filters by part with %s-filtering", async (filterMode) => {
    const loaded = await loadedFrom(alignments);

    const hits = await search("lost text", loaded, embedder, {
      filter: partFilter("002"),
      filterMode,
    });

    // Vector 3 matches best but has no verdict
    expect(hits.map((hit) => hit.vector_id)).toEqual([2]);
  });

  it("finds a validated alignment behind many closer unvalidated ones", async () => {
    const loaded = await loadedFrom([
      ...Array.from({ length: 45 }, () => makeAlignment("EMERGENCY", "EMERGENZA")),
      makeAlignment("AN EMERGENCY TRAIN", "UN TRENO D'EMERGENZA", { validation: verdict(true, 0.9) }),
    ]);

    const hits = await search("emergency", loaded, embedder, { k: 10 });
    const inPart = await search("emergency", loaded, embedder, { k: 10, filter: partFilter("001") });

    expect(hits.map((hit) => hit.vector_id)).toEqual([45]);
    expect(inPart.map((hit) => hit.vector_id)).toEqual([45]);
  });

  it.each([0, -3, 2.5])("rejects k = %p", async (k) => {
    const loaded = await loadedFrom(alignments);

    await expect(search("emergency", loaded, embedder, { k })).rejects.toThrow(
      `k must be a positive integer, got ${k}`
    );
  });

  it("rejects an empty query", async () => {
    const loaded = await loadedFrom(alignments);

    await expect(search("   ", loaded, embedder)).rejects.toThrow(ValidationError);
  });

  it("rejects an embedder that differs from the one the index was built with", async () => {
    const loaded = await loadedFrom(alignments);

    await expect(
      search("emergency", loaded, vocabularyEmbedder(VOCABULARY, "another-model"))
    ).rejects.toThrow(ConfigMismatchError);
  });
});

describe("assertCompatible", () => {
  it("reports the expected and actual settings", async () => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    const loaded = await loadedFrom(alignments);
    jest.restoreAllMocks();

    let thrown: unknown;
    try {
      assertCompatible(loaded.config, vocabularyEmbedder(["one", "two"], "stub-vocabulary"));
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigMismatchError);
    expect(thrown).toMatchObject({
      message: "Query embedder does not match index: dimension 2 != 7",
      expected: { model_name: "stub-vocabulary", embedding_dim: 7 },
      actual: { model_name: "stub-vocabulary", embedding_dim: 2 },
    });
  });
});
