import type { Embedder } from "../embeddings";
import type { Alignment, Chunk, ValidationVerdict } from "../../types/schemas";

export function verdict(isValid: boolean, confidence: number): ValidationVerdict {
  return {
    is_valid_alignment: isValid,
    confidence,
    reason: isValid ? "Same content" : "Different content",
    validation_success: true,
    error: null,
  };
}

export const erroredVerdict: ValidationVerdict = {
  is_valid_alignment: false,
  confidence: 0,
  reason: "",
  validation_success: false,
  error: "Connection refused",
};

export function makeChunk(chunkId: number, text: string, language: "en" | "it", part = "001"): Chunk {
  return { chunk_id: chunkId, text, language, part, page: "001" };
}

export function makeAlignment(
  srcText: string,
  tgtText: string,
  options: {
    part?: string;
    srcIds?: number[];
    tgtIds?: number[];
    type?: string;
    validation?: ValidationVerdict;
  } = {}
): Alignment {
  const { part = "001", srcIds = [], tgtIds = [], type = "1-1", validation } = options;
  return {
    part,
    src_text: srcText,
    tgt_text: tgtText,
    src_chunks: srcIds.map((chunk_id) => ({ chunk_id, text: srcText })),
    tgt_chunks: tgtIds.map((chunk_id) => ({ chunk_id, text: tgtText })),
    alignment_type: type,
    ...(validation ? { validation } : {}),
  };
}

export const chunks: Chunk[] = [
  makeChunk(0, "Prologue", "en"),
  makeChunk(1, "AN EMERGENCY", "en"),
  makeChunk(2, "PASSENGER TRAIN", "en"),
  makeChunk(3, "Introduction", "en", "002"),
  makeChunk(4, "Lost text", "en", "002"),
  makeChunk(101, "UN'EMERGENZA", "it"),
  makeChunk(102, "TRENO PASSEGGERI", "it"),
  makeChunk(103, "Introduzione", "it", "002"),
  makeChunk(104, "Testo perduto", "it", "002"),
];

export const alignments: Alignment[] = [
  makeAlignment("AN EMERGENCY", "UN'EMERGENZA", {
    srcIds: [1],
    tgtIds: [101],
    validation: verdict(true, 0.9),
  }),
  makeAlignment("PASSENGER TRAIN", "TRENO PASSEGGERI", {
    srcIds: [2],
    tgtIds: [102],
    type: "1-2",
    validation: erroredVerdict,
  }),
  makeAlignment("Introduction", "Introduzione", {
    part: "002",
    srcIds: [3],
    tgtIds: [103],
    validation: verdict(false, 0.8),
  }),
  makeAlignment("Lost text", "Testo perduto", {
    part: "002",
    srcIds: [4],
    tgtIds: [104],
  }),
];

/**
 * Bag-of-words embedder over a fixed vocabulary: component i counts the
 * occurrences of vocabulary[i] in the lowercased text.
 */
export function vocabularyEmbedder(vocabulary: string[], modelName = "stub-vocabulary"): Embedder & {
  calls: string[][];
} {
  const calls: string[][] = [];
  return {
    modelName,
    dimension: vocabulary.length,
    calls,
    async embed(texts: string[]): Promise<number[][]> {
      calls.push(texts);
      return texts.map((text) => {
        const words = text.toLowerCase().split(/[^\p{L}']+/u);
        return vocabulary.map((term) => words.filter((word) => word === term).length);
      });
    },
  };
}
