import { isValidated, readAlignments, readChunks } from "./jsonl";
import {
  Alignment,
  Chunk,
  Language,
  LookupResult,
  PaddedId,
  ValidatedAlignment,
} from "../types/schemas";

export interface CorpusOptions {
  sourceLanguage?: Language;
  targetLanguage?: Language;
}

type Side = "src_chunks" | "tgt_chunks";

interface SideIndex {
  // chunk_id -> alignments holding it on this side, file order
  owners: Map<number, Alignment[]>;
  // validated chunk ids on this side, ascending, with their first validated alignment
  validatedIds: number[];
  validatedOwner: Map<number, ValidatedAlignment>;
}

export interface ChunkAlignmentMatch {
  alignment: ValidatedAlignment;
  matchedChunkId: number;
  exact: boolean;
}

/**
 * Immutable in-memory view over chunks and alignments.
 *
 * Built once at startup and passed to whatever needs it. Every lookup goes
 * through indices computed here: chunk id -> chunk, chunk id -> language and
 * chunk id -> owning alignments on each side.
 */
export class Corpus {
  readonly sourceLanguage: Language;
  readonly targetLanguage: Language;
  readonly chunks: readonly Chunk[];
  readonly alignments: readonly Alignment[];
  readonly validated: readonly ValidatedAlignment[];
  readonly parts: readonly PaddedId[];

  private readonly chunkById = new Map<number, Chunk>();
  private readonly languageById = new Map<number, Language>();
  private readonly sides: Record<Side, SideIndex>;
  private readonly validatedByPart = new Map<PaddedId, ValidatedAlignment[]>();

  constructor(chunks: readonly Chunk[], alignments: readonly Alignment[], options: CorpusOptions = {}) {
    this.sourceLanguage = options.sourceLanguage ?? "en";
    this.targetLanguage = options.targetLanguage ?? "it";
    this.chunks = Object.freeze([...chunks]);
    this.alignments = Object.freeze([...alignments]);

    for (const chunk of this.chunks) {
      if (this.chunkById.has(chunk.chunk_id)) {
        console.warn(`Duplicate chunk_id ${chunk.chunk_id}; keeping the first occurrence`);
        continue;
      }
      this.chunkById.set(chunk.chunk_id, chunk);
      this.languageById.set(chunk.chunk_id, chunk.language);
    }

    this.sides = {
      src_chunks: this.indexSide("src_chunks", this.sourceLanguage),
      tgt_chunks: this.indexSide("tgt_chunks", this.targetLanguage),
    };

    const validated = this.alignments.filter(isValidated);
    this.validated = Object.freeze(validated);
    for (const alignment of validated) {
      const list = this.validatedByPart.get(alignment.part) ?? [];
      list.push(alignment);
      this.validatedByPart.set(alignment.part, list);
    }
    this.parts = Object.freeze(
      [...new Set(this.alignments.map((a) => a.part))].sort()
    );

    Object.freeze(this);
  }

  static async fromFiles(
    chunksFile: string,
    alignmentsFile: string,
    options: CorpusOptions = {}
  ): Promise<Corpus> {
    const [chunks, alignments] = await Promise.all([
      readChunks(chunksFile),
      readAlignments(alignmentsFile),
    ]);
    const corpus = new Corpus(chunks.records, alignments.records, options);
    console.log(
      `Corpus ready: ${corpus.chunks.length} chunks, ${corpus.alignments.length} alignments (${corpus.validated.length} validated)`
    );
    return corpus;
  }

  getChunk(chunkId: number): Chunk | undefined {
    return this.chunkById.get(chunkId);
  }

  languageOf(chunkId: number): Language | undefined {
    return this.languageById.get(chunkId);
  }

  alignmentsForChunk(chunkId: number): readonly Alignment[] {
    const side = this.sideFor(chunkId);
    return side ? this.sides[side].owners.get(chunkId) ?? [] : [];
  }

  alignmentsForPart(part: PaddedId): readonly ValidatedAlignment[] {
    return this.validatedByPart.get(part) ?? [];
  }

  /**
   * First chunk (file order) whose text contains the excerpt, case-insensitive
   */
  findChunkByText(excerpt: string): Chunk | undefined {
    const needle = excerpt.trim().toLowerCase();
    if (!needle) return undefined;
    return this.chunks.find((chunk) => chunk.text.toLowerCase().includes(needle));
  }

  /**
   * Validated alignment holding the chunk on its own language side. When the
   * chunk's alignment is not validated (or missing), falls back to the
   * validated alignment of the nearest preceding chunk id on the same side.
   */
  findAlignmentForChunk(chunkId: number): ChunkAlignmentMatch | undefined {
    const side = this.sideFor(chunkId);
    if (!side) return undefined;
    const index = this.sides[side];

    const exact = (index.owners.get(chunkId) ?? []).find(isValidated);
    if (exact) {
      return { alignment: exact, matchedChunkId: chunkId, exact: true };
    }

    const preceding = largestBelow(index.validatedIds, chunkId);
    if (preceding === undefined) return undefined;
    const alignment = index.validatedOwner.get(preceding);
    return alignment ? { alignment, matchedChunkId: preceding, exact: false } : undefined;
  }

  lookup(excerpt: string): LookupResult {
    const chunk = this.findChunkByText(excerpt);
    if (!chunk) {
      return { found: false, reason: "Text excerpt not found in chunks", excerpt };
    }

    const match = this.findAlignmentForChunk(chunk.chunk_id);
    if (!match) {
      return {
        found: false,
        reason: "No valid alignment found",
        chunk_id: chunk.chunk_id,
        language: chunk.language,
        chunk_text: chunk.text,
      };
    }

    const { alignment } = match;
    return {
      found: true,
      query_chunk_id: chunk.chunk_id,
      language: chunk.language,
      matched_chunk_id: match.matchedChunkId,
      exact: match.exact,
      part: alignment.part,
      src_text: alignment.src_text,
      tgt_text: alignment.tgt_text,
      alignment_type: alignment.alignment_type,
      confidence: alignment.validation.confidence,
      alignment,
    };
  }

  private sideFor(chunkId: number): Side | undefined {
    const language = this.languageById.get(chunkId);
    if (language === this.sourceLanguage) return "src_chunks";
    if (language === this.targetLanguage) return "tgt_chunks";
    // Chunk missing from the chunk file: infer from where alignments place it
    if (this.sides.src_chunks.owners.has(chunkId)) return "src_chunks";
    if (this.sides.tgt_chunks.owners.has(chunkId)) return "tgt_chunks";
    return undefined;
  }

  private indexSide(side: Side, language: Language): SideIndex {
    const owners = new Map<number, Alignment[]>();
    const validatedOwner = new Map<number, ValidatedAlignment>();

    for (const alignment of this.alignments) {
      const validated = isValidated(alignment);
      for (const ref of alignment[side]) {
        const list = owners.get(ref.chunk_id) ?? [];
        list.push(alignment);
        owners.set(ref.chunk_id, list);

        if (!this.languageById.has(ref.chunk_id)) {
          this.languageById.set(ref.chunk_id, language);
        }
        if (validated && !validatedOwner.has(ref.chunk_id)) {
          validatedOwner.set(ref.chunk_id, alignment);
        }
      }
    }

    const validatedIds = [...validatedOwner.keys()].sort((a, b) => a - b);
    return { owners, validatedIds, validatedOwner };
  }
}

/**
 * Largest value in an ascending array that is strictly below `target`
 */
function largestBelow(sorted: readonly number[], target: number): number | undefined {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (sorted[mid] < target) lo = mid + 1;
    else hi = mid;
  }
  return lo > 0 ? sorted[lo - 1] : undefined;
}

// ============================================================================
// Statistics
// ============================================================================

export interface AlignmentSummary {
  total: number;
  validated: number;
  valid: number;
  invalid: number;
  errored: number;
  unvalidated: number;
  meanConfidence: number | null;
  byType: Record<string, number>;
  byPart: Record<PaddedId, number>;
}

export function summarizeAlignments(alignments: readonly Alignment[]): AlignmentSummary {
  const byType: Record<string, number> = {};
  const byPart: Record<string, number> = {};
  let validated = 0;
  let valid = 0;
  let errored = 0;
  let unvalidated = 0;
  let confidenceSum = 0;

  for (const alignment of alignments) {
    byType[alignment.alignment_type] = (byType[alignment.alignment_type] ?? 0) + 1;
    byPart[alignment.part] = (byPart[alignment.part] ?? 0) + 1;

    const verdict = alignment.validation;
    if (!verdict) {
      unvalidated++;
    } else if (!verdict.validation_success) {
      errored++;
    } else {
      validated++;
      confidenceSum += verdict.confidence;
      if (verdict.is_valid_alignment) valid++;
    }
  }

  return {
    total: alignments.length,
    validated,
    valid,
    invalid: validated - valid,
    errored,
    unvalidated,
    meanConfidence: validated > 0 ? confidenceSum / validated : null,
    byType: sortKeys(byType),
    byPart: sortKeys(byPart),
  };
}

function sortKeys(record: Record<string, number>): Record<string, number> {
  return Object.fromEntries(Object.entries(record).sort(([a], [b]) => a.localeCompare(b)));
}
