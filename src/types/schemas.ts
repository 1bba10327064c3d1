/**
 * Data Schemas & Contracts
 *
 * Record shapes for the chunk and alignment JSONL files, the validation
 * verdict written back by the judge, and the artifacts of a vector index.
 * Runtime validation lives next to each type so both stay in step.
 */

import { z } from "zod";

// ============================================================================
// 1. Identifiers & Conventions
// ============================================================================

export const LANGUAGES = ["en", "it"] as const;

export type Language = (typeof LANGUAGES)[number];

/**
 * Part and page identifiers are zero-padded ("001") and are compared as
 * strings so that lexical order matches reading order.
 */
export type PaddedId = string;

// ============================================================================
// 2. Chunk
// ============================================================================

export const chunkSchema = z.object({
  chunk_id: z.number().int(),
  text: z.string(),
  language: z.enum(LANGUAGES),
  part: z.string(),
  page: z.string(),
});

export type Chunk = z.infer<typeof chunkSchema>;

/**
 * Chunk copies embedded in alignment records. Older alignment files omit
 * part/page on the embedded copies.
 */
export const chunkRefSchema = z.object({
  chunk_id: z.number().int(),
  text: z.string().default(""),
  language: z.string().optional(),
  part: z.string().optional(),
  page: z.string().optional(),
});

export type ChunkRef = z.infer<typeof chunkRefSchema>;

// ============================================================================
// 3. Validation Verdict
// ============================================================================

export const validationVerdictSchema = z.object({
  is_valid_alignment: z.boolean(),
  confidence: z.number().min(0).max(1),
  reason: z.string().optional(),
  validation_success: z.boolean(),
  error: z.string().nullable().optional(),
});

export type ValidationVerdict = z.infer<typeof validationVerdictSchema>;

// ============================================================================
// 4. Alignment
// ============================================================================

export const alignmentSchema = z.object({
  part: z.string(),
  // Missing text is kept as "" so the indexer counts the record as skipped
  src_text: z.string().default(""),
  tgt_text: z.string().default(""),
  src_chunks: z.array(chunkRefSchema),
  tgt_chunks: z.array(chunkRefSchema),
  alignment_type: z.string(), // e.g. "1-1", "1-2", "2-1"
  src_indices: z.array(z.number().int()).optional(),
  tgt_indices: z.array(z.number().int()).optional(),
  validation: validationVerdictSchema.optional(),
});

export type Alignment = z.infer<typeof alignmentSchema>;

export type ValidatedAlignment = Alignment & {
  validation: ValidationVerdict & { validation_success: true };
};

export type TextField = "src_text" | "tgt_text";

export const TEXT_FIELDS: readonly TextField[] = ["src_text", "tgt_text"];

// ============================================================================
// 5. Vector Index Artifacts
// ============================================================================

export const INDEX_VARIANTS = ["flat-ip", "flat-l2", "ivf"] as const;

export type IndexVariant = (typeof INDEX_VARIANTS)[number];

/**
 * One line of metadata.jsonl. Line n describes vector n.
 */
export const metadataRecordSchema = z.object({
  id: z.number().int(), // position of the alignment in the input file
  src_text: z.string(),
  tgt_text: z.string(),
  part: z.string(),
  src_indices: z.array(z.number().int()),
  tgt_indices: z.array(z.number().int()),
  alignment_type: z.string(),
  src_chunks: z.array(chunkRefSchema),
  tgt_chunks: z.array(chunkRefSchema),
  validation: validationVerdictSchema.nullable(),
});

export type MetadataRecord = z.infer<typeof metadataRecordSchema>;

export const indexConfigSchema = z.object({
  model_name: z.string().min(1),
  embedding_dim: z.number().int().positive(),
  normalize_embeddings: z.boolean(),
  index_variant: z.enum(INDEX_VARIANTS),
  text_field: z.enum(["src_text", "tgt_text"]),
  num_vectors: z.number().int().nonnegative(),
  nlist: z.number().int().positive().optional(),
  nprobe: z.number().int().positive().optional(),
  source_hash: z.string().optional(),
  created_at: z.string(), // ISO-8601
});

export type IndexConfigRecord = z.infer<typeof indexConfigSchema>;

export interface BuildStats {
  num_alignments: number;
  num_indexed: number;
  num_skipped: number;
  embedding_dim: number;
  index_variant: IndexVariant;
  model_name: string;
  text_field: TextField;
}

// ============================================================================
// 6. Retrieval Results
// ============================================================================

export interface SearchHit {
  vector_id: number;
  score: number;
  record: MetadataRecord;
}

export interface RerankedHit extends SearchHit {
  judge_score: number;
  similarity_rank: number; // 0-based position in the similarity order
}

export interface RerankFailure {
  vector_id: number;
  error: string;
}

// ============================================================================
// 7. Lookup Results
// ============================================================================

export type LookupResult =
  | {
      found: true;
      query_chunk_id: number;
      language: Language;
      matched_chunk_id: number;
      exact: boolean;
      part: PaddedId;
      src_text: string;
      tgt_text: string;
      alignment_type: string;
      confidence: number;
      alignment: ValidatedAlignment;
    }
  | {
      found: false;
      reason: "Text excerpt not found in chunks";
      excerpt: string;
    }
  | {
      found: false;
      reason: "No valid alignment found";
      chunk_id: number;
      language: Language;
      chunk_text: string;
    };
