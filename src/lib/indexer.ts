import fs from "fs/promises";
import path from "path";
import { embedChecked, Embedder, l2Normalize } from "./embeddings";
import { EmbeddingBatchError, IndexFormatError, ValidationError } from "./errors";
import { parseJSONL, toJSONL } from "./jsonl";
import { batchRanges, getCurrentTimestamp } from "./utils";
import {
  chooseVariant,
  createIndex,
  deserializeIndex,
  IVFIndex,
  VectorIndex,
} from "./vectorIndex";
import {
  Alignment,
  BuildStats,
  IndexConfigRecord,
  indexConfigSchema,
  IndexVariant,
  MetadataRecord,
  metadataRecordSchema,
  TEXT_FIELDS,
  TextField,
} from "../types/schemas";

/**
 * Alignment indexer
 * Embeds one text field of every alignment and keeps vector n paired with
 * metadata line n. Nothing reaches disk until the whole pass has succeeded.
 */

export const INDEX_FILENAME = "embeddings.index";
export const METADATA_FILENAME = "metadata.jsonl";
export const CONFIG_FILENAME = "index_config.json";

export interface IndexerOptions {
  textField?: TextField;
  batchSize?: number;
  normalize?: boolean;
  variant?: IndexVariant | "auto";
  nlist?: number;
  nprobe?: number;
  /** Hash of the input file, recorded for reproducibility */
  sourceHash?: string;
}

export interface BuiltIndex {
  index: VectorIndex;
  metadata: MetadataRecord[];
  config: IndexConfigRecord;
  stats: BuildStats;
}

export interface LoadedIndex {
  dir: string;
  index: VectorIndex;
  metadata: MetadataRecord[];
  config: IndexConfigRecord;
}

export function toMetadataRecord(alignment: Alignment, id: number): MetadataRecord {
  return {
    id,
    src_text: alignment.src_text,
    tgt_text: alignment.tgt_text,
    part: alignment.part,
    src_indices: alignment.src_indices ?? [],
    tgt_indices: alignment.tgt_indices ?? [],
    alignment_type: alignment.alignment_type,
    src_chunks: alignment.src_chunks,
    tgt_chunks: alignment.tgt_chunks,
    validation: alignment.validation ?? null,
  };
}

/**
 * Build an index in memory
 * @throws EmbeddingBatchError naming the failed range; no partial result
 */
export async function buildIndex(
  alignments: readonly Alignment[],
  embedder: Embedder,
  options: IndexerOptions = {}
): Promise<BuiltIndex> {
  const {
    textField = "src_text",
    batchSize = 32,
    normalize = true,
    variant: requestedVariant = "auto",
    nlist = 100,
    nprobe = 10,
    sourceHash,
  } = options;

  if (!TEXT_FIELDS.includes(textField)) {
    throw new ValidationError(`Unknown text field: ${textField}`);
  }
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new ValidationError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  // Collect the texts to embed, keeping input order
  const texts: string[] = [];
  const metadata: MetadataRecord[] = [];
  alignments.forEach((alignment, i) => {
    const text = alignment[textField];
    if (!text || !text.trim()) {
      console.warn(`Skipping alignment ${i}: missing '${textField}'`);
      return;
    }
    texts.push(text);
    metadata.push(toMetadataRecord(alignment, i));
  });

  const skipped = alignments.length - texts.length;
  if (texts.length === 0) {
    throw new ValidationError(`No alignments with a non-empty '${textField}' to index`);
  }

  const variant = requestedVariant === "auto" ? chooseVariant(texts.length, normalize) : requestedVariant;
  if (variant !== "flat-l2" && !normalize) {
    throw new ValidationError(`Index variant ${variant} uses inner product and requires normalized embeddings`);
  }

  console.log(`Processing ${texts.length} texts from field '${textField}' (${skipped} skipped)`);
  console.log(`Embedding with ${embedder.modelName}, batch size ${batchSize}`);

  const vectors: Float32Array[] = [];
  let dimension = embedder.dimension;
  for (const [start, end] of batchRanges(texts.length, batchSize)) {
    let batch: Float32Array[];
    try {
      batch = await embedChecked(embedder, texts.slice(start, end), dimension);
    } catch (error) {
      throw new EmbeddingBatchError(start, end, error);
    }
    dimension = dimension ?? batch[0].length;
    for (const vector of batch) {
      vectors.push(normalize ? l2Normalize(vector) : vector);
    }
    console.log(`Embedded ${end}/${texts.length}`);
  }

  const embeddingDim = dimension ?? vectors[0].length;
  const index = createIndex({ variant, dimension: embeddingDim, nlist, nprobe });
  if (index instanceof IVFIndex) {
    console.log("Training IVF index...");
    index.train(vectors);
  }
  index.add(vectors);
  console.log(`Index built. Total vectors: ${index.size}`);

  const config: IndexConfigRecord = {
    model_name: embedder.modelName,
    embedding_dim: embeddingDim,
    normalize_embeddings: normalize,
    index_variant: variant,
    text_field: textField,
    num_vectors: index.size,
    ...(index instanceof IVFIndex ? { nlist: index.clusterCount, nprobe: index.nprobe } : {}),
    ...(sourceHash ? { source_hash: sourceHash } : {}),
    created_at: getCurrentTimestamp(),
  };

  const stats: BuildStats = {
    num_alignments: alignments.length,
    num_indexed: texts.length,
    num_skipped: skipped,
    embedding_dim: embeddingDim,
    index_variant: variant,
    model_name: embedder.modelName,
    text_field: textField,
  };

  return { index, metadata, config, stats };
}

/**
 * Persist an index directory. Files are written to a staging directory next
 * to `dir`, which then replaces `dir` in one rename.
 */
export async function saveIndex(dir: string, built: BuiltIndex): Promise<void> {
  const target = path.resolve(dir);
  const parent = path.dirname(target);
  const base = path.basename(target);
  await fs.mkdir(parent, { recursive: true });

  const staging = await fs.mkdtemp(path.join(parent, `.${base}.staging-`));
  try {
    await fs.writeFile(path.join(staging, INDEX_FILENAME), built.index.serialize());
    await fs.writeFile(path.join(staging, METADATA_FILENAME), toJSONL(built.metadata), "utf-8");
    await fs.writeFile(
      path.join(staging, CONFIG_FILENAME),
      JSON.stringify(built.config, null, 2) + "\n",
      "utf-8"
    );
  } catch (error) {
    await fs.rm(staging, { recursive: true, force: true });
    throw error;
  }

  const previous = await exists(target) ? path.join(parent, `.${base}.previous-${Date.now()}`) : null;
  if (previous) {
    await fs.rename(target, previous);
  }
  try {
    await fs.rename(staging, target);
  } catch (error) {
    if (previous) await fs.rename(previous, target);
    await fs.rm(staging, { recursive: true, force: true });
    throw error;
  }
  if (previous) {
    await fs.rm(previous, { recursive: true, force: true });
  }

  console.log(`Index saved successfully to: ${target}`);
}

export async function loadIndex(dir: string): Promise<LoadedIndex> {
  console.log(`Loading index from: ${dir}`);

  const configText = await readRequired(path.join(dir, CONFIG_FILENAME));
  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(configText);
  } catch (error) {
    throw new IndexFormatError(`Config file is not valid JSON: ${String(error)}`);
  }
  const parsedConfig = indexConfigSchema.safeParse(rawConfig);
  if (!parsedConfig.success) {
    throw new IndexFormatError(`Invalid index config: ${parsedConfig.error.message}`);
  }
  const config = parsedConfig.data;

  const index = deserializeIndex(await readRequiredBuffer(path.join(dir, INDEX_FILENAME)));

  const { values, malformed } = parseJSONL(await readRequired(path.join(dir, METADATA_FILENAME)));
  if (malformed > 0) {
    throw new IndexFormatError(`Metadata file has ${malformed} malformed lines`);
  }
  const metadata = values.map((value, line) => {
    const result = metadataRecordSchema.safeParse(value);
    if (!result.success) {
      throw new IndexFormatError(`Invalid metadata record at line ${line + 1}`);
    }
    return result.data;
  });

  if (index.size !== metadata.length || index.size !== config.num_vectors) {
    throw new IndexFormatError(
      `Index has ${index.size} vectors, metadata ${metadata.length} records, config ${config.num_vectors}`
    );
  }
  if (index.dimension !== config.embedding_dim || index.variant !== config.index_variant) {
    throw new IndexFormatError(
      `Index file (${index.variant}, dim ${index.dimension}) does not match config (${config.index_variant}, dim ${config.embedding_dim})`
    );
  }

  console.log(`Index loaded: ${index.size} vectors, model ${config.model_name}`);
  return { dir, index, metadata, config };
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

async function readRequired(file: string): Promise<string> {
  return (await readRequiredBuffer(file)).toString("utf-8");
}

async function readRequiredBuffer(file: string): Promise<Buffer> {
  try {
    return await fs.readFile(file);
  } catch (error) {
    throw new IndexFormatError(`Cannot read ${file}: ${String(error)}`);
  }
}
