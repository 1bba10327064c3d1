import { embedChecked, Embedder, l2Normalize } from "./embeddings";
import { ConfigMismatchError, ValidationError } from "./errors";
import type { LoadedIndex } from "./indexer";
import { IVFIndex, type ScoredId } from "./vectorIndex";
import type { IndexConfigRecord, MetadataRecord, SearchHit } from "../types/schemas";

export type FilterMode = "pre" | "post";

export interface SearchOptions {
  k?: number;
  maxTopK?: number;
  /** Drop hits scoring below this value */
  similarityThreshold?: number;
  filter?: (record: MetadataRecord) => boolean;
  /**
   * pre: restrict candidates before scoring (exact on flat indices).
   * post: fetch k * overFetchFactor hits, then filter.
   */
  filterMode?: FilterMode;
  overFetchFactor?: number;
  /** IVF only: override the clusters probed for this query */
  nprobe?: number;
  /** Also return records without a successful validation verdict */
  includeUnvalidated?: boolean;
}

/**
 * Fail fast when the query embedder is not the one the index was built with
 */
export function assertCompatible(config: IndexConfigRecord, embedder: Embedder): void {
  const mismatches: string[] = [];
  if (embedder.modelName !== config.model_name) {
    mismatches.push(`model ${embedder.modelName} != ${config.model_name}`);
  }
  if (embedder.dimension !== undefined && embedder.dimension !== config.embedding_dim) {
    mismatches.push(`dimension ${embedder.dimension} != ${config.embedding_dim}`);
  }
  if (mismatches.length > 0) {
    throw new ConfigMismatchError(
      `Query embedder does not match index: ${mismatches.join(", ")}`,
      { model_name: config.model_name, embedding_dim: config.embedding_dim },
      { model_name: embedder.modelName, embedding_dim: embedder.dimension }
    );
  }
}

export function partFilter(part: string): (record: MetadataRecord) => boolean {
  return (record) => record.part === part;
}

/**
 * Embed the query and return up to k hits, best first.
 * Ties keep ascending vector id order.
 */
export async function search(
  query: string,
  loaded: LoadedIndex,
  embedder: Embedder,
  options: SearchOptions = {}
): Promise<SearchHit[]> {
  const {
    k: requestedK = 10,
    maxTopK = 100,
    similarityThreshold,
    filter: userFilter,
    filterMode = "post",
    overFetchFactor = 4,
    nprobe,
    includeUnvalidated = false,
  } = options;

  if (!query.trim()) {
    throw new ValidationError("Query must not be empty");
  }
  if (!Number.isInteger(requestedK) || requestedK < 1) {
    throw new ValidationError(`k must be a positive integer, got ${requestedK}`);
  }
  const k = Math.min(requestedK, maxTopK);

  const { index, metadata, config } = loaded;
  assertCompatible(config, embedder);

  const [embedded] = await embedChecked(embedder, [query]);
  if (embedded.length !== config.embedding_dim) {
    throw new ConfigMismatchError(
      `Query embedding has dimension ${embedded.length}, index expects ${config.embedding_dim}`,
      { embedding_dim: config.embedding_dim },
      { embedding_dim: embedded.length }
    );
  }
  const vector = config.normalize_embeddings ? l2Normalize(embedded) : embedded;

  // Validated-only is always applied before scoring; only the caller's
  // filter follows filterMode
  const validated = includeUnvalidated ? undefined : validatedIds(metadata);

  let scored: ScoredId[];
  if (userFilter && filterMode === "pre") {
    const allowed = new Set<number>();
    metadata.forEach((record, id) => {
      if ((!validated || validated.has(id)) && userFilter(record)) allowed.add(id);
    });
    scored = index.search(vector, k, { allowed, nprobe });
  } else if (userFilter) {
    const fetched = index.search(vector, k * Math.max(1, overFetchFactor), { allowed: validated, nprobe });
    scored = fetched.filter(({ id }) => userFilter(metadata[id])).slice(0, k);
  } else {
    scored = index.search(vector, k, { allowed: validated, nprobe });
  }

  return scored
    .filter(({ score }) => similarityThreshold === undefined || score >= similarityThreshold)
    .map(({ id, score }) => ({ vector_id: id, score, record: metadata[id] }));
}

/**
 * Ids of records with a successful verdict, or undefined when every record
 * has one
 */
function validatedIds(metadata: readonly MetadataRecord[]): ReadonlySet<number> | undefined {
  if (metadata.every(isValidatedRecord)) return undefined;
  const ids = new Set<number>();
  metadata.forEach((record, id) => {
    if (isValidatedRecord(record)) ids.add(id);
  });
  return ids;
}

export function isValidatedRecord(record: MetadataRecord): boolean {
  return record.validation?.validation_success === true;
}

export function describeIndex(loaded: LoadedIndex): Record<string, unknown> {
  const { index, config } = loaded;
  return {
    ...config,
    num_vectors: index.size,
    ...(index instanceof IVFIndex ? { nlist: index.clusterCount, nprobe: index.nprobe } : {}),
  };
}
