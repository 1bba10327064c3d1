/**
 * Error types shared by the indexer, searcher, reranker and route handlers.
 */

/**
 * Bad input from a caller: empty query, unknown field, invalid option.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * The index was built under a different embedding configuration than the
 * one used to query it.
 */
export class ConfigMismatchError extends Error {
  constructor(
    message: string,
    readonly expected: Record<string, unknown>,
    readonly actual: Record<string, unknown>
  ) {
    super(message);
    this.name = "ConfigMismatchError";
  }
}

export class EmbeddingBatchError extends Error {
  constructor(
    readonly start: number,
    readonly end: number,
    cause: unknown
  ) {
    super(
      `Embedding failed for records [${start}, ${end}): ${errorMessage(cause)}`,
      { cause }
    );
    this.name = "EmbeddingBatchError";
  }
}

export class IndexFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IndexFormatError";
  }
}

export class RerankError extends Error {
  constructor(
    message: string,
    readonly scored: number,
    readonly required: number
  ) {
    super(message);
    this.name = "RerankError";
  }
}

export class TimeoutError extends Error {
  constructor(label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
