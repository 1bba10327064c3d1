/**
 * Embedding collaborators and vector helpers
 *
 * The indexer and searcher never call a model directly: they take an
 * Embedder, so tests can pass a deterministic stub.
 */

export interface Embedder {
  /** Model identifier recorded in the index config */
  readonly modelName: string;
  /** Output dimensionality, when known before the first call */
  readonly dimension?: number;
  embed(texts: string[]): Promise<number[][]>;
}

/**
 * Scale a vector to unit length. Zero vectors are returned unchanged.
 */
export function l2Normalize(vector: ArrayLike<number>): Float32Array {
  const out = Float32Array.from(vector);
  let sum = 0;
  for (let i = 0; i < out.length; i++) sum += out[i] * out[i];
  const norm = Math.sqrt(sum);
  if (norm === 0) return out;
  for (let i = 0; i < out.length; i++) out[i] /= norm;
  return out;
}

/**
 * Embed texts and check the shape of what came back
 */
export async function embedChecked(
  embedder: Embedder,
  texts: string[],
  expectedDimension?: number
): Promise<Float32Array[]> {
  const vectors = await embedder.embed(texts);

  if (vectors.length !== texts.length) {
    throw new Error(`Embedder returned ${vectors.length} vectors for ${texts.length} texts`);
  }

  const dimension = expectedDimension ?? vectors[0]?.length;
  return vectors.map((vector, i) => {
    if (vector.length === 0 || vector.length !== dimension) {
      throw new Error(
        `Embedding ${i} has dimension ${vector.length}, expected ${dimension}`
      );
    }
    if (vector.some((value) => !Number.isFinite(value))) {
      throw new Error(`Embedding ${i} contains non-finite values`);
    }
    return Float32Array.from(vector);
  });
}
