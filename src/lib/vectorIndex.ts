import { IndexFormatError, ValidationError } from "./errors";
import { INDEX_VARIANTS, type IndexVariant } from "../types/schemas";

/**
 * In-process nearest-neighbor indices over Float32Array storage.
 *
 * Scores are "higher is more similar" for every variant: inner product for
 * flat-ip and ivf, negated squared Euclidean distance for flat-l2.
 * Results are ordered by descending score, then ascending vector id.
 */

export interface ScoredId {
  id: number;
  score: number;
}

export interface IndexSearchOptions {
  /** Only these vector ids are candidates */
  allowed?: ReadonlySet<number>;
  /** IVF only: clusters to scan for this query */
  nprobe?: number;
}

export interface VectorIndex {
  readonly variant: IndexVariant;
  readonly dimension: number;
  readonly size: number;
  add(vectors: readonly Float32Array[]): void;
  search(query: Float32Array, k: number, options?: IndexSearchOptions): ScoredId[];
  getVector(id: number): Float32Array;
  serialize(): Buffer;
}

export const IVF_THRESHOLD = 100_000;

const MAGIC = 0x49565241; // "ARVI" little-endian
const FORMAT_VERSION = 1;
const HEADER_BYTES = 28;
const KMEANS_ITERATIONS = 10;

const VARIANT_CODES: Record<IndexVariant, number> = {
  "flat-ip": 0,
  "flat-l2": 1,
  ivf: 2,
};

export function dot(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

export function squaredL2(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return sum;
}

export function compareScored(a: ScoredId, b: ScoredId): number {
  return b.score - a.score || a.id - b.id;
}

function topK(scored: ScoredId[], k: number): ScoredId[] {
  return scored.sort(compareScored).slice(0, Math.max(0, k));
}

abstract class BaseIndex implements VectorIndex {
  abstract readonly variant: IndexVariant;
  protected readonly vectors: Float32Array[] = [];

  constructor(readonly dimension: number) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new ValidationError(`Invalid index dimension: ${dimension}`);
    }
  }

  get size(): number {
    return this.vectors.length;
  }

  getVector(id: number): Float32Array {
    const vector = this.vectors[id];
    if (!vector) {
      throw new ValidationError(`Vector id ${id} out of range (size ${this.size})`);
    }
    return vector;
  }

  add(vectors: readonly Float32Array[]): void {
    for (const vector of vectors) {
      this.checkDimension(vector, "Vector");
    }
    for (const vector of vectors) {
      this.insert(vector);
    }
  }

  abstract search(query: Float32Array, k: number, options?: IndexSearchOptions): ScoredId[];

  serialize(): Buffer {
    const extra = this.extraSections();
    const buffer = Buffer.alloc(
      HEADER_BYTES + extra.byteLength + this.size * this.dimension * 4
    );

    buffer.writeUInt32LE(MAGIC, 0);
    buffer.writeUInt32LE(FORMAT_VERSION, 4);
    buffer.writeUInt32LE(VARIANT_CODES[this.variant], 8);
    buffer.writeUInt32LE(this.dimension, 12);
    buffer.writeUInt32LE(this.size, 16);
    const [nlist, nprobe] = this.clusterParams();
    buffer.writeUInt32LE(nlist, 20);
    buffer.writeUInt32LE(nprobe, 24);

    extra.copy(buffer, HEADER_BYTES);
    let offset = HEADER_BYTES + extra.byteLength;
    for (const vector of this.vectors) {
      offset = writeFloats(buffer, vector, offset);
    }
    return buffer;
  }

  protected insert(vector: Float32Array): void {
    this.vectors.push(vector);
  }

  protected clusterParams(): [number, number] {
    return [0, 0];
  }

  protected extraSections(): Buffer {
    return Buffer.alloc(0);
  }

  protected checkDimension(vector: Float32Array, label: string): void {
    if (vector.length !== this.dimension) {
      throw new ValidationError(
        `${label} dimension ${vector.length} does not match index dimension ${this.dimension}`
      );
    }
  }

  protected scoreIds(
    query: Float32Array,
    ids: Iterable<number>,
    score: (a: Float32Array, b: Float32Array) => number
  ): ScoredId[] {
    const scored: ScoredId[] = [];
    for (const id of ids) {
      scored.push({ id, score: score(query, this.vectors[id]) });
    }
    return scored;
  }
}

/**
 * Exact search over every stored vector
 */
export class FlatIndex extends BaseIndex {
  readonly variant: IndexVariant;

  constructor(dimension: number, readonly metric: "ip" | "l2") {
    super(dimension);
    this.variant = metric === "ip" ? "flat-ip" : "flat-l2";
  }

  search(query: Float32Array, k: number, { allowed }: IndexSearchOptions = {}): ScoredId[] {
    this.checkDimension(query, "Query");
    const ids = allowed
      ? [...allowed].filter((id) => id >= 0 && id < this.size)
      : this.vectors.keys();
    const score =
      this.metric === "ip" ? dot : (a: Float32Array, b: Float32Array) => -squaredL2(a, b);
    return topK(this.scoreIds(query, ids, score), k);
  }
}

/**
 * Inverted-file index: vectors are bucketed by their nearest centroid and a
 * query only scans the `nprobe` closest buckets. Approximate; raise nprobe
 * for recall at the cost of latency.
 */
export class IVFIndex extends BaseIndex {
  readonly variant = "ivf" as const;
  private centroids: Float32Array[] = [];
  private lists: number[][] = [];
  private assignments: number[] = [];

  constructor(dimension: number, readonly nlist: number, readonly nprobe: number) {
    super(dimension);
    if (!Number.isInteger(nlist) || nlist <= 0) {
      throw new ValidationError(`nlist must be a positive integer, got ${nlist}`);
    }
    if (!Number.isInteger(nprobe) || nprobe <= 0) {
      throw new ValidationError(`nprobe must be a positive integer, got ${nprobe}`);
    }
  }

  get isTrained(): boolean {
    return this.centroids.length > 0;
  }

  get clusterCount(): number {
    return this.centroids.length;
  }

  /**
   * Deterministic spherical k-means: the first `nlist` vectors seed the
   * centroids, then a fixed number of assign/update rounds
   */
  train(samples: readonly Float32Array[]): void {
    if (samples.length === 0) {
      throw new ValidationError("Cannot train an IVF index without vectors");
    }
    if (this.size > 0) {
      throw new ValidationError("IVF index already holds vectors; train before adding");
    }
    samples.forEach((sample) => this.checkDimension(sample, "Training vector"));

    const count = Math.min(this.nlist, samples.length);
    let centroids: Float32Array[] = samples.slice(0, count).map((sample) => Float32Array.from(sample));

    for (let iteration = 0; iteration < KMEANS_ITERATIONS; iteration++) {
      const sums = centroids.map(() => new Float32Array(this.dimension));
      const sizes = new Array<number>(count).fill(0);

      for (const sample of samples) {
        const cluster = nearestCentroid(centroids, sample);
        sizes[cluster]++;
        const sum = sums[cluster];
        for (let i = 0; i < this.dimension; i++) sum[i] += sample[i];
      }

      centroids = sums.map((sum, cluster) =>
        sizes[cluster] === 0 ? centroids[cluster] : unitOrSelf(sum)
      );
    }

    this.centroids = centroids;
    this.lists = centroids.map(() => []);
  }

  search(
    query: Float32Array,
    k: number,
    { allowed, nprobe = this.nprobe }: IndexSearchOptions = {}
  ): ScoredId[] {
    this.checkDimension(query, "Query");
    if (!this.isTrained) return [];

    const probes = topK(
      this.centroids.map((centroid, id) => ({ id, score: dot(query, centroid) })),
      nprobe
    );

    const ids: number[] = [];
    for (const probe of probes) {
      for (const id of this.lists[probe.id]) {
        if (!allowed || allowed.has(id)) ids.push(id);
      }
    }
    return topK(this.scoreIds(query, ids, dot), k);
  }

  protected insert(vector: Float32Array): void {
    if (!this.isTrained) {
      throw new ValidationError("IVF index must be trained before adding vectors");
    }
    const cluster = nearestCentroid(this.centroids, vector);
    this.lists[cluster].push(this.vectors.length);
    this.assignments.push(cluster);
    super.insert(vector);
  }

  protected clusterParams(): [number, number] {
    return [this.centroids.length, this.nprobe];
  }

  protected extraSections(): Buffer {
    const buffer = Buffer.alloc(
      this.centroids.length * this.dimension * 4 + this.assignments.length * 4
    );
    let offset = 0;
    for (const centroid of this.centroids) {
      offset = writeFloats(buffer, centroid, offset);
    }
    for (const cluster of this.assignments) {
      offset = buffer.writeUInt32LE(cluster, offset);
    }
    return buffer;
  }

  /** @internal used by deserializeIndex */
  restore(centroids: Float32Array[], assignments: number[], vectors: Float32Array[]): void {
    this.centroids = centroids;
    this.lists = centroids.map(() => []);
    this.assignments = [];
    vectors.forEach((vector, id) => {
      const cluster = assignments[id];
      if (cluster === undefined || cluster >= centroids.length) {
        throw new IndexFormatError(`Vector ${id} has invalid cluster ${cluster}`);
      }
      this.lists[cluster].push(id);
      this.assignments.push(cluster);
      this.vectors.push(vector);
    });
  }
}

function nearestCentroid(centroids: readonly Float32Array[], vector: Float32Array): number {
  let best = 0;
  let bestScore = -Infinity;
  centroids.forEach((centroid, cluster) => {
    const score = dot(vector, centroid);
    if (score > bestScore) {
      bestScore = score;
      best = cluster;
    }
  });
  return best;
}

function unitOrSelf(vector: Float32Array): Float32Array {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) sum += vector[i] * vector[i];
  const norm = Math.sqrt(sum);
  if (norm === 0) return vector;
  for (let i = 0; i < vector.length; i++) vector[i] /= norm;
  return vector;
}

function writeFloats(buffer: Buffer, values: Float32Array, offset: number): number {
  let cursor = offset;
  for (let i = 0; i < values.length; i++) {
    cursor = buffer.writeFloatLE(values[i], cursor);
  }
  return cursor;
}

function readFloats(buffer: Buffer, offset: number, length: number): Float32Array {
  const values = new Float32Array(length);
  for (let i = 0; i < length; i++) {
    values[i] = buffer.readFloatLE(offset + i * 4);
  }
  return values;
}

export interface CreateIndexOptions {
  variant: IndexVariant;
  dimension: number;
  nlist?: number;
  nprobe?: number;
}

export function createIndex({ variant, dimension, nlist = 100, nprobe = 10 }: CreateIndexOptions): VectorIndex {
  switch (variant) {
    case "flat-ip":
      return new FlatIndex(dimension, "ip");
    case "flat-l2":
      return new FlatIndex(dimension, "l2");
    case "ivf":
      return new IVFIndex(dimension, nlist, nprobe);
  }
}

/**
 * Pick exact search for small corpora and IVF past IVF_THRESHOLD vectors.
 * IVF scores by inner product, so it is only chosen for normalized vectors.
 */
export function chooseVariant(count: number, normalized: boolean): IndexVariant {
  if (!normalized) return "flat-l2";
  return count >= IVF_THRESHOLD ? "ivf" : "flat-ip";
}

export function deserializeIndex(buffer: Buffer): VectorIndex {
  if (buffer.byteLength < HEADER_BYTES || buffer.readUInt32LE(0) !== MAGIC) {
    throw new IndexFormatError("Not a vector index file");
  }
  const version = buffer.readUInt32LE(4);
  if (version !== FORMAT_VERSION) {
    throw new IndexFormatError(`Unsupported index format version ${version}`);
  }

  const code = buffer.readUInt32LE(8);
  const variant = INDEX_VARIANTS.find((name) => VARIANT_CODES[name] === code);
  if (!variant) {
    throw new IndexFormatError(`Unknown index variant code ${code}`);
  }

  const dimension = buffer.readUInt32LE(12);
  const count = buffer.readUInt32LE(16);
  const nlist = buffer.readUInt32LE(20);
  const nprobe = buffer.readUInt32LE(24);

  const clusterBytes = variant === "ivf" ? nlist * dimension * 4 + count * 4 : 0;
  const expected = HEADER_BYTES + clusterBytes + count * dimension * 4;
  if (buffer.byteLength !== expected) {
    throw new IndexFormatError(
      `Index file has ${buffer.byteLength} bytes, expected ${expected}`
    );
  }

  let offset = HEADER_BYTES;
  const centroids: Float32Array[] = [];
  const assignments: number[] = [];
  if (variant === "ivf") {
    for (let c = 0; c < nlist; c++) {
      centroids.push(readFloats(buffer, offset, dimension));
      offset += dimension * 4;
    }
    for (let id = 0; id < count; id++) {
      assignments.push(buffer.readUInt32LE(offset));
      offset += 4;
    }
  }

  const vectors: Float32Array[] = [];
  for (let id = 0; id < count; id++) {
    vectors.push(readFloats(buffer, offset, dimension));
    offset += dimension * 4;
  }

  if (variant === "ivf") {
    const index = new IVFIndex(dimension, Math.max(nlist, 1), Math.max(nprobe, 1));
    index.restore(centroids, assignments, vectors);
    return index;
  }

  const index = createIndex({ variant, dimension });
  index.add(vectors);
  return index;
}
