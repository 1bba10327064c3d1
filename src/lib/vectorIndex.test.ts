import { IndexFormatError, ValidationError } from "./errors";
import {
  chooseVariant,
  createIndex,
  deserializeIndex,
  FlatIndex,
  IVF_THRESHOLD,
  IVFIndex,
} from "./vectorIndex";

const v = (...values: number[]): Float32Array => Float32Array.from(values);

describe("FlatIndex", () => {
  it("ranks by inner product", () => {
    const index = new FlatIndex(2, "ip");
    index.add([v(1, 0), v(0, 1), v(0.6, 0.8)]);

    expect(index.search(v(0, 1), 2)).toEqual([
      { id: 1, score: 1 },
      { id: 2, score: Math.fround(0.8) },
    ]);
  });

  it("ranks by negative squared distance", () => {
    const index = new FlatIndex(2, "l2");
    index.add([v(0, 0), v(3, 4), v(1, 0)]);

    expect(index.search(v(0, 0), 3)).toEqual([
      { id: 0, score: -0 },
      { id: 2, score: -1 },
      { id: 1, score: -25 },
    ]);
  });

  it("breaks score ties by ascending id", () => {
    const index = new FlatIndex(2, "ip");
    index.add([v(1, 0), v(0, 1), v(1, 0), v(1, 0)]);

    expect(index.search(v(1, 0), 3).map((hit) => hit.id)).toEqual([0, 2, 3]);
  });

  it("returns its own vector first for a stored query", () => {
    const index = new FlatIndex(3, "ip");
    const vectors = [v(1, 0, 0), v(0, 0.6, 0.8), v(0.8, 0.6, 0)];
    index.add(vectors);

    vectors.forEach((vector, id) => {
      expect(index.search(vector, 1)[0].id).toBe(id);
    });
  });

  it("only scores allowed ids", () => {
    const index = new FlatIndex(2, "ip");
    index.add([v(1, 0), v(0.9, 0.1), v(0, 1)]);

    const hits = index.search(v(1, 0), 5, { allowed: new Set([1, 2, 7]) });

    expect(hits.map((hit) => hit.id)).toEqual([1, 2]);
  });

  it("rejects vectors of the wrong dimension without adding any", () => {
    const index = new FlatIndex(2, "ip");

    expect(() => index.add([v(1, 0), v(1, 0, 0)])).toThrow(ValidationError);
    expect(index.size).toBe(0);
    expect(() => index.search(v(1), 1)).toThrow(ValidationError);
  });

  it("rejects an out-of-range vector id", () => {
    expect(() => new FlatIndex(2, "ip").getVector(0)).toThrow("Vector id 0 out of range (size 0)");
  });
});

describe("IVFIndex", () => {
  const vectors = [v(1, 0), v(0, 1), v(0.96, 0.28), v(0.28, 0.96)];

  function trained(nprobe = 1): IVFIndex {
    const index = new IVFIndex(2, 2, nprobe);
    index.train(vectors);
    index.add(vectors);
    return index;
  }

  it("must be trained before vectors are added", () => {
    expect(() => new IVFIndex(2, 2, 1).add([v(1, 0)])).toThrow(
      "IVF index must be trained before adding vectors"
    );
  });

  it("cannot be trained on no vectors", () => {
    expect(() => new IVFIndex(2, 2, 1).train([])).toThrow(ValidationError);
  });

  it("caps clusters at the number of training vectors", () => {
    const index = new IVFIndex(2, 10, 1);
    index.train(vectors);

    expect(index.clusterCount).toBe(4);
  });

  it("scans only the probed cluster", () => {
    const index = trained(1);

    expect(index.search(v(1, 0), 4).map((hit) => hit.id)).toEqual([0, 2]);
  });

  it("finds every vector when all clusters are probed", () => {
    const index = trained(1);

    expect(index.search(v(1, 0), 4, { nprobe: 2 }).map((hit) => hit.id)).toEqual([0, 2, 3, 1]);
  });
});

describe("serialization", () => {
  it("restores a flat index", () => {
    const index = createIndex({ variant: "flat-l2", dimension: 2 });
    index.add([v(1, 2), v(3, 4)]);

    const restored = deserializeIndex(index.serialize());

    expect(restored.variant).toBe("flat-l2");
    expect(restored.size).toBe(2);
    expect(Array.from(restored.getVector(1))).toEqual([3, 4]);
    expect(restored.search(v(3, 4), 1)).toEqual(index.search(v(3, 4), 1));
  });

  it("restores an IVF index with its clusters", () => {
    const index = new IVFIndex(2, 2, 1);
    const vectors = [v(1, 0), v(0, 1), v(0.96, 0.28)];
    index.train(vectors);
    index.add(vectors);

    const restored = deserializeIndex(index.serialize());

    expect(restored).toBeInstanceOf(IVFIndex);
    expect(restored.search(v(1, 0), 3)).toEqual(index.search(v(1, 0), 3));
  });

  it("rejects foreign and truncated files", () => {
    const index = createIndex({ variant: "flat-ip", dimension: 2 });
    index.add([v(1, 0)]);
    const bytes = index.serialize();

    expect(() => deserializeIndex(Buffer.from("not an index file at all....."))).toThrow(IndexFormatError);
    expect(() => deserializeIndex(bytes.subarray(0, bytes.length - 4))).toThrow(IndexFormatError);
  });
});

describe("chooseVariant", () => {
  it("uses exact inner product below the IVF threshold", () => {
    expect(chooseVariant(IVF_THRESHOLD - 1, true)).toBe("flat-ip");
    expect(chooseVariant(IVF_THRESHOLD, true)).toBe("ivf");
  });

  it("uses L2 for unnormalized vectors", () => {
    expect(chooseVariant(IVF_THRESHOLD, false)).toBe("flat-l2");
  });
});
