import { describe, it, expect } from "vitest";
import { buildBatches } from "./Batcher";
import { createBatchKey, batchKeyEquals, batchKeyToString } from "./BatchKey";
import type { BatchKey } from "./types";

function keysFor(textures: string[], transformId: string | null = null): BatchKey[] {
  return textures.map((t) => createBatchKey(t, transformId));
}

/** Deterministic pseudo-random stream of keys */
function randomKeys(seed: number, length: number): BatchKey[] {
  let state = seed;
  const next = () => {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    return state;
  };
  const keys: BatchKey[] = [];
  for (let i = 0; i < length; i++) {
    const texture = ["a", "b", "c"][next() % 3]!;
    const transform = next() % 4 === 0 ? "group" : null;
    keys.push(createBatchKey(texture, transform));
  }
  return keys;
}

function countRuns(keys: BatchKey[]): number {
  let runs = 0;
  for (let i = 0; i < keys.length; i++) {
    if (i === 0 || !batchKeyEquals(keys[i - 1]!, keys[i]!)) runs++;
  }
  return runs;
}

describe("buildBatches", () => {
  it("yields zero batches for an empty stream", () => {
    const plan = buildBatches([]);
    expect(plan.ranges).toEqual([]);
    expect(plan.order).toBeNull();
  });

  it("merges a single-texture stream into one batch", () => {
    const plan = buildBatches(keysFor(["a", "a", "a", "a", "a"]));
    expect(plan.ranges).toEqual([{ key: createBatchKey("a"), start: 0, count: 5 }]);
  });

  it("never merges non-contiguous runs of the same texture", () => {
    const plan = buildBatches(keysFor(["a", "a", "a", "b", "b", "a"]));

    expect(plan.ranges.map((r) => [r.key.textureId, r.start, r.start + r.count])).toEqual([
      ["a", 0, 3],
      ["b", 3, 5],
      ["a", 5, 6],
    ]);
  });

  it("emits one batch per sprite when two textures alternate", () => {
    const textures = Array.from({ length: 100 }, (_, i) => (i % 2 === 0 ? "a" : "b"));
    const plan = buildBatches(keysFor(textures));

    expect(plan.ranges).toHaveLength(100);
    expect(plan.ranges.every((r) => r.count === 1)).toBe(true);
  });

  it("splits on transform changes within one texture", () => {
    const keys = [
      createBatchKey("a", null),
      createBatchKey("a", null),
      createBatchKey("a", "panel"),
      createBatchKey("a", "panel"),
      createBatchKey("a", null),
    ];

    const plan = buildBatches(keys);

    expect(plan.ranges.map((r) => [r.key.transformId, r.count])).toEqual([
      [null, 2],
      ["panel", 2],
      [null, 1],
    ]);
  });

  it("treats numeric and string ids as different textures", () => {
    const plan = buildBatches([createBatchKey(1), createBatchKey("1")]);
    expect(plan.ranges).toHaveLength(2);
  });

  it("merges consecutive NaN ids into one batch", () => {
    const plan = buildBatches([createBatchKey(NaN), createBatchKey(NaN), createBatchKey(NaN, NaN)]);

    expect(plan.ranges.map(({ start, count }) => [start, count])).toEqual([
      [0, 2],
      [2, 1],
    ]);
  });

  describe("for arbitrary streams", () => {
    const seeds = [1, 7, 42, 1234, 99991];

    it("emits exactly one batch per maximal run", () => {
      for (const seed of seeds) {
        const keys = randomKeys(seed, 200);
        expect(buildBatches(keys).ranges).toHaveLength(countRuns(keys));
      }
    });

    it("covers the stream in order with no gaps or overlap", () => {
      for (const seed of seeds) {
        const keys = randomKeys(seed, 200);
        const { ranges } = buildBatches(keys);

        const covered: number[] = [];
        for (const range of ranges) {
          for (let i = range.start; i < range.start + range.count; i++) {
            expect(batchKeyEquals(keys[i]!, range.key)).toBe(true);
            covered.push(i);
          }
        }
        expect(covered).toEqual(keys.map((_, i) => i));
      }
    });
  });

  describe("reorderable mode", () => {
    it("groups by key in order of first appearance", () => {
      const plan = buildBatches(keysFor(["a", "b", "a", "c", "b", "a"]), { reorderable: true });

      expect(plan.ranges.map((r) => [r.key.textureId, r.start, r.count])).toEqual([
        ["a", 0, 3],
        ["b", 3, 2],
        ["c", 5, 1],
      ]);
      expect(Array.from(plan.order ?? [])).toEqual([0, 2, 5, 1, 4, 3]);
    });

    it("turns the alternating worst case into two batches", () => {
      const textures = Array.from({ length: 100 }, (_, i) => (i % 2 === 0 ? "a" : "b"));
      const plan = buildBatches(keysFor(textures), { reorderable: true });

      expect(plan.ranges).toHaveLength(2);
    });
  });
});

describe("BatchKey", () => {
  it("defaults a missing transform to null", () => {
    expect(createBatchKey("a")).toEqual({ textureId: "a", transformId: null });
  });

  it("compares ids the way Map keys do", () => {
    expect(batchKeyEquals(createBatchKey(NaN), createBatchKey(NaN))).toBe(true);
    expect(batchKeyEquals(createBatchKey(0), createBatchKey(-0))).toBe(true);
    expect(batchKeyEquals(createBatchKey("a", NaN), createBatchKey("a", NaN))).toBe(true);
    expect(batchKeyEquals(createBatchKey(1), createBatchKey("1"))).toBe(false);
  });

  it("produces distinct strings for distinct keys", () => {
    expect(batchKeyToString(createBatchKey("a"))).toBe("sa|-");
    expect(batchKeyToString(createBatchKey(1, "g"))).toBe("n1|sg");
    expect(batchKeyToString(createBatchKey("1"))).not.toBe(batchKeyToString(createBatchKey(1)));
  });
});
