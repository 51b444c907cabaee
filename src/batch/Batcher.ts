/**
 * Batcher
 *
 * Groups an ordered sprite stream into the fewest draw calls that keep
 * painter's order: only consecutive sprites sharing a texture and a group
 * transform are merged. The batch count always equals the number of maximal
 * equal-key runs in the input.
 *
 * Interleaving textures sprite by sprite therefore costs one draw call per
 * sprite. Callers that can should submit sprites grouped by texture, or opt
 * into reorderable mode when nothing overlaps.
 */

import { batchKeyEquals, batchKeyToString } from "./BatchKey";
import type { BatchKey, BatchPlan, BatchRange, BatcherOptions } from "./types";

/**
 * Build batch ranges for a frame.
 *
 * @param keys - One key per sprite, in submission order
 * @param options - Batching options
 */
export function buildBatches(
  keys: readonly BatchKey[],
  options: BatcherOptions = {}
): BatchPlan {
  if (options.reorderable) {
    return groupByKey(keys);
  }
  return { ranges: scanRuns(keys), order: null };
}

/** Single left-to-right scan, O(n) with O(1) state */
function scanRuns(keys: readonly BatchKey[]): BatchRange[] {
  const ranges: BatchRange[] = [];

  let current: BatchKey | null = null;
  let start = 0;

  for (let i = 0; i < keys.length; i++) {
    const key = keys[i]!;
    if (current && batchKeyEquals(current, key)) continue;

    if (current) {
      ranges.push({ key: current, start, count: i - start });
    }
    current = key;
    start = i;
  }

  if (current) {
    ranges.push({ key: current, start, count: keys.length - start });
  }

  return ranges;
}

/**
 * Stable grouping by key, keys ordered by first appearance. Sprites keep
 * their relative order within a key.
 */
function groupByKey(keys: readonly BatchKey[]): BatchPlan {
  const groups = new Map<string, { key: BatchKey; members: number[] }>();

  for (let i = 0; i < keys.length; i++) {
    const key = keys[i]!;
    const id = batchKeyToString(key);
    let group = groups.get(id);
    if (!group) {
      group = { key, members: [] };
      groups.set(id, group);
    }
    group.members.push(i);
  }

  const ranges: BatchRange[] = [];
  const order = new Uint32Array(keys.length);
  let next = 0;

  for (const { key, members } of groups.values()) {
    ranges.push({ key, start: next, count: members.length });
    for (const index of members) {
      order[next++] = index;
    }
  }

  return { ranges, order };
}
