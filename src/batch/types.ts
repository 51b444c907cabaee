/**
 * Batch Types
 */

import type { BindGroup } from "../backend/types";
import type { TextureId, TransformId } from "../geometry/types";

/** Key for grouping consecutive sprites into one draw call */
export interface BatchKey {
  textureId: TextureId;
  /** Group transform id, null for none */
  transformId: TransformId | null;
}

/** A run of quads sharing one key */
export interface BatchRange {
  key: BatchKey;
  /** First quad of the run in the combined vertex buffer */
  start: number;
  /** Number of quads in the run */
  count: number;
}

export interface BatchPlan {
  ranges: BatchRange[];
  /**
   * Permutation applied to the geometry in reorderable mode:
   * new position i holds the quad originally submitted at order[i].
   * Null when submission order is kept.
   */
  order: Uint32Array | null;
}

export interface BatcherOptions {
  /**
   * Group sprites by key regardless of submission order. Only valid when the
   * caller guarantees that sprites with different keys never overlap.
   */
  reorderable?: boolean;
}

/** A finalized batch, ready for the draw executor */
export interface Batch {
  readonly textureId: TextureId;
  readonly transformId: TransformId | null;
  readonly bindGroup: BindGroup;
  /** Byte offset of this batch's target uniform block */
  readonly uniformOffset: number;
  /** First quad in the combined vertex buffer */
  readonly start: number;
  /** Number of quads */
  readonly count: number;
}
