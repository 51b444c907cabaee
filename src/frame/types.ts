/**
 * Frame Types
 */

export type FrameState = "building" | "finalized" | "executed" | "discarded";

export interface FrameOptions {
  /**
   * Group sprites by texture and transform regardless of submission order.
   * Only correct when sprites with different keys never overlap.
   */
  reorderable?: boolean;
}
