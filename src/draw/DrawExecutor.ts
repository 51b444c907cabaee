/**
 * Draw Executor
 *
 * Walks finalized batches in order and issues one indexed draw call per
 * batch, skipping bind group and uniform rebinds that would repeat the
 * previous batch's state.
 */

import { INDICES_PER_QUAD } from "../geometry/QuadBuilder";
import type { Batch } from "../batch/types";
import type { GpuBackend } from "../backend/types";
import type { FrameBindings } from "../frame/FrameBuffers";

/** The part of the backend that records draw commands */
export type DrawBackend = Pick<
  GpuBackend,
  "beginPass" | "setBindGroup" | "setUniforms" | "drawIndexed" | "endPass"
>;

export interface DrawStats {
  /** Draw calls issued (one per batch) */
  drawCalls: number;
  /** setBindGroup calls, including the first bind of the pass */
  bindGroupSwitches: number;
  /** setUniforms calls, including the first bind of the pass */
  uniformBinds: number;
  /** Quads drawn */
  sprites: number;
}

export const EMPTY_STATS: Readonly<DrawStats> = Object.freeze({
  drawCalls: 0,
  bindGroupSwitches: 0,
  uniformBinds: 0,
  sprites: 0,
});

/**
 * Execute batches against a backend.
 *
 * @param backend - Backend receiving the draw commands
 * @param batches - Finalized batches in draw order
 * @param bindings - Uploaded frame buffers; only read when there is a batch
 */
export function executeBatches(
  backend: DrawBackend,
  batches: readonly Batch[],
  bindings: () => FrameBindings
): DrawStats {
  if (batches.length === 0) return { ...EMPTY_STATS };

  const { pass, uniformBuffer, uniformBlockSize } = bindings();
  const stats: DrawStats = { ...EMPTY_STATS };

  let currentBindGroup: number | null = null;
  let currentUniformOffset: number | null = null;

  backend.beginPass(pass);

  // A failed draw still closes the pass
  try {
    for (const batch of batches) {
      if (batch.bindGroup.id !== currentBindGroup) {
        currentBindGroup = batch.bindGroup.id;
        backend.setBindGroup(batch.bindGroup);
        stats.bindGroupSwitches++;
      }

      if (batch.uniformOffset !== currentUniformOffset) {
        currentUniformOffset = batch.uniformOffset;
        backend.setUniforms(uniformBuffer, batch.uniformOffset, uniformBlockSize);
        stats.uniformBinds++;
      }

      backend.drawIndexed(batch.start * INDICES_PER_QUAD, batch.count * INDICES_PER_QUAD);
      stats.drawCalls++;
      stats.sprites += batch.count;
    }
  } finally {
    backend.endPass();
  }

  return stats;
}
