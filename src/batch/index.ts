/**
 * Batching Module
 *
 * Order-preserving draw call batching.
 */

export { buildBatches } from "./Batcher";
export { createBatchKey, batchKeyEquals, batchKeyToString } from "./BatchKey";
export type { Batch, BatchKey, BatchPlan, BatchRange, BatcherOptions } from "./types";
