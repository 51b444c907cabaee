/**
 * Dynamic vertex storage for one frame
 *
 * Accumulates fixed-size float records (one per quad) on the CPU.
 * Grows by 2x as needed, up to a hard record limit.
 */

import { BufferOverflowError } from "../errors";

export interface DynamicBufferOptions {
  /** Floats per record */
  recordSize: number;
  /** Initial capacity in records (default: 1024) */
  initialCapacity?: number;
  /** Hard cap in records; growing past it throws BufferOverflowError */
  maxRecords?: number;
}

export class DynamicBuffer {
  readonly recordSize: number;
  readonly maxRecords: number;

  private data: Float32Array;
  private capacity: number;
  private length = 0;

  constructor(options: DynamicBufferOptions) {
    this.recordSize = options.recordSize;
    this.maxRecords = options.maxRecords ?? Number.MAX_SAFE_INTEGER;
    this.capacity = Math.min(options.initialCapacity ?? 1024, this.maxRecords);
    this.data = new Float32Array(this.capacity * this.recordSize);
  }

  /**
   * Current number of records
   */
  get count(): number {
    return this.length;
  }

  /**
   * Capacity in records before the next reallocation
   */
  get recordCapacity(): number {
    return this.capacity;
  }

  /**
   * Reset for a new frame (keeps the allocation)
   */
  reset(): void {
    this.length = 0;
  }

  /**
   * Append `count` records and return the view to write them into.
   *
   * @throws BufferOverflowError if the buffer would exceed maxRecords
   */
  append(count = 1): Float32Array {
    this.ensureCapacity(this.length + count);
    const start = this.length * this.recordSize;
    this.length += count;
    return this.data.subarray(start, this.length * this.recordSize);
  }

  /**
   * View of the records written so far
   */
  view(): Float32Array {
    return this.data.subarray(0, this.length * this.recordSize);
  }

  /**
   * Reorder records: record i becomes the record previously at order[i].
   */
  permute(order: Uint32Array): void {
    if (order.length !== this.length) {
      throw new Error(`Permutation length ${order.length} does not match ${this.length} records`);
    }

    const size = this.recordSize;
    const source = this.data.slice(0, this.length * size);
    for (let i = 0; i < order.length; i++) {
      const from = order[i]! * size;
      this.data.set(source.subarray(from, from + size), i * size);
    }
  }

  /**
   * Ensure we have enough capacity
   */
  private ensureCapacity(needed: number): void {
    if (needed <= this.capacity) return;
    if (needed > this.maxRecords) {
      throw new BufferOverflowError(needed, this.maxRecords);
    }

    // Grow by 2x, clamped to the hard cap
    const newCapacity = Math.min(Math.max(needed, this.capacity * 2), this.maxRecords);
    const newData = new Float32Array(newCapacity * this.recordSize);

    // Copy existing data
    newData.set(this.data.subarray(0, this.length * this.recordSize));
    this.data = newData;
    this.capacity = newCapacity;
  }
}
