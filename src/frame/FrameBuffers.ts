/**
 * Frame Buffers
 *
 * Owns the growable vertex storage for a frame plus the three GPU buffers the
 * draw calls read: vertices, the shared quad index pattern, and the target
 * uniform blocks (one per distinct group transform).
 *
 * Contents are rewritten from offset 0 every frame. GPU buffers are only
 * reallocated when the frame outgrows them, by doubling.
 */

import { DynamicBuffer } from "./DynamicBuffer";
import {
  FLOATS_PER_QUAD,
  INDICES_PER_QUAD,
  writeQuadIndices,
} from "../geometry/QuadBuilder";
import { alignTo, TARGET_UNIFORMS_SIZE, writeTargetUniforms } from "../backend/uniforms";
import { create as createMat4, type Mat4 } from "../math/mat4";
import { InvalidStateError } from "../errors";
import type { BufferKind, GpuBackend, GpuBuffer, PassDescriptor } from "../backend/types";

/** Bytes per float */
const FLOAT_SIZE = 4;
/** Bytes per 32-bit index */
const INDEX_SIZE = 4;

const IDENTITY = createMat4();

/** The part of the backend that manages buffers */
export type BufferBackend = Pick<
  GpuBackend,
  "uniformOffsetAlignment" | "createBuffer" | "writeBuffer" | "destroyBuffer"
>;

export interface FrameBuffersOptions {
  /** Quads to allocate room for up front (default: 1024) */
  initialQuadCapacity?: number;
  /** Hard cap on quads per frame (default: 1 << 20) */
  maxQuads?: number;
}

export interface TargetSize {
  width: number;
  height: number;
}

/** Everything the draw executor needs from an uploaded frame */
export interface FrameBindings {
  pass: PassDescriptor;
  uniformBuffer: GpuBuffer;
  uniformBlockSize: number;
}

export class FrameBuffers {
  readonly backend: BufferBackend;
  readonly vertices: DynamicBuffer;
  /** Byte distance between consecutive target uniform blocks */
  readonly uniformStride: number;

  private readonly initialQuadCapacity: number;

  private vertexBuffer: GpuBuffer | null = null;
  private indexBuffer: GpuBuffer | null = null;
  private uniformBuffer: GpuBuffer | null = null;
  private indexQuadCapacity = 0;
  private uniformStaging = new Uint8Array(0);

  private _uploaded = false;
  private _reallocations = 0;
  private _destroyed = false;

  constructor(backend: BufferBackend, options: FrameBuffersOptions = {}) {
    this.backend = backend;
    this.initialQuadCapacity = options.initialQuadCapacity ?? 1024;
    this.vertices = new DynamicBuffer({
      recordSize: FLOATS_PER_QUAD,
      initialCapacity: this.initialQuadCapacity,
      maxRecords: options.maxQuads ?? 1 << 20,
    });
    this.uniformStride = alignTo(TARGET_UNIFORMS_SIZE, backend.uniformOffsetAlignment);
  }

  /** Number of quads written this frame */
  get quadCount(): number {
    return this.vertices.count;
  }

  /** Whether the current contents have been staged on the GPU */
  get uploaded(): boolean {
    return this._uploaded;
  }

  /** GPU buffers created or recreated since construction */
  get reallocations(): number {
    return this._reallocations;
  }

  /**
   * Reset for a new frame (keeps CPU and GPU allocations)
   */
  reset(): void {
    this.assertAlive();
    this.vertices.reset();
    this._uploaded = false;
  }

  /**
   * Stage the frame's vertices, indices and target uniforms on the GPU.
   *
   * @param target - Render target size in pixels
   * @param transforms - Group transform per uniform slot (null = identity)
   * @returns Byte offset of each slot's uniform block
   */
  upload(target: TargetSize, transforms: ReadonlyArray<Mat4 | null>): number[] {
    this.assertAlive();
    if (this._uploaded) {
      throw new InvalidStateError("Frame buffers already uploaded - call reset() first");
    }

    const quads = this.vertices.count;
    const offsets = transforms.map((_, slot) => slot * this.uniformStride);

    if (quads > 0) {
      this.uploadVertices(quads);
      this.uploadIndices(quads);
      this.uploadUniforms(target, transforms);
    }

    this._uploaded = true;
    return offsets;
  }

  /**
   * Bindings for the draw executor.
   *
   * @throws InvalidStateError if nothing has been uploaded
   */
  bindings(): FrameBindings {
    if (!this._uploaded || !this.vertexBuffer || !this.indexBuffer || !this.uniformBuffer) {
      throw new InvalidStateError("Frame buffers have not been uploaded");
    }
    return {
      pass: { vertexBuffer: this.vertexBuffer, indexBuffer: this.indexBuffer },
      uniformBuffer: this.uniformBuffer,
      uniformBlockSize: TARGET_UNIFORMS_SIZE,
    };
  }

  private uploadVertices(quads: number): void {
    const needed = quads * FLOATS_PER_QUAD * FLOAT_SIZE;
    const minimum = this.initialQuadCapacity * FLOATS_PER_QUAD * FLOAT_SIZE;
    this.vertexBuffer = this.ensureGpuBuffer(this.vertexBuffer, "vertex", needed, minimum);
    this.backend.writeBuffer(this.vertexBuffer, 0, this.vertices.view());
  }

  private uploadIndices(quads: number): void {
    // The index pattern does not depend on frame contents, so it is only
    // rewritten when the quad capacity grows
    if (this.indexBuffer && quads <= this.indexQuadCapacity) return;

    const capacity = Math.max(quads, this.indexQuadCapacity * 2, this.initialQuadCapacity);
    const indices = new Uint32Array(capacity * INDICES_PER_QUAD);
    writeQuadIndices(indices, 0, capacity);

    this.indexBuffer = this.ensureGpuBuffer(
      this.indexBuffer,
      "index",
      capacity * INDICES_PER_QUAD * INDEX_SIZE,
      0
    );
    this.backend.writeBuffer(this.indexBuffer, 0, indices);
    this.indexQuadCapacity = capacity;
  }

  private uploadUniforms(target: TargetSize, transforms: ReadonlyArray<Mat4 | null>): void {
    const slots = Math.max(transforms.length, 1);
    const needed = slots * this.uniformStride;

    if (this.uniformStaging.byteLength < needed) {
      this.uniformStaging = new Uint8Array(needed);
    }
    const view = new DataView(this.uniformStaging.buffer, 0, needed);
    for (let slot = 0; slot < slots; slot++) {
      writeTargetUniforms(
        view,
        slot * this.uniformStride,
        target.width,
        target.height,
        transforms[slot] ?? IDENTITY
      );
    }

    this.uniformBuffer = this.ensureGpuBuffer(this.uniformBuffer, "uniform", needed, 0);
    this.backend.writeBuffer(this.uniformBuffer, 0, this.uniformStaging.subarray(0, needed));
  }

  /** Return `current` if it holds `needed` bytes, else a larger replacement */
  private ensureGpuBuffer(
    current: GpuBuffer | null,
    kind: BufferKind,
    needed: number,
    minimum: number
  ): GpuBuffer {
    if (current && current.byteLength >= needed) return current;

    // Grow by 2x
    const byteLength = Math.max(needed, (current?.byteLength ?? 0) * 2, minimum);
    const replacement = this.backend.createBuffer(kind, byteLength);
    if (current) {
      this.backend.destroyBuffer(current);
    }
    this._reallocations++;
    return replacement;
  }

  /**
   * Release GPU buffers
   */
  destroy(): void {
    if (this._destroyed) return;

    for (const buffer of [this.vertexBuffer, this.indexBuffer, this.uniformBuffer]) {
      if (buffer) this.backend.destroyBuffer(buffer);
    }
    this.vertexBuffer = null;
    this.indexBuffer = null;
    this.uniformBuffer = null;
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  private assertAlive(): void {
    if (this._destroyed) {
      throw new InvalidStateError("Frame buffers have been destroyed");
    }
  }
}
