/**
 * GPU Backend Types
 *
 * The batching core talks to the GPU only through this contract: buffer
 * uploads, bind group and uniform binding, and indexed draw calls.
 */

export type BufferKind = "vertex" | "index" | "uniform";

/** A backend-owned GPU buffer */
export interface GpuBuffer {
  readonly id: number;
  readonly kind: BufferKind;
  readonly byteLength: number;
}

/** A texture, its sampler and its 16-byte texture uniform block bound together */
export interface BindGroup {
  readonly id: number;
}

/** Buffers used for every draw call of a pass */
export interface PassDescriptor {
  vertexBuffer: GpuBuffer;
  indexBuffer: GpuBuffer;
}

export interface GpuBackend<TTexture = unknown> {
  /** Required alignment in bytes of uniform offsets passed to setUniforms */
  readonly uniformOffsetAlignment: number;

  createBuffer(kind: BufferKind, byteLength: number): GpuBuffer;
  /** Copy `data` into `buffer` starting at `byteOffset` */
  writeBuffer(buffer: GpuBuffer, byteOffset: number, data: ArrayBufferView): void;
  destroyBuffer(buffer: GpuBuffer): void;

  createBindGroup(texture: TTexture, uniforms: GpuBuffer): BindGroup;
  destroyBindGroup(bindGroup: BindGroup): void;

  beginPass(pass: PassDescriptor): void;
  setBindGroup(bindGroup: BindGroup): void;
  /** Bind a target uniform block (size + group transform) */
  setUniforms(buffer: GpuBuffer, byteOffset: number, byteLength: number): void;
  /** Draw `indexCount` indices starting at `firstIndex` (32-bit indices) */
  drawIndexed(firstIndex: number, indexCount: number): void;
  endPass(): void;
}
