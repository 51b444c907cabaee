/**
 * WebGL Buffer wrapper with lifecycle management
 */

import type { BufferKind } from "../types";

// WebGL constants (avoid referencing WebGL2RenderingContext at module load time for testing)
const GL_ARRAY_BUFFER = 0x8892;
const GL_ELEMENT_ARRAY_BUFFER = 0x8893;
const GL_UNIFORM_BUFFER = 0x8a11;
const GL_DYNAMIC_DRAW = 0x88e8;

const TARGET_MAP: Record<BufferKind, GLenum> = {
  vertex: GL_ARRAY_BUFFER,
  index: GL_ELEMENT_ARRAY_BUFFER,
  uniform: GL_UNIFORM_BUFFER,
};

export class Buffer {
  readonly gl: WebGL2RenderingContext;
  readonly handle: WebGLBuffer;
  readonly kind: BufferKind;
  readonly target: GLenum;

  private _byteLength = 0;
  private _destroyed = false;

  constructor(gl: WebGL2RenderingContext, kind: BufferKind) {
    this.gl = gl;
    this.kind = kind;
    this.target = TARGET_MAP[kind];

    const handle = gl.createBuffer();
    if (!handle) {
      throw new Error("Failed to create WebGL buffer");
    }
    this.handle = handle;
  }

  /** Allocated size in bytes */
  get byteLength(): number {
    return this._byteLength;
  }

  /** Bind this buffer to its target */
  bind(): void {
    if (this._destroyed) {
      throw new Error("Cannot bind destroyed buffer");
    }
    this.gl.bindBuffer(this.target, this.handle);
  }

  /** Allocate `byteLength` bytes of uninitialized storage */
  allocate(byteLength: number): void {
    if (this._destroyed) {
      throw new Error("Cannot allocate destroyed buffer");
    }
    this.bind();
    this.gl.bufferData(this.target, byteLength, GL_DYNAMIC_DRAW);
    this._byteLength = byteLength;
  }

  /** Write `data` at `offset` bytes; must fit the allocation */
  updateData(data: ArrayBufferView, offset: number = 0): void {
    if (this._destroyed) {
      throw new Error("Cannot update data on destroyed buffer");
    }
    if (offset + data.byteLength > this._byteLength) {
      throw new Error(
        `Write of ${data.byteLength} bytes at ${offset} exceeds buffer size ${this._byteLength}`
      );
    }
    this.bind();
    this.gl.bufferSubData(this.target, offset, data);
  }

  /** Delete the buffer and release GPU memory */
  destroy(): void {
    if (this._destroyed) return;
    this.gl.deleteBuffer(this.handle);
    this._destroyed = true;
  }

  /** Check if buffer has been destroyed */
  get destroyed(): boolean {
    return this._destroyed;
  }
}
