/**
 * WebGL2 implementation of the GPU backend.
 *
 * Bind groups pair a caller-owned texture with its texture uniform buffer
 * (block 0). Target uniform blocks are bound per batch with bindBufferRange
 * (block 1). One vertex array object is kept per vertex/index buffer pair.
 */

import { Buffer } from "./Buffer";
import { createProgram } from "./compile";
import { setBlendMode, type BlendMode } from "./blendMode";
import {
  spriteFragmentShader,
  spriteVertexShader,
  TARGET_BLOCK_BINDING,
  TEXTURE_BLOCK_BINDING,
} from "./shaders";
import { VERTEX_ATTRIBUTES, VERTEX_STRIDE } from "../../geometry/QuadBuilder";
import type {
  BindGroup,
  BufferKind,
  GpuBackend,
  GpuBuffer,
  PassDescriptor,
} from "../types";

// WebGL constants
const GL_FLOAT = 0x1406;
const GL_TRIANGLES = 0x0004;
const GL_UNSIGNED_INT = 0x1405;
const GL_UNIFORM_BUFFER = 0x8a11;
const GL_UNIFORM_BUFFER_OFFSET_ALIGNMENT = 0x8a34;
const GL_TEXTURE_2D = 0x0de1;
const GL_TEXTURE0 = 0x84c0;
const GL_TEXTURE_MIN_FILTER = 0x2801;
const GL_TEXTURE_MAG_FILTER = 0x2800;
const GL_TEXTURE_WRAP_S = 0x2802;
const GL_TEXTURE_WRAP_T = 0x2803;
const GL_CLAMP_TO_EDGE = 0x812f;
const GL_NEAREST = 0x2600;
const GL_LINEAR = 0x2601;

/** Bytes per 32-bit index */
const INDEX_SIZE = 4;

/** Used when the context does not report an alignment */
const DEFAULT_UNIFORM_ALIGNMENT = 256;

export type TextureFilter = "nearest" | "linear";

export interface WebGLBackendOptions {
  /** How sprites composite onto the target (default: "normal") */
  blendMode?: BlendMode;
  /** Sampler filter for every registered texture (default: "nearest") */
  filter?: TextureFilter;
}

interface BindGroupEntry {
  texture: WebGLTexture;
  uniforms: Buffer;
}

export class WebGLBackend implements GpuBackend<WebGLTexture> {
  readonly gl: WebGL2RenderingContext;
  readonly uniformOffsetAlignment: number;
  readonly blendMode: BlendMode;
  readonly filter: TextureFilter;

  private program: WebGLProgram;
  private samplerLocation: WebGLUniformLocation | null;

  private buffers = new Map<number, Buffer>();
  private bindGroups = new Map<number, BindGroupEntry>();
  private vaos = new Map<string, WebGLVertexArrayObject>();
  private nextId = 1;
  private passActive = false;
  private _destroyed = false;

  constructor(gl: WebGL2RenderingContext, options: WebGLBackendOptions = {}) {
    this.gl = gl;
    this.blendMode = options.blendMode ?? "normal";
    this.filter = options.filter ?? "nearest";

    this.program = createProgram(gl, spriteVertexShader, spriteFragmentShader, {
      TextureUniforms: TEXTURE_BLOCK_BINDING,
      TargetUniforms: TARGET_BLOCK_BINDING,
    });
    this.samplerLocation = gl.getUniformLocation(this.program, "u_texture");

    const alignment: unknown = gl.getParameter(GL_UNIFORM_BUFFER_OFFSET_ALIGNMENT);
    this.uniformOffsetAlignment =
      typeof alignment === "number" && alignment > 0 ? alignment : DEFAULT_UNIFORM_ALIGNMENT;
  }

  createBuffer(kind: BufferKind, byteLength: number): GpuBuffer {
    this.assertAlive();

    // Keep index buffer bindings out of whatever VAO is current
    this.gl.bindVertexArray(null);

    const buffer = new Buffer(this.gl, kind);
    buffer.allocate(byteLength);

    const id = this.nextId++;
    this.buffers.set(id, buffer);
    return { id, kind, byteLength };
  }

  writeBuffer(buffer: GpuBuffer, byteOffset: number, data: ArrayBufferView): void {
    if (this.passActive) {
      throw new Error("Cannot write buffers during a pass");
    }
    this.gl.bindVertexArray(null);
    this.getBuffer(buffer).updateData(data, byteOffset);
  }

  destroyBuffer(buffer: GpuBuffer): void {
    const entry = this.buffers.get(buffer.id);
    if (!entry) return;

    for (const [key, vao] of this.vaos) {
      const [vertexId, indexId] = key.split(":");
      if (vertexId === String(buffer.id) || indexId === String(buffer.id)) {
        this.gl.deleteVertexArray(vao);
        this.vaos.delete(key);
      }
    }

    entry.destroy();
    this.buffers.delete(buffer.id);
  }

  createBindGroup(texture: WebGLTexture, uniforms: GpuBuffer): BindGroup {
    this.assertAlive();
    const gl = this.gl;
    const filter = this.filter === "linear" ? GL_LINEAR : GL_NEAREST;

    gl.bindTexture(GL_TEXTURE_2D, texture);
    gl.texParameteri(GL_TEXTURE_2D, GL_TEXTURE_MIN_FILTER, filter);
    gl.texParameteri(GL_TEXTURE_2D, GL_TEXTURE_MAG_FILTER, filter);
    gl.texParameteri(GL_TEXTURE_2D, GL_TEXTURE_WRAP_S, GL_CLAMP_TO_EDGE);
    gl.texParameteri(GL_TEXTURE_2D, GL_TEXTURE_WRAP_T, GL_CLAMP_TO_EDGE);
    gl.bindTexture(GL_TEXTURE_2D, null);

    const id = this.nextId++;
    this.bindGroups.set(id, { texture, uniforms: this.getBuffer(uniforms) });
    return { id };
  }

  destroyBindGroup(bindGroup: BindGroup): void {
    // The texture itself belongs to the caller
    this.bindGroups.delete(bindGroup.id);
  }

  beginPass(pass: PassDescriptor): void {
    this.assertAlive();
    if (this.passActive) {
      throw new Error("A pass is already active - call endPass() first");
    }
    const gl = this.gl;

    gl.useProgram(this.program);
    setBlendMode(gl, this.blendMode);
    gl.bindVertexArray(this.getVao(pass));
    gl.activeTexture(GL_TEXTURE0);
    if (this.samplerLocation) {
      gl.uniform1i(this.samplerLocation, 0);
    }

    this.passActive = true;
  }

  setBindGroup(bindGroup: BindGroup): void {
    this.assertPass();
    const entry = this.bindGroups.get(bindGroup.id);
    if (!entry) {
      throw new Error(`Unknown bind group ${bindGroup.id}`);
    }

    this.gl.bindTexture(GL_TEXTURE_2D, entry.texture);
    this.gl.bindBufferBase(GL_UNIFORM_BUFFER, TEXTURE_BLOCK_BINDING, entry.uniforms.handle);
  }

  setUniforms(buffer: GpuBuffer, byteOffset: number, byteLength: number): void {
    this.assertPass();
    if (byteOffset % this.uniformOffsetAlignment !== 0) {
      throw new Error(
        `Uniform offset ${byteOffset} is not aligned to ${this.uniformOffsetAlignment}`
      );
    }

    this.gl.bindBufferRange(
      GL_UNIFORM_BUFFER,
      TARGET_BLOCK_BINDING,
      this.getBuffer(buffer).handle,
      byteOffset,
      byteLength
    );
  }

  drawIndexed(firstIndex: number, indexCount: number): void {
    this.assertPass();
    this.gl.drawElements(GL_TRIANGLES, indexCount, GL_UNSIGNED_INT, firstIndex * INDEX_SIZE);
  }

  endPass(): void {
    this.assertPass();
    this.gl.bindVertexArray(null);
    this.passActive = false;
  }

  /** Delete the program, vertex arrays and every live buffer */
  destroy(): void {
    if (this._destroyed) return;
    const gl = this.gl;

    for (const vao of this.vaos.values()) {
      gl.deleteVertexArray(vao);
    }
    for (const buffer of this.buffers.values()) {
      buffer.destroy();
    }
    gl.deleteProgram(this.program);

    this.vaos.clear();
    this.buffers.clear();
    this.bindGroups.clear();
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  private getBuffer(buffer: GpuBuffer): Buffer {
    const entry = this.buffers.get(buffer.id);
    if (!entry) {
      throw new Error(`Unknown or destroyed buffer ${buffer.id}`);
    }
    return entry;
  }

  private getVao(pass: PassDescriptor): WebGLVertexArrayObject {
    const key = `${pass.vertexBuffer.id}:${pass.indexBuffer.id}`;
    const existing = this.vaos.get(key);
    if (existing) return existing;

    const gl = this.gl;
    const vao = gl.createVertexArray();
    if (!vao) {
      throw new Error("Failed to create vertex array object");
    }
    gl.bindVertexArray(vao);

    this.getBuffer(pass.vertexBuffer).bind();
    for (const { location, size, offset } of Object.values(VERTEX_ATTRIBUTES)) {
      gl.enableVertexAttribArray(location);
      gl.vertexAttribPointer(location, size, GL_FLOAT, false, VERTEX_STRIDE, offset);
    }
    this.getBuffer(pass.indexBuffer).bind();

    this.vaos.set(key, vao);
    return vao;
  }

  private assertPass(): void {
    if (!this.passActive) {
      throw new Error("No active pass - call beginPass() first");
    }
  }

  private assertAlive(): void {
    if (this._destroyed) {
      throw new Error("WebGL backend has been destroyed");
    }
  }
}
