/**
 * WebGLBackend Tests
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { WebGLBackend } from "./WebGLBackend";
import { SpriteRenderer } from "../../SpriteRenderer";

// Mock WebGL2 context
function createMockGL(alignment: number | null = 256): WebGL2RenderingContext {
  let handles = 0;
  const gl = {
    createProgram: vi.fn(() => ({ program: true })),
    createShader: vi.fn(() => ({})),
    shaderSource: vi.fn(),
    compileShader: vi.fn(),
    getShaderParameter: vi.fn(() => true),
    attachShader: vi.fn(),
    linkProgram: vi.fn(),
    getProgramParameter: vi.fn(() => true),
    getUniformBlockIndex: vi.fn((_program: unknown, name: string) =>
      name === "TextureUniforms" ? 3 : 4
    ),
    uniformBlockBinding: vi.fn(),
    getUniformLocation: vi.fn(() => ({ sampler: true })),
    getParameter: vi.fn(() => alignment),
    useProgram: vi.fn(),
    createBuffer: vi.fn(() => ({ buffer: ++handles })),
    bindBuffer: vi.fn(),
    bufferData: vi.fn(),
    bufferSubData: vi.fn(),
    deleteBuffer: vi.fn(),
    createVertexArray: vi.fn(() => ({ vao: ++handles })),
    bindVertexArray: vi.fn(),
    deleteVertexArray: vi.fn(),
    enableVertexAttribArray: vi.fn(),
    vertexAttribPointer: vi.fn(),
    bindTexture: vi.fn(),
    texParameteri: vi.fn(),
    activeTexture: vi.fn(),
    uniform1i: vi.fn(),
    bindBufferBase: vi.fn(),
    bindBufferRange: vi.fn(),
    enable: vi.fn(),
    blendFunc: vi.fn(),
    blendFuncSeparate: vi.fn(),
    drawElements: vi.fn(),
    deleteShader: vi.fn(),
    deleteProgram: vi.fn(),
    getShaderInfoLog: vi.fn(() => ""),
    getProgramInfoLog: vi.fn(() => ""),
    VERTEX_SHADER: 0x8b31,
    FRAGMENT_SHADER: 0x8b30,
    COMPILE_STATUS: 0x8b81,
    LINK_STATUS: 0x8b82,
    INVALID_INDEX: 0xffffffff,
    BLEND: 0x0be2,
    ONE: 1,
    SRC_ALPHA: 0x0302,
    ONE_MINUS_SRC_ALPHA: 0x0303,
  } as unknown as WebGL2RenderingContext;
  return gl;
}

const GL_UNIFORM_BUFFER = 0x8a11;
const GL_TEXTURE_2D = 0x0de1;
const GL_TRIANGLES = 0x0004;
const GL_UNSIGNED_INT = 0x1405;
const GL_FLOAT = 0x1406;

describe("WebGLBackend", () => {
  let gl: WebGL2RenderingContext;
  let backend: WebGLBackend;
  const texture = { texture: "atlas" };

  beforeEach(() => {
    gl = createMockGL();
    backend = new WebGLBackend(gl);
  });

  function createPass() {
    return {
      vertexBuffer: backend.createBuffer("vertex", 1440),
      indexBuffer: backend.createBuffer("index", 240),
    };
  }

  describe("constructor", () => {
    it("binds both uniform blocks to their binding points", () => {
      expect(gl.uniformBlockBinding).toHaveBeenCalledWith({ program: true }, 3, 0);
      expect(gl.uniformBlockBinding).toHaveBeenCalledWith({ program: true }, 4, 1);
    });

    it("reads the uniform offset alignment from the context", () => {
      expect(new WebGLBackend(createMockGL(64)).uniformOffsetAlignment).toBe(64);
    });

    it("falls back to 256 when the context reports nothing", () => {
      expect(new WebGLBackend(createMockGL(null)).uniformOffsetAlignment).toBe(256);
    });

    it("throws when a uniform block is missing", () => {
      const broken = createMockGL();
      (broken.getUniformBlockIndex as ReturnType<typeof vi.fn>).mockReturnValue(0xffffffff);

      expect(() => new WebGLBackend(broken)).toThrow(
        "Uniform block TextureUniforms not found in program"
      );
    });
  });

  describe("buffers", () => {
    it("allocates storage on create", () => {
      const buffer = backend.createBuffer("uniform", 512);

      expect(buffer).toEqual({ id: 1, kind: "uniform", byteLength: 512 });
      expect(gl.bufferData).toHaveBeenCalledWith(GL_UNIFORM_BUFFER, 512, 0x88e8);
    });

    it("writes data at an offset", () => {
      const buffer = backend.createBuffer("vertex", 64);
      const data = new Float32Array([1, 2, 3]);

      backend.writeBuffer(buffer, 16, data);

      expect(gl.bufferSubData).toHaveBeenCalledWith(0x8892, 16, data);
    });

    it("rejects writes to destroyed buffers", () => {
      const buffer = backend.createBuffer("vertex", 64);
      backend.destroyBuffer(buffer);

      expect(() => backend.writeBuffer(buffer, 0, new Float32Array(1))).toThrow(
        "Unknown or destroyed buffer 1"
      );
    });
  });

  describe("bind groups", () => {
    it("configures nearest filtering and edge clamping by default", () => {
      const uniforms = backend.createBuffer("uniform", 16);

      backend.createBindGroup(texture, uniforms);

      expect(gl.bindTexture).toHaveBeenCalledWith(GL_TEXTURE_2D, texture);
      expect(gl.texParameteri).toHaveBeenCalledWith(GL_TEXTURE_2D, 0x2801, 0x2600);
      expect(gl.texParameteri).toHaveBeenCalledWith(GL_TEXTURE_2D, 0x2800, 0x2600);
      expect(gl.texParameteri).toHaveBeenCalledWith(GL_TEXTURE_2D, 0x2802, 0x812f);
    });

    it("uses linear filtering when configured", () => {
      const linear = new WebGLBackend(gl, { filter: "linear" });

      linear.createBindGroup(texture, linear.createBuffer("uniform", 16));

      expect(gl.texParameteri).toHaveBeenCalledWith(GL_TEXTURE_2D, 0x2801, 0x2601);
    });
  });

  describe("pass", () => {
    it("sets up the vertex layout once per buffer pair", () => {
      const pass = createPass();

      backend.beginPass(pass);
      backend.endPass();
      backend.beginPass(pass);
      backend.endPass();

      expect(gl.createVertexArray).toHaveBeenCalledTimes(1);
      expect(gl.vertexAttribPointer).toHaveBeenCalledWith(0, 3, GL_FLOAT, false, 36, 0);
      expect(gl.vertexAttribPointer).toHaveBeenCalledWith(1, 2, GL_FLOAT, false, 36, 12);
      expect(gl.vertexAttribPointer).toHaveBeenCalledWith(2, 4, GL_FLOAT, false, 36, 20);
    });

    it("applies the blend mode", () => {
      backend.beginPass(createPass());

      expect(gl.enable).toHaveBeenCalledWith(gl.BLEND);
      expect(gl.blendFunc).toHaveBeenCalledWith(gl.SRC_ALPHA, gl.ONE_MINUS_SRC_ALPHA);
    });

    it("binds the texture and its uniform block", () => {
      const uniforms = backend.createBuffer("uniform", 16);
      const bindGroup = backend.createBindGroup(texture, uniforms);
      backend.beginPass(createPass());

      backend.setBindGroup(bindGroup);

      expect(gl.bindTexture).toHaveBeenLastCalledWith(GL_TEXTURE_2D, texture);
      expect(gl.bindBufferBase).toHaveBeenCalledWith(GL_UNIFORM_BUFFER, 0, { buffer: 1 });
    });

    it("binds target uniforms as a range of block 1", () => {
      const uniforms = backend.createBuffer("uniform", 512);
      backend.beginPass(createPass());

      backend.setUniforms(uniforms, 256, 80);

      expect(gl.bindBufferRange).toHaveBeenCalledWith(
        GL_UNIFORM_BUFFER,
        1,
        { buffer: 1 },
        256,
        80
      );
    });

    it("rejects unaligned uniform offsets", () => {
      const uniforms = backend.createBuffer("uniform", 512);
      backend.beginPass(createPass());

      expect(() => backend.setUniforms(uniforms, 80, 80)).toThrow(
        "Uniform offset 80 is not aligned to 256"
      );
    });

    it("draws 32-bit indices from a byte offset", () => {
      backend.beginPass(createPass());

      backend.drawIndexed(18, 12);

      expect(gl.drawElements).toHaveBeenCalledTimes(1);
      expect(gl.drawElements).toHaveBeenCalledWith(GL_TRIANGLES, 12, GL_UNSIGNED_INT, 72);
    });

    it("refuses draws outside a pass", () => {
      expect(() => backend.drawIndexed(0, 6)).toThrow("No active pass - call beginPass() first");
    });

    it("refuses nested passes", () => {
      const pass = createPass();
      backend.beginPass(pass);

      expect(() => backend.beginPass(pass)).toThrow(
        "A pass is already active - call endPass() first"
      );
    });

    it("refuses buffer writes during a pass", () => {
      const pass = createPass();
      backend.beginPass(pass);

      expect(() => backend.writeBuffer(pass.vertexBuffer, 0, new Float32Array(1))).toThrow(
        "Cannot write buffers during a pass"
      );
    });
  });

  describe("destroy", () => {
    it("drops vertex arrays that reference a destroyed buffer", () => {
      const pass = createPass();
      backend.beginPass(pass);
      backend.endPass();

      backend.destroyBuffer(pass.vertexBuffer);

      expect(gl.deleteVertexArray).toHaveBeenCalledTimes(1);
    });

    it("releases program and buffers", () => {
      createPass();

      backend.destroy();

      expect(gl.deleteBuffer).toHaveBeenCalledTimes(2);
      expect(gl.deleteProgram).toHaveBeenCalledWith({ program: true });
      expect(() => backend.createBuffer("vertex", 4)).toThrow("WebGL backend has been destroyed");
    });
  });

  describe("with SpriteRenderer", () => {
    it("renders a frame through the WebGL calls", () => {
      const renderer = new SpriteRenderer({ backend, initialQuadCapacity: 4 });
      const atlas = { texture: "atlas" };
      const font = { texture: "font" };
      renderer.registerTexture("atlas", { width: 128, height: 128 }, false, atlas);
      renderer.registerTexture("font", { width: 64, height: 64 }, true, font);

      const frame = renderer.beginFrame({ width: 320, height: 240 });
      for (const textureId of ["atlas", "atlas", "font"]) {
        frame.submit({ textureId, src: { x: 0, y: 0, width: 16, height: 16 } });
      }
      const stats = renderer.render(frame);

      expect(stats.drawCalls).toBe(2);
      expect(vi.mocked(gl.drawElements).mock.calls).toEqual([
        [GL_TRIANGLES, 12, GL_UNSIGNED_INT, 0],
        [GL_TRIANGLES, 6, GL_UNSIGNED_INT, 48],
      ]);
      expect(gl.bindBufferRange).toHaveBeenCalledTimes(1);
    });
  });
});
