import { describe, it, expect, vi } from "vitest";
import { Buffer } from "./Buffer";

function createMockGL(): WebGL2RenderingContext {
  return {
    createBuffer: vi.fn(() => ({})),
    deleteBuffer: vi.fn(),
    bindBuffer: vi.fn(),
    bufferData: vi.fn(),
    bufferSubData: vi.fn(),
    ARRAY_BUFFER: 0x8892,
    ELEMENT_ARRAY_BUFFER: 0x8893,
    UNIFORM_BUFFER: 0x8a11,
    DYNAMIC_DRAW: 0x88e8,
  } as unknown as WebGL2RenderingContext;
}

describe("Buffer", () => {
  describe("constructor", () => {
    it("maps vertex buffers to ARRAY_BUFFER", () => {
      const gl = createMockGL();
      const buffer = new Buffer(gl, "vertex");

      expect(gl.createBuffer).toHaveBeenCalled();
      expect(buffer.target).toBe(gl.ARRAY_BUFFER);
    });

    it("maps index buffers to ELEMENT_ARRAY_BUFFER", () => {
      const buffer = new Buffer(createMockGL(), "index");

      expect(buffer.target).toBe(0x8893);
    });

    it("maps uniform buffers to UNIFORM_BUFFER", () => {
      const buffer = new Buffer(createMockGL(), "uniform");

      expect(buffer.target).toBe(0x8a11);
    });

    it("throws if buffer creation fails", () => {
      const gl = createMockGL();
      (gl.createBuffer as ReturnType<typeof vi.fn>).mockReturnValue(null);

      expect(() => new Buffer(gl, "vertex")).toThrow("Failed to create WebGL buffer");
    });
  });

  describe("allocate", () => {
    it("reserves storage with dynamic usage", () => {
      const gl = createMockGL();
      const buffer = new Buffer(gl, "vertex");

      buffer.allocate(1024);

      expect(gl.bindBuffer).toHaveBeenCalledWith(gl.ARRAY_BUFFER, buffer.handle);
      expect(gl.bufferData).toHaveBeenCalledWith(gl.ARRAY_BUFFER, 1024, gl.DYNAMIC_DRAW);
      expect(buffer.byteLength).toBe(1024);
    });
  });

  describe("updateData", () => {
    it("writes data at offset", () => {
      const gl = createMockGL();
      const buffer = new Buffer(gl, "uniform");
      buffer.allocate(64);
      const data = new Float32Array([1, 2]);

      buffer.updateData(data, 8);

      expect(gl.bufferSubData).toHaveBeenCalledWith(gl.UNIFORM_BUFFER, 8, data);
    });

    it("defaults to offset 0", () => {
      const gl = createMockGL();
      const buffer = new Buffer(gl, "vertex");
      buffer.allocate(16);
      const data = new Float32Array([1]);

      buffer.updateData(data);

      expect(gl.bufferSubData).toHaveBeenCalledWith(gl.ARRAY_BUFFER, 0, data);
    });

    it("rejects writes past the allocation", () => {
      const buffer = new Buffer(createMockGL(), "vertex");
      buffer.allocate(8);

      expect(() => buffer.updateData(new Float32Array(2), 4)).toThrow(
        "Write of 8 bytes at 4 exceeds buffer size 8"
      );
    });

    it("throws when updating a destroyed buffer", () => {
      const buffer = new Buffer(createMockGL(), "vertex");
      buffer.allocate(8);
      buffer.destroy();

      expect(() => buffer.updateData(new Float32Array([1]))).toThrow(
        "Cannot update data on destroyed buffer"
      );
    });
  });

  describe("bind", () => {
    it("throws when binding destroyed buffer", () => {
      const buffer = new Buffer(createMockGL(), "index");
      buffer.destroy();

      expect(() => buffer.bind()).toThrow("Cannot bind destroyed buffer");
    });
  });

  describe("destroy", () => {
    it("deletes the buffer", () => {
      const gl = createMockGL();
      const buffer = new Buffer(gl, "vertex");

      buffer.destroy();

      expect(gl.deleteBuffer).toHaveBeenCalledWith(buffer.handle);
      expect(buffer.destroyed).toBe(true);
    });

    it("is idempotent", () => {
      const gl = createMockGL();
      const buffer = new Buffer(gl, "vertex");

      buffer.destroy();
      buffer.destroy();

      expect(gl.deleteBuffer).toHaveBeenCalledTimes(1);
    });
  });
});
