/**
 * Shader compilation utilities
 */

/** Compile a shader from source */
export function compileShader(
  gl: WebGL2RenderingContext,
  type: number,
  source: string
): WebGLShader {
  const shader = gl.createShader(type);
  if (!shader) {
    throw new Error("Failed to create shader");
  }

  gl.shaderSource(shader, source);
  gl.compileShader(shader);

  if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
    const log = gl.getShaderInfoLog(shader);
    gl.deleteShader(shader);
    throw new Error(`Shader compilation failed: ${log}`);
  }

  return shader;
}

/**
 * Create and link a shader program, then assign its uniform blocks to
 * binding points.
 *
 * @param blockBindings - Uniform block name to binding point
 */
export function createProgram(
  gl: WebGL2RenderingContext,
  vertexSource: string,
  fragmentSource: string,
  blockBindings: Readonly<Record<string, number>> = {}
): WebGLProgram {
  const vs = compileShader(gl, gl.VERTEX_SHADER, vertexSource);
  const fs = compileShader(gl, gl.FRAGMENT_SHADER, fragmentSource);

  const program = gl.createProgram();
  if (!program) {
    throw new Error("Failed to create program");
  }

  gl.attachShader(program, vs);
  gl.attachShader(program, fs);
  gl.linkProgram(program);

  // Shaders are linked into the program now
  gl.deleteShader(vs);
  gl.deleteShader(fs);

  if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
    const log = gl.getProgramInfoLog(program);
    gl.deleteProgram(program);
    throw new Error(`Program linking failed: ${log}`);
  }

  for (const [name, binding] of Object.entries(blockBindings)) {
    const index = gl.getUniformBlockIndex(program, name);
    if (index === gl.INVALID_INDEX) {
      gl.deleteProgram(program);
      throw new Error(`Uniform block ${name} not found in program`);
    }
    gl.uniformBlockBinding(program, index, binding);
  }

  return program;
}
