/**
 * How sprite pixels combine with what is already on the target.
 * Every mode is a fixed-function blend state, applied once per pass.
 */

export type BlendMode = "normal" | "premultiplied" | "add" | "multiply" | "screen";

/**
 * Enable blending and set the blend function for `mode`.
 */
export function setBlendMode(
  gl: WebGL2RenderingContext,
  mode: BlendMode
): void {
  gl.enable(gl.BLEND);

  switch (mode) {
    case "normal":
      // Sprite textures with straight alpha, the tint multiplied in by the shader
      gl.blendFunc(gl.SRC_ALPHA, gl.ONE_MINUS_SRC_ALPHA);
      break;

    case "premultiplied":
      // Atlases exported with color already scaled by alpha
      gl.blendFunc(gl.ONE, gl.ONE_MINUS_SRC_ALPHA);
      break;

    case "add":
      // Glows and particles brighten the target; alpha fades them out
      gl.blendFunc(gl.SRC_ALPHA, gl.ONE);
      break;

    case "multiply":
      // Shadow and lighting overlays darken color only, coverage accumulates
      gl.blendFuncSeparate(gl.DST_COLOR, gl.ZERO, gl.DST_ALPHA, gl.ONE_MINUS_SRC_ALPHA);
      break;

    case "screen":
      // Light overlays: never darker than either input
      gl.blendFuncSeparate(gl.ONE, gl.ONE_MINUS_SRC_COLOR, gl.ONE, gl.ONE_MINUS_SRC_ALPHA);
      break;
  }
}
