/**
 * Uniform block packing
 *
 * Byte layouts match the std140 blocks declared in the sprite shaders:
 *
 *   TextureUniforms (16 bytes)        TargetUniforms (80 bytes)
 *     0  vec2  size                     0  vec2  size
 *     8  uint  isMask                  16  mat4  transform (column-major)
 *    12  -     padding
 */

import type { Mat4 } from "../math/mat4";

export const TEXTURE_UNIFORMS_SIZE = 16;
export const TARGET_UNIFORMS_SIZE = 80;

const TARGET_TRANSFORM_OFFSET = 16;

/** Pack the per-texture block */
export function packTextureUniforms(
  width: number,
  height: number,
  isMask: boolean
): Uint8Array {
  const bytes = new Uint8Array(TEXTURE_UNIFORMS_SIZE);
  const view = new DataView(bytes.buffer);
  view.setFloat32(0, width, true);
  view.setFloat32(4, height, true);
  view.setUint32(8, isMask ? 1 : 0, true);
  return bytes;
}

/**
 * Write a target block (target size plus group transform) into `view`.
 *
 * @param view - Destination view
 * @param byteOffset - Offset of the block within `view`
 * @param width - Target width in pixels
 * @param height - Target height in pixels
 * @param transform - Group transform applied before projection
 */
export function writeTargetUniforms(
  view: DataView,
  byteOffset: number,
  width: number,
  height: number,
  transform: Mat4
): void {
  view.setFloat32(byteOffset, width, true);
  view.setFloat32(byteOffset + 4, height, true);
  view.setFloat32(byteOffset + 8, 0, true);
  view.setFloat32(byteOffset + 12, 0, true);
  for (let i = 0; i < 16; i++) {
    view.setFloat32(byteOffset + TARGET_TRANSFORM_OFFSET + i * 4, transform[i] ?? 0, true);
  }
}

/** Round `value` up to a multiple of `alignment` */
export function alignTo(value: number, alignment: number): number {
  return Math.ceil(value / alignment) * alignment;
}
