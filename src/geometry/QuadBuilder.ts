/**
 * Quad Builder
 *
 * Expands sprite requests into vertex data. Each sprite becomes four vertices
 * laid out as:
 *
 *   position (3 floats) | texCoord (2 floats, pixels) | tint (4 floats)
 *
 * Texture coordinates stay in pixel units; the vertex shader divides by the
 * texture size, so the same vertex data stays valid if a texture is swapped.
 */

import { transformPoint } from "../math/affine";
import { WHITE } from "../types/color";
import type { SpriteRequest } from "./types";

/** Bytes per float */
const FLOAT_SIZE = 4;

export const FLOATS_PER_VERTEX = 9;
export const VERTEX_STRIDE = FLOATS_PER_VERTEX * FLOAT_SIZE;
export const VERTICES_PER_QUAD = 4;
export const INDICES_PER_QUAD = 6;
export const FLOATS_PER_QUAD = FLOATS_PER_VERTEX * VERTICES_PER_QUAD;

/** Attribute offsets in bytes within one vertex */
export const VERTEX_ATTRIBUTES = {
  position: { location: 0, size: 3, offset: 0 },
  texCoord: { location: 1, size: 2, offset: 3 * FLOAT_SIZE },
  tint: { location: 2, size: 4, offset: 5 * FLOAT_SIZE },
} as const;

/** Index pattern for one quad: corners TL, BL, TR, BR */
const QUAD_INDICES = [0, 1, 2, 1, 2, 3] as const;

/**
 * Write one sprite's four vertices.
 *
 * @param out - Destination, at least FLOATS_PER_QUAD floats from `offset`
 * @param offset - Float offset of the first vertex
 * @param sprite - Sprite to expand
 */
export function writeSpriteVertices(
  out: Float32Array,
  offset: number,
  sprite: SpriteRequest
): void {
  const { src } = sprite;
  const z = sprite.z ?? 0;
  const [r, g, b, a] = sprite.tint ?? WHITE;

  const left = src.x;
  const top = src.y;
  const right = src.x + src.width;
  const bottom = src.y + src.height;

  // Local corners (0,0), (0,h), (w,0), (w,h) paired with their source texels
  const corners: ReadonlyArray<readonly [number, number, number, number]> = [
    [0, 0, left, top],
    [0, src.height, left, bottom],
    [src.width, 0, right, top],
    [src.width, src.height, right, bottom],
  ];

  let o = offset;
  for (const [lx, ly, u, v] of corners) {
    const [x, y] = sprite.transform
      ? transformPoint(sprite.transform, lx, ly)
      : [lx, ly];

    out[o++] = x;
    out[o++] = y;
    out[o++] = z;
    out[o++] = u;
    out[o++] = v;
    out[o++] = r;
    out[o++] = g;
    out[o++] = b;
    out[o++] = a;
  }
}

/**
 * Write the fixed quad index pattern for a run of quads as absolute indices.
 *
 * @param out - Destination, at least quadCount * INDICES_PER_QUAD entries from firstQuad
 * @param firstQuad - Index of the first quad to write
 * @param quadCount - Number of quads
 */
export function writeQuadIndices(
  out: Uint32Array,
  firstQuad: number,
  quadCount: number
): void {
  let o = firstQuad * INDICES_PER_QUAD;
  for (let q = firstQuad; q < firstQuad + quadCount; q++) {
    const base = q * VERTICES_PER_QUAD;
    for (const index of QUAD_INDICES) {
      out[o++] = base + index;
    }
  }
}
