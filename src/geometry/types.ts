/**
 * Sprite Geometry Types
 */

import type { Affine2 } from "../math/affine";
import type { Color } from "../types/color";

/** Caller-chosen texture identifier */
export type TextureId = string | number;

/** Caller-chosen group transform identifier */
export type TransformId = string | number;

/** Axis-aligned rectangle in texture pixels */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** A single sprite draw request */
export interface SpriteRequest {
  /** Texture to sample from (must be registered) */
  readonly textureId: TextureId;
  /** Source rectangle in texture pixels */
  readonly src: Rect;
  /** Places the src-sized quad in target space (default: identity) */
  readonly transform?: Affine2;
  /** Depth written to every vertex (default: 0) */
  readonly z?: number;
  /** Tint multiplied with the sampled color (default: opaque white) */
  readonly tint?: Color;
  /** Group transform shared by the whole batch (default: none) */
  readonly transformId?: TransformId | null;
}
