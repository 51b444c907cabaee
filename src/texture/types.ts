/**
 * Texture Registry Types
 */

import type { BindGroup } from "../backend/types";
import type { TextureId } from "../geometry/types";

export interface TextureSize {
  width: number;
  height: number;
}

/** Registered texture, also used as the handle returned by register() */
export interface TextureInfo {
  readonly id: TextureId;
  readonly width: number;
  readonly height: number;
  /** Sample the red channel as alpha; RGB comes from the tint */
  readonly isMask: boolean;
  readonly bindGroup: BindGroup;
}
