/**
 * sprite-batcher - order-preserving 2D sprite batching over a pluggable GPU backend
 */

export const VERSION = "0.1.0";

export { SpriteRenderer, type SpriteRendererOptions } from "./SpriteRenderer";
export * from "./frame";
export * from "./batch";
export * from "./draw";
export * from "./geometry";
export { TextureRegistry, type TextureRegistryView } from "./texture/TextureRegistry";
export type { TextureInfo, TextureSize } from "./texture/types";
export type {
  BindGroup,
  BufferKind,
  GpuBackend,
  GpuBuffer,
  PassDescriptor,
} from "./backend/types";
export {
  alignTo,
  packTextureUniforms,
  writeTargetUniforms,
  TEXTURE_UNIFORMS_SIZE,
  TARGET_UNIFORMS_SIZE,
} from "./backend/uniforms";
export * from "./backend/webgl";
export {
  SpriteBatchError,
  UnknownTextureError,
  UnknownTransformError,
  BufferOverflowError,
  InvalidStateError,
  isSpriteBatchError,
  type SpriteBatchErrorKind,
} from "./errors";
export * as affine from "./math/affine";
export * as mat4 from "./math/mat4";
export { WHITE, type Color } from "./types/color";
