export { Frame, type FrameContext, type TextureLookup } from "./Frame";
export {
  FrameBuffers,
  type BufferBackend,
  type FrameBindings,
  type FrameBuffersOptions,
  type TargetSize,
} from "./FrameBuffers";
export { DynamicBuffer, type DynamicBufferOptions } from "./DynamicBuffer";
export type { FrameOptions, FrameState } from "./types";
