export { WebGLBackend, type WebGLBackendOptions, type TextureFilter } from "./WebGLBackend";
export { setBlendMode, type BlendMode } from "./blendMode";
export { spriteVertexShader, spriteFragmentShader } from "./shaders";
