/**
 * Sprite shaders
 *
 * Vertex positions are in target pixels (origin top-left, y down) before the
 * group transform. Texture coordinates arrive in texels and are normalized by
 * the texture block's size in the fragment stage.
 */

/** Uniform block binding points */
export const TEXTURE_BLOCK_BINDING = 0;
export const TARGET_BLOCK_BINDING = 1;

export const spriteVertexShader = `#version 300 es
precision highp float;

layout(std140) uniform TargetUniforms {
  vec2 u_targetSize;
  mat4 u_transform;
};

layout(location = 0) in vec3 a_position;
layout(location = 1) in vec2 a_texCoord;
layout(location = 2) in vec4 a_tint;

out vec2 v_texCoord;
out vec4 v_tint;

void main() {
  vec4 world = u_transform * vec4(a_position, 1.0);
  vec2 clip = world.xy / u_targetSize * 2.0 - 1.0;
  gl_Position = vec4(clip.x, -clip.y, world.z, 1.0);
  v_texCoord = a_texCoord;
  v_tint = a_tint;
}
`;

export const spriteFragmentShader = `#version 300 es
precision highp float;

layout(std140) uniform TextureUniforms {
  vec2 u_textureSize;
  uint u_isMask;
};

uniform sampler2D u_texture;

in vec2 v_texCoord;
in vec4 v_tint;

out vec4 fragColor;

void main() {
  vec4 texel = texture(u_texture, v_texCoord / u_textureSize);
  if (u_isMask != 0u) {
    // Mask textures carry coverage in the red channel
    fragColor = vec4(v_tint.rgb, v_tint.a * texel.r);
  } else {
    fragColor = texel * v_tint;
  }
}
`;
