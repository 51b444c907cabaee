export {
  writeSpriteVertices,
  writeQuadIndices,
  FLOATS_PER_VERTEX,
  FLOATS_PER_QUAD,
  VERTEX_STRIDE,
  VERTICES_PER_QUAD,
  INDICES_PER_QUAD,
  VERTEX_ATTRIBUTES,
} from "./QuadBuilder";
export type { Rect, SpriteRequest, TextureId, TransformId } from "./types";
