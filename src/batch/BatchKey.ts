/**
 * Batch Key Utilities
 *
 * Functions for creating and comparing batch keys.
 */

import type { TextureId, TransformId } from "../geometry/types";
import type { BatchKey } from "./types";

/**
 * Create a batch key for a sprite.
 *
 * @param textureId - Texture the sprite samples
 * @param transformId - Group transform, or null/undefined for none
 */
export function createBatchKey(
  textureId: TextureId,
  transformId?: TransformId | null
): BatchKey {
  return { textureId, transformId: transformId ?? null };
}

/**
 * Compare two batch keys for equality.
 * Ids compare without coercion, so 1 and "1" are different textures.
 * NaN equals itself, matching Map lookups in the registry.
 */
export function batchKeyEquals(a: BatchKey, b: BatchKey): boolean {
  return sameId(a.textureId, b.textureId) && sameId(a.transformId, b.transformId);
}

/**
 * Convert a batch key to a unique string for map keys.
 */
export function batchKeyToString(key: BatchKey): string {
  return `${idToString(key.textureId)}|${key.transformId === null ? "-" : idToString(key.transformId)}`;
}

function idToString(id: TextureId | TransformId): string {
  return typeof id === "number" ? `n${id}` : `s${id}`;
}

/** SameValueZero, the equality Map and Set use */
function sameId<T>(a: T, b: T): boolean {
  return a === b || (a !== a && b !== b);
}
