/**
 * Error types raised by the sprite batching core.
 * The core never retries after any of them; the caller decides whether to
 * drop the sprite or the frame.
 */

export type SpriteBatchErrorKind =
  | "UnknownTexture"
  | "UnknownTransform"
  | "BufferOverflow"
  | "InvalidState";

export abstract class SpriteBatchError extends Error {
  abstract readonly kind: SpriteBatchErrorKind;
}

/** A texture id was used before `register` or after `unregister`. */
export class UnknownTextureError extends SpriteBatchError {
  readonly kind = "UnknownTexture";
  readonly textureId: string | number;

  constructor(textureId: string | number) {
    super(`Unknown texture: ${String(textureId)}`);
    this.name = "UnknownTextureError";
    this.textureId = textureId;
  }
}

/** A sprite referenced a group transform the frame does not define. */
export class UnknownTransformError extends SpriteBatchError {
  readonly kind = "UnknownTransform";
  readonly transformId: string | number;

  constructor(transformId: string | number) {
    super(`Unknown transform: ${String(transformId)}`);
    this.name = "UnknownTransformError";
    this.transformId = transformId;
  }
}

/** Buffer growth would exceed the configured hard cap. */
export class BufferOverflowError extends SpriteBatchError {
  readonly kind = "BufferOverflow";
  readonly requested: number;
  readonly limit: number;

  constructor(requested: number, limit: number) {
    super(`Buffer overflow: ${requested} quads requested, limit is ${limit}`);
    this.name = "BufferOverflowError";
    this.requested = requested;
    this.limit = limit;
  }
}

/** An operation was called in a state that does not allow it. */
export class InvalidStateError extends SpriteBatchError {
  readonly kind = "InvalidState";

  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}

export function isSpriteBatchError(error: unknown): error is SpriteBatchError {
  return error instanceof SpriteBatchError;
}
