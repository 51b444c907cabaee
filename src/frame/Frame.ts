/**
 * Frame
 *
 * One cycle of sprite submission, batching and draw issuance.
 *
 *   building --finalize()--> finalized --execute()--> executed
 *       \                        |                       |
 *        `----- discard() -------+-----------------------'--> discarded
 *
 * Sprites may only be submitted while building. Batches are produced exactly
 * once, on finalize, and a finalized frame executes exactly once. Nothing
 * reaches the GPU draw queue before execute(), so a frame discarded earlier
 * has no draw side effects.
 */

import { writeSpriteVertices } from "../geometry/QuadBuilder";
import { buildBatches } from "../batch/Batcher";
import { createBatchKey } from "../batch/BatchKey";
import { executeBatches, type DrawBackend, type DrawStats } from "../draw/DrawExecutor";
import { copy as copyMat4, type Mat4 } from "../math/mat4";
import {
  BufferOverflowError,
  InvalidStateError,
  UnknownTransformError,
} from "../errors";
import type { FrameBuffers, TargetSize } from "./FrameBuffers";
import type { FrameOptions, FrameState } from "./types";
import type { Batch, BatchKey } from "../batch/types";
import type { SpriteRequest, TextureId, TransformId } from "../geometry/types";
import type { TextureInfo } from "../texture/types";

/** Resolves texture ids; throws UnknownTextureError for unregistered ids */
export interface TextureLookup {
  lookup(id: TextureId): TextureInfo;
}

export interface FrameContext {
  textures: TextureLookup;
  buffers: FrameBuffers;
  backend: DrawBackend;
  target: TargetSize;
  options?: FrameOptions;
}

export class Frame {
  readonly target: TargetSize;
  readonly options: FrameOptions;

  private readonly textures: TextureLookup;
  private readonly buffers: FrameBuffers;
  private readonly backend: DrawBackend;

  private _state: FrameState = "building";
  private keys: BatchKey[] = [];
  private transforms = new Map<TransformId, Mat4>();
  private usedTextures = new Set<TextureId>();
  private _batches: Batch[] = [];
  private _stats: DrawStats | null = null;

  constructor(context: FrameContext) {
    const { width, height } = context.target;
    if (!(width > 0) || !(height > 0)) {
      throw new InvalidStateError(`Invalid target size ${width}x${height}`);
    }

    this.textures = context.textures;
    this.buffers = context.buffers;
    this.backend = context.backend;
    this.target = { width, height };
    this.options = { ...context.options };
  }

  get state(): FrameState {
    return this._state;
  }

  /** Building or finalized: the frame still holds the shared frame buffers */
  get isActive(): boolean {
    return this._state === "building" || this._state === "finalized";
  }

  /** Number of sprites accepted so far */
  get spriteCount(): number {
    return this.keys.length;
  }

  /** Batches produced by finalize(), in draw order */
  get batches(): readonly Batch[] {
    return this._batches;
  }

  /** Statistics from execute(), null before */
  get stats(): DrawStats | null {
    return this._stats;
  }

  /** Whether an active frame has accepted a sprite using this texture */
  usesTexture(id: TextureId): boolean {
    return this.isActive && this.usedTextures.has(id);
  }

  /**
   * Define a group transform that sprites can reference by id.
   * Redefining an id replaces the matrix for the whole frame.
   */
  setTransform(id: TransformId, matrix: Mat4): void {
    this.assertState("building", "setTransform");
    this.transforms.set(id, copyMat4(matrix));
  }

  /**
   * Submit a sprite. Submission order is draw order.
   *
   * @throws UnknownTextureError - the sprite is dropped, the frame keeps building
   * @throws UnknownTransformError - the sprite is dropped, the frame keeps building
   * @throws BufferOverflowError - the frame is discarded
   */
  submit(sprite: SpriteRequest): void {
    this.assertState("building", "submit");

    this.textures.lookup(sprite.textureId);

    const transformId = sprite.transformId ?? null;
    if (transformId !== null && !this.transforms.has(transformId)) {
      throw new UnknownTransformError(transformId);
    }

    let out: Float32Array;
    try {
      out = this.buffers.vertices.append();
    } catch (error) {
      if (error instanceof BufferOverflowError) {
        this.discard();
      }
      throw error;
    }

    writeSpriteVertices(out, 0, sprite);
    this.keys.push(createBatchKey(sprite.textureId, transformId));
    this.usedTextures.add(sprite.textureId);
  }

  /**
   * Batch the submitted sprites and stage all buffers on the GPU.
   * Any failure discards the frame; nothing has been drawn at that point.
   *
   * @returns Batches in draw order
   */
  finalize(): readonly Batch[] {
    this.assertState("building", "finalize");

    try {
      this._batches = this.prepareBatches();
    } catch (error) {
      this.discard();
      throw error;
    }

    this._state = "finalized";
    return this._batches;
  }

  /**
   * Issue the draw calls. Valid exactly once, after finalize().
   * A backend failure discards the frame.
   */
  execute(): DrawStats {
    this.assertState("finalized", "execute");

    let stats: DrawStats;
    try {
      stats = executeBatches(this.backend, this._batches, () => this.buffers.bindings());
    } catch (error) {
      this.discard();
      throw error;
    }

    this._stats = stats;
    this._state = "executed";
    return stats;
  }

  private prepareBatches(): Batch[] {
    const plan = buildBatches(this.keys, { reorderable: this.options.reorderable });

    // One uniform slot per distinct transform, in order of first use
    const slots = new Map<TransformId | null, number>();
    const slotTransforms: Array<Mat4 | null> = [];
    for (const { key } of plan.ranges) {
      if (slots.has(key.transformId)) continue;
      slots.set(key.transformId, slotTransforms.length);
      slotTransforms.push(
        key.transformId === null ? null : this.transforms.get(key.transformId) ?? null
      );
    }

    // Resolve bind groups before the vertex data is reordered or uploaded
    const resolved = plan.ranges.map((range) => ({
      range,
      bindGroup: this.textures.lookup(range.key.textureId).bindGroup,
      slot: slots.get(range.key.transformId) ?? 0,
    }));

    if (plan.order) {
      this.buffers.vertices.permute(plan.order);
    }
    const offsets = this.buffers.upload(this.target, slotTransforms);

    return resolved.map(({ range: { key, start, count }, bindGroup, slot }) => ({
      textureId: key.textureId,
      transformId: key.transformId,
      bindGroup,
      uniformOffset: offsets[slot] ?? 0,
      start,
      count,
    }));
  }

  /**
   * Abandon the frame. Safe to call in any state.
   */
  discard(): void {
    if (this._state === "discarded") return;
    this._state = "discarded";
    this.keys = [];
    this.transforms.clear();
    this.usedTextures.clear();
  }

  private assertState(expected: FrameState, operation: string): void {
    if (this._state !== expected) {
      throw new InvalidStateError(
        `Cannot ${operation}() on a ${this._state} frame (expected ${expected})`
      );
    }
  }
}
