/**
 * SpriteRenderer - owns the texture registry and frame buffers, hands out frames
 */

import { Frame } from "./frame/Frame";
import { FrameBuffers, type TargetSize } from "./frame/FrameBuffers";
import { TextureRegistry, type TextureRegistryView } from "./texture/TextureRegistry";
import { InvalidStateError } from "./errors";
import type { DrawStats } from "./draw/DrawExecutor";
import type { FrameOptions } from "./frame/types";
import type { GpuBackend } from "./backend/types";
import type { TextureId } from "./geometry/types";
import type { TextureInfo, TextureSize } from "./texture/types";

export interface SpriteRendererOptions<TTexture> {
  backend: GpuBackend<TTexture>;
  /** Quads to allocate room for up front (default: 1024) */
  initialQuadCapacity?: number;
  /** Hard cap on quads per frame (default: 1 << 20) */
  maxQuads?: number;
  /** Log a frame summary at most once per second (default: false) */
  debug?: boolean;
}

export class SpriteRenderer<TTexture = unknown> {
  readonly backend: GpuBackend<TTexture>;
  readonly debug: boolean;

  private registry: TextureRegistry<TTexture>;
  private buffers: FrameBuffers;
  private current: Frame | null = null;
  private destroyed = false;

  private frameCount = 0;
  private lastDebugTime = 0;

  constructor(options: SpriteRendererOptions<TTexture>) {
    this.backend = options.backend;
    this.debug = options.debug ?? false;
    this.registry = new TextureRegistry(options.backend);
    this.buffers = new FrameBuffers(options.backend, {
      initialQuadCapacity: options.initialQuadCapacity,
      maxQuads: options.maxQuads,
    });
  }

  /** Read-only view of the registered textures; changes go through this renderer */
  get textures(): TextureRegistryView<TTexture> {
    return this.registry;
  }

  /** Frames rendered so far */
  get framesRendered(): number {
    return this.frameCount;
  }

  /** The most recent frame handed out by beginFrame() */
  get currentFrame(): Frame | null {
    return this.current;
  }

  registerTexture(
    id: TextureId,
    size: TextureSize,
    isMask: boolean,
    texture: TTexture
  ): TextureInfo {
    this.assertAlive();

    // A finalized frame already holds the old bind group
    const frame = this.current;
    if (
      frame?.state === "finalized" &&
      frame.usesTexture(id) &&
      this.registry.has(id) &&
      !this.registry.isCurrentTexture(id, texture)
    ) {
      throw new InvalidStateError(
        `Texture ${String(id)} is in use by a finalized frame and cannot be replaced`
      );
    }

    return this.registry.register(id, size, isMask, texture);
  }

  unregisterTexture(handle: TextureInfo | TextureId): boolean {
    this.assertAlive();

    const id = typeof handle === "object" ? handle.id : handle;
    if (this.current?.usesTexture(id)) {
      throw new InvalidStateError(
        `Texture ${String(id)} is in use by the ${this.current.state} frame`
      );
    }

    return this.registry.unregister(id);
  }

  lookupTexture(id: TextureId): TextureInfo {
    this.assertAlive();
    return this.registry.lookup(id);
  }

  /**
   * Start a new frame. The previous frame must have been executed or discarded.
   */
  beginFrame(target: TargetSize, options: FrameOptions = {}): Frame {
    this.assertAlive();

    if (this.current?.isActive) {
      throw new InvalidStateError(
        `Previous frame is still ${this.current.state} - render or discard it first`
      );
    }

    this.buffers.reset();
    this.current = new Frame({
      textures: this.registry,
      buffers: this.buffers,
      backend: this.backend,
      target,
      options,
    });
    return this.current;
  }

  /**
   * Finalize (if still building) and execute a frame from this renderer.
   */
  render(frame: Frame): DrawStats {
    this.assertAlive();

    if (frame !== this.current) {
      throw new InvalidStateError("Frame was not started by this renderer");
    }

    if (frame.state === "building") {
      frame.finalize();
    }
    const stats = frame.execute();

    // Debug logging (once per second)
    this.frameCount++;
    if (this.debug) {
      const now = Date.now();
      if (now - this.lastDebugTime > 1000) {
        console.log(
          `[SpriteRenderer] frame=${this.frameCount}, batches=${frame.batches.length}, ` +
            `drawCalls=${stats.drawCalls}, bindGroupSwitches=${stats.bindGroupSwitches}, ` +
            `sprites=${stats.sprites}`
        );
        this.lastDebugTime = now;
      }
    }

    return stats;
  }

  /** Release all GPU resources */
  destroy(): void {
    if (this.destroyed) return;

    this.current?.discard();
    this.current = null;
    this.buffers.destroy();
    this.registry.destroy();
    this.destroyed = true;
  }

  private assertAlive(): void {
    if (this.destroyed) {
      throw new InvalidStateError("Sprite renderer has been destroyed");
    }
  }
}
