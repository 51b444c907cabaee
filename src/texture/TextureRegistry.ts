/**
 * Texture Registry
 *
 * Maps caller texture ids to their GPU-side state. Each registered texture
 * owns one bind group (texture + sampler + 16-byte uniform block) that is only
 * rebuilt when the underlying GPU texture changes.
 */

import { packTextureUniforms, TEXTURE_UNIFORMS_SIZE } from "../backend/uniforms";
import { InvalidStateError, UnknownTextureError } from "../errors";
import type { BindGroup, GpuBackend, GpuBuffer } from "../backend/types";
import type { TextureId } from "../geometry/types";
import type { TextureInfo, TextureSize } from "./types";

interface Entry<TTexture> {
  info: TextureInfo;
  texture: TTexture;
  uniforms: GpuBuffer;
}

/** The query side of a registry */
export type TextureRegistryView<TTexture = unknown> = Pick<
  TextureRegistry<TTexture>,
  "lookup" | "isCurrentTexture" | "has" | "size" | "bindGroupBuilds"
>;

export class TextureRegistry<TTexture = unknown> {
  readonly backend: GpuBackend<TTexture>;

  private entries = new Map<TextureId, Entry<TTexture>>();
  private _bindGroupBuilds = 0;
  private _destroyed = false;

  constructor(backend: GpuBackend<TTexture>) {
    this.backend = backend;
  }

  /**
   * Register a texture, or update an existing registration.
   *
   * Re-registering with the same GPU texture only rewrites the uniform block;
   * a different GPU texture rebuilds the bind group.
   *
   * @param id - Caller-chosen texture id
   * @param size - Texture size in pixels
   * @param isMask - Whether the red channel is used as alpha
   * @param texture - Backend texture object
   */
  register(
    id: TextureId,
    size: TextureSize,
    isMask: boolean,
    texture: TTexture
  ): TextureInfo {
    this.assertAlive();
    validateSize(id, size);

    const existing = this.entries.get(id);

    if (existing) {
      const sameShape =
        existing.info.width === size.width &&
        existing.info.height === size.height &&
        existing.info.isMask === isMask;

      if (existing.texture === texture && sameShape) {
        return existing.info;
      }

      // The old bind group stays live until its replacement exists
      const previous = existing.info.bindGroup;
      const bindGroup =
        existing.texture === texture ? previous : this.buildBindGroup(texture, existing.uniforms);

      if (!sameShape) {
        try {
          this.backend.writeBuffer(
            existing.uniforms,
            0,
            packTextureUniforms(size.width, size.height, isMask)
          );
        } catch (error) {
          if (bindGroup !== previous) this.backend.destroyBindGroup(bindGroup);
          throw error;
        }
      }
      if (bindGroup !== previous) {
        this.backend.destroyBindGroup(previous);
      }

      const info: TextureInfo = { id, width: size.width, height: size.height, isMask, bindGroup };
      this.entries.set(id, { info, texture, uniforms: existing.uniforms });
      return info;
    }

    const uniforms = this.backend.createBuffer("uniform", TEXTURE_UNIFORMS_SIZE);
    this.backend.writeBuffer(
      uniforms,
      0,
      packTextureUniforms(size.width, size.height, isMask)
    );

    const info: TextureInfo = {
      id,
      width: size.width,
      height: size.height,
      isMask,
      bindGroup: this.buildBindGroup(texture, uniforms),
    };
    this.entries.set(id, { info, texture, uniforms });
    return info;
  }

  /**
   * Release a texture's bind group and uniform buffer.
   *
   * @returns false if the texture was not registered
   */
  unregister(handle: TextureInfo | TextureId): boolean {
    this.assertAlive();

    const id = typeof handle === "object" ? handle.id : handle;
    const entry = this.entries.get(id);
    if (!entry) return false;

    this.backend.destroyBindGroup(entry.info.bindGroup);
    this.backend.destroyBuffer(entry.uniforms);
    this.entries.delete(id);
    return true;
  }

  /**
   * Look up a registered texture.
   *
   * @throws UnknownTextureError if the id is not registered
   */
  lookup(id: TextureId): TextureInfo {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new UnknownTextureError(id);
    }
    return entry.info;
  }

  /** Whether `texture` is the GPU resource currently registered under `id` */
  isCurrentTexture(id: TextureId, texture: TTexture): boolean {
    return this.entries.get(id)?.texture === texture;
  }

  has(id: TextureId): boolean {
    return this.entries.has(id);
  }

  /** Number of registered textures */
  get size(): number {
    return this.entries.size;
  }

  /** Total bind groups created since construction */
  get bindGroupBuilds(): number {
    return this._bindGroupBuilds;
  }

  /** Release every registered texture */
  destroy(): void {
    if (this._destroyed) return;

    for (const entry of this.entries.values()) {
      this.backend.destroyBindGroup(entry.info.bindGroup);
      this.backend.destroyBuffer(entry.uniforms);
    }
    this.entries.clear();
    this._destroyed = true;
  }

  get destroyed(): boolean {
    return this._destroyed;
  }

  private buildBindGroup(texture: TTexture, uniforms: GpuBuffer): BindGroup {
    const bindGroup = this.backend.createBindGroup(texture, uniforms);
    this._bindGroupBuilds++;
    return bindGroup;
  }

  private assertAlive(): void {
    if (this._destroyed) {
      throw new InvalidStateError("Texture registry has been destroyed");
    }
  }
}

function validateSize(id: TextureId, size: TextureSize): void {
  const valid = (n: number) => Number.isInteger(n) && n > 0;
  if (!valid(size.width) || !valid(size.height)) {
    throw new InvalidStateError(
      `Invalid size ${size.width}x${size.height} for texture ${String(id)}`
    );
  }
}
