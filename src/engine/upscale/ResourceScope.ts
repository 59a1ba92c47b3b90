// Ownership tracking for textures a bound pipeline allocated

import { Logger } from '../../services/logger';

const log = Logger.create('ResourceScope');

/**
 * A texture the engine may read and bind but never destroy: the caller's
 * input frame, or another pipeline's output seen from downstream.
 */
export type BorrowedTexture = Omit<GPUTexture, 'destroy'>;

export type DestroyableTexture = Pick<GPUTexture, 'destroy' | 'label'>;

/**
 * Owns every texture adopted into it and destroys each exactly once.
 * Borrowed textures cannot be adopted: they lack `destroy`.
 */
export class ResourceScope {
  private readonly owned: DestroyableTexture[] = [];
  private isDisposed = false;

  constructor(readonly label: string) {}

  adopt<T extends DestroyableTexture>(texture: T): T {
    if (this.isDisposed) {
      // Nothing will ever release it, so release it now
      texture.destroy();
      throw new Error(`ResourceScope "${this.label}" is disposed and cannot adopt resources`);
    }
    this.owned.push(texture);
    return texture;
  }

  get size(): number {
    return this.owned.length;
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  /**
   * Destroys every owned texture. Later calls are no-ops.
   */
  dispose(): void {
    if (this.isDisposed) return;
    this.isDisposed = true;

    const textures = this.owned.splice(0);
    for (const texture of textures) {
      texture.destroy();
    }
    log.debug(`Released ${textures.length} textures for ${this.label}`);
  }
}
