// Creates the physical textures a pipeline declares, sized from its input frame

import { Logger } from '../../services/logger';
import type { PhysicalTextureEntry, PhysicalTextureMap } from './BindResolver';
import { ResourceAllocationError, describeError } from './errors';
import type { BorrowedTexture, ResourceScope } from './ResourceScope';
import { applyScaleFactor } from './scaleFactor';
import type { ExecutablePipeline, PhysicalTexture, TextureComponents, TextureSize } from './types';

const log = Logger.create('ResourceAllocator');

export function physicalTextureUsage(): GPUTextureUsageFlags {
  return GPUTextureUsage.STORAGE_BINDING |
    GPUTextureUsage.TEXTURE_BINDING |
    GPUTextureUsage.COPY_SRC |
    GPUTextureUsage.COPY_DST;
}

export function getTextureFormat(components: TextureComponents): GPUTextureFormat {
  switch (components) {
    case 1:
      return 'r32float';
    case 2:
      return 'rg32float';
    case 4:
      return 'rgba32float';
  }
}

export function getPhysicalTextureSize(texture: PhysicalTexture, inputSize: TextureSize): TextureSize {
  return {
    width: applyScaleFactor(inputSize.width, texture.scaleFactor[0]),
    height: applyScaleFactor(inputSize.height, texture.scaleFactor[1]),
  };
}

/**
 * Allocates every non-source texture of `pipeline` into `scope` and aliases
 * the source texture to `source`.
 *
 * Out-of-memory and validation failures are caught through error scopes; on
 * any failure the textures created so far are destroyed before a
 * ResourceAllocationError is thrown.
 */
export async function allocatePhysicalTextures(
  device: GPUDevice,
  pipeline: ExecutablePipeline,
  source: BorrowedTexture,
  scope: ResourceScope
): Promise<PhysicalTextureMap> {
  const inputSize: TextureSize = { width: source.width, height: source.height };
  const textures = new Map<number, PhysicalTextureEntry>();
  const created: GPUTexture[] = [];

  const releaseCreated = (): void => {
    for (const texture of created) {
      texture.destroy();
    }
    created.length = 0;
  };

  device.pushErrorScope('out-of-memory');
  device.pushErrorScope('validation');

  let thrown: unknown = null;
  try {
    for (const pt of pipeline.physicalTextures) {
      if (pt.isSource) {
        textures.set(pt.id, {
          texture: source,
          view: source.createView({ label: `${pipeline.name} source` }),
          format: source.format,
          owned: false,
        });
        continue;
      }

      const { width, height } = getPhysicalTextureSize(pt, inputSize);
      if (width === 0 || height === 0) {
        throw new Error(`Texture ${pt.id} would be ${width}x${height} for a ${inputSize.width}x${inputSize.height} input`);
      }

      const format = getTextureFormat(pt.components);
      const texture = device.createTexture({
        label: `${pipeline.name} texture ${pt.id}`,
        size: { width, height, depthOrArrayLayers: 1 },
        mipLevelCount: 1,
        sampleCount: 1,
        dimension: '2d',
        format,
        usage: physicalTextureUsage(),
      });
      created.push(texture);

      textures.set(pt.id, {
        texture,
        view: texture.createView({ label: `${pipeline.name} texture ${pt.id} view` }),
        format,
        owned: true,
      });
    }
  } catch (error) {
    thrown = error;
  }

  // Scopes must be popped in reverse order even when creation threw
  const validationError = await device.popErrorScope();
  const memoryError = await device.popErrorScope();

  if (thrown !== null) {
    releaseCreated();
    throw new ResourceAllocationError(pipeline.name, `Texture allocation failed: ${describeError(thrown)}`, { cause: thrown });
  }

  const scopeError = memoryError ?? validationError;
  if (scopeError) {
    releaseCreated();
    const reason = memoryError ? 'Out of GPU memory' : 'Invalid texture descriptor';
    throw new ResourceAllocationError(pipeline.name, `${reason}: ${scopeError.message}`);
  }

  for (const texture of created) {
    scope.adopt(texture);
  }

  log.debug(`Allocated ${created.length} textures for ${pipeline.name} at ${inputSize.width}x${inputSize.height}`);
  return textures;
}
