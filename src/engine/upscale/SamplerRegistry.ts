// One shared sampler per filter mode per pipeline

import type { SamplerLookup } from './BindResolver';
import { PipelineConfigError } from './errors';
import type { ExecutablePipeline, SamplerFilterMode } from './types';

export class SamplerRegistry implements SamplerLookup {
  private readonly samplers = new Map<SamplerFilterMode, GPUSampler>();

  constructor(private readonly pipelineName: string) {}

  register(mode: SamplerFilterMode, sampler: GPUSampler): void {
    this.samplers.set(mode, sampler);
  }

  get(mode: SamplerFilterMode): GPUSampler {
    const sampler = this.samplers.get(mode);
    if (!sampler) {
      throw new PipelineConfigError(`Sampler mode "${mode}" was not declared`, this.pipelineName);
    }
    return sampler;
  }

  get size(): number {
    return this.samplers.size;
  }
}

export function createSamplerDescriptor(mode: SamplerFilterMode): GPUSamplerDescriptor {
  return {
    label: `Sampler ${mode}`,
    addressModeU: 'clamp-to-edge',
    addressModeV: 'clamp-to-edge',
    addressModeW: 'clamp-to-edge',
    magFilter: mode,
    minFilter: mode,
    mipmapFilter: 'nearest',
  };
}

/**
 * Samplers carry no destroy(); they are released with the pipeline that
 * references them.
 */
export function createSamplerRegistry(device: GPUDevice, pipeline: ExecutablePipeline): SamplerRegistry {
  const registry = new SamplerRegistry(pipeline.name);
  for (const mode of new Set(pipeline.requiredSamplers)) {
    registry.register(mode, device.createSampler(createSamplerDescriptor(mode)));
  }
  return registry;
}
