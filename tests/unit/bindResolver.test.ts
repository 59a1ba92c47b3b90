import { describe, it, expect } from 'vitest';
import {
  createPassBindings,
  mergePassBindings,
  resolvePassBindings,
} from '../../src/engine/upscale/BindResolver';
import type { PhysicalTextureEntry, SamplerLookup } from '../../src/engine/upscale/BindResolver';
import { PipelineConfigError } from '../../src/engine/upscale/errors';
import type { SamplerFilterMode } from '../../src/engine/upscale/types';
import { FakeDevice, FakeTexture, asDevice, asTexture, asView } from '../helpers/mockGpu';
import { makeUpscalePipeline, withPass } from '../helpers/mockPipelines';

function entry(id: number, format: GPUTextureFormat, owned: boolean): PhysicalTextureEntry {
  const texture = new FakeTexture(`texture ${id}`, 16, 16, format, 0);
  return { texture: asTexture(texture), view: asView(texture.createView({ label: `view ${id}` })), format, owned };
}

function textureMap(): Map<number, PhysicalTextureEntry> {
  return new Map([
    [0, entry(0, 'rgba8unorm', false)],
    [1, entry(1, 'rg32float', true)],
    [2, entry(2, 'rgba32float', true)],
  ]);
}

const samplers: SamplerLookup = {
  get(mode: SamplerFilterMode): GPUSampler {
    return { label: `sampler ${mode}`, __brand: 'GPUSampler' };
  },
};

describe('mergePassBindings', () => {
  it('sorts inputs, outputs and samplers by binding number', () => {
    const pass = makeUpscalePipeline('Merge').passes[1];
    expect(mergePassBindings(pass).map(b => [b.kind, b.binding])).toEqual([
      ['input', 0],
      ['input', 1],
      ['sampler', 2],
      ['output', 3],
    ]);
  });

  it('rejects a collision between a sampler and an input', () => {
    const pass = withPass(makeUpscalePipeline('Merge'), 0, {
      samplers: [{ binding: 0, filterMode: 'linear' }],
    }).passes[0];
    expect(() => mergePassBindings(pass)).toThrow('Pass "Merge features" binds input and sampler to binding 0');
  });

  it('rejects negative binding numbers', () => {
    const pass = withPass(makeUpscalePipeline('Merge'), 0, {
      inputTextures: [{ binding: -1, physicalId: 0 }],
    }).passes[0];
    expect(() => mergePassBindings(pass)).toThrow(PipelineConfigError);
  });
});

describe('resolvePassBindings', () => {
  it('builds layout entries matching each binding kind', () => {
    const pass = makeUpscalePipeline('Resolve').passes[1];
    const { layoutEntries, groupEntries } = resolvePassBindings(pass, textureMap(), samplers);

    expect(layoutEntries).toEqual([
      { binding: 0, visibility: 0x4, texture: { sampleType: 'float', viewDimension: '2d', multisampled: false } },
      { binding: 1, visibility: 0x4, texture: { sampleType: 'float', viewDimension: '2d', multisampled: false } },
      { binding: 2, visibility: 0x4, sampler: { type: 'filtering' } },
      { binding: 3, visibility: 0x4, storageTexture: { access: 'write-only', format: 'rgba32float', viewDimension: '2d' } },
    ]);
    expect(groupEntries.map(e => e.binding)).toEqual([0, 1, 2, 3]);
    expect(groupEntries[2].resource).toEqual({ label: 'sampler linear', __brand: 'GPUSampler' });
  });

  it('writes storage entries at the allocated format', () => {
    const pass = makeUpscalePipeline('Resolve').passes[0];
    const { layoutEntries } = resolvePassBindings(pass, textureMap(), samplers);
    expect(layoutEntries[2].storageTexture?.format).toBe('rg32float');
  });

  it('refuses to bind the borrowed source as an output', () => {
    const pass = withPass(makeUpscalePipeline('Resolve'), 0, {
      outputTextures: [{ binding: 2, physicalId: 0 }],
    }).passes[0];
    expect(() => resolvePassBindings(pass, textureMap(), samplers)).toThrow('Pass "Resolve features" writes to the source texture');
  });

  it('reports textures missing from the allocation', () => {
    const pass = makeUpscalePipeline('Resolve').passes[1];
    const textures = textureMap();
    textures.delete(1);
    expect(() => resolvePassBindings(pass, textures, samplers)).toThrow('Pass "Resolve upscale" references unknown texture 1');
  });
});

describe('createPassBindings', () => {
  it('creates the bind group on the explicit layout', () => {
    const device = new FakeDevice();
    const pass = makeUpscalePipeline('Create').passes[0];

    const { layout, bindGroup } = createPassBindings(asDevice(device), pass, textureMap(), samplers);

    expect(device.bindGroupLayouts).toHaveLength(1);
    expect(device.bindGroupLayouts[0].label).toBe('Create features layout');
    expect(device.bindGroups[0].layout).toBe(layout);
    expect(bindGroup.label).toBe('Create features bind group');
  });
});
