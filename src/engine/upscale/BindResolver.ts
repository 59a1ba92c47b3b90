// Maps a pass's logical bindings onto allocated textures and samplers and
// builds an explicit, binding-number-sorted layout for it

import { PipelineConfigError } from './errors';
import type { BorrowedTexture } from './ResourceScope';
import type { ExecutablePass, SamplerFilterMode } from './types';

export interface PhysicalTextureEntry {
  texture: BorrowedTexture;
  view: GPUTextureView;
  format: GPUTextureFormat;
  /** False for the aliased source texture */
  owned: boolean;
}

export type PhysicalTextureMap = ReadonlyMap<number, PhysicalTextureEntry>;

export interface SamplerLookup {
  get(mode: SamplerFilterMode): GPUSampler;
}

export type MergedBinding =
  | { kind: 'input'; binding: number; physicalId: number }
  | { kind: 'output'; binding: number; physicalId: number }
  | { kind: 'sampler'; binding: number; filterMode: SamplerFilterMode };

export interface ResolvedPassBindings {
  layoutEntries: GPUBindGroupLayoutEntry[];
  groupEntries: GPUBindGroupEntry[];
}

export interface PassBindings {
  layout: GPUBindGroupLayout;
  bindGroup: GPUBindGroup;
}

/**
 * Inputs, outputs and samplers merged into one list sorted by binding number.
 * Throws when two entries share a binding number.
 */
export function mergePassBindings(pass: ExecutablePass): MergedBinding[] {
  const merged: MergedBinding[] = [
    ...pass.inputTextures.map((b): MergedBinding => ({ kind: 'input', binding: b.binding, physicalId: b.physicalId })),
    ...pass.outputTextures.map((b): MergedBinding => ({ kind: 'output', binding: b.binding, physicalId: b.physicalId })),
    ...pass.samplers.map((b): MergedBinding => ({ kind: 'sampler', binding: b.binding, filterMode: b.filterMode })),
  ];

  const seen = new Map<number, MergedBinding['kind']>();
  for (const entry of merged) {
    if (!Number.isInteger(entry.binding) || entry.binding < 0) {
      throw new PipelineConfigError(`Pass "${pass.name}" has invalid binding number ${entry.binding}`);
    }
    const previous = seen.get(entry.binding);
    if (previous !== undefined) {
      throw new PipelineConfigError(
        `Pass "${pass.name}" binds ${previous} and ${entry.kind} to binding ${entry.binding}`
      );
    }
    seen.set(entry.binding, entry.kind);
  }

  return merged.sort((a, b) => a.binding - b.binding);
}

export function assertUniqueBindings(pass: ExecutablePass): void {
  mergePassBindings(pass);
}

function lookupTexture(pass: ExecutablePass, textures: PhysicalTextureMap, physicalId: number): PhysicalTextureEntry {
  const entry = textures.get(physicalId);
  if (!entry) {
    throw new PipelineConfigError(`Pass "${pass.name}" references unknown texture ${physicalId}`);
  }
  return entry;
}

export function resolvePassBindings(
  pass: ExecutablePass,
  textures: PhysicalTextureMap,
  samplers: SamplerLookup
): ResolvedPassBindings {
  const layoutEntries: GPUBindGroupLayoutEntry[] = [];
  const groupEntries: GPUBindGroupEntry[] = [];

  for (const entry of mergePassBindings(pass)) {
    switch (entry.kind) {
      case 'input': {
        const texture = lookupTexture(pass, textures, entry.physicalId);
        layoutEntries.push({
          binding: entry.binding,
          visibility: GPUShaderStage.COMPUTE,
          texture: { sampleType: 'float', viewDimension: '2d', multisampled: false },
        });
        groupEntries.push({ binding: entry.binding, resource: texture.view });
        break;
      }
      case 'output': {
        const texture = lookupTexture(pass, textures, entry.physicalId);
        if (!texture.owned) {
          throw new PipelineConfigError(`Pass "${pass.name}" writes to the source texture`);
        }
        layoutEntries.push({
          binding: entry.binding,
          visibility: GPUShaderStage.COMPUTE,
          storageTexture: { access: 'write-only', format: texture.format, viewDimension: '2d' },
        });
        groupEntries.push({ binding: entry.binding, resource: texture.view });
        break;
      }
      case 'sampler': {
        layoutEntries.push({
          binding: entry.binding,
          visibility: GPUShaderStage.COMPUTE,
          sampler: { type: 'filtering' },
        });
        groupEntries.push({ binding: entry.binding, resource: samplers.get(entry.filterMode) });
        break;
      }
    }
  }

  return { layoutEntries, groupEntries };
}

/**
 * Creates the pass's explicit bind group layout and a bind group on that
 * same layout, so the group never depends on an inferred layout.
 */
export function createPassBindings(
  device: GPUDevice,
  pass: ExecutablePass,
  textures: PhysicalTextureMap,
  samplers: SamplerLookup
): PassBindings {
  const { layoutEntries, groupEntries } = resolvePassBindings(pass, textures, samplers);

  const layout = device.createBindGroupLayout({
    label: `${pass.name} layout`,
    entries: layoutEntries,
  });

  const bindGroup = device.createBindGroup({
    label: `${pass.name} bind group`,
    layout,
    entries: groupEntries,
  });

  return { layout, bindGroup };
}
