// A single pipeline bound to GPU resources for one input size

import { Logger } from '../../services/logger';
import { createPassBindings } from './BindResolver';
import { validatePipeline, getResultTextureId } from './descriptorValidation';
import { captureErrors, throwIfScopeFailed } from './errorScopes';
import { PipelineConfigError } from './errors';
import { compilePass, workgroupCount } from './PassCompiler';
import type { ComputeEntryPoint } from './PassCompiler';
import { allocatePhysicalTextures } from './ResourceAllocator';
import { ResourceScope } from './ResourceScope';
import type { BorrowedTexture } from './ResourceScope';
import { createSamplerRegistry } from './SamplerRegistry';
import type { ExecutablePipeline, TextureSize } from './types';

const log = Logger.create('BoundPipeline');

export interface BoundPass {
  name: string;
  computePipeline: GPUComputePipeline;
  bindGroup: GPUBindGroup;
  entryPoint: ComputeEntryPoint;
  workgroups: readonly [number, number];
}

export interface BoundPipeline {
  readonly name: string;
  readonly passes: readonly BoundPass[];
  /** Result of the final pass; owned by this pipeline, lent to callers */
  readonly output: BorrowedTexture;
  readonly ownedTextureCount: number;
  encode(encoder: GPUCommandEncoder): void;
  dispose(): void;
}

export function encodeBoundPasses(encoder: GPUCommandEncoder, passes: readonly BoundPass[]): void {
  for (const pass of passes) {
    const computePass = encoder.beginComputePass({ label: pass.name });
    computePass.setPipeline(pass.computePipeline);
    computePass.setBindGroup(0, pass.bindGroup);
    computePass.dispatchWorkgroups(pass.workgroups[0], pass.workgroups[1], 1);
    computePass.end();
  }
}

/**
 * Validates `pipeline`, allocates its textures against `source`, and
 * compiles every pass. If any step fails, everything allocated so far is
 * released before the error propagates.
 */
export async function bindPipeline(
  device: GPUDevice,
  pipeline: ExecutablePipeline,
  source: BorrowedTexture
): Promise<BoundPipeline> {
  validatePipeline(pipeline);

  const done = log.time(`Binding ${pipeline.name}`);
  const inputSize: TextureSize = { width: source.width, height: source.height };
  const scope = new ResourceScope(pipeline.name);

  try {
    const textures = await allocatePhysicalTextures(device, pipeline, source, scope);
    const samplerResult = await captureErrors(device, () => createSamplerRegistry(device, pipeline));
    throwIfScopeFailed(samplerResult.errors, pipeline.name, 'samplers');
    const samplers = samplerResult.value;

    const passes: BoundPass[] = [];
    for (const pass of pipeline.passes) {
      const bindings = await captureErrors(device, () => createPassBindings(device, pass, textures, samplers));
      throwIfScopeFailed(bindings.errors, pipeline.name, `bindings for ${pass.name}`);
      const { layout, bindGroup } = bindings.value;
      const compiled = await compilePass(device, pass, inputSize, layout);
      passes.push({
        name: compiled.name,
        computePipeline: compiled.computePipeline,
        bindGroup,
        entryPoint: compiled.entryPoint,
        workgroups: workgroupCount(compiled.dispatchExtent),
      });
    }

    const resultId = getResultTextureId(pipeline);
    const result = resultId === null ? undefined : textures.get(resultId);
    if (!result) {
      throw new PipelineConfigError('Final pass has no output texture', pipeline.name);
    }

    done();

    return {
      name: pipeline.name,
      passes,
      output: result.texture,
      ownedTextureCount: scope.size,
      encode(encoder: GPUCommandEncoder): void {
        if (scope.disposed) {
          throw new Error(`Pipeline ${pipeline.name} was disposed`);
        }
        encodeBoundPasses(encoder, passes);
      },
      dispose(): void {
        scope.dispose();
      },
    };
  } catch (error) {
    scope.dispose();
    throw error;
  }
}
