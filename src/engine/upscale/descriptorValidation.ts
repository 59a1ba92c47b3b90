// Static checks and queries on pipeline descriptors. Nothing here touches the GPU.

import { assertUniqueBindings } from './BindResolver';
import { PipelineConfigError } from './errors';
import { isValidScaleFactor } from './scaleFactor';
import type { ExecutablePipeline, PhysicalTexture, ScaleFactorPair } from './types';

const VALID_COMPONENTS = new Set<number>([1, 2, 4]);

function validateTextures(pipeline: ExecutablePipeline): Map<number, PhysicalTexture> {
  const textures = new Map<number, PhysicalTexture>();
  let sourceCount = 0;

  for (const texture of pipeline.physicalTextures) {
    if (textures.has(texture.id)) {
      throw new PipelineConfigError(`Duplicate physical texture id ${texture.id}`, pipeline.name);
    }
    if (!VALID_COMPONENTS.has(texture.components)) {
      throw new PipelineConfigError(
        `Texture ${texture.id} has ${texture.components} components (expected 1, 2 or 4)`,
        pipeline.name
      );
    }
    if (!texture.scaleFactor.every(isValidScaleFactor)) {
      throw new PipelineConfigError(`Texture ${texture.id} has an invalid scale factor`, pipeline.name);
    }
    if (texture.isSource) sourceCount++;
    textures.set(texture.id, texture);
  }

  if (sourceCount !== 1) {
    throw new PipelineConfigError(`Expected exactly one source texture, found ${sourceCount}`, pipeline.name);
  }

  return textures;
}

/**
 * Throws PipelineConfigError for any descriptor that cannot be bound
 * correctly, including binding-number collisions and passes that read a
 * texture before anything has written it.
 */
export function validatePipeline(pipeline: ExecutablePipeline): void {
  if (!pipeline.id) {
    throw new PipelineConfigError('Pipeline id is empty', pipeline.name || null);
  }
  if (!pipeline.name) {
    throw new PipelineConfigError(`Pipeline "${pipeline.id}" has an empty name`);
  }
  if (pipeline.passes.length === 0) {
    throw new PipelineConfigError('Pipeline has no passes', pipeline.name);
  }

  const textures = validateTextures(pipeline);
  const samplerModes = new Set(pipeline.requiredSamplers);
  const written = new Set<number>(
    pipeline.physicalTextures.filter(t => t.isSource).map(t => t.id)
  );

  pipeline.passes.forEach((pass, index) => {
    const label = `Pass ${index} ("${pass.name}")`;

    if (!pass.name) {
      throw new PipelineConfigError(`Pass ${index} has an empty name`, pipeline.name);
    }
    if (pass.outputTextures.length === 0) {
      throw new PipelineConfigError(`${label} has no output textures`, pipeline.name);
    }
    if (!pass.computeScaleFactors.every(s => Number.isFinite(s) && s > 0)) {
      throw new PipelineConfigError(`${label} has an invalid compute scale`, pipeline.name);
    }

    try {
      assertUniqueBindings(pass);
    } catch (error) {
      if (error instanceof PipelineConfigError) {
        throw new PipelineConfigError(error.message, pipeline.name);
      }
      throw error;
    }

    for (const input of pass.inputTextures) {
      if (!textures.has(input.physicalId)) {
        throw new PipelineConfigError(`${label} reads undeclared texture ${input.physicalId}`, pipeline.name);
      }
      if (!written.has(input.physicalId)) {
        throw new PipelineConfigError(
          `${label} reads texture ${input.physicalId} before any pass writes it`,
          pipeline.name
        );
      }
    }

    for (const sampler of pass.samplers) {
      if (!samplerModes.has(sampler.filterMode)) {
        throw new PipelineConfigError(
          `${label} uses undeclared sampler mode "${sampler.filterMode}"`,
          pipeline.name
        );
      }
    }

    for (const output of pass.outputTextures) {
      const texture = textures.get(output.physicalId);
      if (!texture) {
        throw new PipelineConfigError(`${label} writes undeclared texture ${output.physicalId}`, pipeline.name);
      }
      if (texture.isSource) {
        throw new PipelineConfigError(`${label} writes to the source texture`, pipeline.name);
      }
    }

    // Outputs become readable only by later passes
    for (const output of pass.outputTextures) {
      written.add(output.physicalId);
    }
  });
}

export function getSourceTextureId(pipeline: ExecutablePipeline): number | null {
  return pipeline.physicalTextures.find(t => t.isSource)?.id ?? null;
}

/**
 * The pipeline's result: the first output of its final pass.
 */
export function getResultTextureId(pipeline: ExecutablePipeline): number | null {
  const lastPass = pipeline.passes[pipeline.passes.length - 1];
  return lastPass?.outputTextures[0]?.physicalId ?? null;
}

export function getFinalScaleFactor(pipeline: ExecutablePipeline): ScaleFactorPair | null {
  const resultId = getResultTextureId(pipeline);
  if (resultId === null) return null;
  return pipeline.physicalTextures.find(t => t.id === resultId)?.scaleFactor ?? null;
}
