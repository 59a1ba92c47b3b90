// Descriptor types for upscaling pipelines produced by the shader translator

/**
 * Exact rational size multiplier relative to a pipeline's input frame.
 * Kept as a fraction so long pass chains do not accumulate rounding drift.
 */
export interface ScaleFactor {
  numerator: number;
  denominator: number;
}

export type ScaleFactorPair = readonly [ScaleFactor, ScaleFactor];

export type SamplerFilterMode = 'nearest' | 'linear';

/** Component count selects the storage format (1=R, 2=RG, 4=RGBA) */
export type TextureComponents = 1 | 2 | 4;

export interface PhysicalTexture {
  /** Unique within its pipeline */
  id: number;
  components: TextureComponents;
  /** Width and height scale relative to the pipeline input */
  scaleFactor: ScaleFactorPair;
  /** Aliases the caller's input frame; never allocated or destroyed here */
  isSource: boolean;
}

export interface InputTextureBinding {
  binding: number;
  physicalId: number;
}

export interface OutputTextureBinding {
  binding: number;
  physicalId: number;
}

export interface SamplerBinding {
  binding: number;
  filterMode: SamplerFilterMode;
}

export interface ExecutablePass {
  /** Used for labels and error messages */
  name: string;
  /** WGSL source exposing `main` and `main_unchecked` compute entry points */
  shader: string;
  /** Dispatch extent relative to the pipeline input (width, height) */
  computeScaleFactors: readonly [number, number];
  inputTextures: readonly InputTextureBinding[];
  outputTextures: readonly OutputTextureBinding[];
  samplers: readonly SamplerBinding[];
}

/**
 * One pipeline of the chain. Passes are listed in dependency order: no pass
 * reads a texture before the source or an earlier pass has written it.
 */
export interface ExecutablePipeline {
  id: string;
  name: string;
  physicalTextures: readonly PhysicalTexture[];
  requiredSamplers: readonly SamplerFilterMode[];
  passes: readonly ExecutablePass[];
}

export interface TextureSize {
  width: number;
  height: number;
}

export const COMPUTE_WORKGROUP_SIZE_X = 8;
export const COMPUTE_WORKGROUP_SIZE_Y = 8;

export const CHECKED_ENTRY_POINT = 'main';
export const UNCHECKED_ENTRY_POINT = 'main_unchecked';
