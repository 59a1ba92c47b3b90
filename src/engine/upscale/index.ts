// Upscaling pipeline engine - public surface

export * from './types';
export * from './errors';
export * from './scaleFactor';
export { validatePipeline, getSourceTextureId, getResultTextureId, getFinalScaleFactor } from './descriptorValidation';
export { ResourceScope } from './ResourceScope';
export type { BorrowedTexture, DestroyableTexture } from './ResourceScope';
export { allocatePhysicalTextures, getTextureFormat, getPhysicalTextureSize, physicalTextureUsage } from './ResourceAllocator';
export { SamplerRegistry, createSamplerRegistry, createSamplerDescriptor } from './SamplerRegistry';
export { captureErrors, throwIfScopeFailed } from './errorScopes';
export type { ScopedErrors } from './errorScopes';
export { assertUniqueBindings, mergePassBindings, resolvePassBindings, createPassBindings } from './BindResolver';
export type { PhysicalTextureEntry, PhysicalTextureMap, SamplerLookup, PassBindings } from './BindResolver';
export { compilePass, computeDispatchExtent, selectEntryPoint, workgroupCount } from './PassCompiler';
export type { CompiledPass, ComputeEntryPoint } from './PassCompiler';
export { bindPipeline } from './BoundPipeline';
export type { BoundPipeline, BoundPass } from './BoundPipeline';
export { PipelineExecutor, predictOutputSize } from './PipelineExecutor';
export { StageCatalog, parseStageCatalog, parseStage } from './stageCatalog';
export type { StageName, RestoreVariant } from './stageCatalog';
export {
  PRESETS,
  PERFORMANCE_TIERS,
  createPipelines,
  createPipelinesForConfig,
  getEffectiveScale,
  getPresetLabel,
  getPerformanceTierLabel,
  isUpscalePreset,
  isPerformanceTier,
} from './presets';
export type { UpscalePreset, PerformanceTier, UpscaleConfig } from './presets';
