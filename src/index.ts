// Public entry point

export * from './engine/upscale';
export { requestUpscaleDevice, REQUIRED_FEATURES } from './engine/core/WebGPUContext';
export type { UpscaleDevice, UpscaleDeviceOptions, DeviceLostCallback } from './engine/core/WebGPUContext';
export { FrameScheduler } from './engine/render/FrameScheduler';
export type { FrameClock, FrameCallback, FrameSchedulerStats } from './engine/render/FrameScheduler';
export { OutputPresenter, CanvasPresenter } from './engine/render/OutputPresenter';
export type {
  FramePresenter,
  OutputPresenterOptions,
  PresentationCanvas,
  PresenterColorConversion,
} from './engine/render/OutputPresenter';
export { createUpscaleRenderer, videoFrameSource, contextKey } from './engine/render/UpscaleRenderer';
export type {
  FrameSource,
  UpscaleRenderer,
  UpscaleRendererOptions,
  UpscaleRendererStats,
} from './engine/render/UpscaleRenderer';
export { useUpscaleSettingsStore, connectRendererToSettings, MAX_TARGET_SCALE } from './stores/upscaleSettingsStore';
export { Logger, createLogger } from './services/logger';
export type { LogEntry, LogLevel } from './services/logger';
