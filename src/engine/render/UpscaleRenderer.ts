// Drives the upscaling executor from a stream of source frames

import { Logger } from '../../services/logger';
import { FrameRenderError, describeError } from '../upscale/errors';
import { PipelineExecutor } from '../upscale/PipelineExecutor';
import { createPipelinesForConfig } from '../upscale/presets';
import type { UpscaleConfig } from '../upscale/presets';
import type { BorrowedTexture } from '../upscale/ResourceScope';
import type { StageCatalog } from '../upscale/stageCatalog';
import type { TextureSize } from '../upscale/types';
import { FrameScheduler } from './FrameScheduler';
import type { FrameClock } from './FrameScheduler';
import type { FramePresenter } from './OutputPresenter';

const log = Logger.create('UpscaleRenderer');

/** HTMLMediaElement.HAVE_CURRENT_DATA */
const HAVE_CURRENT_DATA = 2;

export interface FrameSource {
  readonly width: number;
  readonly height: number;
  /** False while no decoded frame is available */
  readonly ready: boolean;
  readonly image: GPUCopyExternalImageSource;
}

export function videoFrameSource(video: HTMLVideoElement): FrameSource {
  return {
    get width() {
      return video.videoWidth;
    },
    get height() {
      return video.videoHeight;
    },
    get ready() {
      return video.readyState >= HAVE_CURRENT_DATA;
    },
    image: video,
  };
}

export interface UpscaleRendererOptions {
  device: GPUDevice;
  source: FrameSource;
  clock: FrameClock;
  catalog: StageCatalog;
  config?: UpscaleConfig | null;
  presenter?: FramePresenter;
  signal?: AbortSignal;
}

export interface UpscaleRendererStats {
  framesRendered: number;
  framesFailed: number;
  framesSkipped: number;
  rebinds: number;
  bindFailures: number;
  lastError: string | null;
  stages: string[];
  passCount: number;
  ownedTextureCount: number;
  outputSize: TextureSize | null;
}

export interface UpscaleRenderer {
  /** Resolves once the first context is bound, or when the renderer is disposed first */
  readonly ready: Promise<void>;
  updateConfig(config: UpscaleConfig | null): void;
  getOutput(): BorrowedTexture | null;
  getStats(): UpscaleRendererStats;
  dispose(): Promise<void>;
}

interface RenderContext {
  key: string;
  size: TextureSize;
  frame: GPUTexture;
  executor: PipelineExecutor;
  /** Set once the presenter has been resized to this context's output */
  presenterSized: boolean;
}

export function frameTextureUsage(): GPUTextureUsageFlags {
  return GPUTextureUsage.COPY_DST |
    GPUTextureUsage.TEXTURE_BINDING |
    GPUTextureUsage.RENDER_ATTACHMENT;
}

/**
 * Identifies what a bound context was built for. Any difference means a
 * rebind.
 */
export function contextKey(config: UpscaleConfig | null, size: TextureSize): string {
  const stages = config ? `${config.preset}/${config.performance}/${config.scale}` : 'off';
  return `${size.width}x${size.height}|${stages}`;
}

function isUsableSize(size: TextureSize): boolean {
  return Number.isFinite(size.width) && Number.isFinite(size.height) &&
    size.width > 0 && size.height > 0;
}

function releaseContext(context: RenderContext): void {
  context.executor.dispose();
  context.frame.destroy();
}

export function createUpscaleRenderer(options: UpscaleRendererOptions): UpscaleRenderer {
  const { device, source, clock, catalog, presenter } = options;

  const controller = new AbortController();
  const scheduler = new FrameScheduler(clock, controller.signal);

  let config: UpscaleConfig | null = options.config ? { ...options.config } : null;
  let context: RenderContext | null = null;
  let failedKey: string | null = null;
  let disposePromise: Promise<void> | null = null;

  const stats: Pick<UpscaleRendererStats, 'framesRendered' | 'framesSkipped' | 'rebinds' | 'bindFailures' | 'lastError'> = {
    framesRendered: 0,
    framesSkipped: 0,
    rebinds: 0,
    bindFailures: 0,
    lastError: null,
  };

  let resolveReady: () => void = () => {};
  const ready = new Promise<void>(resolve => {
    resolveReady = resolve;
  });

  const buildContext = async (key: string, size: TextureSize, target: UpscaleConfig | null): Promise<RenderContext> => {
    // Unknown stage names fail here, before any GPU work
    const pipelines = catalog.resolve(createPipelinesForConfig(target));

    const frame = device.createTexture({
      label: 'Upscale input frame',
      size: { width: size.width, height: size.height, depthOrArrayLayers: 1 },
      format: 'rgba8unorm',
      usage: frameTextureUsage(),
    });

    try {
      const executor = await PipelineExecutor.create(device, pipelines, frame);
      return { key, size, frame, executor, presenterSized: false };
    } catch (error) {
      frame.destroy();
      throw error;
    }
  };

  /**
   * Builds the new context completely, then swaps it in. On failure the
   * current context stays in place.
   */
  const rebind = async (key: string, size: TextureSize): Promise<void> => {
    let next: RenderContext;
    try {
      next = await buildContext(key, size, config);
    } catch (error) {
      failedKey = key;
      stats.bindFailures++;
      stats.lastError = describeError(error);
      log.error(`Rebind failed for ${key}; keeping previous context`, error);
      return;
    }

    if (controller.signal.aborted) {
      releaseContext(next);
      return;
    }

    const previous = context;
    context = next;
    failedKey = null;
    stats.rebinds++;
    if (previous) releaseContext(previous);
    resolveReady();

    log.info(`Bound ${key}: ${next.executor.pipelineNames.length} stages, output ${next.executor.outputSize.width}x${next.executor.outputSize.height}`);
  };

  const render = (current: RenderContext): void => {
    try {
      device.queue.copyExternalImageToTexture(
        { source: source.image },
        { texture: current.frame, premultipliedAlpha: false },
        { width: current.size.width, height: current.size.height }
      );

      // Retried every frame until it succeeds
      if (!current.presenterSized) {
        presenter?.resize?.(current.executor.outputSize);
        current.presenterSized = true;
      }

      const encoder = device.createCommandEncoder({ label: 'Upscale frame' });
      current.executor.encode(encoder);
      presenter?.present(encoder, current.executor.output);
      device.queue.submit([encoder.finish()]);
    } catch (error) {
      stats.lastError = describeError(error);
      throw new FrameRenderError(`Frame at ${current.key} failed: ${stats.lastError}`, { cause: error });
    }
    stats.framesRendered++;
  };

  const onFrame = async (): Promise<void> => {
    const size: TextureSize = { width: source.width, height: source.height };
    if (!source.ready || !isUsableSize(size)) {
      stats.framesSkipped++;
      log.debug('Source not ready, waiting for next frame');
      return;
    }

    const key = contextKey(config, size);
    if (context?.key !== key && failedKey !== key) {
      await rebind(key, size);
    }
    if (controller.signal.aborted) return;

    // A failed rebind for a new input size leaves a context that cannot take this frame
    if (!context || context.size.width !== size.width || context.size.height !== size.height) {
      stats.framesSkipped++;
      return;
    }

    render(context);
  };

  const dispose = (): Promise<void> => {
    disposePromise ??= (async () => {
      controller.abort();
      await scheduler.settled();
      if (context) {
        releaseContext(context);
        context = null;
      }
      resolveReady();
      log.info('Disposed');
    })();
    return disposePromise;
  };

  if (options.signal) {
    const external = options.signal;
    const onAbort = (): void => {
      dispose().catch(error => log.error('Dispose after abort failed', error));
    };
    if (external.aborted) {
      onAbort();
    } else {
      external.addEventListener('abort', onAbort, { once: true });
    }
  }

  scheduler.start(onFrame);

  return {
    ready,
    updateConfig(next: UpscaleConfig | null): void {
      config = next ? { ...next } : null;
      scheduler.wake();
    },
    getOutput(): BorrowedTexture | null {
      return context ? context.executor.output : null;
    },
    getStats(): UpscaleRendererStats {
      const schedulerStats = scheduler.getStats();
      return {
        framesRendered: stats.framesRendered,
        framesFailed: schedulerStats.framesFailed,
        framesSkipped: stats.framesSkipped,
        rebinds: stats.rebinds,
        bindFailures: stats.bindFailures,
        lastError: stats.lastError,
        stages: context ? context.executor.pipelineNames : [],
        passCount: context ? context.executor.passCount : 0,
        ownedTextureCount: context ? context.executor.ownedTextureCount : 0,
        outputSize: context ? context.executor.outputSize : null,
      };
    },
    dispose,
  };
}
