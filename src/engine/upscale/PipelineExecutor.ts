// Chains bound pipelines so each one reads the previous one's result

import { Logger } from '../../services/logger';
import { bindPipeline } from './BoundPipeline';
import type { BoundPipeline } from './BoundPipeline';
import { getFinalScaleFactor } from './descriptorValidation';
import { PipelineConfigError, describeError } from './errors';
import type { BorrowedTexture } from './ResourceScope';
import { applyScaleFactor } from './scaleFactor';
import type { ExecutablePipeline, TextureSize } from './types';

const log = Logger.create('PipelineExecutor');

/**
 * Output size of `pipelines` run in order over a `width` x `height` frame.
 * Each stage floors its own result, matching what allocation produces.
 */
export function predictOutputSize(
  pipelines: readonly ExecutablePipeline[],
  width: number,
  height: number
): TextureSize {
  let size: TextureSize = { width, height };
  for (const pipeline of pipelines) {
    const scale = getFinalScaleFactor(pipeline);
    if (!scale) {
      throw new PipelineConfigError('Final pass has no output texture', pipeline.name);
    }
    size = {
      width: applyScaleFactor(size.width, scale[0]),
      height: applyScaleFactor(size.height, scale[1]),
    };
  }
  return size;
}

export class PipelineExecutor {
  private readonly pipelines: BoundPipeline[];
  private readonly source: BorrowedTexture;
  private isDisposed = false;

  private constructor(source: BorrowedTexture, pipelines: BoundPipeline[]) {
    this.source = source;
    this.pipelines = pipelines;
  }

  /**
   * Binds `pipelines` in order. Pipeline i > 0 borrows pipeline i - 1's
   * output as its source. On failure every pipeline already bound is
   * disposed before the error propagates.
   */
  static async create(
    device: GPUDevice,
    pipelines: readonly ExecutablePipeline[],
    source: BorrowedTexture
  ): Promise<PipelineExecutor> {
    const bound: BoundPipeline[] = [];
    let current = source;

    try {
      for (const pipeline of pipelines) {
        const next = await bindPipeline(device, pipeline, current);
        bound.push(next);
        current = next.output;
      }
    } catch (error) {
      log.warn(`Binding failed after ${bound.length} of ${pipelines.length} pipelines: ${describeError(error)}`);
      for (const pipeline of bound.reverse()) {
        pipeline.dispose();
      }
      throw error;
    }

    const executor = new PipelineExecutor(source, bound);
    log.info(`Bound ${bound.length} pipelines (${executor.passCount} passes), output ${current.width}x${current.height}`);
    return executor;
  }

  /**
   * Records every pass of every pipeline into `encoder`, one compute pass
   * each, in declared order.
   */
  encode(encoder: GPUCommandEncoder): void {
    if (this.isDisposed) {
      throw new Error('PipelineExecutor was disposed');
    }
    for (const pipeline of this.pipelines) {
      pipeline.encode(encoder);
    }
  }

  /** The final texture; the source itself when no pipeline is bound */
  get output(): BorrowedTexture {
    const last = this.pipelines[this.pipelines.length - 1];
    return last ? last.output : this.source;
  }

  get outputSize(): TextureSize {
    return { width: this.output.width, height: this.output.height };
  }

  get pipelineNames(): string[] {
    return this.pipelines.map(p => p.name);
  }

  get passCount(): number {
    return this.pipelines.reduce((sum, p) => sum + p.passes.length, 0);
  }

  get ownedTextureCount(): number {
    return this.isDisposed ? 0 : this.pipelines.reduce((sum, p) => sum + p.ownedTextureCount, 0);
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  dispose(): void {
    if (this.isDisposed) return;
    this.isDisposed = true;
    // Downstream pipelines borrow upstream outputs, so release them first
    for (const pipeline of [...this.pipelines].reverse()) {
      pipeline.dispose();
    }
    log.debug('Disposed');
  }
}
