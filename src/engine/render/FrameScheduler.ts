// Frame-ready driven loop with at most one frame in flight

import { Logger } from '../../services/logger';

const log = Logger.create('FrameScheduler');

/**
 * Source of frame-ready notifications. HTMLVideoElement satisfies this
 * through requestVideoFrameCallback.
 */
export interface FrameClock {
  requestVideoFrameCallback(callback: (now: number) => void): number;
  cancelVideoFrameCallback(handle: number): void;
}

export type FrameCallback = () => Promise<void>;

export interface FrameSchedulerStats {
  framesCompleted: number;
  framesFailed: number;
}

export class FrameScheduler {
  private readonly clock: FrameClock;
  private readonly signal: AbortSignal;
  private onFrame: FrameCallback | null = null;
  private handle: number | null = null;
  private inFlight: Promise<void> | null = null;
  private wakeRequested = false;

  private framesCompleted = 0;
  private framesFailed = 0;

  constructor(clock: FrameClock, signal: AbortSignal) {
    this.clock = clock;
    this.signal = signal;
    signal.addEventListener('abort', () => this.cancelPending(), { once: true });
  }

  get running(): boolean {
    return this.onFrame !== null && !this.signal.aborted;
  }

  get busy(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Registers for the next frame-ready notification. The following one is
   * registered only after `onFrame` settles.
   */
  start(onFrame: FrameCallback): void {
    if (this.signal.aborted) {
      log.warn('start() after abort ignored');
      return;
    }
    if (this.onFrame) {
      throw new Error('FrameScheduler already started');
    }
    this.onFrame = onFrame;
    log.debug('Starting');
    this.schedule();
  }

  /**
   * Runs a frame now instead of waiting for the clock. If one is already
   * running, the next runs as soon as it settles.
   */
  wake(): void {
    if (!this.running) return;
    if (this.inFlight) {
      this.wakeRequested = true;
      return;
    }
    this.cancelPending();
    this.runFrame();
  }

  /** Resolves once no frame is in flight */
  async settled(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  getStats(): FrameSchedulerStats {
    return { framesCompleted: this.framesCompleted, framesFailed: this.framesFailed };
  }

  private schedule(): void {
    if (!this.running || this.handle !== null) return;
    this.handle = this.clock.requestVideoFrameCallback(() => {
      this.handle = null;
      this.runFrame();
    });
  }

  private cancelPending(): void {
    if (this.handle !== null) {
      this.clock.cancelVideoFrameCallback(this.handle);
      this.handle = null;
    }
  }

  private runFrame(): void {
    const onFrame = this.onFrame;
    if (!onFrame || this.signal.aborted) return;
    this.inFlight = this.execute(onFrame);
  }

  private async execute(onFrame: FrameCallback): Promise<void> {
    try {
      await onFrame();
      this.framesCompleted++;
    } catch (e) {
      // One bad frame must not stop playback
      this.framesFailed++;
      log.error('Frame failed', e);
    } finally {
      this.inFlight = null;
    }

    if (this.wakeRequested) {
      this.wakeRequested = false;
      this.runFrame();
    } else {
      this.schedule();
    }
  }
}
