// New sample weight / retained weight of the moving averages
export const SMOOTHING_FACTOR = 0.05;
export const RETAINED_WEIGHT = 0.95;

export interface TimingSample {
  /** Wall time of this call */
  processingTimeMs: number;
  smoothedProcessingMs: number;
  fps: number;
}

export type Clock = () => number;

/**
 * Exponential moving averages of per-call processing time and of the interval
 * between consecutive calls. One timer per stream; the first interval is
 * measured from construction.
 */
export class FrameTimer {
  private smoothedProcessingMs = 0;
  private smoothedIntervalMs = 0;
  private lastEndMs: number;

  constructor(private readonly clock: Clock = () => performance.now()) {
    this.lastEndMs = clock();
  }

  now(): number {
    return this.clock();
  }

  /**
   * Closes a call that started at `startMs`.
   */
  mark(startMs: number): TimingSample {
    const endMs = this.clock();
    const processingTimeMs = endMs - startMs;

    this.smoothedProcessingMs = SMOOTHING_FACTOR * processingTimeMs + RETAINED_WEIGHT * this.smoothedProcessingMs;
    this.smoothedIntervalMs = SMOOTHING_FACTOR * (endMs - this.lastEndMs) + RETAINED_WEIGHT * this.smoothedIntervalMs;
    this.lastEndMs = endMs;

    return {
      processingTimeMs,
      smoothedProcessingMs: this.smoothedProcessingMs,
      fps: this.smoothedIntervalMs > 0 ? 1000 / this.smoothedIntervalMs : 0,
    };
  }

  reset(): void {
    this.smoothedProcessingMs = 0;
    this.smoothedIntervalMs = 0;
    this.lastEndMs = this.clock();
  }
}
