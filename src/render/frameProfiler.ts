import type { BackendKind } from './frameRenderer.js';

const PROFILE_RING_CAPACITY = 240;

type FrameSample = {
  timeMs: number;
  pixelCount: number;
};

export type FrameProfileStats = {
  backend: BackendKind;
  sampleCount: number;
  lastMs: number;
  medianMs: number;
  meanMs: number;
  /** Pixels shaded per millisecond across the window; 0 while no time has elapsed. */
  pixelsPerMs: number;
};

const computeMedian = (values: readonly number[]): number => {
  if (!values.length) return 0;
  const copy = [...values].sort((a, b) => a - b);
  const mid = Math.floor(copy.length / 2);
  if (copy.length % 2 === 0) {
    return (copy[mid - 1] + copy[mid]) * 0.5;
  }
  return copy[mid];
};

const computeMean = (values: readonly number[]): number => {
  if (!values.length) return 0;
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
};

export const defaultNow = () => {
  if (typeof performance !== 'undefined' && typeof performance.now === 'function') {
    return performance.now();
  }
  return Date.now();
};

/** Ring buffer of frame timings and sizes for one renderer. */
export class FrameProfiler {
  private readonly samples: FrameSample[] = [];
  private readonly capacity: number;

  constructor(
    private readonly backend: BackendKind,
    capacity = PROFILE_RING_CAPACITY,
  ) {
    this.capacity = Math.max(1, Math.trunc(capacity));
  }

  record(timeMs: number, pixelCount: number): void {
    this.samples.push({ timeMs, pixelCount });
    if (this.samples.length > this.capacity) {
      this.samples.shift();
    }
  }

  getStats(): FrameProfileStats | null {
    if (!this.samples.length) {
      return null;
    }
    const times = this.samples.map((sample) => sample.timeMs);
    let totalMs = 0;
    let totalPixels = 0;
    for (const sample of this.samples) {
      totalMs += sample.timeMs;
      totalPixels += sample.pixelCount;
    }
    return {
      backend: this.backend,
      sampleCount: this.samples.length,
      lastMs: times[times.length - 1],
      medianMs: computeMedian(times),
      meanMs: computeMean(times),
      pixelsPerMs: totalMs > 0 ? totalPixels / totalMs : 0,
    };
  }
}
