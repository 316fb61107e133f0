import type { FrameBuffer } from '../render/frameBuffer.js';
import { BYTES_PER_PIXEL } from '../render/frameBuffer.js';

export type ParityOptions = {
  /** Largest per-channel byte difference that still counts as a match. */
  tolerance?: number;
  /** Fraction of pixels allowed to exceed `tolerance`. */
  maxMismatchRatio?: number;
};

export type ParityReport = {
  maxAbs: number;
  rms: number;
  mismatchedPixels: number;
  pixelCount: number;
  withinTolerance: boolean;
};

const DEFAULT_TOLERANCE = 1;
const DEFAULT_MAX_MISMATCH_RATIO = 0;

/** Per-pixel divergence between two frames of equal size, compared on RGB. */
export const compareFrames = (a: FrameBuffer, b: FrameBuffer, options: ParityOptions = {}): ParityReport => {
  if (a.width !== b.width || a.height !== b.height) {
    throw new Error(`[bulb-parity] frame size mismatch ${a.width}x${a.height} vs ${b.width}x${b.height}`);
  }
  const tolerance = Math.max(0, options.tolerance ?? DEFAULT_TOLERANCE);
  const maxMismatchRatio = Math.max(0, options.maxMismatchRatio ?? DEFAULT_MAX_MISMATCH_RATIO);
  const pixelCount = a.width * a.height;
  let maxAbs = 0;
  let sumSq = 0;
  let mismatchedPixels = 0;
  for (let pixel = 0; pixel < pixelCount; pixel++) {
    const base = pixel * BYTES_PER_PIXEL;
    let pixelMax = 0;
    for (let channel = 0; channel < 3; channel++) {
      const diff = Math.abs(a.data[base + channel] - b.data[base + channel]);
      sumSq += diff * diff;
      pixelMax = Math.max(pixelMax, diff);
    }
    maxAbs = Math.max(maxAbs, pixelMax);
    if (pixelMax > tolerance) {
      mismatchedPixels += 1;
    }
  }
  const rms = pixelCount ? Math.sqrt(sumSq / (pixelCount * 3)) : 0;
  return {
    maxAbs,
    rms,
    mismatchedPixels,
    pixelCount,
    withinTolerance: pixelCount === 0 || mismatchedPixels / pixelCount <= maxMismatchRatio,
  };
};
