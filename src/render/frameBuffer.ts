import type { RenderConfig } from '../config/renderConfig.js';
import { quantizeRgb } from '../shading/color.js';
import type { FrameParams } from './params.js';
import { renderPixel } from './pixel.js';

export const BYTES_PER_PIXEL = 4;

/** Row-major RGBA8 image. */
export type FrameBuffer = {
  width: number;
  height: number;
  data: Uint8ClampedArray;
};

/** Half-open row range [startRow, endRow). */
export type RowBand = {
  index: number;
  startRow: number;
  endRow: number;
};

export const createFrameBuffer = (width: number, height: number): FrameBuffer => {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`[frame-buffer] invalid dimensions ${width}x${height}`);
  }
  return { width, height, data: new Uint8ClampedArray(width * height * BYTES_PER_PIXEL) };
};

/**
 * Splits `height` rows into at most `bandCount` contiguous bands of near-equal
 * size. Bands never overlap and together cover every row once.
 */
export const partitionRows = (height: number, bandCount: number): RowBand[] => {
  const rows = Math.max(0, Math.trunc(height));
  if (rows === 0) return [];
  const count = Math.min(rows, Math.max(1, Math.trunc(bandCount) || 1));
  const base = Math.floor(rows / count);
  const remainder = rows % count;
  const bands: RowBand[] = [];
  let start = 0;
  for (let index = 0; index < count; index++) {
    const size = base + (index < remainder ? 1 : 0);
    bands.push({ index, startRow: start, endRow: start + size });
    start += size;
  }
  return bands;
};

/** Bands of at most `bandHeight` rows. */
export const partitionRowsByHeight = (height: number, bandHeight: number): RowBand[] => {
  const step = Math.max(1, Math.trunc(bandHeight) || 1);
  return partitionRows(height, Math.ceil(Math.max(0, Math.trunc(height)) / step));
};

/** RGBA bytes for the rows of `band`; alpha is always opaque. */
export const renderBand = (
  params: FrameParams,
  band: RowBand,
  config: RenderConfig,
  target?: Uint8ClampedArray,
): Uint8ClampedArray => {
  const { width } = config;
  const required = (band.endRow - band.startRow) * width * BYTES_PER_PIXEL;
  if (target && target.length !== required) {
    throw new Error(`[frame-buffer] band target holds ${target.length} bytes, expected ${required}`);
  }
  const out = target ?? new Uint8ClampedArray(required);
  let offset = 0;
  for (let y = band.startRow; y < band.endRow; y++) {
    for (let x = 0; x < width; x++) {
      const [r, g, b] = quantizeRgb(renderPixel(params, x, y, config));
      out[offset] = r;
      out[offset + 1] = g;
      out[offset + 2] = b;
      out[offset + 3] = 255;
      offset += BYTES_PER_PIXEL;
    }
  }
  return out;
};

export const writeBand = (frame: FrameBuffer, band: RowBand, bytes: Uint8ClampedArray): void => {
  const expected = (band.endRow - band.startRow) * frame.width * BYTES_PER_PIXEL;
  if (bytes.length !== expected) {
    throw new Error(
      `[frame-buffer] band ${band.index} carries ${bytes.length} bytes, expected ${expected}`,
    );
  }
  if (band.startRow < 0 || band.endRow > frame.height) {
    throw new Error(`[frame-buffer] band ${band.index} rows ${band.startRow}..${band.endRow} out of range`);
  }
  frame.data.set(bytes, band.startRow * frame.width * BYTES_PER_PIXEL);
};
