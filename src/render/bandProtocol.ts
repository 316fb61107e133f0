import type { RenderConfig } from '../config/renderConfig.js';
import { BYTES_PER_PIXEL, renderBand, type RowBand } from './frameBuffer.js';
import { unpackParams } from './params.js';

export type BandRequest = {
  kind: 'band';
  frameId: number;
  band: RowBand;
  /** Packed uniform record (see params.ts). */
  params: ArrayBuffer;
  config: RenderConfig;
};

export type BandResponse =
  | {
      kind: 'band';
      frameId: number;
      bandIndex: number;
      pixels: ArrayBuffer;
    }
  | {
      kind: 'error';
      frameId: number;
      bandIndex: number;
      message: string;
    };

/** Worker-side handler; also called directly when rendering inline. */
export const handleBandRequest = (request: BandRequest): BandResponse => {
  try {
    const params = unpackParams(request.params);
    const pixels = new ArrayBuffer(bandByteLength(request.band, request.config.width));
    renderBand(params, request.band, request.config, new Uint8ClampedArray(pixels));
    return {
      kind: 'band',
      frameId: request.frameId,
      bandIndex: request.band.index,
      pixels,
    };
  } catch (error) {
    return {
      kind: 'error',
      frameId: request.frameId,
      bandIndex: request.band.index,
      message: error instanceof Error ? error.message : String(error),
    };
  }
};

export const bandByteLength = (band: RowBand, width: number): number =>
  (band.endRow - band.startRow) * width * BYTES_PER_PIXEL;
