import { blake3 } from '@noble/hashes/blake3';

import type { FrameBuffer } from '../render/frameBuffer.js';

const toHex = (bytes: Uint8Array): string => {
  let result = '';
  for (let i = 0; i < bytes.length; i++) {
    result += bytes[i].toString(16).padStart(2, '0');
  }
  return result;
};

const asBytes = (data: Uint8Array | Uint8ClampedArray): Uint8Array =>
  data instanceof Uint8Array ? data : new Uint8Array(data.buffer, data.byteOffset, data.byteLength);

/**
 * BLAKE3-256 of the frame's RGBA bytes, followed by the packed Params record
 * when given, so a digest pins both the image and the camera it came from.
 */
export const digestFrame = (frame: FrameBuffer, paramsBytes?: ArrayBuffer | null): string => {
  const hasher = blake3.create({});
  hasher.update(asBytes(frame.data));
  if (paramsBytes) {
    hasher.update(new Uint8Array(paramsBytes));
  }
  return toHex(hasher.digest());
};
