import test from 'node:test';
import assert from 'node:assert/strict';

import { createCameraState } from '../src/camera/cameraState.js';
import { createFrameBuffer, type FrameBuffer } from '../src/render/frameBuffer.js';
import { packParams } from '../src/render/params.js';
import { digestFrame } from '../src/validation/frameDigest.js';

const EMPTY_BLAKE3 = 'af1349b9f5f9a1a6a0404dea36dcc9499bcb25c9adc112b7cc9a93cae41f3262';

test('digest of an empty frame is the BLAKE3 of no input', () => {
  const empty: FrameBuffer = { width: 0, height: 0, data: new Uint8ClampedArray(0) };
  assert.equal(digestFrame(empty), EMPTY_BLAKE3);
});

test('digest covers both pixels and params', () => {
  const frame = createFrameBuffer(3, 2);
  frame.data.fill(40);
  const base = digestFrame(frame);
  assert.match(base, /^[0-9a-f]{64}$/);
  assert.equal(digestFrame(frame), base);

  const params = packParams(createCameraState({ power: 8 }), 1.5);
  const withParams = digestFrame(frame, params);
  assert.notEqual(withParams, base);
  assert.notEqual(digestFrame(frame, packParams(createCameraState({ power: 9 }), 1.5)), withParams);

  frame.data[5] = 41;
  assert.notEqual(digestFrame(frame), base);
});
