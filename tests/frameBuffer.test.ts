import test from 'node:test';
import assert from 'node:assert/strict';

import { createCameraState } from '../src/camera/cameraState.js';
import { aspectRatio, createRenderConfig } from '../src/config/renderConfig.js';
import { quantizeRgb } from '../src/shading/color.js';
import {
  BYTES_PER_PIXEL,
  createFrameBuffer,
  partitionRows,
  partitionRowsByHeight,
  renderBand,
  writeBand,
} from '../src/render/frameBuffer.js';
import { paramsFromCamera } from '../src/render/params.js';
import { renderPixel } from '../src/render/pixel.js';

const config = createRenderConfig({ width: 4, height: 3, maxSteps: 48 });
const params = paramsFromCamera(createCameraState({ power: 8 }), aspectRatio(config));

test('partitionRows splits rows into disjoint contiguous bands', () => {
  assert.deepEqual(partitionRows(10, 3), [
    { index: 0, startRow: 0, endRow: 4 },
    { index: 1, startRow: 4, endRow: 7 },
    { index: 2, startRow: 7, endRow: 10 },
  ]);
  assert.deepEqual(partitionRows(2, 5), [
    { index: 0, startRow: 0, endRow: 1 },
    { index: 1, startRow: 1, endRow: 2 },
  ]);
  assert.deepEqual(partitionRows(0, 3), []);
  assert.deepEqual(partitionRows(3, 0), [{ index: 0, startRow: 0, endRow: 3 }]);
});

test('partitionRowsByHeight caps band height', () => {
  const bands = partitionRowsByHeight(10, 4);
  assert.deepEqual(
    bands.map((band) => band.endRow - band.startRow),
    [4, 3, 3],
  );
  assert.equal(partitionRowsByHeight(480, 8).length, 60);
});

test('createFrameBuffer rejects empty or fractional sizes', () => {
  assert.equal(createFrameBuffer(4, 3).data.length, 4 * 3 * BYTES_PER_PIXEL);
  assert.throws(() => createFrameBuffer(0, 3), /\[frame-buffer\]/);
  assert.throws(() => createFrameBuffer(2.5, 3), /\[frame-buffer\]/);
});

test('renderBand writes quantized opaque pixels row by row', () => {
  const band = { index: 1, startRow: 1, endRow: 3 };
  const bytes = renderBand(params, band, config);
  assert.equal(bytes.length, 2 * 4 * BYTES_PER_PIXEL);
  for (let y = 1; y < 3; y++) {
    for (let x = 0; x < 4; x++) {
      const offset = ((y - 1) * 4 + x) * BYTES_PER_PIXEL;
      assert.deepEqual(
        [bytes[offset], bytes[offset + 1], bytes[offset + 2], bytes[offset + 3]],
        [...quantizeRgb(renderPixel(params, x, y, config)), 255],
      );
    }
  }
  assert.throws(() => renderBand(params, band, config, new Uint8ClampedArray(4)), /\[frame-buffer\]/);
});

test('writeBand places band bytes at the band rows', () => {
  const frame = createFrameBuffer(2, 3);
  const band = { index: 0, startRow: 1, endRow: 2 };
  writeBand(frame, band, new Uint8ClampedArray([1, 2, 3, 4, 5, 6, 7, 8]));
  assert.deepEqual([...frame.data.subarray(8, 16)], [1, 2, 3, 4, 5, 6, 7, 8]);
  assert.deepEqual([...frame.data.subarray(0, 8)], [0, 0, 0, 0, 0, 0, 0, 0]);
  assert.throws(() => writeBand(frame, band, new Uint8ClampedArray(4)), /carries 4 bytes/);
  assert.throws(
    () => writeBand(frame, { index: 3, startRow: 2, endRow: 4 }, new Uint8ClampedArray(16)),
    /out of range/,
  );
});
