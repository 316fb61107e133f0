import test from 'node:test';
import assert from 'node:assert/strict';

import { createCameraState, resetCamera } from '../src/camera/cameraState.js';
import { aspectRatio, createRenderConfig } from '../src/config/renderConfig.js';
import { BulbDomainError } from '../src/errors.js';
import { bandByteLength, handleBandRequest } from '../src/render/bandProtocol.js';
import { CpuFrameRenderer } from '../src/render/cpuRenderer.js';
import { renderBand } from '../src/render/frameBuffer.js';
import { packParams, paramsFromCamera, unpackParams } from '../src/render/params.js';

const config = createRenderConfig({ width: 8, height: 6, maxSteps: 48 });
const camera = createCameraState({ power: 8, yaw: 0.2, pitch: -0.1, time: 1.5 });

const expectedFrame = () =>
  renderBand(paramsFromCamera(camera, aspectRatio(config)), { index: 0, startRow: 0, endRow: 6 }, config);

test('handleBandRequest renders a band into a transferable buffer', () => {
  const band = { index: 2, startRow: 2, endRow: 4 };
  const response = handleBandRequest({
    kind: 'band',
    frameId: 7,
    band,
    params: packParams(camera, aspectRatio(config)),
    config,
  });
  assert.equal(response.kind, 'band');
  if (response.kind !== 'band') return;
  assert.equal(response.frameId, 7);
  assert.equal(response.bandIndex, 2);
  assert.equal(response.pixels.byteLength, bandByteLength(band, config.width));
  assert.deepEqual(
    new Uint8ClampedArray(response.pixels),
    expectedFrame().subarray(2 * 8 * 4, 4 * 8 * 4),
  );
});

test('handleBandRequest reports failures instead of throwing', () => {
  const response = handleBandRequest({
    kind: 'band',
    frameId: 1,
    band: { index: 0, startRow: 0, endRow: 1 },
    params: new ArrayBuffer(8),
    config,
  });
  assert.equal(response.kind, 'error');
  if (response.kind !== 'error') return;
  assert.match(response.message, /\[bulb-params\]/);
});

test('inline CPU renderer assembles every band', async () => {
  let clock = 0;
  const renderer = CpuFrameRenderer.create({
    config,
    workerCount: 0,
    bandHeight: 4,
    now: () => (clock += 5),
  });
  try {
    assert.equal(renderer.getBackend(), 'cpu');
    assert.equal(renderer.getWorkerCount(), 0);
    assert.equal(renderer.getStats(), null);
    const result = await renderer.render(camera);
    assert.equal(result.backend, 'cpu');
    assert.equal(result.timeMs, 5);
    assert.deepEqual(result.frame.data, expectedFrame());
    assert.deepEqual(result.params, unpackParams(result.paramsBytes));
    assert.equal(result.params.power, 8);
    const stats = renderer.getStats();
    assert.equal(stats?.sampleCount, 1);
    assert.equal(stats?.lastMs, 5);
    assert.equal(stats?.pixelsPerMs, 48 / 5);
  } finally {
    await renderer.dispose();
  }
});

test('CPU renderer rejects overlapping renders and invalid powers', async () => {
  const renderer = CpuFrameRenderer.create({ config, workerCount: 0 });
  try {
    const first = renderer.render(camera);
    await assert.rejects(renderer.render(camera), /in flight/);
    await first;
    await assert.rejects(renderer.render({ ...resetCamera(), power: 1.5 }), BulbDomainError);
  } finally {
    await renderer.dispose();
  }
  await assert.rejects(renderer.render(camera), /disposed/);
});

test('worker pool renders the same frame as the inline path', async () => {
  const renderer = CpuFrameRenderer.create({ config, workerCount: 2, bandHeight: 2 });
  try {
    assert.equal(renderer.getWorkerCount(), 2);
    const result = await renderer.render(camera);
    assert.deepEqual(result.frame.data, expectedFrame());
    const again = await renderer.render(camera);
    assert.deepEqual(again.frame.data, result.frame.data);
  } finally {
    await renderer.dispose();
  }
});
