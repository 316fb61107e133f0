import test from 'node:test';
import assert from 'node:assert/strict';

import { createCameraState } from '../src/camera/cameraState.js';
import { vec3 } from '../src/math/vec3.js';
import {
  PARAMS_ALIGNMENT,
  PARAMS_BYTE_LENGTH,
  PARAMS_LAYOUT,
  packParams,
  paramsFromCamera,
  unpackParams,
} from '../src/render/params.js';

const camera = createCameraState({
  position: vec3(1, 2, 3),
  power: 8,
  yaw: 0.5,
  pitch: -0.25,
  time: 2,
});

test('params record is 32 little-endian bytes in the uniform order', () => {
  const bytes = packParams(camera, 1.5);
  assert.equal(bytes.byteLength, PARAMS_BYTE_LENGTH);
  assert.equal(PARAMS_BYTE_LENGTH % PARAMS_ALIGNMENT, 0);
  const view = new DataView(bytes);
  const read = (offset: number) => view.getFloat32(offset, true);
  assert.equal(read(PARAMS_LAYOUT.positionX), 1);
  assert.equal(read(PARAMS_LAYOUT.positionY), 2);
  assert.equal(read(PARAMS_LAYOUT.positionZ), 3);
  assert.equal(read(12), 8);
  assert.equal(read(16), 0.5);
  assert.equal(read(20), -0.25);
  assert.equal(read(24), 2);
  assert.equal(read(28), 1.5);
});

test('unpackParams reads back what packParams wrote', () => {
  assert.deepEqual(unpackParams(packParams(camera, 1.5)), {
    position: { x: 1, y: 2, z: 3 },
    power: 8,
    yaw: 0.5,
    pitch: -0.25,
    time: 2,
    aspect: 1.5,
  });
});

test('unpackParams honours view offsets and rejects short input', () => {
  const backing = new Uint8Array(PARAMS_BYTE_LENGTH + 8);
  backing.set(new Uint8Array(packParams(camera, 1.5)), 8);
  assert.equal(unpackParams(backing.subarray(8)).aspect, 1.5);
  assert.throws(() => unpackParams(new ArrayBuffer(16)), /\[bulb-params\]/);
});

test('packParams reuses a correctly sized target', () => {
  const target = new ArrayBuffer(PARAMS_BYTE_LENGTH);
  assert.equal(packParams(camera, 1, target), target);
  assert.notEqual(packParams(camera, 1, new ArrayBuffer(8)).byteLength, 8);
});

test('paramsFromCamera rounds through f32 like the shader', () => {
  const params = paramsFromCamera(createCameraState({ yaw: 0.1 }), 640 / 480);
  assert.equal(params.yaw, Math.fround(0.1));
  assert.equal(params.aspect, Math.fround(640 / 480));
});
