import test from 'node:test';
import assert from 'node:assert/strict';

import { CameraStateHub, type CameraSnapshot } from '../src/camera/cameraHub.js';
import { advanceTime, moveCamera } from '../src/camera/cameraState.js';
import { vec3 } from '../src/math/vec3.js';

const flushMicrotasks = () => new Promise<void>((resolve) => queueMicrotask(resolve));

test('CameraStateHub immediate subscription delivers the current snapshot', () => {
  const hub = new CameraStateHub({ power: 8 }, 'bootstrap');
  const seen: CameraSnapshot[] = [];
  hub.subscribe((snapshot) => {
    seen.push(snapshot);
  });
  assert.equal(seen.length, 1);
  assert.equal(seen[0].source, 'bootstrap');
  assert.equal(seen[0].version, 0);
  assert.equal(seen[0].camera.power, 8);
  assert.deepEqual(seen[0].changed, ['position', 'yaw', 'pitch', 'power', 'time']);
});

test('CameraStateHub coalesces updates into one broadcast per microtask', async () => {
  const hub = new CameraStateHub();
  const seen: CameraSnapshot[] = [];
  hub.subscribe(
    (snapshot) => {
      seen.push(snapshot);
    },
    { immediate: false },
  );
  hub.update({ yaw: 0.1 }, { source: 'mouse' });
  const last = hub.update({ power: 6 }, { source: 'keyboard' });
  assert.equal(seen.length, 0);
  await flushMicrotasks();
  assert.equal(seen.length, 1);
  assert.equal(seen[0], last);
  assert.equal(seen[0].version, 2);
  assert.deepEqual(seen[0].changed, ['power']);
  assert.equal(seen[0].camera.yaw, 0.1);
});

test('CameraStateHub snapshots are immutable and unaffected by later updates', () => {
  const hub = new CameraStateHub();
  const before = hub.getSnapshot();
  hub.update({ position: vec3(1, 1, 1) });
  assert.ok(Object.isFrozen(before));
  assert.ok(Object.isFrozen(before.camera));
  assert.deepEqual(before.camera.position, { x: 0, y: 0, z: -2.5 });
  assert.deepEqual(hub.getSnapshot().camera.position, { x: 1, y: 1, z: 1 });
});

test('CameraStateHub ignores no-op updates unless forced', () => {
  const hub = new CameraStateHub();
  assert.equal(hub.update({ power: 2 }), null);
  const forced = hub.update({}, { force: true, source: 'reset' });
  assert.notEqual(forced, null);
  assert.equal(forced?.version, 1);
  assert.deepEqual(forced?.changed, []);
});

test('CameraStateHub keeps time monotonic and applies transitions', () => {
  const hub = new CameraStateHub({ time: 5 });
  assert.equal(hub.update({ time: 1 }), null);
  assert.equal(hub.getSnapshot().camera.time, 5);

  const moved = hub.apply((camera) => advanceTime(moveCamera(camera, { up: 0.5 }), 0.25), {
    source: 'tick',
  });
  assert.equal(moved?.source, 'tick');
  assert.deepEqual(moved?.changed, ['position', 'time']);
  assert.equal(moved?.camera.time, 5.25);
  assert.equal(moved?.camera.position.y, 0.5);
});

test('CameraStateHub unsubscribe stops delivery and diagnostics track state', async () => {
  const hub = new CameraStateHub();
  let calls = 0;
  const unsubscribe = hub.subscribe(
    () => {
      calls += 1;
    },
    { immediate: false },
  );
  assert.equal(hub.getDiagnostics().subscriberCount, 1);
  unsubscribe();
  hub.update({ pitch: 0.2 }, { source: 'mouse' });
  await flushMicrotasks();
  assert.equal(calls, 0);
  assert.deepEqual(hub.getDiagnostics(), { subscriberCount: 0, lastVersion: 1, lastSource: 'mouse' });
});
