import test from 'node:test';
import assert from 'node:assert/strict';

import { march, type RayHit } from '../src/bulb/raymarcher.js';
import { getDefaultRenderConfig } from '../src/config/renderConfig.js';
import { vec3 } from '../src/math/vec3.js';
import { fract, hsvToRgb, quantizeChannel, quantizeRgb, type Rgb } from '../src/shading/color.js';
import { ambientOcclusion, background, blendHue, shade } from '../src/shading/compositor.js';

const config = getDefaultRenderConfig();

const assertRgbClose = (actual: Rgb, expected: Rgb, tolerance = 1e-12) => {
  actual.forEach((channel, index) => {
    assert.ok(Math.abs(channel - expected[index]) <= tolerance, `channel ${index}: ${channel} vs ${expected[index]}`);
  });
};

test('hsvToRgb covers the primary hues and wraps', () => {
  assert.deepEqual(hsvToRgb(0, 1, 1), [1, 0, 0]);
  assert.deepEqual(hsvToRgb(0.5, 1, 1), [0, 1, 1]);
  assert.deepEqual(hsvToRgb(1, 1, 1), [1, 0, 0]);
  assert.deepEqual(hsvToRgb(1.25, 0, 0.5), [0.5, 0.5, 0.5]);
});

test('fract wraps negatives into [0, 1)', () => {
  assert.equal(fract(2.25), 0.25);
  assert.equal(fract(-0.25), 0.75);
});

test('quantization clamps then truncates', () => {
  assert.equal(quantizeChannel(1), 255);
  assert.equal(quantizeChannel(0.5), 127);
  assert.equal(quantizeChannel(2), 255);
  assert.equal(quantizeChannel(-1), 0);
  assert.equal(quantizeChannel(Number.NaN), 0);
  assert.deepEqual(quantizeRgb([0, 0.25, 1]), [0, 63, 255]);
});

test('ambient occlusion falls from 1 to 0 across the step budget', () => {
  assert.equal(ambientOcclusion(0, 150), 1);
  assert.equal(ambientOcclusion(150, 150), 0);
  assert.ok(ambientOcclusion(10, 150) > ambientOcclusion(100, 150));
});

test('blendHue mixes iteration and normal terms and wraps', () => {
  const hue = blendHue(12, 12, 0, vec3(0, 0, -1), 0, vec3(0, 0, 0));
  assert.ok(Math.abs(hue - 0.5) < 1e-12, `hue ${hue}`);
  const drifted = blendHue(12, 12, 30, vec3(0, 0, -1), 0, vec3(0, 0, 0));
  assert.ok(drifted >= 0 && drifted < 1);
});

test('blendHue weights the trap and position terms', () => {
  // 0.25·0.4 + 0.5·0.2 + (0.3·2)·0.2 + (1.5·0.3)·0.2
  const hue = blendHue(3, 12, 0, vec3(0, 0, -1), 0.3, vec3(1, 0.5, 0));
  assert.ok(Math.abs(hue - 0.41) < 1e-12, `hue ${hue}`);
});

test('background at the bottom of the view is the dim floor colour', () => {
  assertRgbClose(background(vec3(0, -1, 0), { time: 0 }), [0.01, 0.014, 0.02]);
});

test('shade produces an in-gamut colour for a real hit', () => {
  const direction = vec3(0, 0, 1);
  const hit = march(vec3(0, 0, -4), direction, 8, config);
  assert.equal(hit.hit, true);
  const rgb = shade(hit, direction, { power: 8, time: 0 }, config);
  assert.equal(rgb.length, 3);
  for (const channel of rgb) {
    assert.ok(channel >= 0 && channel <= 1, `channel ${channel}`);
  }
  assert.ok(Math.max(...rgb) > 0);
});

test('shade lights a known hit with key, fill, ambient and specular terms', () => {
  // Every sample around (0, 3, 0) escapes at once, so the normal is +y.
  const position = vec3(0, 3, 0);
  const hit: RayHit = {
    hit: true,
    position,
    distance: 1,
    steps: 30,
    sample: { distance: 0, iterations: 6, trap: 0.4 },
    minTrap: 0.4,
  };
  const rgb = shade(hit, vec3(0.6, 0, -0.8), { power: 8, time: 0.5 }, config);
  // hue 0.71, saturation 0.90506, value 0.53691, highlight 0.00054
  assertRgbClose(rgb, [0.17785692821283725, 0.05151385643993109, 0.5374487478741858]);
});
