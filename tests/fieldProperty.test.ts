import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';

import { evaluateField } from '../src/bulb/fieldEvaluator.js';
import { estimateNormal } from '../src/bulb/normalEstimator.js';
import { march } from '../src/bulb/raymarcher.js';
import { getDefaultRenderConfig } from '../src/config/renderConfig.js';
import { length, normalize, scale, vec3 } from '../src/math/vec3.js';
import { background } from '../src/shading/compositor.js';

const config = getDefaultRenderConfig();

const unit = fc.double({ min: -1, max: 1, noNaN: true });
const direction = fc.tuple(unit, unit, unit).map(([x, y, z]) => normalize(vec3(x, y, z)));
const power = fc.integer({ min: 2, max: 12 });

test('points beyond radius 4 escape before maxIter', () => {
  fc.assert(
    fc.property(direction, fc.double({ min: 4.01, max: 100, noNaN: true }), power, (dir, radius, n) => {
      const sample = evaluateField(scale(dir, radius), n, config);
      return sample.iterations < config.maxIter;
    }),
  );
});

test('trap never exceeds the starting radius inside the bailout sphere', () => {
  fc.assert(
    fc.property(direction, fc.double({ min: 0, max: 1.99, noNaN: true }), power, (dir, radius, n) => {
      const p = scale(dir, radius);
      return evaluateField(p, n, config).trap <= length(p);
    }),
  );
});

test('normals are unit length', () => {
  fc.assert(
    fc.property(direction, fc.double({ min: 0.3, max: 3, noNaN: true }), power, (dir, radius, n) => {
      const normal = estimateNormal(scale(dir, radius), n, config);
      return Math.abs(length(normal) - 1) < 1e-9;
    }),
  );
});

test('march is a pure function of its inputs', () => {
  fc.assert(
    fc.property(direction, fc.double({ min: 1.5, max: 4, noNaN: true }), power, (dir, radius, n) => {
      const origin = scale(dir, -radius);
      assert.deepEqual(march(origin, dir, n, config), march(origin, dir, n, config));
    }),
    { numRuns: 25 },
  );
});

test('background brightens monotonically with view height', () => {
  fc.assert(
    fc.property(unit, unit, fc.double({ min: 0, max: 100, noNaN: true }), (a, b, time) => {
      const lo = Math.min(a, b);
      const hi = Math.max(a, b);
      const low = background(vec3(0, lo, 1), { time });
      const high = background(vec3(0, hi, 1), { time });
      return low.every((channel, index) => channel <= high[index] + 1e-12);
    }),
  );
});
