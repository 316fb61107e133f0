import type { RenderConfig } from '../config/renderConfig.js';
import { addScaled, type Vec3 } from '../math/vec3.js';
import { evaluateField, TRAP_SENTINEL, type FieldSample } from './fieldEvaluator.js';

export type RayHit = {
  hit: boolean;
  /** Point where the march stopped (origin + direction·distance). */
  position: Vec3;
  /** Ray parameter t at termination. */
  distance: number;
  /** Step index of the hit, or the number of samples taken on a miss. */
  steps: number;
  /** Last field sample taken. */
  sample: FieldSample;
  /** Smallest orbit trap over every sample along the ray. */
  minTrap: number;
};

export type MarchConfig = Pick<
  RenderConfig,
  'maxSteps' | 'maxIter' | 'bailout' | 'epsilon' | 'damping' | 'maxDistance'
>;

const EMPTY_SAMPLE: FieldSample = Object.freeze({
  distance: Number.POSITIVE_INFINITY,
  iterations: 0,
  trap: TRAP_SENTINEL,
});

/**
 * Sphere-traces the bulb: each step advances by the damped distance estimate.
 * A miss (ray left the scene or the step budget ran out) is a normal outcome.
 */
export const march = (origin: Vec3, direction: Vec3, power: number, config: MarchConfig): RayHit => {
  const { maxSteps, epsilon, damping, maxDistance } = config;
  let t = 0;
  let minTrap = TRAP_SENTINEL;
  let sample = EMPTY_SAMPLE;
  let steps = maxSteps;

  for (let i = 0; i < maxSteps; i++) {
    sample = evaluateField(addScaled(origin, direction, t), power, config);
    minTrap = Math.min(minTrap, sample.trap);

    if (sample.distance < epsilon) {
      return {
        hit: true,
        position: addScaled(origin, direction, t),
        distance: t,
        steps: i,
        sample,
        minTrap,
      };
    }
    // NaN (sampled exactly at the origin) or +inf: stop as a miss.
    if (!Number.isFinite(sample.distance)) {
      steps = i + 1;
      break;
    }

    t += sample.distance * damping;
    if (t > maxDistance) {
      steps = i + 1;
      break;
    }
  }

  return {
    hit: false,
    position: addScaled(origin, direction, t),
    distance: t,
    steps,
    sample,
    minTrap,
  };
};
