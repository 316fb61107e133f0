import { assertPower } from '../camera/cameraState.js';
import type { RenderConfig } from '../config/renderConfig.js';
import type { Vec3 } from '../math/vec3.js';

/** Largest finite f32; both backends start the orbit trap here. */
export const TRAP_SENTINEL = 3.4028234663852886e38;

export type FieldSample = {
  /** Distance estimate to the bulb surface. */
  distance: number;
  /** Index at which |z| passed the bailout radius, or maxIter if it never did. */
  iterations: number;
  /** Smallest |z| seen before escape (orbit trap around the origin). */
  trap: number;
};

export type FieldConfig = Pick<RenderConfig, 'maxIter' | 'bailout'>;

/**
 * Escape-time iteration of the power-n bulb with a running scalar derivative.
 *
 *   z₀ = p,  z ← zⁿ + p   (n-th power in spherical coordinates)
 *   dr ← n·rⁿ⁻¹·dr + 1
 *
 * The distance estimate 0.5·ln(r)·r/dr is a lower bound on the distance to the
 * surface once z has escaped; for points that never escape it shrinks towards
 * zero, which the raymarcher reads as a hit.
 */
export const evaluateField = (p: Vec3, power: number, config: FieldConfig): FieldSample => {
  assertPower(power);
  const { maxIter, bailout } = config;
  let zx = p.x;
  let zy = p.y;
  let zz = p.z;
  let dr = 1;
  let r = 0;
  let trap = TRAP_SENTINEL;
  let iterations = maxIter;

  for (let i = 0; i < maxIter; i++) {
    r = Math.sqrt(zx * zx + zy * zy + zz * zz);
    if (r > bailout) {
      iterations = i;
      break;
    }
    trap = Math.min(trap, r);

    dr = Math.pow(r, power - 1) * power * dr + 1;

    const theta = Math.atan2(zz, Math.sqrt(zx * zx + zy * zy)) * power;
    const phi = Math.atan2(zy, zx) * power;
    const zr = Math.pow(r, power);
    const cosTheta = Math.cos(theta);

    zx = zr * cosTheta * Math.cos(phi) + p.x;
    zy = zr * cosTheta * Math.sin(phi) + p.y;
    zz = zr * Math.sin(theta) + p.z;
  }

  return {
    distance: (0.5 * Math.log(r) * r) / dr,
    iterations,
    trap,
  };
};

export const fieldDistance = (p: Vec3, power: number, config: FieldConfig): number =>
  evaluateField(p, power, config).distance;
