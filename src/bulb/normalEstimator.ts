import type { RenderConfig } from '../config/renderConfig.js';
import { normalize, vec3, type Vec3 } from '../math/vec3.js';
import { fieldDistance } from './fieldEvaluator.js';

export type NormalConfig = Pick<RenderConfig, 'maxIter' | 'bailout' | 'normalEpsilon'>;

/**
 * Surface normal from central differences of the distance estimate along each
 * axis (six field evaluations). Always unit length: a flat or non-finite
 * gradient falls back to the -z axis.
 */
export const estimateNormal = (p: Vec3, power: number, config: NormalConfig): Vec3 => {
  const e = config.normalEpsilon;
  const dx =
    fieldDistance(vec3(p.x + e, p.y, p.z), power, config) -
    fieldDistance(vec3(p.x - e, p.y, p.z), power, config);
  const dy =
    fieldDistance(vec3(p.x, p.y + e, p.z), power, config) -
    fieldDistance(vec3(p.x, p.y - e, p.z), power, config);
  const dz =
    fieldDistance(vec3(p.x, p.y, p.z + e), power, config) -
    fieldDistance(vec3(p.x, p.y, p.z - e), power, config);
  return normalize(vec3(dx, dy, dz));
};
