import type { RayHit } from '../bulb/raymarcher.js';
import { estimateNormal } from '../bulb/normalEstimator.js';
import type { CameraState } from '../camera/cameraState.js';
import type { RenderConfig } from '../config/renderConfig.js';
import { dot, normalize, scale, sub, vec3, type Vec3 } from '../math/vec3.js';
import { clampRgb, fract, hsvToRgb, type Rgb } from './color.js';

const FILL_LIGHT_DIRECTION = vec3(-0.5, 0.8, 0.3);

/**
 * Shading constants. bulb.wgsl declares each one (except the derived
 * `fillLight`) as an UPPER_SNAKE_CASE const with the same value.
 */
export const SHADING = Object.freeze({
  keyLight: vec3(0.577, 0.577, -0.577),
  fillLightDirection: FILL_LIGHT_DIRECTION,
  fillLight: normalize(FILL_LIGHT_DIRECTION),
  fillWeight: 0.5,
  ambientFloor: 0.15,
  specularExponent: 32,
  specularGain: 0.5,
  aoGamma: 0.4,
  baseSaturation: 0.8,
  occlusionSaturation: 0.2,
  iterationHueWeight: 0.4,
  normalHueWeight: 0.2,
  trapHueWeight: 0.2,
  positionHueWeight: 0.2,
  timeHueRate: 0.1,
  trapHueScale: 2,
  positionHueScale: 0.3,
  backgroundHue: 0.6,
  backgroundHueRate: 0.02,
  backgroundSaturation: 0.5,
  backgroundGain: 0.15,
  backgroundFloor: 0.02,
});

export type ShadeConfig = Pick<RenderConfig, 'maxSteps' | 'maxIter' | 'bailout' | 'normalEpsilon'>;

type ShadeCamera = Pick<CameraState, 'power' | 'time'>;

/** Occlusion proxy: rays that needed more steps grazed more geometry. */
export const ambientOcclusion = (steps: number, maxSteps: number): number =>
  1 - Math.pow(steps / maxSteps, SHADING.aoGamma);

/** Hue blended from iteration count, normal, orbit trap and position, wrapped into [0, 1). */
export const blendHue = (
  iterations: number,
  maxIter: number,
  time: number,
  normal: Vec3,
  trap: number,
  position: Vec3,
): number => {
  const iterationHue = iterations / maxIter + time * SHADING.timeHueRate;
  const normalHue = (normal.x + normal.y * 0.5 + 1) * 0.5;
  const trapHue = trap * SHADING.trapHueScale;
  const positionHue = (position.x + position.y + position.z) * SHADING.positionHueScale;
  return fract(
    iterationHue * SHADING.iterationHueWeight +
      normalHue * SHADING.normalHueWeight +
      trapHue * SHADING.trapHueWeight +
      positionHue * SHADING.positionHueWeight,
  );
};

/** Lit color of a surface hit; `viewDir` is the ray direction. */
export const shade = (hit: RayHit, viewDir: Vec3, camera: ShadeCamera, config: ShadeConfig): Rgb => {
  const normal = estimateNormal(hit.position, camera.power, config);

  const keyDot = dot(normal, SHADING.keyLight);
  const diffKey = Math.max(keyDot, 0);
  const diffFill = Math.max(dot(normal, SHADING.fillLight), 0) * SHADING.fillWeight;

  const reflected = sub(scale(normal, 2 * keyDot), SHADING.keyLight);
  const specular = Math.pow(Math.max(-dot(viewDir, reflected), 0), SHADING.specularExponent);

  const ao = ambientOcclusion(hit.steps, config.maxSteps);

  const hue = blendHue(
    hit.sample.iterations,
    config.maxIter,
    camera.time,
    normal,
    hit.minTrap,
    hit.position,
  );
  const saturation = SHADING.baseSaturation + (1 - ao) * SHADING.occlusionSaturation;
  const value = Math.min((diffKey + diffFill + SHADING.ambientFloor) * ao, 1);

  const [r, g, b] = hsvToRgb(hue, saturation, value);
  const highlight = specular * SHADING.specularGain;
  return clampRgb([r + highlight, g + highlight, b + highlight]);
};

/** Dim vertical gradient behind the bulb, drifting slowly in hue. */
export const background = (viewDir: Vec3, camera: Pick<CameraState, 'time'>): Rgb => {
  const gradient = (viewDir.y + 1) * 0.5;
  const hue = SHADING.backgroundHue + camera.time * SHADING.backgroundHueRate;
  return hsvToRgb(
    hue,
    SHADING.backgroundSaturation,
    gradient * SHADING.backgroundGain + SHADING.backgroundFloor,
  );
};
