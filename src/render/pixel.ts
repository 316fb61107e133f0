import { march } from '../bulb/raymarcher.js';
import type { RenderConfig } from '../config/renderConfig.js';
import type { Rgb } from '../shading/color.js';
import { background, shade } from '../shading/compositor.js';
import type { FrameParams } from './params.js';
import { pixelToNdc, viewRayDirection } from './viewRay.js';

/** Full per-pixel pipeline: view ray → march → shade or background. */
export const renderPixel = (params: FrameParams, x: number, y: number, config: RenderConfig): Rgb => {
  const { u, v } = pixelToNdc(x, y, config.width, config.height, params.aspect);
  const direction = viewRayDirection(params, u, v);
  const hit = march(params.position, direction, params.power, config);
  return hit.hit ? shade(hit, direction, params, config) : background(direction, params);
};
