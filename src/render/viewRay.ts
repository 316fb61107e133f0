import { cameraRotation } from '../camera/cameraState.js';
import { normalize, transformVec3, vec3, type Vec3 } from '../math/vec3.js';
import type { FrameParams } from './params.js';

export type ScreenPoint = { u: number; v: number };

/**
 * Pixel → screen coordinates: u spans [-aspect, aspect) left to right, v spans
 * (-1, 1] top to bottom.
 */
export const pixelToNdc = (
  x: number,
  y: number,
  width: number,
  height: number,
  aspect: number,
): ScreenPoint => ({
  u: ((x / width) * 2 - 1) * aspect,
  v: -((y / height) * 2 - 1),
});

/** Unit ray through (u, v) on the image plane at z = 1, rotated by yaw then pitch. */
export const viewRayDirection = (params: Pick<FrameParams, 'yaw' | 'pitch'>, u: number, v: number): Vec3 =>
  transformVec3(cameraRotation(params), normalize(vec3(u, v, 1)));
