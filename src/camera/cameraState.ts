import { BulbDomainError } from '../errors.js';
import {
  add,
  multiplyMat3,
  rotationX,
  rotationY,
  scale,
  transformVec3,
  vec3,
  type Vec3,
} from '../math/vec3.js';

export const MIN_POWER = 2;
export const MAX_POWER = 12;

/** Shape powers selectable from the number row, slot 1..9. */
export const POWER_PRESETS: readonly number[] = Object.freeze([2, 3, 4, 5, 6, 7, 8, 9, 12]);

/**
 * Session camera. `power` is the bulb exponent (integer valued, kept as a float
 * because it feeds `pow`); `time` only ever increases and drives hue drift.
 */
export type CameraState = {
  position: Vec3;
  yaw: number;
  pitch: number;
  power: number;
  time: number;
};

export type CameraStateInit = Partial<CameraState>;

export type CameraMove = {
  forward?: number;
  right?: number;
  up?: number;
};

const INTERNAL_DEFAULT_CAMERA: CameraState = {
  position: vec3(0, 0, -2.5),
  yaw: 0,
  pitch: 0,
  power: MIN_POWER,
  time: 0,
};

const finiteOr = (value: number | undefined, fallback: number) =>
  value != null && Number.isFinite(value) ? value : fallback;

const sanitizePosition = (position: Vec3 | undefined): Vec3 => {
  const base = INTERNAL_DEFAULT_CAMERA.position;
  if (!position) return base;
  return vec3(
    finiteOr(position.x, base.x),
    finiteOr(position.y, base.y),
    finiteOr(position.z, base.z),
  );
};

/** Rounds to the nearest integer exponent and clamps into [2, 12]. */
export const clampPower = (value: number): number => {
  if (Number.isNaN(value)) return MIN_POWER;
  if (!Number.isFinite(value)) return value > 0 ? MAX_POWER : MIN_POWER;
  return Math.min(MAX_POWER, Math.max(MIN_POWER, Math.round(value)));
};

export const assertPower = (power: number): void => {
  if (!Number.isFinite(power) || power < MIN_POWER) {
    throw new BulbDomainError(power);
  }
};

export const powerForPreset = (slot: number): number => {
  const preset = POWER_PRESETS[Math.trunc(slot) - 1];
  if (preset == null) {
    throw new RangeError(`[camera] power preset slot must be 1..${POWER_PRESETS.length} (received ${slot})`);
  }
  return preset;
};

export const createCameraState = (init?: CameraStateInit): CameraState => ({
  position: sanitizePosition(init?.position),
  yaw: finiteOr(init?.yaw, INTERNAL_DEFAULT_CAMERA.yaw),
  pitch: finiteOr(init?.pitch, INTERNAL_DEFAULT_CAMERA.pitch),
  power: init?.power == null ? INTERNAL_DEFAULT_CAMERA.power : clampPower(init.power),
  time: Math.max(0, finiteOr(init?.time, INTERNAL_DEFAULT_CAMERA.time)),
});

export const resetCamera = (): CameraState => createCameraState();

export const cameraRotation = (camera: Pick<CameraState, 'yaw' | 'pitch'>) =>
  multiplyMat3(rotationY(camera.yaw), rotationX(camera.pitch));

export const cameraForward = (camera: Pick<CameraState, 'yaw' | 'pitch'>): Vec3 =>
  transformVec3(cameraRotation(camera), vec3(0, 0, 1));

/** Strafe axis; ignores pitch so strafing stays level. */
export const cameraRight = (camera: Pick<CameraState, 'yaw'>): Vec3 =>
  transformVec3(rotationY(camera.yaw), vec3(1, 0, 0));

export const moveCamera = (camera: CameraState, move: CameraMove): CameraState => {
  let position = camera.position;
  if (move.forward) position = add(position, scale(cameraForward(camera), move.forward));
  if (move.right) position = add(position, scale(cameraRight(camera), move.right));
  if (move.up) position = add(position, vec3(0, move.up, 0));
  return { ...camera, position };
};

export const rotateCamera = (camera: CameraState, deltaYaw: number, deltaPitch: number): CameraState => ({
  ...camera,
  yaw: camera.yaw + finiteOr(deltaYaw, 0),
  pitch: camera.pitch + finiteOr(deltaPitch, 0),
});

export const advanceTime = (camera: CameraState, dt: number): CameraState =>
  Number.isFinite(dt) && dt > 0 ? { ...camera, time: camera.time + dt } : camera;

export const snapshotCamera = (camera: CameraState): Readonly<CameraState> =>
  Object.freeze({
    position: Object.freeze({ x: camera.position.x, y: camera.position.y, z: camera.position.z }),
    yaw: camera.yaw,
    pitch: camera.pitch,
    power: camera.power,
    time: camera.time,
  });
