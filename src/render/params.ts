import type { CameraState } from '../camera/cameraState.js';
import { vec3, type Vec3 } from '../math/vec3.js';

/**
 * Per-frame uniform record, the only state that crosses into the shader.
 *
 * | Offset | Field      | WGSL                                  |
 * |--------|------------|---------------------------------------|
 * | 0      | position.x | cameraPosPower: vec4<f32> (.x)        |
 * | 4      | position.y | cameraPosPower.y                      |
 * | 8      | position.z | cameraPosPower.z                      |
 * | 12     | power      | cameraPosPower.w                      |
 * | 16     | yaw        | rotation: vec2<f32> (.x)              |
 * | 20     | pitch      | rotation.y                            |
 * | 24     | time       | time: f32                             |
 * | 28     | aspect     | aspect: f32                           |
 *
 * Little-endian f32 throughout, 32 bytes, 16-byte aligned.
 */
export const PARAMS_LAYOUT = Object.freeze({
  positionX: 0,
  positionY: 4,
  positionZ: 8,
  power: 12,
  yaw: 16,
  pitch: 20,
  time: 24,
  aspect: 28,
} as const);

export const PARAMS_BYTE_LENGTH = 32;
export const PARAMS_ALIGNMENT = 16;

/** Camera and viewport values exactly as the shader reads them (f32-rounded). */
export type FrameParams = {
  position: Vec3;
  power: number;
  yaw: number;
  pitch: number;
  time: number;
  aspect: number;
};

const LITTLE_ENDIAN = true;

export const packParams = (
  camera: Pick<CameraState, 'position' | 'power' | 'yaw' | 'pitch' | 'time'>,
  aspect: number,
  target?: ArrayBuffer | null,
): ArrayBuffer => {
  const buffer =
    target && target.byteLength === PARAMS_BYTE_LENGTH ? target : new ArrayBuffer(PARAMS_BYTE_LENGTH);
  const view = new DataView(buffer);
  view.setFloat32(PARAMS_LAYOUT.positionX, camera.position.x, LITTLE_ENDIAN);
  view.setFloat32(PARAMS_LAYOUT.positionY, camera.position.y, LITTLE_ENDIAN);
  view.setFloat32(PARAMS_LAYOUT.positionZ, camera.position.z, LITTLE_ENDIAN);
  view.setFloat32(PARAMS_LAYOUT.power, camera.power, LITTLE_ENDIAN);
  view.setFloat32(PARAMS_LAYOUT.yaw, camera.yaw, LITTLE_ENDIAN);
  view.setFloat32(PARAMS_LAYOUT.pitch, camera.pitch, LITTLE_ENDIAN);
  view.setFloat32(PARAMS_LAYOUT.time, camera.time, LITTLE_ENDIAN);
  view.setFloat32(PARAMS_LAYOUT.aspect, aspect, LITTLE_ENDIAN);
  return buffer;
};

export const unpackParams = (source: ArrayBuffer | ArrayBufferView): FrameParams => {
  const view =
    source instanceof ArrayBuffer
      ? new DataView(source)
      : new DataView(source.buffer, source.byteOffset, source.byteLength);
  if (view.byteLength < PARAMS_BYTE_LENGTH) {
    throw new Error(
      `[bulb-params] expected at least ${PARAMS_BYTE_LENGTH} bytes, received ${view.byteLength}`,
    );
  }
  return {
    position: vec3(
      view.getFloat32(PARAMS_LAYOUT.positionX, LITTLE_ENDIAN),
      view.getFloat32(PARAMS_LAYOUT.positionY, LITTLE_ENDIAN),
      view.getFloat32(PARAMS_LAYOUT.positionZ, LITTLE_ENDIAN),
    ),
    power: view.getFloat32(PARAMS_LAYOUT.power, LITTLE_ENDIAN),
    yaw: view.getFloat32(PARAMS_LAYOUT.yaw, LITTLE_ENDIAN),
    pitch: view.getFloat32(PARAMS_LAYOUT.pitch, LITTLE_ENDIAN),
    time: view.getFloat32(PARAMS_LAYOUT.time, LITTLE_ENDIAN),
    aspect: view.getFloat32(PARAMS_LAYOUT.aspect, LITTLE_ENDIAN),
  };
};

/** Pack then unpack, so the CPU path sees the same rounded inputs as the GPU. */
export const paramsFromCamera = (
  camera: Pick<CameraState, 'position' | 'power' | 'yaw' | 'pitch' | 'time'>,
  aspect: number,
): FrameParams => unpackParams(packParams(camera, aspect));
