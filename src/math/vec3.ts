export type Vec3 = {
  readonly x: number;
  readonly y: number;
  readonly z: number;
};

/** Row-major 3×3 matrix. */
export type Mat3 = readonly [
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
];

export const FALLBACK_AXIS: Vec3 = Object.freeze({ x: 0, y: 0, z: -1 });

export const vec3 = (x: number, y: number, z: number): Vec3 => ({ x, y, z });

export const add = (a: Vec3, b: Vec3): Vec3 => ({ x: a.x + b.x, y: a.y + b.y, z: a.z + b.z });

export const sub = (a: Vec3, b: Vec3): Vec3 => ({ x: a.x - b.x, y: a.y - b.y, z: a.z - b.z });

export const scale = (v: Vec3, s: number): Vec3 => ({ x: v.x * s, y: v.y * s, z: v.z * s });

/** a + b·s */
export const addScaled = (a: Vec3, b: Vec3, s: number): Vec3 => ({
  x: a.x + b.x * s,
  y: a.y + b.y * s,
  z: a.z + b.z * s,
});

export const dot = (a: Vec3, b: Vec3): number => a.x * b.x + a.y * b.y + a.z * b.z;

export const length = (v: Vec3): number => Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);

/**
 * Unit vector along `v`. A zero-length or non-finite input has no direction,
 * so it maps to FALLBACK_AXIS; the shader applies the same rule.
 */
export const normalize = (v: Vec3): Vec3 => {
  const len = length(v);
  if (!Number.isFinite(len) || len <= 0) {
    return FALLBACK_AXIS;
  }
  const inv = 1 / len;
  return { x: v.x * inv, y: v.y * inv, z: v.z * inv };
};

export const rotationX = (angle: number): Mat3 => {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return [1, 0, 0, 0, c, -s, 0, s, c];
};

export const rotationY = (angle: number): Mat3 => {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return [c, 0, s, 0, 1, 0, -s, 0, c];
};

export const multiplyMat3 = (a: Mat3, b: Mat3): Mat3 => {
  const out: number[] = new Array(9);
  for (let row = 0; row < 3; row++) {
    for (let col = 0; col < 3; col++) {
      out[row * 3 + col] =
        a[row * 3] * b[col] + a[row * 3 + 1] * b[3 + col] + a[row * 3 + 2] * b[6 + col];
    }
  }
  return [out[0], out[1], out[2], out[3], out[4], out[5], out[6], out[7], out[8]];
};

export const transformVec3 = (m: Mat3, v: Vec3): Vec3 => ({
  x: m[0] * v.x + m[1] * v.y + m[2] * v.z,
  y: m[3] * v.x + m[4] * v.y + m[5] * v.z,
  z: m[6] * v.x + m[7] * v.y + m[8] * v.z,
});
