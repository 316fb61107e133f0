/** Linear color, each channel nominally in [0, 1]. */
export type Rgb = readonly [r: number, g: number, b: number];

/** Fractional part wrapped into [0, 1), matching WGSL `fract`. */
export const fract = (value: number): number => value - Math.floor(value);

const clamp01 = (value: number) => {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
};

/**
 * HSV → RGB with every component in [0, 1]. The hue wraps, so any real hue is
 * accepted.
 */
export const hsvToRgb = (h: number, s: number, v: number): Rgb => {
  const hue = fract(h);
  const sector = Math.floor(hue * 6);
  const f = hue * 6 - sector;
  const p = v * (1 - s);
  const q = v * (1 - f * s);
  const t = v * (1 - (1 - f) * s);

  switch (sector % 6) {
    case 0:
      return [v, t, p];
    case 1:
      return [q, v, p];
    case 2:
      return [p, v, t];
    case 3:
      return [p, q, v];
    case 4:
      return [t, p, v];
    default:
      return [v, p, q];
  }
};

export const clampRgb = (rgb: Rgb): Rgb => [clamp01(rgb[0]), clamp01(rgb[1]), clamp01(rgb[2])];

/** Channel bytes as the shader writes them: clamp, scale by 255, truncate. */
export const quantizeChannel = (value: number): number => Math.trunc(clamp01(value) * 255);

export const quantizeRgb = (rgb: Rgb): [number, number, number] => [
  quantizeChannel(rgb[0]),
  quantizeChannel(rgb[1]),
  quantizeChannel(rgb[2]),
];
