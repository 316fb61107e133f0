const clamp = (value: number, min: number, max: number) => {
  if (Number.isNaN(value)) return min;
  if (!Number.isFinite(value)) return value > 0 ? max : min;
  if (value < min) return min;
  if (value > max) return max;
  return value;
};

export const RENDER_CONFIG_KEYS = [
  'width',
  'height',
  'maxSteps',
  'maxIter',
  'bailout',
  'epsilon',
  'normalEpsilon',
  'damping',
  'maxDistance',
] as const;

export type RenderConfigKey = (typeof RENDER_CONFIG_KEYS)[number];

const INTEGER_KEYS: ReadonlySet<RenderConfigKey> = new Set(['width', 'height', 'maxSteps', 'maxIter']);

/**
 * Tunables shared by both frame renderers. Distances are in the bulb's own
 * units (the set fits inside a radius of roughly 1.2):
 *  - maxSteps: raymarch iteration cap
 *  - maxIter: field iteration cap
 *  - bailout: escape radius of the field iteration
 *  - epsilon: distance under which a march step counts as a hit
 *  - normalEpsilon: half-width of the central difference used for normals
 *  - damping: fraction of the distance estimate advanced per step
 *  - maxDistance: march length after which a ray counts as a miss
 */
export type RenderConfig = {
  width: number;
  height: number;
  maxSteps: number;
  maxIter: number;
  bailout: number;
  epsilon: number;
  normalEpsilon: number;
  damping: number;
  maxDistance: number;
};

export type RenderConfigInit = Partial<RenderConfig>;

const INTERNAL_DEFAULT_RENDER_CONFIG: RenderConfig = {
  width: 640,
  height: 480,
  maxSteps: 150,
  maxIter: 12,
  bailout: 2.0,
  epsilon: 0.0005,
  normalEpsilon: 0.0005,
  damping: 0.8,
  maxDistance: 6.0,
};

const RENDER_CONFIG_BOUNDS: Record<RenderConfigKey, { min: number; max: number }> = {
  width: { min: 1, max: 4096 },
  height: { min: 1, max: 4096 },
  maxSteps: { min: 1, max: 1024 },
  maxIter: { min: 1, max: 64 },
  bailout: { min: 1, max: 16 },
  epsilon: { min: 1e-6, max: 0.1 },
  normalEpsilon: { min: 1e-6, max: 0.1 },
  damping: { min: 0.05, max: 1 },
  maxDistance: { min: 0.5, max: 1000 },
};

const sanitizeField = (key: RenderConfigKey, value: number | undefined): number => {
  if (value == null) return INTERNAL_DEFAULT_RENDER_CONFIG[key];
  const bounds = RENDER_CONFIG_BOUNDS[key];
  const clamped = clamp(value, bounds.min, bounds.max);
  return INTEGER_KEYS.has(key) ? Math.trunc(clamped) : clamped;
};

export const createRenderConfig = (init?: RenderConfigInit): RenderConfig => ({
  width: sanitizeField('width', init?.width),
  height: sanitizeField('height', init?.height),
  maxSteps: sanitizeField('maxSteps', init?.maxSteps),
  maxIter: sanitizeField('maxIter', init?.maxIter),
  bailout: sanitizeField('bailout', init?.bailout),
  epsilon: sanitizeField('epsilon', init?.epsilon),
  normalEpsilon: sanitizeField('normalEpsilon', init?.normalEpsilon),
  damping: sanitizeField('damping', init?.damping),
  maxDistance: sanitizeField('maxDistance', init?.maxDistance),
});

export const renderConfigToJSON = (config: RenderConfig): RenderConfig => ({
  width: config.width,
  height: config.height,
  maxSteps: config.maxSteps,
  maxIter: config.maxIter,
  bailout: config.bailout,
  epsilon: config.epsilon,
  normalEpsilon: config.normalEpsilon,
  damping: config.damping,
  maxDistance: config.maxDistance,
});

export const DEFAULT_RENDER_CONFIG: Readonly<RenderConfig> = Object.freeze(
  renderConfigToJSON(INTERNAL_DEFAULT_RENDER_CONFIG),
);

export const getDefaultRenderConfig = (): RenderConfig => createRenderConfig();

export const getRenderConfigBounds = (): Record<RenderConfigKey, { min: number; max: number }> => ({
  ...RENDER_CONFIG_BOUNDS,
});

export const isIntegerRenderConfigKey = (key: RenderConfigKey): boolean => INTEGER_KEYS.has(key);

export const aspectRatio = (config: Pick<RenderConfig, 'width' | 'height'>): number =>
  config.width / config.height;
