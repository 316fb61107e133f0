import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';

import { RenderConfigValidationError, type RenderConfigIssue } from '../errors.js';
import {
  createRenderConfig,
  getRenderConfigBounds,
  isIntegerRenderConfigKey,
  RENDER_CONFIG_KEYS,
  type RenderConfig,
  type RenderConfigInit,
  type RenderConfigKey,
} from './renderConfig.js';

export type RenderConfigValidationResult = {
  config: RenderConfig;
  issues: RenderConfigIssue[];
};

export type RenderConfigLoadResult =
  | {
      readonly kind: 'success';
      readonly config: RenderConfig;
      readonly issues: RenderConfigIssue[];
      readonly sourceName?: string;
    }
  | {
      readonly kind: 'error';
      readonly message: string;
      readonly issues: RenderConfigIssue[] | undefined;
      readonly sourceName?: string;
    };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isRenderConfigKey = (key: string): key is RenderConfigKey =>
  RENDER_CONFIG_KEYS.some((candidate) => candidate === key);

const pushIssue = (
  issues: RenderConfigIssue[],
  code: string,
  message: string,
  path: readonly (string | number)[],
  severity: RenderConfigIssue['severity'] = 'error',
) => {
  issues.push({ code, message, path, severity });
};

export function validateRenderConfig(payload: unknown): RenderConfigValidationResult {
  const issues: RenderConfigIssue[] = [];

  if (!isRecord(payload)) {
    pushIssue(issues, 'config/type', 'Render config root must be an object', []);
    throw new RenderConfigValidationError('Render config root must be an object', issues);
  }

  const bounds = getRenderConfigBounds();
  const init: RenderConfigInit = {};

  for (const key of Object.keys(payload)) {
    if (!isRenderConfigKey(key)) {
      pushIssue(issues, 'config/unknown-key', `Unknown render config key "${key}"`, [key], 'warning');
      continue;
    }
    const value = payload[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      pushIssue(issues, `config/${key}/type`, `${key} must be a finite number`, [key]);
      continue;
    }
    if (isIntegerRenderConfigKey(key) && !Number.isInteger(value)) {
      pushIssue(
        issues,
        `config/${key}/integer`,
        `${key} must be an integer (received ${value}, truncated)`,
        [key],
        'warning',
      );
    }
    const { min, max } = bounds[key];
    if (value < min || value > max) {
      pushIssue(
        issues,
        `config/${key}/range`,
        `${key} must lie within [${min}, ${max}] (received ${value}, clamped)`,
        [key],
        'warning',
      );
    }
    init[key] = value;
  }

  const hasFatalIssues = issues.some((issue) => issue.severity === 'error');
  if (hasFatalIssues) {
    throw new RenderConfigValidationError('Render config validation failed', issues);
  }

  return { config: createRenderConfig(init), issues };
}

export async function loadRenderConfigFromJson(
  json: string,
  sourceName?: string,
): Promise<RenderConfigLoadResult> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : 'Failed to parse JSON render config',
      issues: undefined,
      sourceName,
    };
  }

  try {
    const { config, issues } = validateRenderConfig(parsed);
    return { kind: 'success', config, issues, sourceName };
  } catch (error) {
    if (error instanceof RenderConfigValidationError) {
      return {
        kind: 'error',
        message: error.message,
        issues: error.issues,
        sourceName,
      };
    }
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : 'Unknown render config validation error',
      issues: undefined,
      sourceName,
    };
  }
}

export async function loadRenderConfigFile(path: string): Promise<RenderConfigLoadResult> {
  let json: string;
  try {
    json = await readFile(path, 'utf8');
  } catch (error) {
    return {
      kind: 'error',
      message: error instanceof Error ? error.message : `Unable to read ${path}`,
      issues: undefined,
      sourceName: basename(path),
    };
  }
  return loadRenderConfigFromJson(json, basename(path));
}
