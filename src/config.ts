/**
 * Streaming configuration: defaults, validation, and environment loading.
 * All tuning knobs live here, nowhere else.
 */

import type { LogLevel } from './core/logger';

// ── Defaults ────────────────────────────────────────────────────

/** Upper size bound (inclusive) of Small, Medium and Large. */
export const DEFAULT_SIZE_THRESHOLDS = [1, 4, 16] as const;
/** Chunk edge length of Small, Medium and Large. */
export const DEFAULT_CHUNK_SIZES = [8, 16, 64] as const;
export const DEFAULT_LOAD_RANGE = 2;

export const TARGET_TPS = 60;
export const DEFAULT_TICK_INTERVAL_MS = 1000 / TARGET_TPS;
export const DEFAULT_SCHEDULER_BUDGET_MS = 4;

export const DEFAULT_OBSERVER_MOVE_THRESHOLD = 1;
export const POSITION_EPSILON = 0.01;
export const SIZE_EPSILON = 0.01;
export const PROPERTY_EPSILON = 1e-4;

const ENV_PREFIX = 'WORLD_STREAMER_';

// ── Runtime Config ──────────────────────────────────────────────
export interface StreamingConfig {
  sizeThresholds: readonly [number, number, number];
  chunkSizes: readonly [number, number, number];
  loadRange: number;
  schedulerBudgetMs: number;
  tickIntervalMs: number;
  timeSlicing: boolean;
  observerMoveThreshold: number;
  positionEpsilon: number;
  sizeEpsilon: number;
  propertyEpsilon: number;
  logLevel: LogLevel;
}

export interface ConfigValidationResult {
  valid: boolean;
  config: StreamingConfig;
  errors: string[];
}

export const DEFAULT_STREAMING_CONFIG: StreamingConfig = {
  sizeThresholds: DEFAULT_SIZE_THRESHOLDS,
  chunkSizes: DEFAULT_CHUNK_SIZES,
  loadRange: DEFAULT_LOAD_RANGE,
  schedulerBudgetMs: DEFAULT_SCHEDULER_BUDGET_MS,
  tickIntervalMs: DEFAULT_TICK_INTERVAL_MS,
  timeSlicing: true,
  observerMoveThreshold: DEFAULT_OBSERVER_MOVE_THRESHOLD,
  positionEpsilon: POSITION_EPSILON,
  sizeEpsilon: SIZE_EPSILON,
  propertyEpsilon: PROPERTY_EPSILON,
  logLevel: 'info',
};

const POSITIVE_NUMBER_FIELDS = [
  'schedulerBudgetMs',
  'tickIntervalMs',
] as const;

const NON_NEGATIVE_NUMBER_FIELDS = [
  'observerMoveThreshold',
  'positionEpsilon',
  'sizeEpsilon',
  'propertyEpsilon',
] as const;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isPositiveNumber(value: unknown, field: string, errors: string[]): boolean {
  if (typeof value !== 'number' || Number.isNaN(value) || value <= 0) {
    errors.push(`${field} must be greater than 0`);
    return false;
  }
  if (!Number.isFinite(value)) {
    errors.push(`${field} must be finite`);
    return false;
  }
  return true;
}

function isNonNegativeNumber(value: unknown, field: string, errors: string[]): boolean {
  if (typeof value !== 'number' || Number.isNaN(value) || value < 0) {
    errors.push(`${field} must not be negative`);
    return false;
  }
  if (!Number.isFinite(value)) {
    errors.push(`${field} must be finite`);
    return false;
  }
  return true;
}

function checkTriple(values: readonly number[], field: string, errors: string[]): void {
  if (values.length !== 3) {
    errors.push(`${field} must list exactly 3 values, got ${values.length}`);
    return;
  }
  values.forEach((value, i) => isPositiveNumber(value, `${field}[${i}]`, errors));
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Merge defaults with overrides and validate resulting streaming config.
 */
export function validateAndLoadConfig(
  overrides: Partial<StreamingConfig> = {},
): ConfigValidationResult {
  const config: StreamingConfig = { ...DEFAULT_STREAMING_CONFIG, ...overrides };
  const errors: string[] = [];

  checkTriple(config.sizeThresholds, 'sizeThresholds', errors);
  checkTriple(config.chunkSizes, 'chunkSizes', errors);

  const [small, medium, large] = config.sizeThresholds;
  if (!(small < medium && medium < large)) {
    errors.push(`sizeThresholds must be strictly ascending, got [${config.sizeThresholds.join(', ')}]`);
  }

  if (!Number.isInteger(config.loadRange) || config.loadRange < 0) {
    errors.push('loadRange must be a non-negative integer');
  }

  for (const field of POSITIVE_NUMBER_FIELDS) {
    isPositiveNumber(config[field], field, errors);
  }

  for (const field of NON_NEGATIVE_NUMBER_FIELDS) {
    isNonNegativeNumber(config[field], field, errors);
  }

  if (typeof config.timeSlicing !== 'boolean') {
    errors.push('timeSlicing must be a boolean');
  }

  if (!isLogLevel(config.logLevel)) {
    errors.push(`logLevel must be one of ${LOG_LEVELS.join(', ')}`);
  }

  return {
    valid: errors.length === 0,
    config,
    errors,
  };
}

// ── Environment ─────────────────────────────────────────────────

function parseNumber(raw: string, name: string, errors: string[]): number | undefined {
  const value = Number(raw.trim());
  if (raw.trim() === '' || Number.isNaN(value)) {
    errors.push(`${ENV_PREFIX}${name} is not a number: "${raw}"`);
    return undefined;
  }
  return value;
}

function parseTriple(
  raw: string,
  name: string,
  errors: string[],
): readonly [number, number, number] | undefined {
  const parts = raw.split(',').map((part) => parseNumber(part, name, errors));
  const [a, b, c] = parts;
  if (parts.length !== 3 || a === undefined || b === undefined || c === undefined) {
    if (parts.length !== 3) {
      errors.push(`${ENV_PREFIX}${name} must list exactly 3 comma-separated numbers`);
    }
    return undefined;
  }
  return [a, b, c];
}

function parseBoolean(raw: string, name: string, errors: string[]): boolean | undefined {
  const value = raw.trim().toLowerCase();
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  errors.push(`${ENV_PREFIX}${name} is not a boolean: "${raw}"`);
  return undefined;
}

/**
 * Build a config from WORLD_STREAMER_* environment variables.
 * Unparseable values are reported as errors rather than replaced by defaults.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): ConfigValidationResult {
  const overrides: Partial<StreamingConfig> = {};
  const errors: string[] = [];
  const read = (name: string): string | undefined => env[`${ENV_PREFIX}${name}`];

  const loadRange = read('LOAD_RANGE');
  if (loadRange !== undefined) {
    const value = parseNumber(loadRange, 'LOAD_RANGE', errors);
    if (value !== undefined) overrides.loadRange = value;
  }

  const budget = read('BUDGET_MS');
  if (budget !== undefined) {
    const value = parseNumber(budget, 'BUDGET_MS', errors);
    if (value !== undefined) overrides.schedulerBudgetMs = value;
  }

  const interval = read('TICK_INTERVAL_MS');
  if (interval !== undefined) {
    const value = parseNumber(interval, 'TICK_INTERVAL_MS', errors);
    if (value !== undefined) overrides.tickIntervalMs = value;
  }

  const slicing = read('TIME_SLICING');
  if (slicing !== undefined) {
    const value = parseBoolean(slicing, 'TIME_SLICING', errors);
    if (value !== undefined) overrides.timeSlicing = value;
  }

  const thresholds = read('SIZE_THRESHOLDS');
  if (thresholds !== undefined) {
    const value = parseTriple(thresholds, 'SIZE_THRESHOLDS', errors);
    if (value !== undefined) overrides.sizeThresholds = value;
  }

  const chunkSizes = read('CHUNK_SIZES');
  if (chunkSizes !== undefined) {
    const value = parseTriple(chunkSizes, 'CHUNK_SIZES', errors);
    if (value !== undefined) overrides.chunkSizes = value;
  }

  const logLevel = read('LOG_LEVEL');
  if (logLevel !== undefined) {
    const value = logLevel.trim().toLowerCase();
    if (isLogLevel(value)) {
      overrides.logLevel = value;
    } else {
      errors.push(`${ENV_PREFIX}LOG_LEVEL is not a log level: "${logLevel}"`);
    }
  }

  const result = validateAndLoadConfig(overrides);
  return {
    valid: result.valid && errors.length === 0,
    config: result.config,
    errors: [...errors, ...result.errors],
  };
}
