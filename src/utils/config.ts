import dotenv from 'dotenv';
import type { TaskKind, Thresholds } from '../types';
import { ConfigurationError } from './errors';
import type { LogLevel } from './logger';
import { isLogLevel } from './logger';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.25;
export const DEFAULT_MAX_DETECTIONS = 30;

const DEFAULT_IOU_THRESHOLD: Record<TaskKind, number> = {
  detect: 0.4,
  segment: 0.45,
  pose: 0.45,
  obb: 0.45,
  classify: 0.45,
};

export function defaultThresholds(task: TaskKind): Thresholds {
  return {
    confidenceThreshold: DEFAULT_CONFIDENCE_THRESHOLD,
    iouThreshold: DEFAULT_IOU_THRESHOLD[task],
    maxDetections: DEFAULT_MAX_DETECTIONS,
  };
}

export function validateThresholds(thresholds: Partial<Thresholds>): void {
  const { confidenceThreshold, iouThreshold, maxDetections } = thresholds;
  if (confidenceThreshold !== undefined && !(confidenceThreshold >= 0 && confidenceThreshold <= 1)) {
    throw new ConfigurationError(`confidenceThreshold must be within [0, 1], got ${confidenceThreshold}`);
  }
  if (iouThreshold !== undefined && !(iouThreshold >= 0 && iouThreshold <= 1)) {
    throw new ConfigurationError(`iouThreshold must be within [0, 1], got ${iouThreshold}`);
  }
  if (maxDetections !== undefined && !(Number.isInteger(maxDetections) && maxDetections >= 0)) {
    throw new ConfigurationError(`maxDetections must be a non-negative integer, got ${maxDetections}`);
  }
}

/**
 * Thresholds shared between whoever tunes them and the decode path. Every
 * update swaps in a new frozen snapshot, so a decode that read `snapshot()`
 * once never sees half of an update.
 */
export class ThresholdStore {
  private current: Readonly<Partial<Thresholds>>;

  constructor(initial: Partial<Thresholds> = {}) {
    validateThresholds(initial);
    this.current = Object.freeze({ ...initial });
  }

  update(partial: Partial<Thresholds>): void {
    validateThresholds(partial);
    const next: Partial<Thresholds> = { ...this.current };
    for (const key of ['confidenceThreshold', 'iouThreshold', 'maxDetections'] as const) {
      const value = partial[key];
      if (value !== undefined) next[key] = value;
    }
    this.current = Object.freeze(next);
  }

  /** Explicit overrides only; `snapshot` fills the rest from the task defaults */
  overrides(): Readonly<Partial<Thresholds>> {
    return this.current;
  }

  snapshot(task: TaskKind): Readonly<Thresholds> {
    const overrides = this.current;
    return Object.freeze({ ...defaultThresholds(task), ...overrides });
  }
}

export interface EnvConfig {
  thresholds: Partial<Thresholds>;
  logLevel?: LogLevel;
}

function parseNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Reads YOLO_CONFIDENCE_THRESHOLD, YOLO_IOU_THRESHOLD, YOLO_MAX_DETECTIONS and
 * YOLO_LOG_LEVEL.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const thresholds: Partial<Thresholds> = {};
  const confidenceThreshold = parseNumber(env, 'YOLO_CONFIDENCE_THRESHOLD');
  const iouThreshold = parseNumber(env, 'YOLO_IOU_THRESHOLD');
  const maxDetections = parseNumber(env, 'YOLO_MAX_DETECTIONS');
  if (confidenceThreshold !== undefined) thresholds.confidenceThreshold = confidenceThreshold;
  if (iouThreshold !== undefined) thresholds.iouThreshold = iouThreshold;
  if (maxDetections !== undefined) thresholds.maxDetections = maxDetections;
  validateThresholds(thresholds);

  const level = env.YOLO_LOG_LEVEL;
  if (level !== undefined && !isLogLevel(level)) {
    throw new ConfigurationError(`YOLO_LOG_LEVEL must be one of debug, info, warn, error, silent; got "${level}"`);
  }
  return level === undefined ? { thresholds } : { thresholds, logLevel: level };
}

/**
 * Loads a .env file into process.env, then reads the configuration from it.
 */
export function loadDotenv(path?: string): EnvConfig {
  dotenv.config(path ? { path } : undefined);
  return loadEnvConfig(process.env);
}
