/**
 * Configuration Loader
 *
 * Loads triage thresholds from YAML with environment-specific overrides.
 * The result is passed explicitly to the engine; there is no global config.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import type { Logger } from 'pino';
import { TriageError, zodErrorToTriageError } from '../api/errors.js';
import type { ThresholdConfig } from '../types/thresholds.js';
import { TriageConfigSchema, type TriageConfig } from '../types/schemas/config.js';
import { DEFAULT_THRESHOLDS } from './defaults.js';

export type Environment = 'production' | 'development' | 'test';

export interface LoadConfigOptions {
  /** Explicit config file; must exist */
  configPath?: string;
  /** Defaults to NODE_ENV, then 'development' */
  environment?: Environment;
  logger?: Logger;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects; arrays and scalars from source replace target.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
export function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'triage.yaml');
}

function resolveEnvironment(environment?: Environment): Environment {
  if (environment) {
    return environment;
  }
  const env = process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Parse YAML text, apply the selected environment section and validate.
 */
export function parseConfig(text: string, environment: Environment, source = '<inline>'): TriageConfig {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TriageError('InvalidConfig', `Failed to parse ${source}: ${reason}`, { source });
  }

  // An empty file parses to undefined
  if (raw === undefined || raw === null) {
    raw = {};
  }
  if (!isPlainObject(raw)) {
    throw new TriageError('InvalidConfig', `Configuration in ${source} must be a mapping`, { source });
  }

  const { environments, ...base } = raw;
  let merged = base;
  if (isPlainObject(environments)) {
    const override = environments[environment];
    if (isPlainObject(override)) {
      merged = deepMerge(base, override);
    }
  }

  const result = TriageConfigSchema.safeParse(merged);
  if (!result.success) {
    throw zodErrorToTriageError(result.error, 'InvalidConfig');
  }
  return result.data;
}

/**
 * Load configuration from a YAML file.
 *
 * An explicit path must exist. Without one, the shipped config/triage.yaml is
 * used when present and built-in defaults otherwise.
 */
export function loadConfig(options: LoadConfigOptions = {}): TriageConfig {
  const environment = resolveEnvironment(options.environment);
  const path = options.configPath ?? defaultConfigPath();

  if (!existsSync(path)) {
    if (options.configPath) {
      throw new TriageError('InvalidConfig', `Configuration file not found: ${path}`, { path });
    }
    options.logger?.debug({ path }, 'No configuration file, using built-in defaults');
    return TriageConfigSchema.parse({});
  }

  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TriageError('InvalidConfig', `Failed to read configuration ${path}: ${reason}`, { path });
  }

  const config = parseConfig(text, environment, path);
  options.logger?.debug({ path, environment }, 'Loaded configuration');
  return config;
}

/**
 * Convert YAML thresholds (snake_case) to ThresholdConfig (camelCase)
 */
export function toThresholdConfig(config: TriageConfig): ThresholdConfig {
  const t = config.thresholds;

  return {
    oldTrendThreshold: t.old_trend_threshold ?? DEFAULT_THRESHOLDS.oldTrendThreshold,
    youngIntervalSeconds: t.young_interval_seconds ?? DEFAULT_THRESHOLDS.youngIntervalSeconds,
    gcTimeRatio: t.gc_time_ratio ?? DEFAULT_THRESHOLDS.gcTimeRatio,
    intervalCvMax: t.interval_cv_max ?? DEFAULT_THRESHOLDS.intervalCvMax,
    longPauseMs: t.long_pause_ms ?? DEFAULT_THRESHOLDS.longPauseMs,
    pauseP99Ms: t.pause_p99_ms ?? DEFAULT_THRESHOLDS.pauseP99Ms,
    humongousPerMinute: t.humongous_per_minute ?? DEFAULT_THRESHOLDS.humongousPerMinute,
    pauseSpikeMs: t.pause_spike_ms ?? DEFAULT_THRESHOLDS.pauseSpikeMs,
    humongousSpikeLagSeconds:
      t.humongous_spike_lag_seconds ?? DEFAULT_THRESHOLDS.humongousSpikeLagSeconds,
    maxGcGapSeconds: t.max_gc_gap_seconds ?? DEFAULT_THRESHOLDS.maxGcGapSeconds,
    starvationOccupancyPct: t.starvation_occupancy_pct ?? DEFAULT_THRESHOLDS.starvationOccupancyPct,
    metaspaceGrowthMbPerMinute:
      t.metaspace_growth_mb_per_minute ?? DEFAULT_THRESHOLDS.metaspaceGrowthMbPerMinute,
    sustainedGrowthShare: t.sustained_growth_share ?? DEFAULT_THRESHOLDS.sustainedGrowthShare,
    tlabSlowAllocsPerMinute:
      t.tlab_slow_allocs_per_minute ?? DEFAULT_THRESHOLDS.tlabSlowAllocsPerMinute,
    minSamples: t.min_samples ?? DEFAULT_THRESHOLDS.minSamples,
    minMixedCycles: t.min_mixed_cycles ?? DEFAULT_THRESHOLDS.minMixedCycles,
  };
}
