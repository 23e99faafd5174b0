/**
 * Default Configuration Constants
 *
 * All detector thresholds centralized here. Only the tail window and the
 * old-gen trend threshold are exposed as CLI flags; the rest can be tuned
 * through the YAML file.
 */

import type { ThresholdConfig } from '../types/thresholds.js';

export const DEFAULT_THRESHOLDS: Readonly<ThresholdConfig> = {
  oldTrendThreshold: 5.0, // regions/minute

  youngIntervalSeconds: 1.0,
  gcTimeRatio: 0.1, // 10% of wall time paused
  intervalCvMax: 0.5,

  longPauseMs: 1_000,
  pauseP99Ms: 200,

  humongousPerMinute: 1.0,
  pauseSpikeMs: 100,
  humongousSpikeLagSeconds: 1.0,

  maxGcGapSeconds: 120,
  starvationOccupancyPct: 70,

  metaspaceGrowthMbPerMinute: 1.0,
  sustainedGrowthShare: 0.6,

  tlabSlowAllocsPerMinute: 500,

  minSamples: 5,
  minMixedCycles: 2,
};

/**
 * Report and engine constants
 */
export const ANALYSIS = {
  /** Old-gen occupancy level used for the time-to-exhaustion projection */
  PROJECTION_OCCUPANCY_PCT: 90,

  /** Heap occupancy above this makes any firing finding CRITICAL */
  CRITICAL_HEAP_OCCUPANCY_PCT: 90,

  /** Longest pauses quoted as evidence */
  MAX_PAUSE_EVIDENCE: 5,

  /** Old-gen samples quoted as evidence (first ones and last ones) */
  MAX_TREND_EVIDENCE: 6,

  /** Uptime drop (seconds) that marks a restarted JVM rather than out-of-order lines */
  RESTART_TOLERANCE_SECONDS: 1,
} as const;

/**
 * Environment variable controlling the CLI log level
 */
export const LOG_LEVEL_ENV = 'GC_TRIAGE_LOG_LEVEL';
