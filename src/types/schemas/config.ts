/**
 * Triage Configuration Schemas
 *
 * Zod schemas for validating triage.yaml. Keys are snake_case in the file and
 * converted to ThresholdConfig by the loader.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { REPORT_FORMATS } from '../../report/renderer.js';

const positive = (label: string) => z.number().positive(`${label} must be positive`);
const share = z.number().min(0, 'must be >= 0').max(1, 'must be <= 1');

/**
 * Detector thresholds (every key optional; missing keys keep their defaults)
 */
export const ThresholdsFileSchema = z
  .object({
    old_trend_threshold: positive('Old-gen trend threshold'),
    young_interval_seconds: positive('Young interval'),
    gc_time_ratio: share,
    interval_cv_max: z.number().min(0, 'must be >= 0'),
    long_pause_ms: positive('Long pause threshold'),
    pause_p99_ms: positive('Pause p99 threshold'),
    humongous_per_minute: z.number().min(0, 'must be >= 0'),
    pause_spike_ms: positive('Pause spike threshold'),
    humongous_spike_lag_seconds: z.number().min(0, 'must be >= 0'),
    max_gc_gap_seconds: positive('Max GC gap'),
    starvation_occupancy_pct: z.number().min(0).max(100, 'must be <= 100'),
    metaspace_growth_mb_per_minute: positive('Metaspace growth threshold'),
    sustained_growth_share: share,
    tlab_slow_allocs_per_minute: z.number().min(0, 'must be >= 0'),
    min_samples: z.number().int().min(1, 'must be >= 1'),
    min_mixed_cycles: z.number().int().min(0, 'must be >= 0'),
  })
  .partial()
  .strict();

/**
 * Analysis defaults (overridden by CLI flags)
 */
export const AnalysisFileSchema = z
  .object({
    tail_window_minutes: positive('Tail window').nullable(),
    format: z.enum(REPORT_FORMATS),
  })
  .partial()
  .strict();

/**
 * Resolved configuration (environment overrides already applied)
 */
export const TriageConfigSchema = z
  .object({
    thresholds: ThresholdsFileSchema.default({}),
    analysis: AnalysisFileSchema.default({}),
  })
  .strict();

export type ThresholdsFile = z.infer<typeof ThresholdsFileSchema>;
export type AnalysisFile = z.infer<typeof AnalysisFileSchema>;
export type TriageConfig = z.infer<typeof TriageConfigSchema>;
