/**
 * Detector thresholds, passed explicitly to every detector.
 */
export interface ThresholdConfig {
  /** Retention: old-gen growth above this fires SUSPECTED (regions/minute) */
  oldTrendThreshold: number;

  /** Allocation pressure: median young-GC interval below this (seconds) */
  youngIntervalSeconds: number;
  /** Allocation pressure: share of wall time spent paused above this (0-1) */
  gcTimeRatio: number;
  /** Allocation pressure: coefficient of variation at or below this counts as consistent */
  intervalCvMax: number;

  /** Pauses at or above this qualify as long (ms) */
  longPauseMs: number;
  /** Long STW: p99 pause must exceed this (ms) */
  pauseP99Ms: number;

  /** Humongous markers per minute above this */
  humongousPerMinute: number;
  /** A pause at or above this counts as a spike (ms) */
  pauseSpikeMs: number;
  /** Spike must start within this many seconds after a humongous marker */
  humongousSpikeLagSeconds: number;

  /** Starvation: gap between collections above this (seconds) */
  maxGcGapSeconds: number;
  /** Starvation: old-gen occupancy at gap start at or above this (percent) */
  starvationOccupancyPct: number;

  /** Metaspace growth above this (MB/minute) */
  metaspaceGrowthMbPerMinute: number;
  /** Share of increasing metaspace steps required to call growth sustained (0-1) */
  sustainedGrowthShare: number;

  /** TLAB slow-path allocations per minute above this */
  tlabSlowAllocsPerMinute: number;

  /** Below this sample count confidence is lowered */
  minSamples: number;
  /** Mixed/full collections needed for a high-confidence retention finding */
  minMixedCycles: number;
}
