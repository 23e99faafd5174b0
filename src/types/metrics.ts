/**
 * Aggregated metrics
 *
 * Computed once per run from the windowed event stream and never mutated.
 */

import type { AnalysisWindow, CollectorName, GcPauseCategory } from './events.js';

export interface TrendFit {
  /** Growth per minute (least-squares slope; first-to-last for two points) */
  ratePerMinute: number;
  samples: number;
  first: number;
  last: number;
  delta: number;
  spanMinutes: number;
}

export interface YoungIntervalMetrics {
  readonly intervals: number;
  readonly medianSeconds: number;
  readonly p99Seconds: number;
  readonly meanSeconds: number;
  /** Coefficient of variation (stddev / mean) */
  readonly cv: number;
}

export interface GcTimeMetrics {
  readonly totalPauseMs: number;
  readonly spanSeconds: number;
  /** Share of the window spent in pauses (0-1) */
  readonly ratio: number;
}

export interface PauseRef {
  readonly uptimeSeconds: number;
  readonly pauseMs: number;
  readonly category: GcPauseCategory;
  readonly gcId: number;
  readonly lineNumber: number;
}

export interface PauseMetrics {
  readonly count: number;
  readonly p99Ms: number;
  readonly maxMs: number;
  readonly longPauseThresholdMs: number;
  readonly longPauseCount: number;
  /** Longest qualifying pauses, longest first */
  readonly longest: readonly PauseRef[];
}

export interface OldGenSample {
  readonly lineNumber: number;
  readonly uptimeSeconds: number;
  readonly regions: number;
}

export interface OldGenMetrics {
  readonly samples: number;
  /** First and last few post-collection samples, in uptime order */
  readonly quotedSamples: readonly OldGenSample[];
  readonly trend: TrendFit | null;
  readonly mixedOrFullCollections: number;
  /** Share of consecutive post-collection samples that did not decrease (0-1) */
  readonly nonDecreasingShare: number;
  readonly capacityRegions: number | null;
  readonly currentRegions: number | null;
  readonly currentOccupancyPct: number | null;
  /** Minutes until old-gen reaches 90% of heap regions at the current rate */
  readonly minutesTo90Pct: number | null;
}

export interface MetaspaceMetrics {
  readonly samples: number;
  /** MB/minute */
  readonly trend: TrendFit | null;
  readonly increasingSteps: number;
  readonly steps: number;
  readonly metadataTriggeredCollections: number;
  readonly lastCommittedMb: number | null;
}

export interface HumongousMetrics {
  readonly count: number;
  readonly perMinute: number;
  readonly peakRegions: number | null;
  readonly coOccurringSpikes: number;
  readonly spikeLagSeconds: number;
}

export type TlabMetrics =
  | { readonly available: false }
  | {
      readonly available: true;
      readonly samples: number;
      readonly slowAllocs: number;
      readonly perMinute: number;
    };

export interface InterGcGapMetrics {
  readonly maxGapSeconds: number;
  readonly gapStartUptime: number;
  readonly oldRegionsAtStart: number | null;
  readonly occupancyPctAtStart: number | null;
  /** Old-gen regions when region lines were logged, whole-heap size otherwise */
  readonly occupancySource: 'old-regions' | 'heap';
}

export interface CollectorMetrics {
  readonly name: CollectorName;
  /** False when no identity line was found and G1 is assumed */
  readonly explicit: boolean;
}

export interface SafepointMetrics {
  readonly count: number;
  readonly maxTimeToSafepointMs: number;
  readonly maxTotalMs: number;
}

export interface HeapMetrics {
  readonly regionSizeMb: number | null;
  readonly maxCapacityMb: number | null;
  readonly lastHeapAfterMb: number | null;
  readonly occupancyPct: number | null;
}

export interface SampleCounts {
  readonly youngGc: number;
  readonly mixedGc: number;
  readonly fullGc: number;
  readonly concurrentPauses: number;
  readonly humongous: number;
  readonly evacFailures: number;
  readonly metaspace: number;
  readonly tlab: number;
  readonly safepoints: number;
  readonly oldGen: number;
}

export interface GcMetrics {
  readonly window: AnalysisWindow;
  readonly sampleCounts: SampleCounts;
  readonly youngInterval: YoungIntervalMetrics | null;
  readonly gcTime: GcTimeMetrics;
  readonly pauses: PauseMetrics;
  readonly oldGen: OldGenMetrics;
  readonly metaspace: MetaspaceMetrics;
  readonly humongous: HumongousMetrics;
  readonly tlab: TlabMetrics;
  readonly evacuationFailures: number;
  readonly interGcGap: InterGcGapMetrics | null;
  readonly collector: CollectorMetrics;
  readonly safepoints: SafepointMetrics;
  readonly heap: HeapMetrics;
  readonly notes: readonly string[];
}
