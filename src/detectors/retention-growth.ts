/**
 * Retention Growth Detector
 *
 * A rising post-collection old-gen floor is only ever SUSPECTED: warmup and
 * cache fills look the same as a leak until a plateau is (or is not) reached.
 */

import type { Confidence, Finding } from '../types/findings.js';
import type { GcMetrics } from '../types/metrics.js';
import type { ThresholdConfig } from '../types/thresholds.js';
import { ANALYSIS } from '../config/defaults.js';
import { createFinding, minutes, percent } from './finding.js';

const STEADY_FLOOR_SHARE = 0.9;
const MIN_TREND_SAMPLES = 3;

export const RETENTION_NOTE =
  'This pattern shows a steady increase in old generation occupancy. ' +
  'If the application is still warming up (caches and data structures filling), this may be ' +
  'nominal growth until a plateau is reached. Growth that continues after a plateau is a very ' +
  'strong leak signal, and no plateau after several hours of runtime almost certainly means a leak. ' +
  'Compare with a healthy baseline run to tell nominal growth from leak-like behavior.';

export function detectRetentionGrowth(
  metrics: GcMetrics,
  thresholds: ThresholdConfig
): Finding | null {
  const { oldGen } = metrics;
  const { trend } = oldGen;

  if (trend === null || trend.ratePerMinute <= thresholds.oldTrendThreshold) {
    return null;
  }

  let confidence: Confidence = 'low';
  if (
    oldGen.samples >= thresholds.minSamples &&
    oldGen.nonDecreasingShare >= STEADY_FLOOR_SHARE &&
    oldGen.mixedOrFullCollections >= thresholds.minMixedCycles
  ) {
    confidence = 'high';
  } else if (oldGen.samples >= MIN_TREND_SAMPLES) {
    confidence = 'medium';
  }

  const evidence = [
    `Old-gen after GC: ${trend.first} -> ${trend.last} regions (${signed(trend.delta)}) over ${trend.spanMinutes.toFixed(1)} min`,
    `Trend: ${trend.ratePerMinute.toFixed(1)} regions/min (threshold ${thresholds.oldTrendThreshold})`,
    `Non-decreasing floor: ${percent(oldGen.nonDecreasingShare, 0)} of ${Math.max(0, oldGen.samples - 1)} steps`,
    `Mixed/Full collections in window: ${oldGen.mixedOrFullCollections}`,
  ];
  if (oldGen.currentOccupancyPct !== null && oldGen.capacityRegions !== null) {
    evidence.push(
      `Old-gen occupancy: ${oldGen.currentOccupancyPct.toFixed(1)}% of ${oldGen.capacityRegions} regions`
    );
  }
  if (oldGen.minutesTo90Pct !== null) {
    evidence.push(
      `Projected to reach ${ANALYSIS.PROJECTION_OCCUPANCY_PCT}% of heap in ${oldGen.minutesTo90Pct.toFixed(1)} min at the current rate`
    );
  }
  for (const sample of oldGen.quotedSamples) {
    evidence.push(
      `Line ${sample.lineNumber}: ${sample.regions} regions at ${minutes(sample.uptimeSeconds)} min`
    );
  }

  return createFinding(
    'retention-growth',
    'SUSPECTED',
    confidence,
    evidence,
    [
      'jcmd <pid> GC.class_histogram (check dominant classes)',
      'Short JFR capture (10-30 min, focus on allocations + GC phases)',
      'Heap dump + Eclipse MAT analysis (especially if trend persists after warmup/plateau)',
    ],
    RETENTION_NOTE
  );
}

function signed(value: number): string {
  return value >= 0 ? `+${value}` : `${value}`;
}
