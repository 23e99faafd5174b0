/**
 * GC Starvation / Finalizer Backlog Detector
 */

import type { Confidence, Finding } from '../types/findings.js';
import type { GcMetrics } from '../types/metrics.js';
import type { ThresholdConfig } from '../types/thresholds.js';
import { createFinding, minutes } from './finding.js';

const HIGH_OCCUPANCY_PCT = 85;

export function detectGcStarvation(metrics: GcMetrics, thresholds: ThresholdConfig): Finding | null {
  const gap = metrics.interGcGap;

  if (
    gap === null ||
    gap.occupancyPctAtStart === null ||
    gap.maxGapSeconds <= thresholds.maxGcGapSeconds ||
    gap.occupancyPctAtStart < thresholds.starvationOccupancyPct
  ) {
    return null;
  }

  let confidence: Confidence = 'low';
  if (
    gap.maxGapSeconds >= 2 * thresholds.maxGcGapSeconds &&
    gap.occupancyPctAtStart >= HIGH_OCCUPANCY_PCT
  ) {
    confidence = 'high';
  } else if (gap.occupancySource === 'old-regions') {
    confidence = 'medium';
  }

  const source =
    gap.occupancySource === 'old-regions'
      ? `old-gen ${gap.oldRegionsAtStart ?? 0} regions`
      : 'heap after collection';

  const evidence = [
    `Longest gap between collections: ${gap.maxGapSeconds.toFixed(1)}s starting at ${minutes(gap.gapStartUptime)} min (threshold ${thresholds.maxGcGapSeconds}s)`,
    `Occupancy at gap start: ${gap.occupancyPctAtStart.toFixed(1)}% (${source}, threshold ${thresholds.starvationOccupancyPct}%)`,
  ];

  return createFinding('gc-starvation', 'DETECTED', confidence, evidence, [
    'jcmd <pid> GC.finalizer_info (check the finalization queue length)',
    'Thread dump to see whether the Finalizer or Reference Handler thread is blocked',
    'Look for classes overriding finalize() or heavy Cleaner usage',
  ]);
}
