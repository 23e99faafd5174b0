/**
 * Long Stop-The-World Pause Detector
 *
 * Qualifying pauses are those at or above the long-pause threshold; the
 * finding also needs the p99 pause to exceed its own bound so a single
 * outlier in a healthy log does not fire on its own.
 */

import type { Confidence, Finding } from '../types/findings.js';
import type { GcMetrics } from '../types/metrics.js';
import type { ThresholdConfig } from '../types/thresholds.js';
import { createFinding, minutes } from './finding.js';

export function detectLongStwPauses(metrics: GcMetrics, thresholds: ThresholdConfig): Finding | null {
  const { pauses, safepoints } = metrics;

  if (pauses.longPauseCount === 0 || pauses.p99Ms <= thresholds.pauseP99Ms) {
    return null;
  }

  const confidence: Confidence =
    pauses.longPauseCount >= 3 ? 'high' : pauses.longPauseCount === 2 ? 'medium' : 'low';

  const evidence = [
    `Pauses >= ${pauses.longPauseThresholdMs} ms: ${pauses.longPauseCount} of ${pauses.count}`,
    `Pause p99: ${pauses.p99Ms.toFixed(1)} ms (threshold ${thresholds.pauseP99Ms} ms), max: ${pauses.maxMs.toFixed(1)} ms`,
    ...pauses.longest.map(
      (p) =>
        `Line ${p.lineNumber}: ${p.category} GC(${p.gcId}) paused ${p.pauseMs.toFixed(1)} ms at ${minutes(p.uptimeSeconds)} min`
    ),
  ];
  if (safepoints.count > 0) {
    evidence.push(
      `Max time to safepoint: ${safepoints.maxTimeToSafepointMs.toFixed(1)} ms over ${safepoints.count} safepoints`
    );
  }
  if (metrics.evacuationFailures > 0) {
    evidence.push(`Evacuation failures in window: ${metrics.evacuationFailures}`);
  }

  return createFinding('long-stw-pauses', 'DETECTED', confidence, evidence, [
    'JFR recording (GC + safepoint + pause phases)',
    'Increase logging: -Xlog:gc*,safepoint*',
    'Thread dump during long pause if reproducible',
  ]);
}
