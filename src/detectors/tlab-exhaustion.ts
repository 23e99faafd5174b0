/**
 * TLAB Exhaustion Detector
 *
 * TLAB statistics only exist when the JVM ran with gc+tlab debug logging, so
 * their absence produces an explicit "unavailable" finding instead of a zero.
 */

import type { Confidence, Finding } from '../types/findings.js';
import type { GcMetrics } from '../types/metrics.js';
import type { ThresholdConfig } from '../types/thresholds.js';
import { createFinding } from './finding.js';

export const TLAB_UNAVAILABLE_EVIDENCE = 'TLAB statistics unavailable: no gc+tlab debug lines in the log';

export function detectTlabExhaustion(metrics: GcMetrics, thresholds: ThresholdConfig): Finding | null {
  const { tlab } = metrics;

  if (!tlab.available) {
    return createFinding('tlab-exhaustion', 'NONE', 'low', [TLAB_UNAVAILABLE_EVIDENCE], [
      'Enable TLAB statistics with -Xlog:gc+tlab=debug to analyze slow-path allocations',
    ]);
  }

  if (tlab.perMinute <= thresholds.tlabSlowAllocsPerMinute) {
    return null;
  }

  let confidence: Confidence = 'low';
  if (tlab.samples >= 2 * thresholds.minSamples) {
    confidence = 'high';
  } else if (tlab.samples >= thresholds.minSamples) {
    confidence = 'medium';
  }

  return createFinding(
    'tlab-exhaustion',
    'DETECTED',
    confidence,
    [
      `TLAB slow-path allocations: ${tlab.slowAllocs} (${tlab.perMinute.toFixed(1)}/min, threshold ${thresholds.tlabSlowAllocsPerMinute}/min)`,
      `TLAB samples in window: ${tlab.samples}`,
    ],
    [
      'JFR recording (ObjectAllocationOutsideTLAB) to find allocations missing the TLAB',
      'Review -XX:TLABSize / -XX:MinTLABSize and thread count',
    ]
  );
}
