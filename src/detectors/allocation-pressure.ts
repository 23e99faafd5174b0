/**
 * Allocation Pressure Detector
 *
 * Young collections arriving faster than the configured interval, or pauses
 * eating too much of the window, point at an allocation rate the young
 * generation cannot absorb.
 */

import type { Confidence, Finding } from '../types/findings.js';
import type { GcMetrics } from '../types/metrics.js';
import type { ThresholdConfig } from '../types/thresholds.js';
import { createFinding, percent } from './finding.js';

export function detectAllocationPressure(
  metrics: GcMetrics,
  thresholds: ThresholdConfig
): Finding | null {
  const { youngInterval, gcTime } = metrics;

  const intervalSignal =
    youngInterval !== null && youngInterval.medianSeconds < thresholds.youngIntervalSeconds;
  const ratioSignal = gcTime.ratio > thresholds.gcTimeRatio;

  if (!intervalSignal && !ratioSignal) {
    return null;
  }

  const intervals = youngInterval?.intervals ?? 0;
  const consistent = youngInterval !== null && youngInterval.cv <= thresholds.intervalCvMax;

  let confidence: Confidence = 'medium';
  if (intervals < thresholds.minSamples) {
    confidence = 'low';
  } else if (intervalSignal && ratioSignal && consistent) {
    confidence = 'high';
  }

  const evidence: string[] = [];
  if (youngInterval) {
    evidence.push(
      `Young GC median interval: ${youngInterval.medianSeconds.toFixed(2)}s (threshold ${thresholds.youngIntervalSeconds}s)`,
      `Young GC p99 interval: ${youngInterval.p99Seconds.toFixed(2)}s`,
      `Interval coefficient of variation: ${youngInterval.cv.toFixed(2)}`
    );
  }
  evidence.push(
    `GC time ratio: ${percent(gcTime.ratio)} of ${gcTime.spanSeconds.toFixed(1)}s (threshold ${percent(thresholds.gcTimeRatio)})`,
    `Young GC events in window: ${metrics.sampleCounts.youngGc}`
  );

  return createFinding('allocation-pressure', 'DETECTED', confidence, evidence, [
    'JFR recording with allocation profiling (ObjectAllocationSample) to find the hottest allocation sites',
    'Review young generation sizing (-XX:G1NewSizePercent / -XX:MaxGCPauseMillis)',
    'jcmd <pid> GC.heap_info (check eden and survivor sizes)',
  ]);
}
