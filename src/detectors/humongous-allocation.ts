/**
 * Humongous Allocation Detector
 */

import type { Confidence, Finding } from '../types/findings.js';
import type { GcMetrics } from '../types/metrics.js';
import type { ThresholdConfig } from '../types/thresholds.js';
import { createFinding, lowerConfidence, percent } from './finding.js';

export function detectHumongousAllocation(
  metrics: GcMetrics,
  thresholds: ThresholdConfig
): Finding | null {
  const { humongous } = metrics;

  if (humongous.perMinute <= thresholds.humongousPerMinute || humongous.coOccurringSpikes === 0) {
    return null;
  }

  // Share of humongous markers followed by a pause spike
  const share = humongous.coOccurringSpikes / humongous.count;
  let confidence: Confidence = share >= 0.5 ? 'high' : share >= 0.2 ? 'medium' : 'low';
  if (humongous.count < thresholds.minSamples) {
    confidence = lowerConfidence(confidence);
  }

  const evidence = [
    `Humongous allocations: ${humongous.count} (${humongous.perMinute.toFixed(2)}/min, threshold ${thresholds.humongousPerMinute}/min)`,
    `Followed by a pause >= ${thresholds.pauseSpikeMs} ms within ${humongous.spikeLagSeconds}s: ${humongous.coOccurringSpikes} of ${humongous.count} (${percent(share, 0)})`,
  ];
  if (humongous.peakRegions !== null) {
    evidence.push(`Peak humongous regions: ${humongous.peakRegions}`);
  }
  if (metrics.evacuationFailures > 0) {
    evidence.push(`Evacuation failures in window: ${metrics.evacuationFailures}`);
  }

  return createFinding('humongous-allocation', 'DETECTED', confidence, evidence, [
    'JFR recording (ObjectAllocationOutsideTLAB) to find the large array allocations',
    'Consider a larger region size (-XX:G1HeapRegionSize) so these objects are no longer humongous',
    'Reuse or chunk large buffers instead of allocating them per request',
  ]);
}
