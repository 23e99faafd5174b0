/**
 * Metaspace Leak Detector
 *
 * Growth must be sustained: at least three samples and a majority of
 * increasing steps, so a single class-loading burst does not fire.
 */

import type { Confidence, Finding } from '../types/findings.js';
import type { GcMetrics } from '../types/metrics.js';
import type { ThresholdConfig } from '../types/thresholds.js';
import { createFinding, percent } from './finding.js';

const MIN_SUSTAINED_SAMPLES = 3;

export function detectMetaspaceLeak(metrics: GcMetrics, thresholds: ThresholdConfig): Finding | null {
  const { metaspace } = metrics;
  const { trend } = metaspace;

  if (trend === null || trend.ratePerMinute <= thresholds.metaspaceGrowthMbPerMinute) {
    return null;
  }

  const increasingShare = metaspace.steps > 0 ? metaspace.increasingSteps / metaspace.steps : 0;
  const sustained =
    metaspace.samples >= MIN_SUSTAINED_SAMPLES && increasingShare >= thresholds.sustainedGrowthShare;
  if (!sustained) {
    return null;
  }

  let confidence: Confidence = 'low';
  if (metaspace.samples >= thresholds.minSamples) {
    confidence = metaspace.metadataTriggeredCollections > 0 ? 'high' : 'medium';
  }

  const evidence = [
    `Metaspace growth: ${trend.ratePerMinute.toFixed(2)} MB/min (threshold ${thresholds.metaspaceGrowthMbPerMinute} MB/min)`,
    `Metaspace used: ${trend.first.toFixed(1)} MB -> ${trend.last.toFixed(1)} MB over ${trend.spanMinutes.toFixed(1)} min`,
    `Increasing samples: ${metaspace.increasingSteps} of ${metaspace.steps} steps (${percent(increasingShare, 0)})`,
    `Metadata GC Threshold collections: ${metaspace.metadataTriggeredCollections}`,
  ];
  if (metaspace.lastCommittedMb !== null) {
    evidence.push(`Metaspace committed: ${metaspace.lastCommittedMb.toFixed(1)} MB`);
  }

  return createFinding('metaspace-leak', 'DETECTED', confidence, evidence, [
    'jcmd <pid> VM.classloader_stats (look for class loaders that keep growing)',
    'jcmd <pid> GC.class_stats or VM.metaspace to find the classes filling metaspace',
    'Check for dynamic proxies, generated classes or redeployed class loaders that are never released',
  ]);
}
