/**
 * Wrong Collector Detector
 */

import type { Finding } from '../types/findings.js';
import type { CollectorName } from '../types/events.js';
import type { GcMetrics } from '../types/metrics.js';
import type { ThresholdConfig } from '../types/thresholds.js';
import { createFinding } from './finding.js';

const LEGACY_COLLECTORS: ReadonlySet<CollectorName> = new Set(['Serial', 'Parallel']);

export function isLegacyCollector(name: CollectorName): boolean {
  return LEGACY_COLLECTORS.has(name);
}

export function detectWrongCollector(metrics: GcMetrics, _thresholds: ThresholdConfig): Finding | null {
  const { collector } = metrics;

  if (!isLegacyCollector(collector.name)) {
    return null;
  }

  return createFinding(
    'wrong-collector',
    'DETECTED',
    'high',
    [
      `Collector: ${collector.name}`,
      `${collector.name} collects the old generation in one stop-the-world pause`,
    ],
    [
      'Switch to G1 (-XX:+UseG1GC) unless this is a throughput-only batch workload',
      'Check JVM flags and container memory: a small heap or a single CPU makes the JVM pick Serial',
    ]
  );
}
