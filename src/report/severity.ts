/**
 * Severity and exit code mapping
 */

import { ANALYSIS } from '../config/defaults.js';
import { isLegacyCollector } from '../detectors/wrong-collector.js';
import { isFiring, type Finding, type Severity } from '../types/findings.js';
import type { GcMetrics } from '../types/metrics.js';

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  /** No finding DETECTED or SUSPECTED */
  OK: 0,
  /** Findings, none critical */
  FINDINGS: 1,
  /** At least one critical condition */
  CRITICAL: 2,
  /** Bad arguments, unreadable input or unsupported log */
  FAILURE: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function isHeapOccupancyCritical(metrics: GcMetrics): boolean {
  const { occupancyPct } = metrics.heap;
  return occupancyPct !== null && occupancyPct > ANALYSIS.CRITICAL_HEAP_OCCUPANCY_PCT;
}

export function computeSeverity(finding: Finding, metrics: GcMetrics): Severity {
  if (!isFiring(finding)) {
    return 'OK';
  }

  const critical =
    (finding.suspectId === 'wrong-collector' && isLegacyCollector(metrics.collector.name)) ||
    (finding.suspectId === 'retention-growth' && finding.confidence === 'high') ||
    (finding.suspectId === 'allocation-pressure' && finding.confidence === 'high') ||
    isHeapOccupancyCritical(metrics);

  return critical ? 'CRITICAL' : 'WARNING';
}

export function computeExitCode(findings: readonly Finding[], metrics: GcMetrics): ExitCode {
  const firing = findings.filter(isFiring);
  if (firing.length === 0) {
    return EXIT_CODES.OK;
  }
  return firing.some((f) => computeSeverity(f, metrics) === 'CRITICAL')
    ? EXIT_CODES.CRITICAL
    : EXIT_CODES.FINDINGS;
}
