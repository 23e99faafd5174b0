/**
 * Helpers shared by the suspect detectors.
 */

import {
  SUSPECT_TITLES,
  type Confidence,
  type Finding,
  type FindingStatus,
  type SuspectId,
} from '../types/findings.js';
import type { GcMetrics } from '../types/metrics.js';
import type { ThresholdConfig } from '../types/thresholds.js';

/**
 * A detector reads the aggregated metrics and an explicit threshold set and
 * produces at most one finding.
 */
export type Detector = (metrics: GcMetrics, thresholds: ThresholdConfig) => Finding | null;

export function createFinding(
  suspectId: SuspectId,
  status: FindingStatus,
  confidence: Confidence,
  evidence: string[],
  nextSteps: string[],
  note?: string
): Finding {
  const finding: Finding = {
    suspectId,
    title: SUSPECT_TITLES[suspectId],
    status,
    confidence,
    evidence: Object.freeze([...evidence]),
    nextSteps: Object.freeze([...nextSteps]),
    ...(note !== undefined && { note }),
  };
  return Object.freeze(finding);
}

/**
 * Step confidence down one level (sparse data never suppresses a finding).
 */
export function lowerConfidence(confidence: Confidence): Confidence {
  return confidence === 'high' ? 'medium' : 'low';
}

export function minutes(seconds: number): string {
  return (seconds / 60).toFixed(1);
}

export function percent(ratio: number, decimals = 1): string {
  return `${(ratio * 100).toFixed(decimals)}%`;
}
