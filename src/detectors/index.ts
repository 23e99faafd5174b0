/**
 * Suspect Detectors
 *
 * Run in fixed catalog order so the finding set is stable across runs.
 */

import type { Finding } from '../types/findings.js';
import type { GcMetrics } from '../types/metrics.js';
import type { ThresholdConfig } from '../types/thresholds.js';
import { detectAllocationPressure } from './allocation-pressure.js';
import type { Detector } from './finding.js';
import { detectGcStarvation } from './gc-starvation.js';
import { detectHumongousAllocation } from './humongous-allocation.js';
import { detectLongStwPauses } from './long-stw-pauses.js';
import { detectMetaspaceLeak } from './metaspace-leak.js';
import { detectRetentionGrowth } from './retention-growth.js';
import { detectTlabExhaustion } from './tlab-exhaustion.js';
import { detectWrongCollector } from './wrong-collector.js';

export const DETECTORS: readonly Detector[] = [
  detectAllocationPressure,
  detectHumongousAllocation,
  detectLongStwPauses,
  detectGcStarvation,
  detectMetaspaceLeak,
  detectTlabExhaustion,
  detectWrongCollector,
  detectRetentionGrowth,
];

export function runDetectors(metrics: GcMetrics, thresholds: ThresholdConfig): Finding[] {
  const findings: Finding[] = [];
  for (const detector of DETECTORS) {
    const finding = detector(metrics, thresholds);
    if (finding) {
      findings.push(finding);
    }
  }
  return findings;
}

export { createFinding, lowerConfidence } from './finding.js';
export type { Detector } from './finding.js';
export { detectAllocationPressure } from './allocation-pressure.js';
export { detectHumongousAllocation } from './humongous-allocation.js';
export { detectLongStwPauses } from './long-stw-pauses.js';
export { detectGcStarvation } from './gc-starvation.js';
export { detectMetaspaceLeak } from './metaspace-leak.js';
export { detectTlabExhaustion, TLAB_UNAVAILABLE_EVIDENCE } from './tlab-exhaustion.js';
export { detectWrongCollector, isLegacyCollector } from './wrong-collector.js';
export { detectRetentionGrowth, RETENTION_NOTE } from './retention-growth.js';
