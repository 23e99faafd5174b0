/**
 * Finding Model
 *
 * One finding per suspect, created by exactly one detector and never
 * modified afterwards.
 */

export type SuspectId =
  | 'allocation-pressure'
  | 'humongous-allocation'
  | 'long-stw-pauses'
  | 'gc-starvation'
  | 'metaspace-leak'
  | 'tlab-exhaustion'
  | 'wrong-collector'
  | 'retention-growth';

/**
 * Fixed catalog order; findings are always reported in this order.
 */
export const SUSPECT_CATALOG: readonly SuspectId[] = [
  'allocation-pressure',
  'humongous-allocation',
  'long-stw-pauses',
  'gc-starvation',
  'metaspace-leak',
  'tlab-exhaustion',
  'wrong-collector',
  'retention-growth',
] as const;

export const SUSPECT_TITLES: Readonly<Record<SuspectId, string>> = {
  'allocation-pressure': 'Allocation Pressure',
  'humongous-allocation': 'Humongous Allocation Pressure',
  'long-stw-pauses': 'Long STW Pauses',
  'gc-starvation': 'GC Starvation / Finalizer Backlog',
  'metaspace-leak': 'Metaspace Leak',
  'tlab-exhaustion': 'TLAB Exhaustion',
  'wrong-collector': 'Wrong Collector Choice',
  'retention-growth': 'Retention Growth',
};

export type FindingStatus = 'DETECTED' | 'SUSPECTED' | 'NONE';

export type Confidence = 'low' | 'medium' | 'high';

export type Severity = 'OK' | 'WARNING' | 'CRITICAL';

export interface Finding {
  readonly suspectId: SuspectId;
  readonly title: string;
  readonly status: FindingStatus;
  readonly confidence: Confidence;
  readonly evidence: readonly string[];
  readonly nextSteps: readonly string[];
  /** Interpretation hint shown under the evidence */
  readonly note?: string;
}

export function isFiring(finding: Finding): boolean {
  return finding.status === 'DETECTED' || finding.status === 'SUSPECTED';
}
