/**
 * GC Event Model
 *
 * Typed records produced from unified-logging lines. Every event carries the
 * JVM uptime as its canonical timestamp; wall-clock decorators are ignored.
 */

export type CollectorName = 'G1' | 'Parallel' | 'Serial' | 'ZGC' | 'Shenandoah' | 'CMS';

export type GcPauseCategory = 'YoungGC' | 'MixedGC' | 'FullGC' | 'ConcurrentCyclePause';

export type EventCategory =
  | GcPauseCategory
  | 'HumongousAlloc'
  | 'EvacFailure'
  | 'MetaspaceSample'
  | 'TLABSample'
  | 'CollectorIdentity'
  | 'SafepointMarker';

interface EventBase {
  /** Uptime on the continuous timeline (rebased across segments) */
  uptimeSeconds: number;
  lineNumber: number;
  /** Logical segment index; increments when uptime goes backwards */
  segment: number;
}

export interface GcPauseEvent extends EventBase {
  category: GcPauseCategory;
  gcId: number;
  pauseMs: number;
  /** e.g. "Young", "Full", "Remark" */
  pauseType: string;
  /** Parenthesised tags after the pause type, e.g. ["Normal", "G1 Evacuation Pause"] */
  causes: string[];
  heapBeforeMb: number;
  heapAfterMb: number;
  heapTotalMb: number;
  evacuationFailure: boolean;
  oldRegionsBefore?: number;
  oldRegionsAfter?: number;
  humongousRegionsBefore?: number;
  humongousRegionsAfter?: number;
}

export interface HumongousAllocEvent extends EventBase {
  category: 'HumongousAlloc';
  gcId: number;
  humongousRegions?: number;
}

export interface EvacFailureEvent extends EventBase {
  category: 'EvacFailure';
  gcId: number;
}

export interface MetaspaceSampleEvent extends EventBase {
  category: 'MetaspaceSample';
  gcId: number;
  usedBeforeMb: number;
  usedMb: number;
  committedMb: number | null;
  metadataThresholdTriggered: boolean;
}

export interface TlabSampleEvent extends EventBase {
  category: 'TLABSample';
  gcId: number | null;
  threads: number;
  refills: number;
  slowAllocs: number;
}

export interface CollectorIdentityEvent extends EventBase {
  category: 'CollectorIdentity';
  collector: CollectorName;
}

export interface SafepointMarkerEvent extends EventBase {
  category: 'SafepointMarker';
  operation: string;
  timeToSafepointMs: number;
  totalMs: number;
}

export type GcEvent =
  | GcPauseEvent
  | HumongousAllocEvent
  | EvacFailureEvent
  | MetaspaceSampleEvent
  | TlabSampleEvent
  | CollectorIdentityEvent
  | SafepointMarkerEvent;

const PAUSE_CATEGORIES: ReadonlySet<EventCategory> = new Set<EventCategory>([
  'YoungGC',
  'MixedGC',
  'FullGC',
  'ConcurrentCyclePause',
]);

export function isPauseEvent(event: GcEvent): event is GcPauseEvent {
  return PAUSE_CATEGORIES.has(event.category);
}

/**
 * Young, mixed and full collections; excludes remark/cleanup pauses of the
 * concurrent cycle.
 */
export function isCollectionEvent(event: GcEvent): event is GcPauseEvent {
  return (
    event.category === 'YoungGC' || event.category === 'MixedGC' || event.category === 'FullGC'
  );
}

/**
 * Heap geometry announced once at JVM startup.
 */
export interface HeapGeometry {
  regionSizeMb: number | null;
  maxCapacityMb: number | null;
}

/**
 * Analysis window on the continuous uptime timeline (seconds, both inclusive)
 */
export interface AnalysisWindow {
  startUptime: number;
  endUptime: number;
  /** Requested trailing window, null when the whole log was requested */
  requestedMinutes: number | null;
  /** True when the requested window was at least the data span */
  fallbackToFullLog: boolean;
}

export interface LineStats {
  totalLines: number;
  classifiedLines: number;
  unclassifiedLines: number;
  /** Heap-region or start records whose pause line never appeared */
  orphanedRecords: number;
  segments: number;
}
