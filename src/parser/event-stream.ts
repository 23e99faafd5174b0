/**
 * Event Stream Builder
 *
 * Turns classified lines into a time-ordered sequence of typed events keyed
 * by JVM uptime, then applies the trailing-window cut. The line source is
 * consumed exactly once.
 *
 * Records that describe one collection across several lines (start line,
 * region snapshots, metaspace) are held by GC id and merged when the pause
 * completion line of that collection arrives.
 */

import type { Logger } from 'pino';
import { createNoPausesError, createUnsupportedLogError, TriageError } from '../api/errors.js';
import { ANALYSIS } from '../config/defaults.js';
import {
  isPauseEvent,
  type AnalysisWindow,
  type CollectorName,
  type GcEvent,
  type GcPauseCategory,
  type GcPauseEvent,
  type HeapGeometry,
  type LineStats,
  type MetaspaceSampleEvent,
} from '../types/events.js';
import {
  classifyLine,
  type ClassifiedLine,
  type MetaspaceRecord,
  type PauseRecord,
} from './line-classifier.js';

export interface EventStreamOptions {
  /** Trailing window in minutes; unset analyzes the whole log */
  tailWindowMinutes?: number | null;
  logger?: Logger;
}

export interface EventStream {
  /** Events inside the analysis window, ordered by uptime */
  readonly events: readonly GcEvent[];
  readonly totalEvents: number;
  readonly window: AnalysisWindow;
  readonly heap: HeapGeometry;
  /** First collector identity in the file, regardless of the window */
  readonly collector: CollectorName | null;
  /** Whether any TLAB line appeared anywhere in the file */
  readonly tlabSeen: boolean;
  readonly lineStats: LineStats;
  readonly notes: readonly string[];
}

interface PendingCollection {
  oldBefore?: number;
  oldAfter?: number;
  humongousBefore?: number;
  humongousAfter?: number;
  metaspace: MetaspaceRecord[];
}

const METADATA_THRESHOLD = 'Metadata GC Threshold';

export class EventStreamBuilder {
  private readonly logger?: Logger;
  private readonly events: GcEvent[] = [];
  private readonly heap: HeapGeometry = { regionSizeMb: null, maxCapacityMb: null };

  // Per-segment collection state (GC ids restart with the JVM)
  private pending = new Map<number, PendingCollection>();
  private completed = new Set<number>();
  private metadataTriggered = new Set<number>();
  private evacFailureEmitted = new Set<number>();

  private segment = 0;
  private offset = 0;
  private segmentMaxUptime: number | null = null;
  private tlabSeen = false;
  private orphanedRecords = 0;
  private totalLines = 0;
  private classifiedLines = 0;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  /**
   * Classify and absorb one line. Unrecognized lines are counted and dropped.
   */
  public accept(line: string): void {
    this.totalLines++;
    const record = classifyLine(line, this.totalLines);
    if (!record) {
      return;
    }

    this.classifiedLines++;
    this.absorb(record);
  }

  /**
   * Finish the pass and cut the analysis window.
   *
   * @throws TriageError `EmptyOrUnsupportedLog` when no event was produced, or
   *   when a G1 (or unidentified) log has no GC pause
   */
  public build(options: Omit<EventStreamOptions, 'logger'> = {}): EventStream {
    const tailWindowMinutes = options.tailWindowMinutes ?? null;
    if (tailWindowMinutes !== null && (!Number.isFinite(tailWindowMinutes) || tailWindowMinutes <= 0)) {
      throw new TriageError('InvalidArguments', 'tail window must be a positive number of minutes', {
        tailWindowMinutes,
      });
    }

    this.flushSegment();

    if (this.events.length === 0) {
      throw createUnsupportedLogError(this.totalLines);
    }

    const ordered = [...this.events].sort((a, b) => a.uptimeSeconds - b.uptimeSeconds);

    let collector: CollectorName | null = null;
    for (const event of ordered) {
      if (event.category === 'CollectorIdentity') {
        collector = event.collector;
        break;
      }
    }

    // A legacy collector identity alone is still a verdict; a G1 log without
    // a single pause is not
    if ((collector === null || collector === 'G1') && !ordered.some(isPauseEvent)) {
      throw createNoPausesError(this.totalLines, collector);
    }

    const firstUptime = ordered[0].uptimeSeconds;
    const endUptime = ordered[ordered.length - 1].uptimeSeconds;
    const spanSeconds = endUptime - firstUptime;
    const notes: string[] = [];

    let window: AnalysisWindow;
    if (tailWindowMinutes === null) {
      window = { startUptime: firstUptime, endUptime, requestedMinutes: null, fallbackToFullLog: false };
    } else if (tailWindowMinutes * 60 >= spanSeconds) {
      window = {
        startUptime: firstUptime,
        endUptime,
        requestedMinutes: tailWindowMinutes,
        fallbackToFullLog: true,
      };
      notes.push(
        `Requested tail window of ${tailWindowMinutes} min covers the whole log ` +
          `(${(spanSeconds / 60).toFixed(1)} min of data); analyzing the full log`
      );
    } else {
      window = {
        startUptime: endUptime - tailWindowMinutes * 60,
        endUptime,
        requestedMinutes: tailWindowMinutes,
        fallbackToFullLog: false,
      };
    }

    if (this.segment > 0) {
      notes.push(
        `Uptime went backwards ${this.segment} time(s); later runs were appended to one continuous timeline`
      );
    }

    const events = ordered.filter((e) => e.uptimeSeconds >= window.startUptime);
    const lineStats: LineStats = {
      totalLines: this.totalLines,
      classifiedLines: this.classifiedLines,
      unclassifiedLines: this.totalLines - this.classifiedLines,
      orphanedRecords: this.orphanedRecords,
      segments: this.segment + 1,
    };

    this.logger?.debug({ lineStats, window, windowEvents: events.length }, 'Built event stream');

    return {
      events,
      totalEvents: ordered.length,
      window,
      heap: { ...this.heap },
      collector,
      tlabSeen: this.tlabSeen,
      lineStats,
      notes,
    };
  }

  private absorb(record: ClassifiedLine): void {
    const uptimeSeconds = this.toTimeline(record.uptimeSeconds);
    const base = { uptimeSeconds, lineNumber: record.lineNumber, segment: this.segment };

    switch (record.kind) {
      case 'heap-init':
        if (record.field === 'regionSize') {
          this.heap.regionSizeMb = record.sizeMb;
        } else {
          this.heap.maxCapacityMb = record.sizeMb;
        }
        return;

      case 'collector':
        this.events.push({ ...base, category: 'CollectorIdentity', collector: record.collector });
        return;

      case 'gc-start':
        if (record.causes.includes(METADATA_THRESHOLD)) {
          this.metadataTriggered.add(record.gcId);
        }
        this.pendingFor(record.gcId);
        return;

      case 'heap-regions': {
        const pending = this.pendingFor(record.gcId);
        if (record.space === 'old') {
          pending.oldBefore = record.before;
          pending.oldAfter = record.after;
        } else {
          pending.humongousBefore = record.before;
          pending.humongousAfter = record.after;
        }
        return;
      }

      case 'metaspace':
        if (this.completed.has(record.gcId)) {
          this.events.push(this.toMetaspaceEvent(record));
        } else {
          this.pendingFor(record.gcId).metaspace.push(record);
        }
        return;

      case 'tlab':
        this.tlabSeen = true;
        this.events.push({
          ...base,
          category: 'TLABSample',
          gcId: record.gcId,
          threads: record.threads,
          refills: record.refills,
          slowAllocs: record.slowAllocs,
        });
        return;

      case 'safepoint':
        this.events.push({
          ...base,
          category: 'SafepointMarker',
          operation: record.operation,
          timeToSafepointMs: record.timeToSafepointMs,
          totalMs: record.totalMs,
        });
        return;

      case 'to-space-exhausted':
        this.emitEvacFailure(record.gcId, uptimeSeconds, record.lineNumber);
        return;

      case 'pause':
        this.completePause(record, uptimeSeconds);
        return;
    }
  }

  private completePause(record: PauseRecord, uptimeSeconds: number): void {
    const pending = this.pending.get(record.gcId);
    this.pending.delete(record.gcId);
    this.completed.add(record.gcId);
    if (record.metadataThreshold) {
      this.metadataTriggered.add(record.gcId);
    }

    const base = { uptimeSeconds, lineNumber: record.lineNumber, segment: this.segment };

    if (record.humongousAllocation) {
      this.events.push({
        ...base,
        category: 'HumongousAlloc',
        gcId: record.gcId,
        humongousRegions: pending?.humongousBefore,
      });
    }

    if (record.evacuationFailure) {
      this.emitEvacFailure(record.gcId, uptimeSeconds, record.lineNumber);
    }

    for (const metaspace of pending?.metaspace ?? []) {
      this.events.push(this.toMetaspaceEvent(metaspace));
    }

    const event: GcPauseEvent = {
      ...base,
      category: toPauseCategory(record),
      gcId: record.gcId,
      pauseMs: record.pauseMs,
      pauseType: record.pauseType,
      causes: record.causes,
      heapBeforeMb: record.heapBeforeMb,
      heapAfterMb: record.heapAfterMb,
      heapTotalMb: record.heapTotalMb,
      evacuationFailure: record.evacuationFailure,
      oldRegionsBefore: pending?.oldBefore,
      oldRegionsAfter: pending?.oldAfter,
      humongousRegionsBefore: pending?.humongousBefore,
      humongousRegionsAfter: pending?.humongousAfter,
    };
    this.events.push(event);
  }

  private emitEvacFailure(gcId: number, uptimeSeconds: number, lineNumber: number): void {
    if (this.evacFailureEmitted.has(gcId)) {
      return;
    }
    this.evacFailureEmitted.add(gcId);
    this.events.push({ uptimeSeconds, lineNumber, segment: this.segment, category: 'EvacFailure', gcId });
  }

  private toMetaspaceEvent(record: MetaspaceRecord): MetaspaceSampleEvent {
    return {
      uptimeSeconds: record.uptimeSeconds + this.offset,
      lineNumber: record.lineNumber,
      segment: this.segment,
      category: 'MetaspaceSample',
      gcId: record.gcId,
      usedBeforeMb: record.usedBeforeMb,
      usedMb: record.usedMb,
      committedMb: record.committedMb,
      metadataThresholdTriggered: this.metadataTriggered.has(record.gcId),
    };
  }

  private pendingFor(gcId: number): PendingCollection {
    let pending = this.pending.get(gcId);
    if (!pending) {
      pending = { metaspace: [] };
      this.pending.set(gcId, pending);
    }
    return pending;
  }

  /**
   * Map a raw uptime onto the continuous timeline. A drop of more than
   * RESTART_TOLERANCE_SECONDS below the highest uptime seen so far is a
   * restarted JVM appending to the file and opens a new segment; smaller
   * drops are lines logged slightly out of order and keep their uptime.
   */
  private toTimeline(rawUptime: number): number {
    if (
      this.segmentMaxUptime !== null &&
      this.segmentMaxUptime - rawUptime > ANALYSIS.RESTART_TOLERANCE_SECONDS
    ) {
      const previousEnd = this.segmentMaxUptime + this.offset;
      this.flushSegment();
      this.segment++;
      this.offset = previousEnd;
      this.segmentMaxUptime = null;
      this.logger?.debug(
        { segment: this.segment, rawUptime, offset: this.offset },
        'Uptime went backwards; starting new segment'
      );
    }
    this.segmentMaxUptime = Math.max(this.segmentMaxUptime ?? rawUptime, rawUptime);
    return rawUptime + this.offset;
  }

  /**
   * Emit metaspace samples whose collection never completed and reset the
   * per-segment collection state.
   */
  private flushSegment(): void {
    for (const pending of this.pending.values()) {
      if (pending.metaspace.length > 0) {
        for (const metaspace of pending.metaspace) {
          this.events.push(this.toMetaspaceEvent(metaspace));
        }
      } else {
        this.orphanedRecords++;
      }
    }
    this.pending = new Map();
    this.completed = new Set();
    this.metadataTriggered = new Set();
    this.evacFailureEmitted = new Set();
  }
}

function toPauseCategory(record: PauseRecord): GcPauseCategory {
  switch (record.pauseType) {
    case 'Full':
      return 'FullGC';
    case 'Remark':
    case 'Cleanup':
      return 'ConcurrentCyclePause';
    default:
      return record.mixed ? 'MixedGC' : 'YoungGC';
  }
}

/**
 * Build an event stream from a synchronous line source.
 */
export function buildEventStream(lines: Iterable<string>, options: EventStreamOptions = {}): EventStream {
  const builder = new EventStreamBuilder(options.logger);
  for (const line of lines) {
    builder.accept(line);
  }
  return builder.build(options);
}

/**
 * Build an event stream from an asynchronous line source such as
 * `readline.Interface`.
 */
export async function buildEventStreamFromAsync(
  lines: AsyncIterable<string>,
  options: EventStreamOptions = {}
): Promise<EventStream> {
  const builder = new EventStreamBuilder(options.logger);
  for await (const line of lines) {
    builder.accept(line);
  }
  return builder.build(options);
}
