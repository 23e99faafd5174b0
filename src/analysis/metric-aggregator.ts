/**
 * Metric Aggregator
 *
 * Consumes the windowed event stream once and produces the immutable metric
 * set the detectors read. Sparse data still yields metrics; the detectors
 * lower confidence instead.
 *
 * Trend fitting uses ordinary least squares over every windowed sample
 * (x = uptime in minutes), which reduces to the first-to-last delta when only
 * two samples exist.
 */

import type { Logger } from 'pino';
import { ANALYSIS } from '../config/defaults.js';
import type { EventStream } from '../parser/event-stream.js';
import {
  isCollectionEvent,
  isPauseEvent,
  type GcPauseEvent,
  type HumongousAllocEvent,
  type MetaspaceSampleEvent,
} from '../types/events.js';
import type {
  CollectorMetrics,
  GcMetrics,
  HumongousMetrics,
  InterGcGapMetrics,
  MetaspaceMetrics,
  OldGenMetrics,
  OldGenSample,
  PauseMetrics,
  PauseRef,
  TlabMetrics,
  TrendFit,
  YoungIntervalMetrics,
} from '../types/metrics.js';
import type { ThresholdConfig } from '../types/thresholds.js';
import {
  linearFit,
  median,
  percentile,
  safeAverage,
  safeDivide,
  safeSum,
  standardDeviation,
  type Point,
} from '../utils/math-helpers.js';

export type AggregationThresholds = Pick<
  ThresholdConfig,
  'longPauseMs' | 'pauseSpikeMs' | 'humongousSpikeLagSeconds'
>;

const METADATA_THRESHOLD = 'Metadata GC Threshold';

/**
 * Fit a growth trend (units per minute) over time-ordered samples.
 * Returns null with fewer than two samples.
 */
export function fitTrend(points: readonly Point[]): TrendFit | null {
  if (points.length < 2) {
    return null;
  }

  const first = points[0];
  const last = points[points.length - 1];
  return {
    ratePerMinute: linearFit(points).slope,
    samples: points.length,
    first: first.y,
    last: last.y,
    delta: last.y - first.y,
    spanMinutes: last.x - first.x,
  };
}

export function aggregateMetrics(
  stream: EventStream,
  thresholds: AggregationThresholds,
  logger?: Logger
): GcMetrics {
  const pauses: GcPauseEvent[] = [];
  const collections: GcPauseEvent[] = [];
  const youngEvents: GcPauseEvent[] = [];
  const humongousMarkers: HumongousAllocEvent[] = [];
  const metaspaceSamples: MetaspaceSampleEvent[] = [];
  const oldGenPoints: Point[] = [];
  const oldGenSamples: OldGenSample[] = [];
  const metadataTriggered = new Set<string>();

  let mixedGc = 0;
  let fullGc = 0;
  let concurrentPauses = 0;
  let evacFailures = 0;
  let tlabSamples = 0;
  let tlabSlowAllocs = 0;
  let safepoints = 0;
  let maxTimeToSafepointMs = 0;
  let maxSafepointTotalMs = 0;

  for (const event of stream.events) {
    if (isPauseEvent(event)) {
      pauses.push(event);
      if (event.causes.includes(METADATA_THRESHOLD)) {
        metadataTriggered.add(`${event.segment}:${event.gcId}`);
      }
      if (isCollectionEvent(event)) {
        collections.push(event);
        if (event.oldRegionsAfter !== undefined) {
          oldGenPoints.push({ x: event.uptimeSeconds / 60, y: event.oldRegionsAfter });
          oldGenSamples.push({
            lineNumber: event.lineNumber,
            uptimeSeconds: event.uptimeSeconds,
            regions: event.oldRegionsAfter,
          });
        }
      }
    }

    switch (event.category) {
      case 'YoungGC':
        youngEvents.push(event);
        break;
      case 'MixedGC':
        mixedGc++;
        break;
      case 'FullGC':
        fullGc++;
        break;
      case 'ConcurrentCyclePause':
        concurrentPauses++;
        break;
      case 'HumongousAlloc':
        humongousMarkers.push(event);
        break;
      case 'EvacFailure':
        evacFailures++;
        break;
      case 'MetaspaceSample':
        metaspaceSamples.push(event);
        if (event.metadataThresholdTriggered) {
          metadataTriggered.add(`${event.segment}:${event.gcId}`);
        }
        break;
      case 'TLABSample':
        tlabSamples++;
        tlabSlowAllocs += event.slowAllocs;
        break;
      case 'SafepointMarker':
        safepoints++;
        maxTimeToSafepointMs = Math.max(maxTimeToSafepointMs, event.timeToSafepointMs);
        maxSafepointTotalMs = Math.max(maxSafepointTotalMs, event.totalMs);
        break;
      case 'CollectorIdentity':
        break;
    }
  }

  const spanSeconds = stream.window.endUptime - stream.window.startUptime;
  const spanMinutes = spanSeconds / 60;
  const capacityRegions = computeCapacityRegions(stream);
  const notes = [...stream.notes];

  const collector = resolveCollector(stream, notes);
  const totalPauseMs = safeSum(pauses.map((p) => p.pauseMs));
  const lastPause = pauses.length > 0 ? pauses[pauses.length - 1] : null;
  const heapCapacityMb = stream.heap.maxCapacityMb ?? lastPause?.heapTotalMb ?? null;

  const metrics: GcMetrics = {
    window: stream.window,
    sampleCounts: {
      youngGc: youngEvents.length,
      mixedGc,
      fullGc,
      concurrentPauses,
      humongous: humongousMarkers.length,
      evacFailures,
      metaspace: metaspaceSamples.length,
      tlab: tlabSamples,
      safepoints,
      oldGen: oldGenPoints.length,
    },
    youngInterval: computeYoungInterval(youngEvents),
    gcTime: {
      totalPauseMs,
      spanSeconds,
      ratio: safeDivide(totalPauseMs / 1_000, spanSeconds),
    },
    pauses: computePauses(pauses, thresholds.longPauseMs),
    oldGen: computeOldGen(oldGenPoints, oldGenSamples, mixedGc + fullGc, capacityRegions),
    metaspace: computeMetaspace(metaspaceSamples, metadataTriggered.size),
    humongous: computeHumongous(humongousMarkers, pauses, spanMinutes, thresholds),
    tlab: computeTlab(stream.tlabSeen, tlabSamples, tlabSlowAllocs, spanMinutes),
    evacuationFailures: evacFailures,
    interGcGap: computeInterGcGap(collections, capacityRegions, heapCapacityMb),
    collector,
    safepoints: { count: safepoints, maxTimeToSafepointMs, maxTotalMs: maxSafepointTotalMs },
    heap: {
      regionSizeMb: stream.heap.regionSizeMb,
      maxCapacityMb: stream.heap.maxCapacityMb,
      lastHeapAfterMb: lastPause?.heapAfterMb ?? null,
      occupancyPct:
        lastPause && heapCapacityMb ? (lastPause.heapAfterMb / heapCapacityMb) * 100 : null,
    },
    notes,
  };

  logger?.debug(
    { sampleCounts: metrics.sampleCounts, spanSeconds, collector: collector.name },
    'Aggregated GC metrics'
  );

  return Object.freeze(metrics);
}

function computeCapacityRegions(stream: EventStream): number | null {
  const { regionSizeMb, maxCapacityMb } = stream.heap;
  if (!regionSizeMb || !maxCapacityMb) {
    return null;
  }
  return Math.floor(maxCapacityMb / regionSizeMb);
}

function resolveCollector(stream: EventStream, notes: string[]): CollectorMetrics {
  if (!stream.collector) {
    notes.push('No collector identity line found; assuming G1');
    return { name: 'G1', explicit: false };
  }

  if (stream.collector === 'ZGC' || stream.collector === 'Shenandoah') {
    notes.push(`Log comes from ${stream.collector}, not G1; most G1 figures will be missing`);
  }
  return { name: stream.collector, explicit: true };
}

function computeYoungInterval(youngEvents: readonly GcPauseEvent[]): YoungIntervalMetrics | null {
  const intervals: number[] = [];
  for (let i = 1; i < youngEvents.length; i++) {
    const previous = youngEvents[i - 1];
    const current = youngEvents[i];
    if (previous.segment === current.segment) {
      intervals.push(current.uptimeSeconds - previous.uptimeSeconds);
    }
  }

  if (intervals.length === 0) {
    return null;
  }

  const meanSeconds = safeAverage(intervals);
  return {
    intervals: intervals.length,
    medianSeconds: median(intervals),
    p99Seconds: percentile(intervals, 99),
    meanSeconds,
    cv: safeDivide(standardDeviation(intervals), meanSeconds),
  };
}

function computePauses(pauses: readonly GcPauseEvent[], longPauseMs: number): PauseMetrics {
  const values = pauses.map((p) => p.pauseMs);
  const qualifying = pauses.filter((p) => p.pauseMs >= longPauseMs);

  const longest: PauseRef[] = [...qualifying]
    .sort((a, b) => b.pauseMs - a.pauseMs || a.uptimeSeconds - b.uptimeSeconds)
    .slice(0, ANALYSIS.MAX_PAUSE_EVIDENCE)
    .map((p) => ({
      uptimeSeconds: p.uptimeSeconds,
      pauseMs: p.pauseMs,
      category: p.category,
      gcId: p.gcId,
      lineNumber: p.lineNumber,
    }));

  return {
    count: values.length,
    p99Ms: percentile(values, 99),
    maxMs: values.reduce((max, v) => Math.max(max, v), 0),
    longPauseThresholdMs: longPauseMs,
    longPauseCount: qualifying.length,
    longest,
  };
}

function computeOldGen(
  points: readonly Point[],
  samples: readonly OldGenSample[],
  mixedOrFullCollections: number,
  capacityRegions: number | null
): OldGenMetrics {
  const trend = fitTrend(points);

  let nonDecreasing = 0;
  for (let i = 1; i < points.length; i++) {
    if (points[i].y >= points[i - 1].y) {
      nonDecreasing++;
    }
  }

  const currentRegions = points.length > 0 ? points[points.length - 1].y : null;
  const currentOccupancyPct =
    capacityRegions && currentRegions !== null ? (currentRegions / capacityRegions) * 100 : null;

  let minutesTo90Pct: number | null = null;
  if (capacityRegions && currentRegions !== null && trend && trend.ratePerMinute > 0) {
    const target = (capacityRegions * ANALYSIS.PROJECTION_OCCUPANCY_PCT) / 100;
    minutesTo90Pct = Math.max(0, (target - currentRegions) / trend.ratePerMinute);
  }

  const half = ANALYSIS.MAX_TREND_EVIDENCE / 2;
  const quotedSamples =
    samples.length <= ANALYSIS.MAX_TREND_EVIDENCE
      ? [...samples]
      : [...samples.slice(0, half), ...samples.slice(samples.length - half)];

  return {
    samples: points.length,
    quotedSamples,
    trend,
    mixedOrFullCollections,
    nonDecreasingShare: points.length > 1 ? nonDecreasing / (points.length - 1) : 0,
    capacityRegions,
    currentRegions,
    currentOccupancyPct,
    minutesTo90Pct,
  };
}

function computeMetaspace(
  samples: readonly MetaspaceSampleEvent[],
  metadataTriggeredCollections: number
): MetaspaceMetrics {
  let increasingSteps = 0;
  for (let i = 1; i < samples.length; i++) {
    if (samples[i].usedMb > samples[i - 1].usedMb) {
      increasingSteps++;
    }
  }

  const last = samples.length > 0 ? samples[samples.length - 1] : null;
  return {
    samples: samples.length,
    trend: fitTrend(samples.map((s) => ({ x: s.uptimeSeconds / 60, y: s.usedMb }))),
    increasingSteps,
    steps: Math.max(0, samples.length - 1),
    metadataTriggeredCollections,
    lastCommittedMb: last?.committedMb ?? null,
  };
}

function computeHumongous(
  markers: readonly HumongousAllocEvent[],
  pauses: readonly GcPauseEvent[],
  spanMinutes: number,
  thresholds: AggregationThresholds
): HumongousMetrics {
  let peakRegions: number | null = null;
  for (const marker of markers) {
    if (marker.humongousRegions !== undefined) {
      peakRegions = Math.max(peakRegions ?? 0, marker.humongousRegions);
    }
  }
  for (const pause of pauses) {
    if (pause.humongousRegionsBefore !== undefined) {
      peakRegions = Math.max(peakRegions ?? 0, pause.humongousRegionsBefore);
    }
  }

  // Both sequences are ordered by uptime
  let coOccurringSpikes = 0;
  let cursor = 0;
  for (const marker of markers) {
    while (cursor < pauses.length && pauses[cursor].uptimeSeconds < marker.uptimeSeconds) {
      cursor++;
    }
    const limit = marker.uptimeSeconds + thresholds.humongousSpikeLagSeconds;
    for (let i = cursor; i < pauses.length && pauses[i].uptimeSeconds <= limit; i++) {
      if (pauses[i].pauseMs >= thresholds.pauseSpikeMs) {
        coOccurringSpikes++;
        break;
      }
    }
  }

  return {
    count: markers.length,
    perMinute: safeDivide(markers.length, spanMinutes),
    peakRegions,
    coOccurringSpikes,
    spikeLagSeconds: thresholds.humongousSpikeLagSeconds,
  };
}

function computeTlab(
  tlabSeen: boolean,
  samples: number,
  slowAllocs: number,
  spanMinutes: number
): TlabMetrics {
  if (!tlabSeen) {
    return { available: false };
  }
  return { available: true, samples, slowAllocs, perMinute: safeDivide(slowAllocs, spanMinutes) };
}

function computeInterGcGap(
  collections: readonly GcPauseEvent[],
  capacityRegions: number | null,
  heapCapacityMb: number | null
): InterGcGapMetrics | null {
  if (collections.length < 2) {
    return null;
  }

  let gapStart = collections[0];
  let maxGapSeconds = -1;
  for (let i = 1; i < collections.length; i++) {
    const gap = collections[i].uptimeSeconds - collections[i - 1].uptimeSeconds;
    if (gap > maxGapSeconds) {
      maxGapSeconds = gap;
      gapStart = collections[i - 1];
    }
  }

  const oldRegionsAtStart = gapStart.oldRegionsAfter ?? null;
  if (oldRegionsAtStart !== null && capacityRegions) {
    return {
      maxGapSeconds,
      gapStartUptime: gapStart.uptimeSeconds,
      oldRegionsAtStart,
      occupancyPctAtStart: (oldRegionsAtStart / capacityRegions) * 100,
      occupancySource: 'old-regions',
    };
  }

  const capacityMb = heapCapacityMb ?? gapStart.heapTotalMb;
  return {
    maxGapSeconds,
    gapStartUptime: gapStart.uptimeSeconds,
    oldRegionsAtStart,
    occupancyPctAtStart: capacityMb > 0 ? (gapStart.heapAfterMb / capacityMb) * 100 : null,
    occupancySource: 'heap',
  };
}
