/**
 * Line Classifier
 *
 * Recognizes the semantic category of one unified-logging line and extracts
 * a typed record. Decorators (`[time][uptime][level][tags]`) are read in any
 * order; only the uptime decorator is required. Anything that does not match
 * a known pattern, or matches with truncated fields, is unclassified (null).
 */

import type { CollectorName } from '../types/events.js';

interface RecordBase {
  uptimeSeconds: number;
  lineNumber: number;
}

export interface PauseRecord extends RecordBase {
  kind: 'pause';
  gcId: number;
  /** `Mixed` and `Initial Mark` are the JDK 9-11 spellings */
  pauseType: 'Young' | 'Mixed' | 'Initial Mark' | 'Full' | 'Remark' | 'Cleanup';
  causes: string[];
  mixed: boolean;
  evacuationFailure: boolean;
  humongousAllocation: boolean;
  metadataThreshold: boolean;
  heapBeforeMb: number;
  heapAfterMb: number;
  heapTotalMb: number;
  pauseMs: number;
}

export interface GcStartRecord extends RecordBase {
  kind: 'gc-start';
  gcId: number;
  pauseType: string;
  causes: string[];
}

export interface HeapRegionsRecord extends RecordBase {
  kind: 'heap-regions';
  gcId: number;
  space: 'old' | 'humongous';
  before: number;
  after: number;
}

export interface MetaspaceRecord extends RecordBase {
  kind: 'metaspace';
  gcId: number;
  usedBeforeMb: number;
  usedMb: number;
  committedMb: number | null;
}

export interface TlabRecord extends RecordBase {
  kind: 'tlab';
  gcId: number | null;
  threads: number;
  refills: number;
  slowAllocs: number;
}

export interface CollectorRecord extends RecordBase {
  kind: 'collector';
  collector: CollectorName;
}

export interface SafepointRecord extends RecordBase {
  kind: 'safepoint';
  operation: string;
  timeToSafepointMs: number;
  totalMs: number;
}

export interface ToSpaceExhaustedRecord extends RecordBase {
  kind: 'to-space-exhausted';
  gcId: number;
}

export interface HeapInitRecord extends RecordBase {
  kind: 'heap-init';
  field: 'regionSize' | 'maxCapacity';
  sizeMb: number;
}

export type ClassifiedLine =
  | PauseRecord
  | GcStartRecord
  | HeapRegionsRecord
  | MetaspaceRecord
  | TlabRecord
  | CollectorRecord
  | SafepointRecord
  | ToSpaceExhaustedRecord
  | HeapInitRecord;

export interface Decorators {
  uptimeSeconds: number | null;
  level: string | null;
  tags: string[];
  message: string;
}

const DECORATOR_PREFIX = /^((?:\s*\[[^\]]*\])+)\s*(.*)$/;
const DECORATOR = /\[([^\]]*)\]/g;
const UPTIME_SECONDS = /^(\d+(?:[.,]\d+)?)s$/;
const UPTIME_MILLIS = /^(\d+)ms$/;
const UPTIME_NANOS = /^(\d+)ns$/;
const LEVEL = /^(trace|debug|info|warning|error)$/;
const TAGS = /^[a-z][a-z0-9_]*(?:,[a-z0-9_]+)*$/;

export const PAUSE_LINE_PATTERN =
  /GC\((\d+)\)\s+Pause\s+(Young|Mixed|Initial Mark|Full|Remark|Cleanup)\b(.*?)\s+(\d+(?:\.\d+)?)([BKMG])->(\d+(?:\.\d+)?)([BKMG])\((\d+(?:\.\d+)?)([BKMG])\)\s+(\d+(?:\.\d+)?)ms\s*$/;
const GC_START_PATTERN = /GC\((\d+)\)\s+Pause\s+(Young|Mixed|Initial Mark|Full|Remark|Cleanup)\b(.*)$/;
export const HEAP_REGIONS_PATTERN = /GC\((\d+)\)\s+(Old|Humongous) regions:\s*(\d+)->(\d+)/;
export const METASPACE_PATTERN =
  /GC\((\d+)\)\s+Metaspace:\s*(\d+)([BKMG])(?:\((\d+)([BKMG])\))?->(\d+)([BKMG])(?:\((\d+)([BKMG])\))?/;
export const TLAB_PATTERN = /TLAB totals:\s*thrds:\s*(\d+)\s+refills:\s*(\d+).*?slow allocs:\s*(\d+)/;
const GC_ID = /GC\((\d+)\)/;
const COLLECTOR_PATTERN =
  /^Using (G1|Parallel|Serial|The Z Garbage Collector|Shenandoah|Concurrent Mark Sweep)\b/;
const SAFEPOINT_PATTERN = /Safepoint "([^"]+)".*?Reaching safepoint:\s*(\d+)\s*ns.*?Total:\s*(\d+)\s*ns/;
const TO_SPACE_PATTERN = /GC\((\d+)\)\s+To-space exhausted/;
const REGION_SIZE_PATTERN = /Heap Region Size:\s*(\d+)([BKMG])\b/i;
const MAX_CAPACITY_PATTERN = /Heap Max Capacity:\s*(\d+)([BKMG])\b/i;

const COLLECTOR_NAMES: Readonly<Record<string, CollectorName>> = {
  G1: 'G1',
  Parallel: 'Parallel',
  Serial: 'Serial',
  'The Z Garbage Collector': 'ZGC',
  Shenandoah: 'Shenandoah',
  'Concurrent Mark Sweep': 'CMS',
};

/**
 * Convert a unified-logging size (`22M`, `1056768K`, `4G`) to megabytes.
 */
export function toMegabytes(value: number, unit: string): number {
  switch (unit) {
    case 'B':
      return value / (1024 * 1024);
    case 'K':
      return value / 1024;
    case 'G':
      return value * 1024;
    default:
      return value;
  }
}

/**
 * Split the leading decorators from the message body.
 */
export function parseDecorators(text: string): Decorators | null {
  const match = DECORATOR_PREFIX.exec(text);
  if (!match) {
    return null;
  }

  let uptimeSeconds: number | null = null;
  let level: string | null = null;
  let tags: string[] = [];

  for (const [, raw] of match[1].matchAll(DECORATOR)) {
    const value = raw.trim();

    if (uptimeSeconds === null) {
      const seconds = UPTIME_SECONDS.exec(value);
      if (seconds) {
        uptimeSeconds = Number(seconds[1].replace(',', '.'));
        continue;
      }
      const millis = UPTIME_MILLIS.exec(value);
      if (millis) {
        uptimeSeconds = Number(millis[1]) / 1_000;
        continue;
      }
      const nanos = UPTIME_NANOS.exec(value);
      if (nanos) {
        uptimeSeconds = Number(nanos[1]) / 1_000_000_000;
        continue;
      }
    }

    if (level === null && LEVEL.test(value)) {
      level = value;
      continue;
    }

    if (tags.length === 0 && TAGS.test(value)) {
      tags = value.split(',');
    }
  }

  return { uptimeSeconds, level, tags, message: match[2].trim() };
}

/**
 * Extract top-level parenthesised groups: ` (Normal) (System.gc())` gives
 * `["Normal", "System.gc()"]`. Returns null when parentheses are unbalanced
 * or text other than whitespace sits between groups.
 */
export function extractParenTags(text: string): string[] | null {
  const tags: string[] = [];
  let depth = 0;
  let current = '';

  for (const ch of text) {
    if (ch === '(') {
      if (depth > 0) {
        current += ch;
      }
      depth++;
    } else if (ch === ')') {
      depth--;
      if (depth < 0) {
        return null;
      }
      if (depth === 0) {
        tags.push(current.trim());
        current = '';
      } else {
        current += ch;
      }
    } else if (depth > 0) {
      current += ch;
    } else if (ch.trim() !== '') {
      return null;
    }
  }

  return depth === 0 ? tags : null;
}

/**
 * Classify one line. Never throws; returns null for unclassified lines.
 */
export function classifyLine(text: string, lineNumber: number): ClassifiedLine | null {
  const decorators = parseDecorators(text);
  if (!decorators || decorators.uptimeSeconds === null || !Number.isFinite(decorators.uptimeSeconds)) {
    return null;
  }

  const base: RecordBase = { uptimeSeconds: decorators.uptimeSeconds, lineNumber };
  const message = decorators.message;

  return (
    classifyCollector(message, base) ??
    classifyHeapInit(message, base) ??
    classifyPause(message, base) ??
    classifyGcStart(message, base) ??
    classifyHeapRegions(message, base) ??
    classifyMetaspace(message, base) ??
    classifyTlab(message, base) ??
    classifyToSpaceExhausted(message, base) ??
    classifySafepoint(message, base)
  );
}

function classifyCollector(message: string, base: RecordBase): CollectorRecord | null {
  const match = COLLECTOR_PATTERN.exec(message);
  if (!match) {
    return null;
  }
  const collector = COLLECTOR_NAMES[match[1]];
  return collector ? { kind: 'collector', collector, ...base } : null;
}

function classifyHeapInit(message: string, base: RecordBase): HeapInitRecord | null {
  const regionSize = REGION_SIZE_PATTERN.exec(message);
  if (regionSize) {
    return {
      kind: 'heap-init',
      field: 'regionSize',
      sizeMb: toMegabytes(Number(regionSize[1]), regionSize[2].toUpperCase()),
      ...base,
    };
  }

  const maxCapacity = MAX_CAPACITY_PATTERN.exec(message);
  if (maxCapacity) {
    return {
      kind: 'heap-init',
      field: 'maxCapacity',
      sizeMb: toMegabytes(Number(maxCapacity[1]), maxCapacity[2].toUpperCase()),
      ...base,
    };
  }

  return null;
}

function classifyPause(message: string, base: RecordBase): PauseRecord | null {
  const match = PAUSE_LINE_PATTERN.exec(message);
  if (!match) {
    return null;
  }

  const causes = extractParenTags(match[3]);
  if (!causes) {
    return null;
  }

  const pauseType = toPauseType(match[2]);
  const pauseMs = Number(match[10]);
  if (!pauseType || !Number.isFinite(pauseMs)) {
    return null;
  }

  return {
    kind: 'pause',
    gcId: Number(match[1]),
    pauseType,
    causes,
    mixed: pauseType === 'Mixed' || (pauseType === 'Young' && causes.includes('Mixed')),
    evacuationFailure: causes.some((c) => c.startsWith('Evacuation Failure')),
    humongousAllocation: causes.includes('G1 Humongous Allocation'),
    metadataThreshold: causes.includes('Metadata GC Threshold'),
    heapBeforeMb: toMegabytes(Number(match[4]), match[5]),
    heapAfterMb: toMegabytes(Number(match[6]), match[7]),
    heapTotalMb: toMegabytes(Number(match[8]), match[9]),
    pauseMs,
    ...base,
  };
}

function classifyGcStart(message: string, base: RecordBase): GcStartRecord | null {
  const match = GC_START_PATTERN.exec(message);
  if (!match) {
    return null;
  }

  const causes = extractParenTags(match[3]);
  if (!causes) {
    return null;
  }

  return { kind: 'gc-start', gcId: Number(match[1]), pauseType: match[2], causes, ...base };
}

function classifyHeapRegions(message: string, base: RecordBase): HeapRegionsRecord | null {
  const match = HEAP_REGIONS_PATTERN.exec(message);
  if (!match) {
    return null;
  }

  return {
    kind: 'heap-regions',
    gcId: Number(match[1]),
    space: match[2] === 'Old' ? 'old' : 'humongous',
    before: Number(match[3]),
    after: Number(match[4]),
    ...base,
  };
}

function classifyMetaspace(message: string, base: RecordBase): MetaspaceRecord | null {
  const match = METASPACE_PATTERN.exec(message);
  if (!match) {
    return null;
  }

  // used(committed)->used(committed) since JDK 16; older releases print
  // used->used(reserved), where the parenthesis is not the committed size.
  const hasCommittedBefore = match[4] !== undefined;
  const committedMb =
    hasCommittedBefore && match[8] !== undefined ? toMegabytes(Number(match[8]), match[9]) : null;

  return {
    kind: 'metaspace',
    gcId: Number(match[1]),
    usedBeforeMb: toMegabytes(Number(match[2]), match[3]),
    usedMb: toMegabytes(Number(match[6]), match[7]),
    committedMb,
    ...base,
  };
}

function classifyTlab(message: string, base: RecordBase): TlabRecord | null {
  const match = TLAB_PATTERN.exec(message);
  if (!match) {
    return null;
  }

  const gcId = GC_ID.exec(message);
  return {
    kind: 'tlab',
    gcId: gcId ? Number(gcId[1]) : null,
    threads: Number(match[1]),
    refills: Number(match[2]),
    slowAllocs: Number(match[3]),
    ...base,
  };
}

function classifyToSpaceExhausted(message: string, base: RecordBase): ToSpaceExhaustedRecord | null {
  const match = TO_SPACE_PATTERN.exec(message);
  return match ? { kind: 'to-space-exhausted', gcId: Number(match[1]), ...base } : null;
}

function classifySafepoint(message: string, base: RecordBase): SafepointRecord | null {
  const match = SAFEPOINT_PATTERN.exec(message);
  if (!match) {
    return null;
  }

  return {
    kind: 'safepoint',
    operation: match[1],
    timeToSafepointMs: Number(match[2]) / 1_000_000,
    totalMs: Number(match[3]) / 1_000_000,
    ...base,
  };
}

function toPauseType(value: string): PauseRecord['pauseType'] | null {
  switch (value) {
    case 'Young':
    case 'Mixed':
    case 'Initial Mark':
    case 'Full':
    case 'Remark':
    case 'Cleanup':
      return value;
    default:
      return null;
  }
}
