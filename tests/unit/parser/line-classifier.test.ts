import { describe, it, expect } from 'vitest';
import {
  classifyLine,
  extractParenTags,
  parseDecorators,
  toMegabytes,
} from '../../../src/parser/line-classifier.js';

describe('parseDecorators', () => {
  it('should read uptime, level and tags in any order', () => {
    const decorators = parseDecorators('[info][gc,heap][2024-01-01T10:00:00.000+0000][12.345s] GC(3) Old regions: 5->6');
    expect(decorators).toEqual({
      uptimeSeconds: 12.345,
      level: 'info',
      tags: ['gc', 'heap'],
      message: 'GC(3) Old regions: 5->6',
    });
  });

  it('should accept millisecond and nanosecond uptimes', () => {
    expect(parseDecorators('[1500ms][info][gc] x')?.uptimeSeconds).toBe(1.5);
    expect(parseDecorators('[2000000000ns][info][gc] x')?.uptimeSeconds).toBe(2);
  });

  it('should accept a comma as decimal separator', () => {
    expect(parseDecorators('[3,250s][info][gc] x')?.uptimeSeconds).toBe(3.25);
  });

  it('should return null without a decorator prefix', () => {
    expect(parseDecorators('plain text')).toBeNull();
  });
});

describe('extractParenTags', () => {
  it('should keep nested parentheses inside a tag', () => {
    expect(extractParenTags(' (Normal) (System.gc())')).toEqual(['Normal', 'System.gc()']);
  });

  it('should reject unbalanced or interleaved text', () => {
    expect(extractParenTags(' (Normal')).toBeNull();
    expect(extractParenTags(' (Normal) junk (Mixed)')).toBeNull();
  });
});

describe('toMegabytes', () => {
  it('should convert unified-logging units', () => {
    expect(toMegabytes(2048, 'K')).toBe(2);
    expect(toMegabytes(4, 'G')).toBe(4096);
    expect(toMegabytes(22, 'M')).toBe(22);
    expect(toMegabytes(1048576, 'B')).toBe(1);
  });
});

describe('classifyLine', () => {
  it('should classify a young pause completion line', () => {
    const record = classifyLine(
      '[8.657s][info][gc] GC(12) Pause Young (Normal) (G1 Evacuation Pause) 22M->19M(256M) 8.657ms',
      7
    );
    expect(record).toEqual({
      kind: 'pause',
      gcId: 12,
      pauseType: 'Young',
      causes: ['Normal', 'G1 Evacuation Pause'],
      mixed: false,
      evacuationFailure: false,
      humongousAllocation: false,
      metadataThreshold: false,
      heapBeforeMb: 22,
      heapAfterMb: 19,
      heapTotalMb: 256,
      pauseMs: 8.657,
      uptimeSeconds: 8.657,
      lineNumber: 7,
    });
  });

  it('should flag mixed, evacuation failure, humongous and metadata pauses', () => {
    const mixed = classifyLine('[1.000s][info][gc] GC(1) Pause Young (Mixed) (G1 Evacuation Pause) 50M->20M(256M) 4.000ms', 1);
    expect(mixed).toMatchObject({ kind: 'pause', mixed: true });

    const failed = classifyLine(
      '[1.000s][info][gc] GC(2) Pause Young (Normal) (G1 Evacuation Pause) (Evacuation Failure: Pinned) 250M->250M(256M) 90.000ms',
      2
    );
    expect(failed).toMatchObject({ kind: 'pause', evacuationFailure: true });

    const humongous = classifyLine(
      '[1.000s][info][gc] GC(3) Pause Young (Concurrent Start) (G1 Humongous Allocation) 80M->40M(256M) 6.000ms',
      3
    );
    expect(humongous).toMatchObject({ kind: 'pause', humongousAllocation: true });

    const metadata = classifyLine(
      '[1.000s][info][gc] GC(4) Pause Full (Metadata GC Threshold) 80M->40M(256M) 60.000ms',
      4
    );
    expect(metadata).toMatchObject({ kind: 'pause', pauseType: 'Full', metadataThreshold: true });
  });

  it('should classify remark pauses without tags', () => {
    expect(classifyLine('[5.000s][info][gc] GC(9) Pause Remark 30M->30M(256M) 1.234ms', 1)).toMatchObject({
      kind: 'pause',
      pauseType: 'Remark',
      causes: [],
      pauseMs: 1.234,
    });
  });

  it('should classify JDK 9-11 mixed and initial-mark pauses', () => {
    expect(
      classifyLine('[12.000s][info][gc] GC(9) Pause Mixed (G1 Evacuation Pause) 120M->60M(256M) 7.500ms', 4)
    ).toEqual({
      kind: 'pause',
      gcId: 9,
      pauseType: 'Mixed',
      causes: ['G1 Evacuation Pause'],
      mixed: true,
      evacuationFailure: false,
      humongousAllocation: false,
      metadataThreshold: false,
      heapBeforeMb: 120,
      heapAfterMb: 60,
      heapTotalMb: 256,
      pauseMs: 7.5,
      uptimeSeconds: 12,
      lineNumber: 4,
    });

    expect(
      classifyLine('[13.000s][info][gc] GC(10) Pause Initial Mark (G1 Humongous Allocation) 200M->150M(256M) 300.000ms', 5)
    ).toMatchObject({
      kind: 'pause',
      pauseType: 'Initial Mark',
      causes: ['G1 Humongous Allocation'],
      mixed: false,
      humongousAllocation: true,
      pauseMs: 300,
    });
  });

  it('should classify a JDK 11 initial-mark start line', () => {
    expect(classifyLine('[13.000s][info][gc,start] GC(10) Pause Initial Mark (G1 Humongous Allocation)', 2)).toEqual({
      kind: 'gc-start',
      gcId: 10,
      pauseType: 'Initial Mark',
      causes: ['G1 Humongous Allocation'],
      uptimeSeconds: 13,
      lineNumber: 2,
    });
  });

  it('should classify a collection start line', () => {
    expect(classifyLine('[1.000s][info][gc,start] GC(5) Pause Young (Normal) (Metadata GC Threshold)', 1)).toEqual({
      kind: 'gc-start',
      gcId: 5,
      pauseType: 'Young',
      causes: ['Normal', 'Metadata GC Threshold'],
      uptimeSeconds: 1,
      lineNumber: 1,
    });
  });

  it('should classify old and humongous region snapshots', () => {
    expect(classifyLine('[1.000s][info][gc,heap] GC(5) Old regions: 120->121', 1)).toMatchObject({
      kind: 'heap-regions',
      gcId: 5,
      space: 'old',
      before: 120,
      after: 121,
    });
    expect(classifyLine('[1.000s][info][gc,heap] GC(5) Humongous regions: 8->2', 1)).toMatchObject({
      space: 'humongous',
      before: 8,
      after: 2,
    });
  });

  it('should read committed metaspace only from the used(committed) form', () => {
    expect(
      classifyLine('[1.000s][info][gc,metaspace] GC(5) Metaspace: 1024K(2048K)->3072K(4096K) NonClass: 1K(2K)->1K(2K)', 1)
    ).toMatchObject({ kind: 'metaspace', usedBeforeMb: 1, usedMb: 3, committedMb: 4 });

    expect(
      classifyLine('[1.000s][info][gc,metaspace] GC(5) Metaspace: 6700K->6700K(1056768K)', 1)
    ).toMatchObject({ kind: 'metaspace', committedMb: null });
  });

  it('should classify TLAB debug lines', () => {
    expect(
      classifyLine('[2.000s][debug][gc,tlab] GC(7) TLAB totals: thrds: 12  refills: 345 max: 40 slow allocs: 7 max 4 waste: 1.2%', 1)
    ).toMatchObject({ kind: 'tlab', gcId: 7, threads: 12, refills: 345, slowAllocs: 7 });
  });

  it('should name every collector family', () => {
    const name = (text: string) => {
      const record = classifyLine(`[0.010s][info][gc,init] ${text}`, 1);
      return record?.kind === 'collector' ? record.collector : null;
    };
    expect(name('Using G1')).toBe('G1');
    expect(name('Using Parallel')).toBe('Parallel');
    expect(name('Using Serial')).toBe('Serial');
    expect(name('Using The Z Garbage Collector')).toBe('ZGC');
    expect(name('Using Shenandoah')).toBe('Shenandoah');
    expect(name('Using Concurrent Mark Sweep')).toBe('CMS');
  });

  it('should convert safepoint nanoseconds to milliseconds', () => {
    expect(
      classifyLine(
        '[3.000s][info][safepoint] Safepoint "G1CollectForAllocation", Time since last: 1000 ns, Reaching safepoint: 2500000 ns, At safepoint: 100 ns, Total: 4000000 ns',
        1
      )
    ).toMatchObject({ kind: 'safepoint', operation: 'G1CollectForAllocation', timeToSafepointMs: 2.5, totalMs: 4 });
  });

  it('should classify heap geometry and to-space exhaustion', () => {
    expect(classifyLine('[0.010s][info][gc,init] Heap Region Size: 2M', 1)).toMatchObject({
      kind: 'heap-init',
      field: 'regionSize',
      sizeMb: 2,
    });
    expect(classifyLine('[0.010s][info][gc,init] Heap Max Capacity: 4G', 1)).toMatchObject({
      kind: 'heap-init',
      field: 'maxCapacity',
      sizeMb: 4096,
    });
    expect(classifyLine('[1.000s][info][gc] GC(8) To-space exhausted', 1)).toMatchObject({
      kind: 'to-space-exhausted',
      gcId: 8,
    });
  });

  it('should leave malformed or unrelated lines unclassified', () => {
    expect(classifyLine('', 1)).toBeNull();
    expect(classifyLine('[info][gc] GC(1) Pause Young (Normal) 22M->19M(256M) 8.657ms', 1)).toBeNull();
    expect(classifyLine('[1.000s][info][gc] GC(1) Pause Young (Normal 22M->19M(256M) 8.657ms', 1)).toBeNull();
    expect(classifyLine('[1.000s][info][gc,phases] GC(1)   Evacuate Collection Set: 3.2ms', 1)).toBeNull();
    expect(classifyLine('2024-01-01 INFO application started', 1)).toBeNull();
  });
});
