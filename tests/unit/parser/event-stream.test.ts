import { describe, it, expect } from 'vitest';
import { TriageError } from '../../../src/api/errors.js';
import {
  EventStreamBuilder,
  buildEventStream,
  buildEventStreamFromAsync,
} from '../../../src/parser/event-stream.js';
import { isPauseEvent } from '../../../src/types/events.js';
import {
  collectionLines,
  collectorLine,
  g1Header,
  jdk11PauseLine,
  safepointLine,
  tlabLine,
  youngSeries,
} from '../../helpers/gc-log-builder.js';

describe('EventStreamBuilder', () => {
  it('should merge region snapshots into the pause event of the same collection', () => {
    const stream = buildEventStream(
      collectionLines({ gcId: 4, uptime: 2, oldBefore: 10, oldAfter: 12, humongousBefore: 3, humongousAfter: 1 })
    );

    const pause = stream.events.find(isPauseEvent);
    expect(pause).toMatchObject({
      category: 'YoungGC',
      gcId: 4,
      oldRegionsBefore: 10,
      oldRegionsAfter: 12,
      humongousRegionsBefore: 3,
      humongousRegionsAfter: 1,
      lineNumber: 4,
    });
  });

  it('should map pause types to categories', () => {
    const stream = buildEventStream([
      ...collectionLines({ gcId: 0, uptime: 1, kind: 'Young' }),
      ...collectionLines({ gcId: 1, uptime: 2, kind: 'Mixed' }),
      ...collectionLines({ gcId: 2, uptime: 3, kind: 'Full' }),
      ...collectionLines({ gcId: 3, uptime: 4, kind: 'Remark' }),
    ]);

    expect(stream.events.map((e) => e.category)).toEqual([
      'YoungGC',
      'MixedGC',
      'FullGC',
      'ConcurrentCyclePause',
    ]);
  });

  it('should map JDK 9-11 mixed and initial-mark pauses', () => {
    const stream = buildEventStream([
      jdk11PauseLine(1, 0, 'Young', 'G1 Evacuation Pause', 5),
      jdk11PauseLine(2, 1, 'Initial Mark', 'G1 Humongous Allocation', 300),
      jdk11PauseLine(3, 2, 'Mixed', 'G1 Evacuation Pause', 7.5),
    ]);

    expect(stream.events.map((e) => e.category)).toEqual([
      'YoungGC',
      'HumongousAlloc',
      'YoungGC',
      'MixedGC',
    ]);
  });

  it('should emit a humongous marker before its collection', () => {
    const stream = buildEventStream(
      collectionLines({ gcId: 1, uptime: 1, cause: '(Normal) (G1 Humongous Allocation)', humongousBefore: 9 })
    );
    expect(stream.events.map((e) => e.category)).toEqual(['HumongousAlloc', 'YoungGC']);
    expect(stream.events[0]).toMatchObject({ gcId: 1, humongousRegions: 9 });
  });

  it('should emit one evacuation failure per collection', () => {
    const stream = buildEventStream([
      '[1.000s][info][gc] GC(6) To-space exhausted',
      ...collectionLines({ gcId: 6, uptime: 1, evacuationFailure: true }),
    ]);
    expect(stream.events.filter((e) => e.category === 'EvacFailure')).toHaveLength(1);
  });

  it('should tag metaspace samples of metadata-threshold collections', () => {
    const stream = buildEventStream(
      collectionLines({
        gcId: 2,
        uptime: 5,
        cause: '(Normal) (Metadata GC Threshold)',
        metaspace: { usedBefore: 2048, usedAfter: 3072, committed: 4096 },
      })
    );

    const sample = stream.events.find((e) => e.category === 'MetaspaceSample');
    expect(sample).toMatchObject({
      usedBeforeMb: 2,
      usedMb: 3,
      committedMb: 4,
      metadataThresholdTriggered: true,
    });
  });

  it('should report TLAB presence for the whole file', () => {
    const lines = [tlabLine(1, 0, 5), ...youngSeries({ count: 3, startUptime: 600, intervalSeconds: 1 })];

    const stream = buildEventStream(lines, { tailWindowMinutes: 1 });
    expect(stream.tlabSeen).toBe(true);
    expect(stream.events.some((e) => e.category === 'TLABSample')).toBe(false);
  });

  it('should keep the first collector identity even outside the window', () => {
    const lines = [collectorLine(0.01, 'Parallel'), ...youngSeries({ count: 3, startUptime: 600, intervalSeconds: 1 })];
    const stream = buildEventStream(lines, { tailWindowMinutes: 1 });
    expect(stream.collector).toBe('Parallel');
  });

  it('should count line statistics', () => {
    const stream = buildEventStream([
      ...g1Header(),
      'garbage',
      '[1.000s][info][gc,phases] GC(1)   Evacuate Collection Set: 3.2ms',
      ...collectionLines({ gcId: 1, uptime: 1 }),
    ]);

    expect(stream.lineStats).toEqual({
      totalLines: 7,
      classifiedLines: 5,
      unclassifiedLines: 2,
      orphanedRecords: 0,
      segments: 1,
    });
    expect(stream.heap).toEqual({ regionSizeMb: 1, maxCapacityMb: 1024 });
  });

  it('should count records whose collection never completed', () => {
    const stream = buildEventStream([
      ...collectionLines({ gcId: 1, uptime: 1 }),
      '[2.000s][info][gc,heap] GC(2) Old regions: 4->5',
    ]);
    expect(stream.lineStats.orphanedRecords).toBe(1);
  });

  describe('windowing', () => {
    const lines = youngSeries({ count: 11, startUptime: 0, intervalSeconds: 60 });

    it('should analyze the whole log without a window', () => {
      const stream = buildEventStream(lines);
      expect(stream.window).toEqual({
        startUptime: 0,
        endUptime: 600,
        requestedMinutes: null,
        fallbackToFullLog: false,
      });
      expect(stream.events).toHaveLength(11);
      expect(stream.notes).toEqual([]);
    });

    it('should keep events inside the trailing window, boundary included', () => {
      const stream = buildEventStream(lines, { tailWindowMinutes: 3 });
      expect(stream.window.startUptime).toBe(420);
      expect(stream.events.map((e) => e.uptimeSeconds)).toEqual([420, 480, 540, 600]);
      expect(stream.totalEvents).toBe(11);
    });

    it('should fall back to the full log when the window covers the data', () => {
      const stream = buildEventStream(lines, { tailWindowMinutes: 10 });
      expect(stream.window.fallbackToFullLog).toBe(true);
      expect(stream.events).toHaveLength(11);
      expect(stream.notes).toEqual([
        'Requested tail window of 10 min covers the whole log (10.0 min of data); analyzing the full log',
      ]);
    });

    it('should reject a non-positive window', () => {
      expect(() => buildEventStream(lines, { tailWindowMinutes: 0 })).toThrow(TriageError);
      expect(() => buildEventStream(lines, { tailWindowMinutes: -5 })).toThrow(
        'tail window must be a positive number of minutes'
      );
    });
  });

  it('should append a restarted JVM onto a continuous timeline', () => {
    const stream = buildEventStream([
      ...collectionLines({ gcId: 0, uptime: 100 }),
      ...collectionLines({ gcId: 1, uptime: 200 }),
      ...collectionLines({ gcId: 0, uptime: 5 }),
    ]);

    const pauses = stream.events.filter(isPauseEvent);
    expect(pauses.map((p) => p.uptimeSeconds)).toEqual([100, 200, 205]);
    expect(pauses.map((p) => p.segment)).toEqual([0, 0, 1]);
    expect(stream.lineStats.segments).toBe(2);
    expect(stream.notes).toEqual([
      'Uptime went backwards 1 time(s); later runs were appended to one continuous timeline',
    ]);
  });

  it('should keep slightly out-of-order lines in one segment', () => {
    const stream = buildEventStream([
      ...collectionLines({ gcId: 0, uptime: 30 }),
      safepointLine(29.999, 1_000, 2_000),
      ...collectionLines({ gcId: 1, uptime: 60 }),
      safepointLine(59.5, 1_000, 2_000),
    ]);

    expect(stream.events.map((e) => [e.category, e.uptimeSeconds, e.segment])).toEqual([
      ['SafepointMarker', 29.999, 0],
      ['YoungGC', 30, 0],
      ['SafepointMarker', 59.5, 0],
      ['YoungGC', 60, 0],
    ]);
    expect(stream.lineStats.segments).toBe(1);
    expect(stream.window.endUptime).toBe(60);
    expect(stream.notes).toEqual([]);
  });

  it('should start a new segment once uptime drops by more than a second', () => {
    const stream = buildEventStream([
      ...collectionLines({ gcId: 0, uptime: 30 }),
      ...collectionLines({ gcId: 1, uptime: 28.5 }),
    ]);

    const pauses = stream.events.filter(isPauseEvent);
    expect(pauses.map((p) => [p.uptimeSeconds, p.segment])).toEqual([
      [30, 0],
      [58.5, 1],
    ]);
  });

  it('should reject a G1 log without any GC pause', () => {
    expect(() => buildEventStream([collectorLine(0.01), 'GC(1) Pause Something 1M->1M(2M) 1ms'])).toThrow(
      'Not a supported G1 log: no GC pause line among 2 lines'
    );
    expect(() => buildEventStream([tlabLine(1, 0, 5)])).toThrow(TriageError);
  });

  it('should accept a legacy collector identity without pauses', () => {
    const stream = buildEventStream([collectorLine(0.01, 'Parallel')]);
    expect(stream.collector).toBe('Parallel');
    expect(stream.events).toHaveLength(1);
  });

  it('should raise EmptyOrUnsupportedLog when nothing was classified', () => {
    expect(() => buildEventStream([])).toThrow('Empty log: no lines to analyze');

    try {
      buildEventStream(['hello', 'world']);
      expect.unreachable('expected an error');
    } catch (error) {
      expect(error).toBeInstanceOf(TriageError);
      expect(error).toMatchObject({
        code: 'EmptyOrUnsupportedLog',
        message: 'Not a supported G1 log: none of 2 lines matched a known unified-logging pattern',
      });
    }
  });

  it('should accept lines from an async source', async () => {
    async function* source() {
      yield* collectionLines({ gcId: 1, uptime: 1 });
    }
    const stream = await buildEventStreamFromAsync(source());
    expect(stream.events).toHaveLength(1);
  });

  it('should be usable line by line', () => {
    const builder = new EventStreamBuilder();
    for (const line of collectionLines({ gcId: 1, uptime: 1 })) {
      builder.accept(line);
    }
    expect(builder.build().events[0].category).toBe('YoungGC');
  });
});
