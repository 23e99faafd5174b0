import { describe, it, expect } from 'vitest';
import { DEFAULT_THRESHOLDS } from '../../../src/config/defaults.js';
import { detectAllocationPressure } from '../../../src/detectors/allocation-pressure.js';
import { quietMetrics } from '../../helpers/metrics-fixture.js';

describe('detectAllocationPressure', () => {
  it('should not fire for relaxed young collections', () => {
    expect(detectAllocationPressure(quietMetrics(), DEFAULT_THRESHOLDS)).toBeNull();
  });

  it('should fire with medium confidence on the interval signal alone', () => {
    const metrics = quietMetrics({
      youngInterval: { intervals: 4319, medianSeconds: 0.39, p99Seconds: 0.39, meanSeconds: 0.39, cv: 0 },
      gcTime: { totalPauseMs: 21600, spanSeconds: 1684.41, ratio: 0.0128 },
    });

    const finding = detectAllocationPressure(metrics, DEFAULT_THRESHOLDS);
    expect(finding).toMatchObject({
      suspectId: 'allocation-pressure',
      title: 'Allocation Pressure',
      status: 'DETECTED',
      confidence: 'medium',
    });
    expect(finding?.evidence).toEqual([
      'Young GC median interval: 0.39s (threshold 1s)',
      'Young GC p99 interval: 0.39s',
      'Interval coefficient of variation: 0.00',
      'GC time ratio: 1.3% of 1684.4s (threshold 10.0%)',
      'Young GC events in window: 60',
    ]);
    expect(finding?.nextSteps.length).toBeGreaterThan(0);
  });

  it('should fire on the GC time ratio alone', () => {
    const metrics = quietMetrics({ gcTime: { totalPauseMs: 90000, spanSeconds: 600, ratio: 0.15 } });
    expect(detectAllocationPressure(metrics, DEFAULT_THRESHOLDS)?.confidence).toBe('medium');
  });

  it('should be high confidence when both signals agree and intervals are consistent', () => {
    const metrics = quietMetrics({
      youngInterval: { intervals: 100, medianSeconds: 0.2, p99Seconds: 0.3, meanSeconds: 0.2, cv: 0.3 },
      gcTime: { totalPauseMs: 120000, spanSeconds: 600, ratio: 0.2 },
    });
    expect(detectAllocationPressure(metrics, DEFAULT_THRESHOLDS)?.confidence).toBe('high');
  });

  it('should stay medium when intervals are erratic', () => {
    const metrics = quietMetrics({
      youngInterval: { intervals: 100, medianSeconds: 0.2, p99Seconds: 3, meanSeconds: 0.5, cv: 1.2 },
      gcTime: { totalPauseMs: 120000, spanSeconds: 600, ratio: 0.2 },
    });
    expect(detectAllocationPressure(metrics, DEFAULT_THRESHOLDS)?.confidence).toBe('medium');
  });

  it('should lower confidence rather than suppress sparse data', () => {
    const metrics = quietMetrics({
      youngInterval: { intervals: 2, medianSeconds: 0.2, p99Seconds: 0.2, meanSeconds: 0.2, cv: 0 },
      gcTime: { totalPauseMs: 120000, spanSeconds: 600, ratio: 0.2 },
    });
    expect(detectAllocationPressure(metrics, DEFAULT_THRESHOLDS)?.confidence).toBe('low');
  });

  it('should honor explicit thresholds', () => {
    const metrics = quietMetrics();
    expect(
      detectAllocationPressure(metrics, { ...DEFAULT_THRESHOLDS, youngIntervalSeconds: 11 })?.status
    ).toBe('DETECTED');
  });
});
