/**
 * Triage Engine
 *
 * classify -> build event stream -> aggregate -> detect. One pass over the
 * line source, no shared state between runs.
 */

import type { Logger } from 'pino';
import { DEFAULT_THRESHOLDS } from '../config/defaults.js';
import { runDetectors } from '../detectors/index.js';
import {
  buildEventStream,
  buildEventStreamFromAsync,
  type EventStream,
} from '../parser/event-stream.js';
import type { AnalysisWindow, LineStats } from '../types/events.js';
import type { Finding } from '../types/findings.js';
import type { GcMetrics, SampleCounts } from '../types/metrics.js';
import type { ThresholdConfig } from '../types/thresholds.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { aggregateMetrics } from './metric-aggregator.js';

export interface AnalyzeOptions {
  /** Trailing window in minutes; unset analyzes the whole log */
  tailWindowMinutes?: number | null;
  /** Overrides merged over DEFAULT_THRESHOLDS */
  thresholds?: Partial<ThresholdConfig>;
  logger?: Logger;
}

export interface AnalysisResult {
  /** Firing findings (plus the TLAB unavailable finding) in catalog order */
  readonly findings: readonly Finding[];
  readonly window: AnalysisWindow;
  readonly sampleCounts: SampleCounts;
  readonly metrics: GcMetrics;
  readonly notes: readonly string[];
  readonly lineStats: LineStats;
  readonly thresholds: Readonly<ThresholdConfig>;
}

export function resolveThresholds(overrides: Partial<ThresholdConfig> = {}): ThresholdConfig {
  return { ...DEFAULT_THRESHOLDS, ...overrides };
}

/**
 * Analyze a synchronous line source (an array of lines, a generator, ...).
 */
export function analyzeLog(lines: Iterable<string>, options: AnalyzeOptions = {}): AnalysisResult {
  const stream = buildEventStream(lines, {
    tailWindowMinutes: options.tailWindowMinutes,
    logger: options.logger,
  });
  return analyzeStream(stream, options);
}

/**
 * Analyze an asynchronous line source such as a `readline.Interface`.
 */
export async function analyzeLogAsync(
  lines: AsyncIterable<string>,
  options: AnalyzeOptions = {}
): Promise<AnalysisResult> {
  const stream = await buildEventStreamFromAsync(lines, {
    tailWindowMinutes: options.tailWindowMinutes,
    logger: options.logger,
  });
  return analyzeStream(stream, options);
}

export function analyzeStream(stream: EventStream, options: AnalyzeOptions = {}): AnalysisResult {
  const thresholds = resolveThresholds(options.thresholds);
  const metrics = aggregateMetrics(stream, thresholds, options.logger);
  const findings = runDetectors(metrics, thresholds);

  lazyLog(
    options.logger,
    'debug',
    () => ({
      findings: findings.map((f) => `${f.suspectId}:${f.status}:${f.confidence}`),
      window: stream.window,
    }),
    'Triage complete'
  );

  return Object.freeze({
    findings: Object.freeze(findings),
    window: metrics.window,
    sampleCounts: metrics.sampleCounts,
    metrics,
    notes: metrics.notes,
    lineStats: stream.lineStats,
    thresholds: Object.freeze(thresholds),
  });
}
