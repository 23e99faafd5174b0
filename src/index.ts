export {
  analyzeLog,
  analyzeLogAsync,
  analyzeStream,
  resolveThresholds,
  type AnalyzeOptions,
  type AnalysisResult,
} from './analysis/engine.js';
export { aggregateMetrics, fitTrend, type AggregationThresholds } from './analysis/metric-aggregator.js';
export {
  TriageError,
  isTriageError,
  toTriageError,
  zodErrorToTriageError,
  type TriageErrorCode,
  type TriageErrorShape,
} from './api/errors.js';
export { DEFAULT_THRESHOLDS, ANALYSIS } from './config/defaults.js';
export { loadConfig, parseConfig, toThresholdConfig, type LoadConfigOptions } from './config/loader.js';
export * from './detectors/index.js';
export {
  EventStreamBuilder,
  buildEventStream,
  buildEventStreamFromAsync,
  type EventStream,
  type EventStreamOptions,
} from './parser/event-stream.js';
export { classifyLine, type ClassifiedLine } from './parser/line-classifier.js';
export { REPORT_FORMATS, renderReport, summarize, type ReportFormat } from './report/renderer.js';
export { computeExitCode, computeSeverity, EXIT_CODES, type ExitCode } from './report/severity.js';

export type * from './types/events.js';
export type * from './types/findings.js';
export type * from './types/metrics.js';
export type * from './types/thresholds.js';
export { SUSPECT_CATALOG, SUSPECT_TITLES, isFiring } from './types/findings.js';
export { isPauseEvent, isCollectionEvent } from './types/events.js';
