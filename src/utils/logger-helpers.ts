/**
 * Logger Helpers
 *
 * Engine code takes an optional pino logger; these helpers keep call sites
 * short and skip building log context when the level is disabled.
 */

import pino, { type Logger } from 'pino';
import { LOG_LEVEL_ENV } from '../config/defaults.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve the CLI log level: --verbose wins, then the environment, then warn.
 */
export function resolveLogLevel(verbose: boolean, env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (verbose) {
    return 'debug';
  }
  const fromEnv = env[LOG_LEVEL_ENV]?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : DEFAULT_LOG_LEVEL;
}

/**
 * Create the CLI logger. Logs go to stderr so stdout carries only the report.
 */
export function createLogger(level: LogLevel): Logger {
  return pino({ name: 'gc-triage', level }, pino.destination(2));
}

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ findings: findings.map(describe) }), 'Triage complete');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
