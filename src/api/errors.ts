/**
 * Triage error utilities.
 *
 * Provides a consistent error type for every public surface so the CLI can
 * tell an unsupported log apart from bad arguments or an unreadable file.
 * Per-line parse problems are never raised; they are recovered inside the
 * classifier.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to callers.
 */
export type TriageErrorCode =
  | 'EmptyOrUnsupportedLog' // zero classifiable events after a full pass
  | 'InvalidConfig'
  | 'InvalidArguments'
  | 'InputNotFound'
  | 'InputReadError';

export interface TriageErrorShape {
  code: TriageErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class TriageError extends Error implements TriageErrorShape {
  public readonly code: TriageErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: TriageErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'TriageError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for JSON output).
   */
  public toObject(): TriageErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function isTriageError(error: unknown): error is TriageError {
  return error instanceof TriageError;
}

/**
 * Raised when a full pass produced no classifiable event.
 */
export function createUnsupportedLogError(totalLines: number): TriageError {
  const message =
    totalLines === 0
      ? 'Empty log: no lines to analyze'
      : `Not a supported G1 log: none of ${totalLines} lines matched a known unified-logging pattern`;
  return new TriageError('EmptyOrUnsupportedLog', message, { totalLines });
}

/**
 * Raised when lines were recognized but none of them was a GC pause, as when
 * the log only carries the collector banner.
 */
export function createNoPausesError(totalLines: number, collector: string | null): TriageError {
  return new TriageError(
    'EmptyOrUnsupportedLog',
    `Not a supported G1 log: no GC pause line among ${totalLines} lines`,
    { totalLines, collector }
  );
}

/**
 * Map unknown errors raised while reading input into TriageError instances.
 */
export function toTriageError(
  error: unknown,
  fallbackCode: TriageErrorCode = 'InputReadError'
): TriageError {
  if (error instanceof TriageError) {
    return error;
  }

  if (error instanceof Error) {
    if ('code' in error && error.code === 'ENOENT') {
      return new TriageError('InputNotFound', error.message);
    }
    return new TriageError(fallbackCode, error.message);
  }

  return new TriageError(fallbackCode, 'Unknown error');
}

/**
 * Convert Zod validation error to TriageError
 *
 * @example
 * ```typescript
 * const result = ThresholdsFileSchema.safeParse({ long_pause_ms: -1 });
 * if (!result.success) {
 *   throw zodErrorToTriageError(result.error, 'InvalidConfig');
 * }
 * // Throws: "Validation error on field 'long_pause_ms': must be positive"
 * ```
 */
export function zodErrorToTriageError(error: ZodError, code: TriageErrorCode): TriageError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'invalid value'}`;

  return new TriageError(code, message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
