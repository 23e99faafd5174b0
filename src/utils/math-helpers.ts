/**
 * Math Helper Utilities
 *
 * Safe mathematical operations that guard against division by zero and empty
 * samples, plus the small set of order statistics and fits the aggregator
 * needs. Every function is deterministic for a given input order.
 */

/**
 * Calculate safe average of an array of numbers
 *
 * @param defaultValue - Value to return if array is empty (default: 0)
 *
 * @example
 * ```typescript
 * safeAverage([1, 2, 3])        // => 2
 * safeAverage([])               // => 0
 * safeAverage([], 100)          // => 100
 * ```
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  return safeSum(values) / values.length;
}

/**
 * Calculate safe division that guards against division by zero
 *
 * @example
 * ```typescript
 * safeDivide(10, 2)        // => 5
 * safeDivide(10, 0)        // => 0
 * safeDivide(10, 0, 100)   // => 100
 * ```
 */
export function safeDivide(numerator: number, denominator: number, defaultValue = 0): number {
  if (denominator === 0) {
    return defaultValue;
  }

  return numerator / denominator;
}

export function safeSum(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  return values.reduce((acc, val) => acc + val, 0);
}

/**
 * Percentile with linear interpolation between closest ranks.
 *
 * @param p - Percentile in [0, 100]
 * @param defaultValue - Returned for an empty sample
 *
 * @example
 * ```typescript
 * percentile([1, 2, 3, 4], 50)  // => 2.5
 * percentile([5], 99)           // => 5
 * ```
 */
export function percentile(values: readonly number[], p: number, defaultValue = 0): number {
  if (p < 0 || p > 100) {
    throw new Error('Percentile must be between 0 and 100');
  }
  if (values.length === 0) {
    return defaultValue;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const index = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const weight = index - lower;

  if (lower === upper) {
    return sorted[lower];
  }

  return sorted[lower] * (1 - weight) + sorted[upper] * weight;
}

export function median(values: readonly number[], defaultValue = 0): number {
  return percentile(values, 50, defaultValue);
}

/**
 * Population standard deviation
 */
export function standardDeviation(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }

  const mean = safeAverage(values);
  const variance = values.reduce((acc, val) => acc + (val - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

export interface Point {
  x: number;
  y: number;
}

export interface LinearFit {
  slope: number;
  intercept: number;
}

/**
 * Ordinary least-squares line through the points.
 *
 * Two points reduce to the first-to-last delta. When every x is identical
 * the slope is 0.
 */
export function linearFit(points: readonly Point[]): LinearFit {
  if (points.length === 0) {
    return { slope: 0, intercept: 0 };
  }

  const meanX = safeAverage(points.map((p) => p.x));
  const meanY = safeAverage(points.map((p) => p.y));

  let covariance = 0;
  let varianceX = 0;
  for (const { x, y } of points) {
    covariance += (x - meanX) * (y - meanY);
    varianceX += (x - meanX) ** 2;
  }

  const slope = safeDivide(covariance, varianceX);
  return { slope, intercept: meanY - slope * meanX };
}

