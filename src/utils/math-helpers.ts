/**
 * Math Helper Utilities
 *
 * Statistics used when reducing a trial. Every helper returns a finite
 * default instead of NaN for empty input or a zero denominator.
 */

/**
 * Divide, returning `defaultValue` when the denominator is 0
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

/**
 * Arithmetic mean, `defaultValue` for an empty array
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * Percentage of `part` in `whole` (0-100), 0 when `whole` is 0
 *
 * @example
 * ```typescript
 * percentage(3, 4)  // => 75
 * percentage(0, 0)  // => 0
 * ```
 */
export function percentage(part: number, whole: number): number {
  return safeDivide(part, whole) * 100;
}

/**
 * Nearest-rank percentile over an ascending array
 *
 * @param sorted - Values sorted ascending
 * @param p - Quantile in [0, 1]
 *
 * @example
 * ```typescript
 * percentile([10, 20, 30, 40], 0.5)   // => 20
 * percentile([10, 20, 30, 40], 0.95)  // => 40
 * percentile([], 0.99)                // => 0
 * ```
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    return 0;
  }
  const index = Math.ceil(sorted.length * p) - 1;
  return sorted[Math.min(sorted.length - 1, Math.max(0, index))] ?? 0;
}

/**
 * Clamp a reading to a finite non-negative number
 */
export function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}
