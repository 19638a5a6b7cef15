/**
 * Rolling statistics over bar series.
 *
 * All functions are pure and operate on plain number arrays so the window
 * manager can compute every dimension the same way.
 */

/**
 * Standard deviations at or below this value are treated as zero, and the
 * z-score of any value against them is 0.
 */
export const STDDEV_EPSILON = 1e-12;

export interface SeriesStats {
  mean: number;
  /** Bessel-corrected sample standard deviation */
  std: number;
  count: number;
}

/**
 * Arithmetic mean; 0 for an empty array.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * Sample standard deviation with n − 1 in the denominator.
 * Fewer than two values have no spread and return 0.
 *
 * @example
 * ```typescript
 * sampleStdDev([2, 4, 4, 4, 5, 5, 7, 9]) // 2.138...
 * ```
 */
export function sampleStdDev(values: readonly number[], precomputedMean?: number): number {
  const n = values.length;
  if (n < 2) {
    return 0;
  }
  const m = precomputedMean ?? mean(values);
  let squares = 0;
  for (const value of values) {
    squares += (value - m) ** 2;
  }
  return Math.sqrt(squares / (n - 1));
}

export function summarize(values: readonly number[]): SeriesStats {
  const m = mean(values);
  return { mean: m, std: sampleStdDev(values, m), count: values.length };
}

/**
 * Standard score of value against a distribution.
 *
 * @example
 * ```typescript
 * zScore(0.03, 0, 0.01)  // 3
 * zScore(5, 5, 0)        // 0
 * ```
 */
export function zScore(value: number, distributionMean: number, std: number): number {
  if (!Number.isFinite(std) || std <= STDDEV_EPSILON) {
    return 0;
  }
  return (value - distributionMean) / std;
}

/**
 * Simple return of close over the previous close.
 */
export function simpleReturn(close: number, previousClose: number): number {
  if (previousClose === 0) {
    return 0;
  }
  return close / previousClose - 1;
}

/**
 * Returns of each close after the first, against its predecessor.
 *
 * @example
 * ```typescript
 * closeToCloseReturns([100, 110, 99]) // [0.1, -0.1]
 * ```
 */
export function closeToCloseReturns(closes: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const previous = closes[i - 1];
    const current = closes[i];
    if (previous === undefined || current === undefined) {
      continue;
    }
    returns.push(simpleReturn(current, previous));
  }
  return returns;
}

/**
 * Intrabar volatility proxy: (high − low) / close.
 */
export function rangeVolatility(bar: { high: number; low: number; close: number }): number {
  if (bar.close === 0) {
    return 0;
  }
  return (bar.high - bar.low) / bar.close;
}
