/**
 * @fileoverview Bar interval enumeration.
 *
 * Canonical interval names follow the exchange kline notation. Duration math
 * lives in @barwatch/market-data-core.
 *
 * @module @barwatch/contracts/intervals
 */

/**
 * Supported bar intervals, ordered from smallest to largest duration.
 */
export const INTERVALS = ['1m', '3m', '5m', '15m', '30m', '1h', '2h', '4h', '1d'] as const;

export type Interval = (typeof INTERVALS)[number];

const INTERVAL_LABELS: Record<Interval, string> = {
  '1m': '1 Minute',
  '3m': '3 Minutes',
  '5m': '5 Minutes',
  '15m': '15 Minutes',
  '30m': '30 Minutes',
  '1h': '1 Hour',
  '2h': '2 Hours',
  '4h': '4 Hours',
  '1d': 'Daily',
};

/**
 * @example
 * ```typescript
 * isInterval('15m')  // true
 * isInterval('10m')  // false
 * ```
 */
export function isInterval(value: string): value is Interval {
  return INTERVALS.some((interval) => interval === value);
}

export function getIntervalLabel(interval: Interval): string {
  return INTERVAL_LABELS[interval];
}

/**
 * Compares two intervals by duration.
 *
 * @returns Negative if a is shorter than b, positive if longer, zero if equal
 */
export function compareIntervals(a: Interval, b: Interval): number {
  return INTERVALS.indexOf(a) - INTERVALS.indexOf(b);
}
