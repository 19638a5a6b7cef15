/**
 * Interval manipulation utilities.
 *
 * This module provides functions for:
 * - Normalizing interval strings (e.g., "15min" → "15m")
 * - Converting intervals to milliseconds
 * - Aligning timestamps to interval boundaries
 *
 * All functions assume UTC. Sources convert exchange times to UTC epoch
 * milliseconds before calling these functions.
 */

import { INTERVALS, isInterval } from '@barwatch/contracts';
import type { Interval } from '@barwatch/contracts';

/**
 * Duration of each canonical interval in milliseconds.
 *
 * Invariants:
 * - All values are positive integers
 * - Each interval is an integer multiple of 1m
 */
const INTERVAL_MS: Record<Interval, number> = {
  '1m': 60_000,
  '3m': 180_000,
  '5m': 300_000,
  '15m': 900_000,
  '30m': 1_800_000,
  '1h': 3_600_000,
  '2h': 7_200_000,
  '4h': 14_400_000,
  '1d': 86_400_000,
};

const MS_TO_INTERVAL = new Map<number, Interval>(INTERVALS.map((interval) => [INTERVAL_MS[interval], interval]));

/**
 * Aliases for common non-canonical notations ("1min", "60s", "D", "1hour").
 */
const INTERVAL_ALIASES: Record<string, number> = {
  '1min': 60_000,
  '60s': 60_000,
  minute: 60_000,

  '3min': 180_000,
  '180s': 180_000,

  '5min': 300_000,
  '300s': 300_000,

  '15min': 900_000,
  '900s': 900_000,

  '30min': 1_800_000,
  '1800s': 1_800_000,

  '1hour': 3_600_000,
  hour: 3_600_000,
  '60m': 3_600_000,
  '3600s': 3_600_000,

  '2hour': 7_200_000,
  '120m': 7_200_000,

  '4hour': 14_400_000,
  '240m': 14_400_000,

  '1D': 86_400_000,
  D: 86_400_000,
  day: 86_400_000,
  daily: 86_400_000,
  '1440m': 86_400_000,
};

/**
 * @example
 * ```typescript
 * intervalToMillis("1m")   // 60000
 * intervalToMillis("4h")   // 14400000
 * ```
 */
export function intervalToMillis(interval: Interval): number {
  return INTERVAL_MS[interval];
}

/**
 * Normalizes an interval string to canonical form.
 *
 * @throws Error if the input is not a recognized interval
 *
 * @example
 * ```typescript
 * normalizeInterval("15m")    // "15m"
 * normalizeInterval("15min")  // "15m"
 * normalizeInterval("D")      // "1d"
 * normalizeInterval("10m")    // Error: Unsupported interval: 10m
 * ```
 *
 * Edge cases:
 * - Leading/trailing whitespace is trimmed
 * - Case matters: "1M" is not "1m"
 */
export function normalizeInterval(input: string): Interval {
  const value = input.trim();
  if (isInterval(value)) {
    return value;
  }

  const ms = INTERVAL_ALIASES[value];
  if (ms !== undefined) {
    const canonical = MS_TO_INTERVAL.get(ms);
    if (canonical) {
      return canonical;
    }
  }

  throw new Error(`Unsupported interval: ${input}. Must be one of: ${INTERVALS.join(', ')}`);
}

/**
 * Aligns a timestamp to an interval boundary.
 *
 * @example
 * ```typescript
 * const ts = 1633024859000; // 2021-09-30T18:00:59.000Z
 * alignTimestamp(ts, "5m", "floor"); // 1633024800000 (18:00:00)
 * alignTimestamp(ts, "5m", "ceil");  // 1633025100000 (18:05:00)
 * ```
 *
 * An already aligned timestamp is returned unchanged in both directions.
 */
export function alignTimestamp(timestamp: number, interval: Interval, direction: 'floor' | 'ceil'): number {
  const ms = intervalToMillis(interval);
  if (direction === 'floor') {
    return Math.floor(timestamp / ms) * ms;
  }
  return Math.ceil(timestamp / ms) * ms;
}

export function isAligned(timestamp: number, interval: Interval): boolean {
  return timestamp % intervalToMillis(interval) === 0;
}

/**
 * Close time of the bar opening at openTime: the last millisecond of its
 * period, following exchange kline convention.
 */
export function closeTimeFor(openTime: number, interval: Interval): number {
  return openTime + intervalToMillis(interval) - 1;
}

/**
 * openTime of the most recent bar whose period has fully elapsed at `now`.
 *
 * @example
 * ```typescript
 * lastClosedOpenTime(Date.UTC(2024, 0, 1, 10, 7), "5m") // 10:00 (the 10:05 bar is still open)
 * ```
 */
export function lastClosedOpenTime(now: number, interval: Interval): number {
  return alignTimestamp(now, interval, 'floor') - intervalToMillis(interval);
}
