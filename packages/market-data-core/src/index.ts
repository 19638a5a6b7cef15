/**
 * @barwatch/market-data-core
 *
 * Pure utilities for interval math and rolling bar statistics. No I/O; all
 * timestamps are UTC epoch milliseconds.
 *
 * @example
 * ```typescript
 * import { normalizeInterval, summarize, zScore } from "@barwatch/market-data-core";
 *
 * const interval = normalizeInterval("15min"); // "15m"
 * const { mean, std } = summarize(returns);
 * const z = zScore(latestReturn, mean, std);
 * ```
 *
 * @packageDocumentation
 */

export {
  intervalToMillis,
  normalizeInterval,
  alignTimestamp,
  isAligned,
  closeTimeFor,
  lastClosedOpenTime,
} from './interval.js';

export {
  STDDEV_EPSILON,
  mean,
  sampleStdDev,
  summarize,
  zScore,
  simpleReturn,
  closeToCloseReturns,
  rangeVolatility,
} from './stats.js';
export type { SeriesStats } from './stats.js';
