/**
 * @fileoverview Main entry point for @barwatch/contracts.
 *
 * @module @barwatch/contracts
 */

// Intervals
export { INTERVALS, isInterval, getIntervalLabel, compareIntervals } from './intervals.js';
export type { Interval } from './intervals.js';

// Bars
export { seriesId, isWellFormedBar, UPSERT_OUTCOMES } from './bars.js';
export type { BarKey, SeriesKey, BarUpdate, StoredBar, UpsertOutcome, MarketTicker } from './bars.js';

// Anomalies
export { ANOMALY_DIMENSIONS } from './anomaly.js';
export type { AnomalyDimension, AnomalyRecord, AnomalyQuery } from './anomaly.js';

// Error classes and guards
export {
  BarwatchError,
  FeedDisconnectedError,
  BackfillFailedError,
  StoreWriteFailedError,
  RetentionFailureError,
  DataUnavailableError,
  ClosedBarImmutableError,
  OperationTimeoutError,
  ConfigValidationError,
  isBarwatchError,
  isFeedDisconnectedError,
  isBackfillFailedError,
  isStoreWriteFailedError,
  isRetentionFailureError,
  isDataUnavailableError,
  isClosedBarImmutableError,
  isOperationTimeoutError,
  isConfigValidationError,
  errorMessage,
} from './errors.js';

// Timing helpers
export { sleep, withTimeout } from './async.js';
