/**
 * @fileoverview Error taxonomy for barwatch.
 *
 * Every error carries a machine-readable code, a structured data payload and
 * an ISO timestamp. None of these errors is fatal to a running service: each
 * component decides whether to retry, skip or surface it in health.
 *
 * @module @barwatch/contracts/errors
 */

import type { Interval } from './intervals.js';

/**
 * Base error class for all barwatch errors.
 *
 * @invariant code is a non-empty string
 * @invariant timestamp is a valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new BarwatchError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class BarwatchError extends Error {
  /** Machine-readable error code, e.g. 'FEED_DISCONNECTED' */
  readonly code: string;

  readonly data?: Record<string, unknown>;

  /** ISO 8601 creation time */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.timestamp = new Date().toISOString();
    if (data !== undefined) {
      this.data = data;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * The live stream of a subscription failed or ended. The pipeline
 * resubscribes with backoff.
 */
export class FeedDisconnectedError extends BarwatchError {
  constructor(
    message: string,
    data: { instrument: string; interval: Interval; attempt: number; [key: string]: unknown },
    options?: ErrorOptions
  ) {
    super('FEED_DISCONNECTED', message, data, options);
  }
}

/**
 * Historical bars could not be fetched after every retry. The instrument is
 * degraded until a later backfill succeeds.
 */
export class BackfillFailedError extends BarwatchError {
  constructor(
    message: string,
    data: { instrument: string; interval: Interval; attempts: number; [key: string]: unknown },
    options?: ErrorOptions
  ) {
    super('BACKFILL_FAILED', message, data, options);
  }
}

/**
 * A bar write failed. The update is dropped; the next update for the same
 * key rewrites the row.
 */
export class StoreWriteFailedError extends BarwatchError {
  constructor(
    message: string,
    data: { instrument: string; interval: Interval; openTime: number; [key: string]: unknown },
    options?: ErrorOptions
  ) {
    super('STORE_WRITE_FAILED', message, data, options);
  }
}

/**
 * A retention step failed. Retried on the next sweep.
 */
export class RetentionFailureError extends BarwatchError {
  constructor(message: string, data: { step: string; [key: string]: unknown }, options?: ErrorOptions) {
    super('RETENTION_FAILURE', message, data, options);
  }
}

/**
 * Upstream data needed for a decision (such as a market snapshot) was empty
 * or could not be fetched.
 */
export class DataUnavailableError extends BarwatchError {
  constructor(message: string, data: { source: string; [key: string]: unknown }, options?: ErrorOptions) {
    super('DATA_UNAVAILABLE', message, data, options);
  }
}

/**
 * An update targeted a bar that is already final.
 */
export class ClosedBarImmutableError extends BarwatchError {
  constructor(
    message: string,
    data: { instrument: string; interval: Interval; openTime: number; [key: string]: unknown }
  ) {
    super('CLOSED_BAR_IMMUTABLE', message, data);
  }
}

/**
 * A bounded operation did not settle within its time limit.
 */
export class OperationTimeoutError extends BarwatchError {
  constructor(message: string, data: { operation: string; timeoutMs: number; [key: string]: unknown }) {
    super('OPERATION_TIMEOUT', message, data);
  }
}

/**
 * Startup configuration failed validation.
 */
export class ConfigValidationError extends BarwatchError {
  constructor(message: string, data: { issues: string[]; [key: string]: unknown }) {
    super('CONFIG_INVALID', message, data);
  }
}

export function isBarwatchError(error: unknown): error is BarwatchError {
  return error instanceof BarwatchError;
}

export function isFeedDisconnectedError(error: unknown): error is FeedDisconnectedError {
  return error instanceof FeedDisconnectedError;
}

export function isBackfillFailedError(error: unknown): error is BackfillFailedError {
  return error instanceof BackfillFailedError;
}

export function isStoreWriteFailedError(error: unknown): error is StoreWriteFailedError {
  return error instanceof StoreWriteFailedError;
}

export function isRetentionFailureError(error: unknown): error is RetentionFailureError {
  return error instanceof RetentionFailureError;
}

export function isDataUnavailableError(error: unknown): error is DataUnavailableError {
  return error instanceof DataUnavailableError;
}

export function isClosedBarImmutableError(error: unknown): error is ClosedBarImmutableError {
  return error instanceof ClosedBarImmutableError;
}

export function isOperationTimeoutError(error: unknown): error is OperationTimeoutError {
  return error instanceof OperationTimeoutError;
}

export function isConfigValidationError(error: unknown): error is ConfigValidationError {
  return error instanceof ConfigValidationError;
}

/**
 * Message of an unknown thrown value, for log fields.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
