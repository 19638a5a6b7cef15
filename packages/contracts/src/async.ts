/**
 * @fileoverview Timing helpers shared by the ingestion and detection loops.
 *
 * @module @barwatch/contracts/async
 */

import { OperationTimeoutError } from './errors.js';

/**
 * Resolves after ms, or as soon as the signal aborts. Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Races work against a timer.
 *
 * The work itself is not cancelled on timeout; its eventual result is
 * discarded.
 *
 * @throws OperationTimeoutError if the work has not settled after timeoutMs
 *
 * @example
 * ```typescript
 * const bars = await withTimeout(() => source.fetchRecentBars('BTCUSDT', '15m', 17), 10_000, 'backfill');
 * ```
 */
export function withTimeout<T>(work: () => Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(
        new OperationTimeoutError(`${operation} timed out after ${timeoutMs}ms`, {
          operation,
          timeoutMs,
        })
      );
    }, timeoutMs);

    work().then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
