/**
 * @fileoverview Performance timing utilities
 * High-resolution timers (performance.now()) for pass and call durations.
 */

export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Milliseconds since start, or the final duration once stopped */
  elapsed(): number;

  /** Stops the timer; repeated calls return the same duration */
  stop(): number;

  isRunning(): boolean;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * await manager.sweep();
 * logger.info('Sweep finished', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    get startTime() {
      return startTime;
    },

    elapsed(): number {
      return Math.round((endTime ?? performance.now()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = performance.now();
      }
      return Math.round(endTime - startTime);
    },

    isRunning(): boolean {
      return endTime === null;
    },
  };
}

/**
 * Measures an async function.
 *
 * @example
 * ```typescript
 * const { result, duration_ms } = await measureAsync(() => store.deleteOlderThan(cutoff));
 * ```
 */
export async function measureAsync<T>(
  fn: () => Promise<T>
): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
