/**
 * Reconnect and retry delays.
 */

export interface BackoffOptions {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Fraction of the delay added or removed at random, 0 to 1 */
  jitter: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  initialDelayMs: 1000,
  maxDelayMs: 60_000,
  multiplier: 2,
  jitter: 0.2,
};

/**
 * Delay before retry number `attempt` (0-based):
 * `initialDelayMs × multiplier^attempt`, capped at `maxDelayMs`, then moved
 * by up to ±jitter of itself and capped again.
 *
 * @example
 * ```typescript
 * computeBackoffDelay(3, DEFAULT_BACKOFF, () => 0.5) // 8000
 * computeBackoffDelay(10, DEFAULT_BACKOFF, () => 0.5) // 60000
 * ```
 */
export function computeBackoffDelay(
  attempt: number,
  options: BackoffOptions = DEFAULT_BACKOFF,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt);
  const base = Math.min(options.initialDelayMs * Math.pow(options.multiplier, exponent), options.maxDelayMs);
  const offset = base * options.jitter * (random() * 2 - 1);
  return Math.round(Math.max(0, Math.min(base + offset, options.maxDelayMs)));
}
