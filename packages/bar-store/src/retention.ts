/**
 * Retention manager for bars and anomaly records.
 *
 * Each sweep runs every step even when an earlier step fails, so one
 * failing table never blocks the others. A failed step is retried on the
 * next sweep.
 */

import { createSilentLogger, startTimer } from '@barwatch/logger'
import type { Logger } from '@barwatch/logger'
import { ConfigValidationError, RetentionFailureError } from '@barwatch/contracts'
import type { Interval } from '@barwatch/contracts'
import { intervalToMillis } from '@barwatch/market-data-core'
import type { BarStore } from './barStore.js'
import type { AnomalySink } from './anomalySink.js'

const HOUR_MS = 60 * 60 * 1000

/**
 * Storage bounds. A value of 0 disables that bound.
 */
export interface RetentionPolicy {
  /** Bars and records older than now − maxAgeMs are deleted */
  maxAgeMs: number
  maxRowsPerSeries: number
  maxTotalRows: number
  maxStorageBytes: number
  maxAnomalyRows: number
}

export const DEFAULT_RETENTION_POLICY: RetentionPolicy = {
  maxAgeMs: 24 * HOUR_MS,
  maxRowsPerSeries: 10_000,
  maxTotalRows: 0,
  maxStorageBytes: 100 * 1024 * 1024,
  maxAnomalyRows: 0,
}

export type RetentionStep = 'bars-age' | 'anomalies-age' | 'bars-per-series' | 'bars-global-cap' | 'anomalies-cap'

export interface RetentionStepResult {
  step: RetentionStep
  deleted: number
  error?: RetentionFailureError
}

export interface RetentionSweepResult {
  startedAt: number
  cutoff: number
  durationMs: number
  steps: RetentionStepResult[]
  totalDeleted: number
  failures: number
}

export interface RetentionManagerOptions {
  logger?: Logger
}

/**
 * Example:
 * ```typescript
 * const manager = new RetentionManager(bars, anomalies, policy, { logger })
 * const result = await manager.sweep()
 * logger.info('Sweep done', { count: result.totalDeleted })
 * ```
 */
export class RetentionManager {
  private logger: Logger
  private failureStreak = 0
  private last: RetentionSweepResult | null = null

  constructor(
    private bars: BarStore,
    private anomalies: AnomalySink,
    private policy: RetentionPolicy,
    options: RetentionManagerOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger()
  }

  /**
   * Sweeps that had at least one failing step, in a row.
   */
  get consecutiveFailures(): number {
    return this.failureStreak
  }

  get lastSweep(): RetentionSweepResult | null {
    return this.last
  }

  async sweep(now: number = Date.now(), overrides: Partial<RetentionPolicy> = {}): Promise<RetentionSweepResult> {
    const policy = { ...this.policy, ...overrides }
    const timer = startTimer()
    const cutoff = now - policy.maxAgeMs

    const steps: RetentionStepResult[] = []
    steps.push(await this.runStep('bars-age', () => this.bars.deleteOlderThan(cutoff)))
    steps.push(await this.runStep('anomalies-age', () => this.anomalies.deleteOlderThan(cutoff)))
    steps.push(await this.runStep('bars-per-series', () => this.bars.deleteExcessPerSeries(policy.maxRowsPerSeries)))
    steps.push(
      await this.runStep('bars-global-cap', () =>
        this.bars.deleteOldestUntilWithinCap(policy.maxTotalRows, policy.maxStorageBytes)
      )
    )
    steps.push(
      await this.runStep('anomalies-cap', () => this.anomalies.deleteOldestUntilWithinCap(policy.maxAnomalyRows))
    )

    const failures = steps.filter((s) => s.error !== undefined).length
    this.failureStreak = failures > 0 ? this.failureStreak + 1 : 0

    const result: RetentionSweepResult = {
      startedAt: now,
      cutoff,
      durationMs: timer.stop(),
      steps,
      totalDeleted: steps.reduce((sum, s) => sum + s.deleted, 0),
      failures,
    }
    this.last = result

    const level = failures > 0 ? 'warn' : 'info'
    this.logger.log(level, 'Retention sweep finished', {
      operation: 'retention-sweep',
      count: result.totalDeleted,
      duration_ms: result.durationMs,
      failures,
      consecutive_failures: this.failureStreak,
      deleted: Object.fromEntries(steps.map((s) => [s.step, s.deleted])),
    })

    return result
  }

  private async runStep(step: RetentionStep, fn: () => Promise<number>): Promise<RetentionStepResult> {
    try {
      return { step, deleted: await fn() }
    } catch (error) {
      const failure = new RetentionFailureError(
        `Retention step ${step} failed: ${error instanceof Error ? error.message : String(error)}`,
        { step },
        { cause: error }
      )
      this.logger.error('Retention step failed', {
        operation: step,
        error_code: failure.code,
        error: failure.message,
      })
      return { step, deleted: 0, error: failure }
    }
  }
}

/**
 * Startup check: the age bound must leave room for a full detection
 * window (plus one bar for the preceding close) at every interval.
 *
 * @throws ConfigValidationError listing every violated bound
 */
export function validateRetentionPolicy(
  policy: RetentionPolicy,
  windowSize: number,
  intervals: readonly Interval[]
): void {
  const issues: string[] = []

  if (policy.maxAgeMs <= 0) {
    issues.push('maxAgeMs must be positive')
  }
  for (const [name, value] of [
    ['maxRowsPerSeries', policy.maxRowsPerSeries],
    ['maxTotalRows', policy.maxTotalRows],
    ['maxStorageBytes', policy.maxStorageBytes],
    ['maxAnomalyRows', policy.maxAnomalyRows],
  ] as const) {
    if (value < 0) {
      issues.push(`${name} must not be negative`)
    }
  }
  if (policy.maxRowsPerSeries > 0 && policy.maxRowsPerSeries < windowSize + 1) {
    issues.push(`maxRowsPerSeries (${policy.maxRowsPerSeries}) must hold at least ${windowSize + 1} bars`)
  }

  for (const interval of intervals) {
    const required = windowSize * intervalToMillis(interval)
    if (policy.maxAgeMs <= required) {
      issues.push(
        `maxAgeMs (${policy.maxAgeMs}) must exceed ${windowSize} × ${interval} (${required}ms) to keep a full window`
      )
    }
  }

  if (issues.length > 0) {
    throw new ConfigValidationError(`Invalid retention policy: ${issues.join('; ')}`, { issues })
  }
}
