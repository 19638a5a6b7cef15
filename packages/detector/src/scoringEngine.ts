/**
 * Anomaly scoring for closed bars.
 *
 * Each bar is compared with the W closed bars before it along three
 * dimensions (return, volume, intrabar range). Dimensions whose |z| reaches
 * their threshold are combined into a weighted composite score.
 */

import { createSilentLogger, startTimer } from '@barwatch/logger';
import type { Logger } from '@barwatch/logger';
import { ANOMALY_DIMENSIONS, errorMessage, seriesId, withTimeout } from '@barwatch/contracts';
import type { AnomalyDimension, AnomalyRecord, SeriesKey, StoredBar } from '@barwatch/contracts';
import { rangeVolatility, simpleReturn, zScore } from '@barwatch/market-data-core';
import type { AnomalySink, BarStore } from '@barwatch/bar-store';
import type { DetectorConfig } from './config.js';
import { volumeOf } from './windowManager.js';
import type { WindowManager, WindowSummary } from './windowManager.js';

export type SkipReason = 'not-final' | 'degraded' | 'insufficient-window';

export type ScoreOutcome =
  | { status: 'scored'; record: AnomalyRecord; written: boolean }
  | { status: 'skipped'; reason: SkipReason };

export interface ScoringPassResult {
  /** Series considered */
  series: number;
  scored: number;
  /** Records newly written to the sink */
  written: number;
  /** Scored bars with at least one triggered dimension */
  anomalies: number;
  skipped: number;
  failed: number;
  durationMs: number;
}

export interface ScoringEngineOptions {
  logger?: Logger;
  /** Instruments whose history is incomplete are not scored */
  isDegraded?: (instrument: string) => boolean;
  /** 24h quote volume recorded alongside each result */
  quoteVolume24h?: (instrument: string) => number | null;
  now?: () => number;
}

/**
 * Scores a bar against the summary of the window preceding it.
 */
export function scoreAgainstWindow(
  bar: StoredBar,
  summary: WindowSummary,
  config: DetectorConfig,
  extras: { quoteVolume24h: number | null; createdAt: number }
): AnomalyRecord {
  const currentReturn = simpleReturn(bar.close, summary.lastClose);
  const currentVolume = volumeOf(bar, config.volumeSource);
  const currentVolatility = rangeVolatility(bar);

  const z: Record<AnomalyDimension, number> = {
    price: zScore(currentReturn, summary.returns.mean, summary.returns.std),
    volume: zScore(currentVolume, summary.volume.mean, summary.volume.std),
    volatility: zScore(currentVolatility, summary.volatility.mean, summary.volatility.std),
  };

  const triggered: Record<AnomalyDimension, boolean> = {
    price: Math.abs(z.price) >= config.priceZThreshold && Math.abs(currentReturn) >= config.minAbsReturn,
    volume: Math.abs(z.volume) >= config.volumeZThreshold,
    volatility: Math.abs(z.volatility) >= config.volatilityZThreshold,
  };

  const reasons = ANOMALY_DIMENSIONS.filter((dimension) => triggered[dimension]);
  const compositeScore = reasons.reduce((sum, dimension) => sum + config.weights[dimension] * Math.abs(z[dimension]), 0);

  return {
    instrument: bar.instrument,
    timestamp: bar.openTime,
    intervalType: bar.interval,
    closePrice: bar.close,
    currentReturn,
    currentVolume,
    currentVolatility,
    priceZ: z.price,
    volumeZ: z.volume,
    volatilityZ: z.volatility,
    compositeScore,
    reasons,
    isAnomaly: reasons.length > 0,
    quoteVolume24h: extras.quoteVolume24h,
    createdAt: extras.createdAt,
  };
}

/**
 * Example:
 * ```typescript
 * const engine = new AnomalyScoringEngine(windows, sink, store, config, {
 *   logger,
 *   isDegraded: (instrument) => pipeline.isDegraded(instrument),
 *   quoteVolume24h: (instrument) => universe.quoteVolume24h(instrument),
 * });
 *
 * events.on('finalized', ({ bar }) => engine.scoreBar(bar).then(() => undefined));
 * const result = await engine.runPass(keys);
 * ```
 */
export class AnomalyScoringEngine {
  private logger: Logger;
  private now: () => number;

  constructor(
    private windows: WindowManager,
    private sink: Pick<AnomalySink, 'upsert'>,
    private store: Pick<BarStore, 'latestClosed'>,
    private config: DetectorConfig,
    private options: ScoringEngineOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? Date.now;
  }

  /**
   * Scores one bar and records the result according to the record policy.
   * Scoring a bar that already has a record leaves the record unchanged.
   */
  async scoreBar(bar: StoredBar): Promise<ScoreOutcome> {
    if (!bar.isFinal) {
      return { status: 'skipped', reason: 'not-final' };
    }
    if (this.options.isDegraded?.(bar.instrument) === true) {
      return { status: 'skipped', reason: 'degraded' };
    }

    const window = await this.windows.summarize(bar.instrument, bar.interval, { before: bar.openTime });
    if (window.status === 'insufficient') {
      this.logger.debug('Window not ready', {
        instrument: bar.instrument,
        interval: bar.interval,
        count: window.available,
        required: window.required,
      });
      return { status: 'skipped', reason: 'insufficient-window' };
    }

    const record = scoreAgainstWindow(bar, window.summary, this.config, {
      quoteVolume24h: this.options.quoteVolume24h?.(bar.instrument) ?? null,
      createdAt: this.now(),
    });

    const shouldWrite = this.config.recordPolicy === 'all' || record.compositeScore > 0;
    const written = shouldWrite ? await this.sink.upsert(record) : false;

    if (written && record.isAnomaly) {
      this.logger.info('Anomaly recorded', {
        instrument: record.instrument,
        interval: record.intervalType,
        open_time: record.timestamp,
        composite_score: record.compositeScore,
        reasons: record.reasons,
      });
    }

    return { status: 'scored', record, written };
  }

  /**
   * Scores the latest closed bar of every series. A failure or timeout on
   * one series is logged and counted; the pass continues.
   */
  async runPass(keys: readonly SeriesKey[]): Promise<ScoringPassResult> {
    const timer = startTimer();
    const result: ScoringPassResult = {
      series: keys.length,
      scored: 0,
      written: 0,
      anomalies: 0,
      skipped: 0,
      failed: 0,
      durationMs: 0,
    };

    for (const key of keys) {
      try {
        const outcome = await withTimeout(
          () => this.scoreLatest(key),
          this.config.scoringTimeoutMs,
          `scoring ${seriesId(key)}`
        );
        if (outcome.status === 'skipped') {
          result.skipped++;
          continue;
        }
        result.scored++;
        if (outcome.written) result.written++;
        if (outcome.record.isAnomaly) result.anomalies++;
      } catch (error) {
        result.failed++;
        this.logger.warn('Scoring failed', {
          instrument: key.instrument,
          interval: key.interval,
          error_code: error instanceof Error && 'code' in error ? String(error.code) : undefined,
          error: errorMessage(error),
        });
      }
    }

    result.durationMs = timer.stop();
    this.logger.info('Scoring pass finished', {
      operation: 'scoring-pass',
      duration_ms: result.durationMs,
      count: result.series,
      scored: result.scored,
      written: result.written,
      anomalies: result.anomalies,
      skipped: result.skipped,
      failed: result.failed,
    });
    return result;
  }

  private async scoreLatest(key: SeriesKey): Promise<ScoreOutcome> {
    const latest = await this.store.latestClosed(key.instrument, key.interval);
    if (latest === null) {
      return { status: 'skipped', reason: 'insufficient-window' };
    }
    return this.scoreBar(latest);
  }
}
