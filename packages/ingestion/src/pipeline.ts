/**
 * Live bar ingestion for the active universe.
 *
 * Every (instrument, interval) series gets its own subscription task: a pump
 * reads the feed into a bounded channel and a consumer drains it into the
 * bar store in delivery order. Dropped streams are resubscribed with capped,
 * jittered backoff, and a series with too little history is backfilled
 * before its live stream starts.
 */

import { createSilentLogger } from '@barwatch/logger';
import type { Logger } from '@barwatch/logger';
import {
  BackfillFailedError,
  FeedDisconnectedError,
  errorMessage,
  UPSERT_OUTCOMES,
  isBarwatchError,
  isWellFormedBar,
  seriesId,
  sleep,
  withTimeout,
} from '@barwatch/contracts';
import type { BarUpdate, Interval, SeriesKey, UpsertOutcome } from '@barwatch/contracts';
import type { BarStore } from '@barwatch/bar-store';
import { BoundedChannel } from './channel.js';
import { DEFAULT_BACKOFF, computeBackoffDelay } from './backoff.js';
import type { BackoffOptions } from './backoff.js';
import type { MarketDataSource } from './source.js';
import type { UniverseChange } from './universe.js';

export type IngestionStore = Pick<BarStore, 'upsert' | 'insertIfAbsent' | 'countClosed'>;

export interface IngestionPipelineOptions {
  intervals: readonly Interval[];
  /** Closed bars a series needs before scoring (W) */
  windowSize: number;
  /** Bars requested per backfill; defaults to W + 1 */
  backfillLimit?: number;
  maxBackfillAttempts?: number;
  backfillTimeoutMs?: number;
  channelCapacity?: number;
  backoff?: Partial<BackoffOptions>;
  logger?: Logger;
  random?: () => number;
}

export interface SubscriptionStats {
  instrument: string;
  interval: Interval;
  outcomes: Record<UpsertOutcome, number>;
  /** Updates dropped because the store write failed */
  writeFailures: number;
  /** Malformed or misrouted updates */
  invalidUpdates: number;
  reconnects: number;
  backfilledBars: number;
}

export interface IngestionStats {
  subscriptions: number;
  instruments: number;
  degradedInstruments: string[];
  outcomes: Record<UpsertOutcome, number>;
  writeFailures: number;
  invalidUpdates: number;
  reconnects: number;
  backfilledBars: number;
}

interface Subscription {
  key: SeriesKey;
  controller: AbortController;
  stats: SubscriptionStats;
  task: Promise<void>;
}

interface StreamResult {
  delivered: boolean;
  failure: unknown;
}

const DEFAULT_MAX_BACKFILL_ATTEMPTS = 3;
const DEFAULT_BACKFILL_TIMEOUT_MS = 10_000;
const DEFAULT_CHANNEL_CAPACITY = 256;

function emptyOutcomes(): Record<UpsertOutcome, number> {
  return { inserted: 0, updated: 0, finalized: 0, rejected: 0 };
}

/**
 * Example:
 * ```typescript
 * const pipeline = new IngestionPipeline(source, store, { intervals: ['15m'], windowSize: 16, logger });
 * const refresh = await selector.refresh();
 * if (refresh.status === 'updated') await pipeline.applyUniverse(refresh);
 * // ...
 * await pipeline.stop();
 * ```
 */
export class IngestionPipeline {
  private subscriptions = new Map<string, Subscription>();
  /** instrument -> ids of its series whose backfill gave up */
  private degraded = new Map<string, Set<string>>();
  private background = new Set<Promise<void>>();
  private stopping = false;

  private logger: Logger;
  private backoff: BackoffOptions;
  private random: () => number;
  private backfillLimit: number;
  private maxBackfillAttempts: number;
  private backfillTimeoutMs: number;
  private channelCapacity: number;

  constructor(
    private source: MarketDataSource,
    private store: IngestionStore,
    private options: IngestionPipelineOptions
  ) {
    this.logger = options.logger ?? createSilentLogger();
    this.backoff = { ...DEFAULT_BACKOFF, ...options.backoff };
    this.random = options.random ?? Math.random;
    this.backfillLimit = options.backfillLimit ?? options.windowSize + 1;
    this.maxBackfillAttempts = options.maxBackfillAttempts ?? DEFAULT_MAX_BACKFILL_ATTEMPTS;
    this.backfillTimeoutMs = options.backfillTimeoutMs ?? DEFAULT_BACKFILL_TIMEOUT_MS;
    this.channelCapacity = options.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY;
  }

  /**
   * Subscribes added instruments on every interval and unsubscribes removed
   * ones. Stored bars of removed instruments are left for retention.
   * Degraded instruments that remain get another backfill attempt.
   */
  async applyUniverse(change: UniverseChange): Promise<void> {
    const removed = new Set(change.removed);
    const aborted: Array<Promise<void>> = [];
    for (const subscription of this.subscriptions.values()) {
      if (removed.has(subscription.key.instrument)) {
        aborted.push(this.unsubscribe(subscription));
      }
    }
    for (const instrument of removed) {
      this.degraded.delete(instrument);
    }
    await Promise.all(aborted);

    if (this.stopping) {
      return;
    }

    for (const instrument of change.added) {
      for (const interval of this.options.intervals) {
        this.subscribe({ instrument, interval });
      }
    }

    for (const [instrument, seriesIds] of this.degraded) {
      for (const id of seriesIds) {
        const subscription = this.subscriptions.get(id);
        if (subscription !== undefined) {
          this.track(this.backfill(subscription, subscription.controller.signal));
        }
      }
      this.logger.info('Retrying backfill for degraded instrument', { instrument });
    }
  }

  isDegraded(instrument: string): boolean {
    return (this.degraded.get(instrument)?.size ?? 0) > 0;
  }

  degradedInstruments(): string[] {
    return [...this.degraded.keys()].filter((instrument) => this.isDegraded(instrument)).sort();
  }

  /** Series with a running subscription */
  activeSeries(): SeriesKey[] {
    return [...this.subscriptions.values()].map(({ key }) => ({ ...key }));
  }

  subscriptionStats(): SubscriptionStats[] {
    return [...this.subscriptions.values()].map(({ stats }) => ({ ...stats, outcomes: { ...stats.outcomes } }));
  }

  stats(): IngestionStats {
    const totals: IngestionStats = {
      subscriptions: this.subscriptions.size,
      instruments: new Set([...this.subscriptions.values()].map(({ key }) => key.instrument)).size,
      degradedInstruments: this.degradedInstruments(),
      outcomes: emptyOutcomes(),
      writeFailures: 0,
      invalidUpdates: 0,
      reconnects: 0,
      backfilledBars: 0,
    };
    for (const { stats } of this.subscriptions.values()) {
      for (const outcome of UPSERT_OUTCOMES) {
        totals.outcomes[outcome] += stats.outcomes[outcome];
      }
      totals.writeFailures += stats.writeFailures;
      totals.invalidUpdates += stats.invalidUpdates;
      totals.reconnects += stats.reconnects;
      totals.backfilledBars += stats.backfilledBars;
    }
    return totals;
  }

  /**
   * Aborts every feed, waits for each consumer to finish the write in
   * flight, and resolves once all subscription tasks have exited.
   */
  async stop(): Promise<void> {
    this.stopping = true;
    const subscriptions = [...this.subscriptions.values()];
    for (const subscription of subscriptions) {
      subscription.controller.abort();
    }
    await Promise.all([...subscriptions.map(({ task }) => task), ...this.background]);
    this.subscriptions.clear();
    this.logger.info('Ingestion stopped', { count: subscriptions.length });
  }

  private subscribe(key: SeriesKey): void {
    const id = seriesId(key);
    if (this.subscriptions.has(id)) {
      return;
    }

    const controller = new AbortController();
    const stats: SubscriptionStats = {
      instrument: key.instrument,
      interval: key.interval,
      outcomes: emptyOutcomes(),
      writeFailures: 0,
      invalidUpdates: 0,
      reconnects: 0,
      backfilledBars: 0,
    };
    const subscription: Subscription = { key, controller, stats, task: Promise.resolve() };
    subscription.task = this.run(subscription).catch((error: unknown) => {
      this.logger.error('Subscription task failed', {
        instrument: key.instrument,
        interval: key.interval,
        error: errorMessage(error),
      });
    });
    this.subscriptions.set(id, subscription);
  }

  private async unsubscribe(subscription: Subscription): Promise<void> {
    subscription.controller.abort();
    this.subscriptions.delete(seriesId(subscription.key));
    await subscription.task;
  }

  private async run(subscription: Subscription): Promise<void> {
    const { key, controller, stats } = subscription;
    const { signal } = controller;
    let attempt = 0;

    while (!signal.aborted) {
      await this.backfill(subscription, signal);
      if (signal.aborted) break;

      const { delivered, failure } = await this.stream(subscription, signal);
      if (signal.aborted) break;

      if (delivered) {
        attempt = 0;
      }
      const error = new FeedDisconnectedError(
        failure === null ? `Feed for ${seriesId(key)} ended` : `Feed for ${seriesId(key)} failed: ${errorMessage(failure)}`,
        { instrument: key.instrument, interval: key.interval, attempt },
        failure === null ? undefined : { cause: failure }
      );
      const delayMs = computeBackoffDelay(attempt, this.backoff, this.random);
      attempt++;
      stats.reconnects++;
      this.logger.warn('Feed disconnected, resubscribing', {
        instrument: key.instrument,
        interval: key.interval,
        error_code: error.code,
        error: error.message,
        attempt,
        delay_ms: delayMs,
      });
      await sleep(delayMs, signal);
    }
  }

  private async stream(subscription: Subscription, signal: AbortSignal): Promise<StreamResult> {
    const { key } = subscription;
    const channel = new BoundedChannel<BarUpdate>(this.channelCapacity);
    const consumer = this.consume(subscription, channel);
    let delivered = false;
    let failure: unknown = null;

    try {
      for await (const update of this.source.subscribe(key.instrument, key.interval, signal)) {
        delivered = true;
        if (signal.aborted || !(await channel.send(update))) {
          break;
        }
      }
    } catch (error) {
      if (!signal.aborted) {
        failure = error;
      }
    } finally {
      channel.close();
    }

    await consumer;
    return { delivered, failure };
  }

  private async consume(subscription: Subscription, channel: BoundedChannel<BarUpdate>): Promise<void> {
    const { key, stats } = subscription;
    for await (const update of channel) {
      if (update.instrument !== key.instrument || update.interval !== key.interval || !isWellFormedBar(update)) {
        stats.invalidUpdates++;
        this.logger.warn('Dropping malformed bar update', {
          instrument: key.instrument,
          interval: key.interval,
          open_time: update.openTime,
        });
        continue;
      }

      try {
        const outcome = await this.store.upsert(update);
        stats.outcomes[outcome]++;
        if (outcome === 'rejected') {
          this.logger.debug('Ignored update to a closed bar', {
            instrument: key.instrument,
            interval: key.interval,
            open_time: update.openTime,
          });
        }
      } catch (error) {
        // The next update for the same bar rewrites the row
        stats.writeFailures++;
        this.logger.error('Dropping bar update after store failure', {
          instrument: key.instrument,
          interval: key.interval,
          open_time: update.openTime,
          error_code: isBarwatchError(error) ? error.code : undefined,
          error: errorMessage(error),
        });
      }
    }
  }

  /**
   * Fills a series that holds fewer than W closed bars. Bars already stored
   * are never overwritten and open bars in the batch are ignored.
   */
  private async backfill(subscription: Subscription, signal: AbortSignal): Promise<void> {
    const { key, stats } = subscription;
    const id = seriesId(key);

    let lastError: unknown = null;
    for (let attempt = 0; attempt < this.maxBackfillAttempts; attempt++) {
      if (signal.aborted) return;
      try {
        const closed = await this.store.countClosed(key.instrument, key.interval);
        if (closed >= this.options.windowSize) {
          this.clearDegraded(key);
          return;
        }

        const bars = await withTimeout(
          () => this.source.fetchRecentBars(key.instrument, key.interval, this.backfillLimit),
          this.backfillTimeoutMs,
          `backfill ${id}`
        );
        let inserted = 0;
        for (const bar of bars) {
          if (!bar.isFinal || bar.instrument !== key.instrument || bar.interval !== key.interval) continue;
          if (!isWellFormedBar(bar)) continue;
          if (await this.store.insertIfAbsent(bar)) inserted++;
        }
        stats.backfilledBars += inserted;
        this.clearDegraded(key);
        this.logger.info('Backfill complete', {
          instrument: key.instrument,
          interval: key.interval,
          operation: 'backfill',
          count: inserted,
        });
        return;
      } catch (error) {
        lastError = error;
        this.logger.warn('Backfill attempt failed', {
          instrument: key.instrument,
          interval: key.interval,
          attempt: attempt + 1,
          error: errorMessage(error),
        });
        if (attempt + 1 < this.maxBackfillAttempts) {
          await sleep(computeBackoffDelay(attempt, this.backoff, this.random), signal);
        }
      }
    }

    if (signal.aborted) return;
    const failure = new BackfillFailedError(
      `Backfill for ${id} failed after ${this.maxBackfillAttempts} attempts`,
      { instrument: key.instrument, interval: key.interval, attempts: this.maxBackfillAttempts },
      lastError === null ? undefined : { cause: lastError }
    );
    const ids = this.degraded.get(key.instrument) ?? new Set<string>();
    ids.add(id);
    this.degraded.set(key.instrument, ids);
    this.logger.error('Instrument degraded', {
      instrument: key.instrument,
      interval: key.interval,
      error_code: failure.code,
      error: failure.message,
    });
  }

  private clearDegraded(key: SeriesKey): void {
    const ids = this.degraded.get(key.instrument);
    if (ids === undefined) return;
    ids.delete(seriesId(key));
    if (ids.size === 0) {
      this.degraded.delete(key.instrument);
      this.logger.info('Instrument recovered', { instrument: key.instrument });
    }
  }

  private track(work: Promise<void>): void {
    const tracked = work.catch((error: unknown) => {
      this.logger.error('Background backfill failed', { error: errorMessage(error) });
    });
    this.background.add(tracked);
    void tracked.then(() => this.background.delete(tracked));
  }
}
