/**
 * The active instrument universe and the selector that refreshes it from
 * market snapshots.
 */

import { createSilentLogger } from '@barwatch/logger';
import type { Logger } from '@barwatch/logger';
import { DataUnavailableError, errorMessage, withTimeout } from '@barwatch/contracts';
import type { MarketTicker } from '@barwatch/contracts';
import type { MarketDataSource } from './source.js';

export interface UniverseChange {
  added: string[];
  removed: string[];
}

/**
 * Ordered set of instruments under observation, most liquid first.
 * One instance is shared by the selector, the pipeline and health reporting.
 */
export class Universe {
  private entries = new Map<string, number>();

  get size(): number {
    return this.entries.size;
  }

  instruments(): string[] {
    return [...this.entries.keys()];
  }

  has(instrument: string): boolean {
    return this.entries.has(instrument);
  }

  /** 24h quote volume at the last refresh, or null outside the universe */
  quoteVolume24h(instrument: string): number | null {
    return this.entries.get(instrument) ?? null;
  }

  replace(tickers: readonly MarketTicker[]): UniverseChange {
    const next = new Map(tickers.map((ticker) => [ticker.instrument, ticker.quoteVolume24h] as const));
    const added = [...next.keys()].filter((instrument) => !this.entries.has(instrument));
    const removed = [...this.entries.keys()].filter((instrument) => !next.has(instrument));
    this.entries = next;
    return { added, removed };
  }
}

export interface UniverseSelectorOptions {
  topN: number;
  minQuoteVolume: number;
  /** Only instruments ending in this quote asset, e.g. 'USDT' */
  quoteAsset?: string;
  /** Kept whenever the snapshot lists them, regardless of volume or rank */
  includeInstruments?: readonly string[];
  /** Never selected */
  excludeInstruments?: readonly string[];
  fetchTimeoutMs?: number;
  logger?: Logger;
}

export type UniverseRefreshResult =
  | { status: 'updated'; added: string[]; removed: string[]; size: number }
  | { status: 'unavailable'; error: DataUnavailableError; size: number };

const DEFAULT_FETCH_TIMEOUT_MS = 15_000;

function byQuoteVolume(a: MarketTicker, b: MarketTicker): number {
  return b.quoteVolume24h - a.quoteVolume24h || (a.instrument < b.instrument ? -1 : a.instrument > b.instrument ? 1 : 0);
}

/**
 * Picks the instruments to observe from a snapshot: the `topN` most liquid
 * above `minQuoteVolume`, plus pinned instruments, minus excluded ones.
 * The result is ordered by quote volume descending, then by name.
 */
export function selectInstruments(
  snapshot: readonly MarketTicker[],
  options: Pick<UniverseSelectorOptions, 'topN' | 'minQuoteVolume' | 'quoteAsset' | 'includeInstruments' | 'excludeInstruments'>
): MarketTicker[] {
  const excluded = new Set(options.excludeInstruments ?? []);
  const pinned = new Set(options.includeInstruments ?? []);
  const quoteAsset = options.quoteAsset;

  const candidates = new Map<string, MarketTicker>();
  for (const ticker of snapshot) {
    if (excluded.has(ticker.instrument) || !Number.isFinite(ticker.quoteVolume24h)) continue;
    if (quoteAsset !== undefined && !ticker.instrument.endsWith(quoteAsset)) continue;
    candidates.set(ticker.instrument, ticker);
  }

  const ranked = [...candidates.values()]
    .filter((ticker) => ticker.quoteVolume24h >= options.minQuoteVolume)
    .sort(byQuoteVolume)
    .slice(0, Math.max(0, options.topN));

  const selected = new Map(ranked.map((ticker) => [ticker.instrument, ticker] as const));
  for (const instrument of pinned) {
    const ticker = candidates.get(instrument);
    if (ticker !== undefined) {
      selected.set(instrument, ticker);
    }
  }

  return [...selected.values()].sort(byQuoteVolume);
}

/**
 * Example:
 * ```typescript
 * const universe = new Universe();
 * const selector = new UniverseSelector(source, universe, { topN: 150, minQuoteVolume: 5000 });
 * const result = await selector.refresh();
 * if (result.status === 'updated') {
 *   await pipeline.applyUniverse(result);
 * }
 * ```
 */
export class UniverseSelector {
  private logger: Logger;

  constructor(
    private source: Pick<MarketDataSource, 'fetchMarketSnapshot'>,
    private universe: Universe,
    private options: UniverseSelectorOptions
  ) {
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Replaces the universe from a fresh snapshot. When the snapshot cannot
   * be fetched or selects nothing, the current universe stays as it is.
   */
  async refresh(): Promise<UniverseRefreshResult> {
    let snapshot: MarketTicker[];
    try {
      snapshot = await withTimeout(
        () => this.source.fetchMarketSnapshot(),
        this.options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
        'market snapshot'
      );
    } catch (error) {
      return this.unavailable(`Market snapshot failed: ${errorMessage(error)}`, error);
    }

    const selected = selectInstruments(snapshot, this.options);
    if (selected.length === 0) {
      return this.unavailable(
        snapshot.length === 0 ? 'Market snapshot was empty' : 'No instrument passed the universe filters'
      );
    }

    const { added, removed } = this.universe.replace(selected);
    this.logger.info('Universe refreshed', {
      operation: 'universe-refresh',
      count: this.universe.size,
      added: added.length,
      removed: removed.length,
    });
    return { status: 'updated', added, removed, size: this.universe.size };
  }

  private unavailable(message: string, cause?: unknown): UniverseRefreshResult {
    const error = new DataUnavailableError(
      message,
      { source: 'market-snapshot', retainedSize: this.universe.size },
      cause === undefined ? undefined : { cause }
    );
    this.logger.warn('Universe refresh skipped, keeping current universe', {
      operation: 'universe-refresh',
      error_code: error.code,
      error: error.message,
      count: this.universe.size,
    });
    return { status: 'unavailable', error, size: this.universe.size };
  }
}
