/**
 * @fileoverview Bar contracts shared by ingestion, storage and detection.
 *
 * @module @barwatch/contracts/bars
 */

import type { Interval } from './intervals.js';

/**
 * Identity of a stored bar. At most one bar exists per key.
 */
export interface BarKey {
  instrument: string;
  interval: Interval;
  /** Epoch milliseconds (UTC) at which the bar opens */
  openTime: number;
}

/**
 * A series is every bar of one instrument at one interval.
 */
export interface SeriesKey {
  instrument: string;
  interval: Interval;
}

/**
 * A bar as delivered by a market data source, live or historical.
 *
 * @invariant high >= max(open, close) and low <= min(open, close)
 * @invariant closeTime > openTime
 * @invariant volume, quoteVolume and tradeCount are >= 0
 *
 * @example
 * ```typescript
 * const update: BarUpdate = {
 *   instrument: 'BTCUSDT',
 *   interval: '15m',
 *   openTime: 1_700_000_100_000,
 *   closeTime: 1_700_001_000_000 - 1,
 *   open: 37_000, high: 37_250, low: 36_900, close: 37_200,
 *   volume: 120.5, quoteVolume: 4_460_000, tradeCount: 3_120,
 *   isFinal: true,
 * };
 * ```
 */
export interface BarUpdate extends BarKey {
  /** Epoch milliseconds at which the bar closes */
  closeTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  /** Base asset volume */
  volume: number;
  /** Quote asset volume */
  quoteVolume: number;
  tradeCount: number;
  /** True once the interval has elapsed; a final bar never changes again */
  isFinal: boolean;
}

/**
 * A bar as persisted by the bar store.
 */
export interface StoredBar extends BarUpdate {
  /** Epoch milliseconds of the last write to this row */
  updatedAt: number;
}

/**
 * Outcome of writing a bar update.
 *
 * - `inserted`: the key was new
 * - `updated`: an open bar was replaced and stays open
 * - `finalized`: an open bar was replaced by its final version
 * - `rejected`: the stored bar is already final; nothing was written
 */
export type UpsertOutcome = 'inserted' | 'updated' | 'finalized' | 'rejected';

export const UPSERT_OUTCOMES: readonly UpsertOutcome[] = ['inserted', 'updated', 'finalized', 'rejected'];

/**
 * 24-hour market activity of one instrument, used for universe ranking.
 */
export interface MarketTicker {
  instrument: string;
  quoteVolume24h: number;
}

/**
 * Stable string form of a series key, used for maps and lock names.
 *
 * @example
 * ```typescript
 * seriesId({ instrument: 'ETHUSDT', interval: '1h' })  // 'ETHUSDT:1h'
 * ```
 */
export function seriesId(key: SeriesKey): string {
  return `${key.instrument}:${key.interval}`;
}

/**
 * Checks the OHLC and volume invariants of an update.
 */
export function isWellFormedBar(bar: BarUpdate): boolean {
  const prices = [bar.open, bar.high, bar.low, bar.close];
  if (!prices.every((p) => Number.isFinite(p) && p > 0)) {
    return false;
  }
  if (bar.high < Math.max(bar.open, bar.close) || bar.low > Math.min(bar.open, bar.close)) {
    return false;
  }
  if (bar.volume < 0 || bar.quoteVolume < 0 || bar.tradeCount < 0) {
    return false;
  }
  return bar.closeTime > bar.openTime;
}
