/**
 * The market data feed as seen by ingestion. Wire protocol, authentication
 * and rate limits live behind implementations of this interface.
 */

import type { BarUpdate, Interval, MarketTicker } from '@barwatch/contracts';

export interface MarketDataSource {
  /**
   * Live updates for one series, in delivery order. A bar is typically
   * delivered several times while open and once more with isFinal set.
   * The iterable ends or throws when the stream drops, and should end
   * promptly once `signal` is aborted.
   */
  subscribe(instrument: string, interval: Interval, signal: AbortSignal): AsyncIterable<BarUpdate>;

  /** Up to `limit` most recent bars of a series, oldest first */
  fetchRecentBars(instrument: string, interval: Interval, limit: number): Promise<BarUpdate[]>;

  /** Tradable instruments with their rolling 24h quote volume */
  fetchMarketSnapshot(): Promise<MarketTicker[]>;
}
