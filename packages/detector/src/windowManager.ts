/**
 * Rolling window statistics over closed bars.
 *
 * Summaries are derived on every call and never cached or persisted.
 */

import { closeToCloseReturns, summarize, rangeVolatility } from '@barwatch/market-data-core';
import type { SeriesStats } from '@barwatch/market-data-core';
import type { Interval, StoredBar } from '@barwatch/contracts';
import type { BarStore } from '@barwatch/bar-store';

export type VolumeSource = 'volume' | 'quoteVolume';

/**
 * Statistics of the last W closed bars of a series.
 */
export interface WindowSummary {
  instrument: string;
  interval: Interval;
  /** The W window bars, oldest first */
  bars: StoredBar[];
  /** Close of the most recent window bar */
  lastClose: number;
  /** Close-to-close returns: W when a predecessor close exists, else W − 1 */
  returns: SeriesStats;
  volume: SeriesStats;
  /** (high − low) / close */
  volatility: SeriesStats;
}

export type WindowResult =
  | { status: 'ready'; summary: WindowSummary }
  | { status: 'insufficient'; available: number; required: number };

export interface WindowOptions {
  /** Only bars opening strictly before this time */
  before?: number;
}

export interface WindowManagerOptions {
  windowSize: number;
  volumeSource: VolumeSource;
}

/**
 * Example:
 * ```typescript
 * const windows = new WindowManager(store, { windowSize: 16, volumeSource: 'quoteVolume' });
 * const result = await windows.summarize('BTCUSDT', '15m', { before: bar.openTime });
 * if (result.status === 'ready') {
 *   const z = zScore(currentReturn, result.summary.returns.mean, result.summary.returns.std);
 * }
 * ```
 */
export class WindowManager {
  constructor(
    private store: Pick<BarStore, 'queryWindow'>,
    private options: WindowManagerOptions
  ) {}

  get windowSize(): number {
    return this.options.windowSize;
  }

  async summarize(instrument: string, interval: Interval, options: WindowOptions = {}): Promise<WindowResult> {
    const size = this.options.windowSize;
    // One extra bar supplies the close preceding the first window bar
    const history = await this.store.queryWindow(instrument, interval, size + 1, options);

    if (history.length < size) {
      return { status: 'insufficient', available: history.length, required: size };
    }

    const bars = history.slice(history.length - size);
    const lastBar = bars[bars.length - 1];
    if (lastBar === undefined) {
      return { status: 'insufficient', available: 0, required: size };
    }

    const returns = closeToCloseReturns(history.map((bar) => bar.close));

    return {
      status: 'ready',
      summary: {
        instrument,
        interval,
        bars,
        lastClose: lastBar.close,
        returns: summarize(returns),
        volume: summarize(bars.map((bar) => volumeOf(bar, this.options.volumeSource))),
        volatility: summarize(bars.map(rangeVolatility)),
      },
    };
  }
}

export function volumeOf(bar: { volume: number; quoteVolume: number }, source: VolumeSource): number {
  return source === 'volume' ? bar.volume : bar.quoteVolume;
}
