/**
 * Deterministic market data for local runs and tests.
 *
 * Every series is a seeded random walk: the same seed, clock and call order
 * produce the same bars. A small share of bars carry an outsized move and
 * volume burst so the detector has something to find.
 */

import { sleep } from '@barwatch/contracts';
import type { BarUpdate, Interval, MarketTicker } from '@barwatch/contracts';
import { alignTimestamp, intervalToMillis } from '@barwatch/market-data-core';
import type { MarketDataSource } from '@barwatch/ingestion';

export interface FixtureMarketSourceConfig {
  seed: number;
  /** Instruments in the snapshot */
  instruments: number;
  /** Delay between live updates of one series */
  tickMs: number;
  /** Chance that a bar is a spike */
  spikeProbability?: number;
  now?: () => number;
}

interface SeriesState {
  instrument: string;
  interval: Interval;
  random: () => number;
  close: number;
  nextOpenTime: number;
  /** Generated bar that has not closed yet */
  pending: BarUpdate | null;
  history: BarUpdate[];
}

const BASE_ASSETS = ['BTC', 'ETH', 'SOL', 'BNB', 'XRP', 'DOGE', 'ADA', 'AVAX', 'LINK', 'DOT', 'LTC', 'TRX'];
const HISTORY_BARS = 500;
const BASE_MOVE = 0.004;
const SPIKE_FACTOR = 8;

/**
 * Seeded random number generator for deterministic fixtures
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return function () {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

/** FNV-1a */
function hashString(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

function round(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

export function fixtureInstrumentNames(count: number): string[] {
  return Array.from({ length: count }, (_, i) => {
    const base = BASE_ASSETS[i];
    return base === undefined ? `ALT${i - BASE_ASSETS.length + 1}USDT` : `${base}USDT`;
  });
}

export class FixtureMarketSource implements MarketDataSource {
  private tickers: MarketTicker[];
  private series = new Map<string, SeriesState>();
  private now: () => number;
  private spikeProbability: number;

  constructor(private config: FixtureMarketSourceConfig) {
    this.now = config.now ?? Date.now;
    this.spikeProbability = config.spikeProbability ?? 0.02;

    const random = seededRandom(config.seed);
    this.tickers = fixtureInstrumentNames(config.instruments).map((instrument, i) => ({
      instrument,
      // Roughly falling with rank, as real markets do
      quoteVolume24h: Math.round((2_000_000_000 / (i + 1)) * (0.5 + random())),
    }));
  }

  async fetchMarketSnapshot(): Promise<MarketTicker[]> {
    return this.tickers.map((ticker) => ({ ...ticker }));
  }

  async fetchRecentBars(instrument: string, interval: Interval, limit: number): Promise<BarUpdate[]> {
    const state = this.stateFor(instrument, interval);
    this.advance(state, this.now());
    return limit > 0 ? state.history.slice(-limit).map((bar) => ({ ...bar })) : [];
  }

  async *subscribe(instrument: string, interval: Interval, signal: AbortSignal): AsyncGenerator<BarUpdate> {
    const state = this.stateFor(instrument, interval);
    this.advance(state, this.now());
    let cursor = state.history.at(-1)?.openTime ?? Number.NEGATIVE_INFINITY;

    while (!signal.aborted) {
      await sleep(this.config.tickMs, signal);
      if (signal.aborted) return;

      const now = this.now();
      this.advance(state, now);
      for (const bar of state.history) {
        if (bar.openTime > cursor) {
          cursor = bar.openTime;
          yield { ...bar };
        }
      }
      if (state.pending !== null) {
        yield this.partial(state.pending, now);
      }
    }
  }

  private stateFor(instrument: string, interval: Interval): SeriesState {
    const id = `${instrument}:${interval}`;
    const existing = this.series.get(id);
    if (existing !== undefined) {
      return existing;
    }

    const random = seededRandom(this.config.seed ^ hashString(id));
    const state: SeriesState = {
      instrument,
      interval,
      random,
      close: round(1 + random() * 999),
      nextOpenTime: alignTimestamp(this.now(), interval, 'floor') - HISTORY_BARS * intervalToMillis(interval),
      pending: null,
      history: [],
    };
    this.series.set(id, state);
    return state;
  }

  /**
   * Moves every bar that closed before `now` from pending into history.
   */
  private advance(state: SeriesState, now: number): void {
    for (;;) {
      const bar = state.pending ?? this.generate(state);
      if (bar.closeTime >= now) {
        state.pending = bar;
        return;
      }
      state.pending = null;
      state.history.push(bar);
      if (state.history.length > HISTORY_BARS) {
        state.history.shift();
      }
    }
  }

  private generate(state: SeriesState): BarUpdate {
    const { random } = state;
    const spike = random() < this.spikeProbability;
    const move = (random() * 2 - 1) * BASE_MOVE * (spike ? SPIKE_FACTOR : 1);

    const open = state.close;
    const close = round(open * (1 + move));
    const high = round(Math.max(open, close) * (1 + random() * 0.002));
    const low = round(Math.min(open, close) * (1 - random() * 0.002));
    const volume = round((50 + random() * 100) * (spike ? 5 : 1));
    const openTime = state.nextOpenTime;
    const ms = intervalToMillis(state.interval);

    state.close = close;
    state.nextOpenTime = openTime + ms;

    return {
      instrument: state.instrument,
      interval: state.interval,
      openTime,
      closeTime: openTime + ms - 1,
      open,
      high,
      low,
      close,
      volume,
      quoteVolume: round(volume * close),
      tradeCount: Math.floor(volume * 3),
      isFinal: true,
    };
  }

  /** The pending bar as it looks part way through its interval */
  private partial(bar: BarUpdate, now: number): BarUpdate {
    const elapsed = (now - bar.openTime) / (bar.closeTime + 1 - bar.openTime);
    const fraction = Math.min(1, Math.max(0.05, elapsed));
    const close = round(bar.open + (bar.close - bar.open) * fraction);
    return {
      ...bar,
      high: Math.max(bar.open, close),
      low: Math.min(bar.open, close),
      close,
      volume: round(bar.volume * fraction),
      quoteVolume: round(bar.quoteVolume * fraction),
      tradeCount: Math.floor(bar.tradeCount * fraction),
      isFinal: false,
    };
  }
}
