import { describe, it, expect, beforeEach } from 'vitest';
import type { AnomalySink, BarStore } from '@barwatch/bar-store';
import type { StoredBar } from '@barwatch/contracts';
import { parseDetectorConfig } from '../src/config.js';
import type { DetectorConfigInput } from '../src/config.js';
import { AnomalyScoringEngine, scoreAgainstWindow } from '../src/scoringEngine.js';
import type { ScoringEngineOptions } from '../src/scoringEngine.js';
import { WindowManager } from '../src/windowManager.js';
import type { WindowSummary } from '../src/windowManager.js';
import { BASE_TIME, FIFTEEN_MINUTES, alternatingCloses, flatBar, openStores, seed, stored } from './fixtures.js';

const SCORED_AT = BASE_TIME + 20 * FIFTEEN_MINUTES;

function summaryOf(overrides: Partial<WindowSummary> = {}): WindowSummary {
  return {
    instrument: 'BTCUSDT',
    interval: '15m',
    bars: [],
    lastClose: 100,
    returns: { mean: 0, std: 0.001, count: 16 },
    volume: { mean: 1000, std: 0, count: 16 },
    volatility: { mean: 0, std: 0, count: 16 },
    ...overrides,
  };
}

describe('scoreAgainstWindow', () => {
  const config = parseDetectorConfig({ minAbsReturn: 0.01 });
  const extras = { quoteVolume24h: null, createdAt: SCORED_AT };

  it('should not trigger price below the absolute return floor', () => {
    const record = scoreAgainstWindow(stored(flatBar(20, 100.3)), summaryOf(), config, extras);

    expect(record.priceZ).toBeCloseTo(3, 6);
    expect(record.reasons).toEqual([]);
    expect(record.compositeScore).toBe(0);
    expect(record.isAnomaly).toBe(false);
  });

  it('should trigger price when both the z-score and the return clear their limits', () => {
    const record = scoreAgainstWindow(stored(flatBar(20, 103)), summaryOf(), config, extras);

    expect(record.currentReturn).toBeCloseTo(0.03, 10);
    expect(record.priceZ).toBeCloseTo(30, 6);
    expect(record.reasons).toEqual(['price']);
    expect(record.compositeScore).toBeCloseTo(12, 6);
  });

  it('should score volume and volatility independently of price', () => {
    const bar = stored(flatBar(20, 100, { high: 104, low: 98, quoteVolume: 1300 }));
    const summary = summaryOf({
      volume: { mean: 1000, std: 100, count: 16 },
      volatility: { mean: 0.03, std: 0.01, count: 16 },
    });

    const record = scoreAgainstWindow(bar, summary, config, extras);

    expect(record.priceZ).toBe(0);
    expect(record.volumeZ).toBe(3);
    expect(record.currentVolatility).toBeCloseTo(0.06, 12);
    expect(record.volatilityZ).toBeCloseTo(3, 6);
    expect(record.reasons).toEqual(['volume', 'volatility']);
    expect(record.compositeScore).toBeCloseTo(1.8, 6);
  });

  it('should give a zero z-score against a flat distribution', () => {
    const record = scoreAgainstWindow(stored(flatBar(20, 100, { quoteVolume: 5000 })), summaryOf(), config, extras);
    expect(record.volumeZ).toBe(0);
    expect(record.reasons).toEqual([]);
  });

  it('should read base volume when configured', () => {
    const baseConfig = parseDetectorConfig({ volumeSource: 'volume' });
    const summary = summaryOf({ volume: { mean: 10, std: 1, count: 16 } });

    const record = scoreAgainstWindow(stored(flatBar(20, 100, { volume: 13 })), summary, baseConfig, extras);

    expect(record.currentVolume).toBe(13);
    expect(record.volumeZ).toBe(3);
  });

  it('should copy the bar identity and extras into the record', () => {
    const record = scoreAgainstWindow(stored(flatBar(20, 100)), summaryOf(), config, {
      quoteVolume24h: 5_000_000,
      createdAt: SCORED_AT,
    });

    expect(record).toMatchObject({
      instrument: 'BTCUSDT',
      timestamp: BASE_TIME + 20 * FIFTEEN_MINUTES,
      intervalType: '15m',
      closePrice: 100,
      quoteVolume24h: 5_000_000,
      createdAt: SCORED_AT,
    });
  });
});

describe('AnomalyScoringEngine', () => {
  let store: BarStore;
  let sink: AnomalySink;
  let closes: number[];

  /** Bars 0-16 alternate returns with mean 0 and std 0.01; bar 17 returns `spike` */
  async function seedScenario(spike: number): Promise<StoredBar> {
    await seed(store, closes.map((close, i) => flatBar(i, close)));
    const last = closes[closes.length - 1] ?? 100;
    const bar = flatBar(closes.length, last * (1 + spike));
    await store.upsert(bar);
    return stored(bar);
  }

  function engineFor(input: DetectorConfigInput = {}, options: ScoringEngineOptions = {}): AnomalyScoringEngine {
    const config = parseDetectorConfig({ minAbsReturn: 0.01, ...input });
    const windows = new WindowManager(store, { windowSize: config.windowSize, volumeSource: config.volumeSource });
    return new AnomalyScoringEngine(windows, sink, store, config, { now: () => SCORED_AT, ...options });
  }

  beforeEach(async () => {
    ({ store, sink } = await openStores());
    closes = alternatingCloses(17);
  });

  it('should record a return three deviations above the window', async () => {
    const bar = await seedScenario(0.03);

    const outcome = await engineFor().scoreBar(bar);

    expect(outcome.status).toBe('scored');
    if (outcome.status !== 'scored') return;
    expect(outcome.written).toBe(true);
    expect(outcome.record.priceZ).toBeCloseTo(3, 6);
    expect(outcome.record.volumeZ).toBe(0);
    expect(outcome.record.volatilityZ).toBe(0);
    expect(outcome.record.reasons).toEqual(['price']);
    expect(outcome.record.compositeScore).toBeCloseTo(1.2, 6);

    const saved = await sink.get('BTCUSDT', bar.openTime, '15m');
    expect(saved?.reasons).toEqual(['price']);
    expect(saved?.createdAt).toBe(SCORED_AT);
  });

  it('should write no record for a small return after the spike enters the window', async () => {
    const spike = await seedScenario(0.03);
    const engine = engineFor();
    await engine.scoreBar(spike);

    const next = flatBar(closes.length + 1, spike.close * 1.002);
    await store.upsert(next);
    const outcome = await engine.scoreBar(stored(next));

    expect(outcome.status).toBe('scored');
    if (outcome.status !== 'scored') return;
    expect(outcome.record.currentReturn).toBeCloseTo(0.002, 10);
    expect(outcome.record.priceZ).toBeCloseTo(0.059, 2);
    expect(outcome.record.reasons).toEqual([]);
    expect(outcome.written).toBe(false);
    expect(await sink.count()).toBe(1);
  });

  it('should keep the first record when a bar is scored twice', async () => {
    const bar = await seedScenario(0.03);
    const engine = engineFor();

    const first = await engine.scoreBar(bar);
    const second = await engine.scoreBar(bar);

    expect(first.status === 'scored' && first.written).toBe(true);
    expect(second.status === 'scored' && second.written).toBe(false);
    expect(await sink.count()).toBe(1);
  });

  it('should write unremarkable bars only under the "all" policy', async () => {
    const bar = await seedScenario(0);

    const anomalous = await engineFor().scoreBar(bar);
    expect(anomalous.status === 'scored' && anomalous.written).toBe(false);
    expect(await sink.count()).toBe(0);

    const all = await engineFor({ recordPolicy: 'all' }).scoreBar(bar);
    expect(all.status === 'scored' && all.written).toBe(true);
    const saved = await sink.get('BTCUSDT', bar.openTime, '15m');
    expect(saved?.isAnomaly).toBe(false);
    expect(saved?.reasons).toEqual([]);
  });

  it('should attach the 24h quote volume', async () => {
    const bar = await seedScenario(0.03);

    const outcome = await engineFor({}, { quoteVolume24h: () => 5_000_000 }).scoreBar(bar);

    expect(outcome.status === 'scored' && outcome.record.quoteVolume24h).toBe(5_000_000);
  });

  it('should skip bars that are not final', async () => {
    const bar = await seedScenario(0.03);
    expect(await engineFor().scoreBar({ ...bar, isFinal: false })).toEqual({ status: 'skipped', reason: 'not-final' });
  });

  it('should skip degraded instruments', async () => {
    const bar = await seedScenario(0.03);

    const outcome = await engineFor({}, { isDegraded: (instrument) => instrument === 'BTCUSDT' }).scoreBar(bar);

    expect(outcome).toEqual({ status: 'skipped', reason: 'degraded' });
    expect(await sink.count()).toBe(0);
  });

  it('should skip bars without a full window', async () => {
    closes = alternatingCloses(10);
    const bar = await seedScenario(0.03);

    expect(await engineFor().scoreBar(bar)).toEqual({ status: 'skipped', reason: 'insufficient-window' });
  });

  describe('runPass', () => {
    it('should score the latest closed bar of every series', async () => {
      await seedScenario(0.03);

      const result = await engineFor().runPass([
        { instrument: 'BTCUSDT', interval: '15m' },
        { instrument: 'ETHUSDT', interval: '15m' },
      ]);

      expect(result).toMatchObject({ series: 2, scored: 1, written: 1, anomalies: 1, skipped: 1, failed: 0 });
      expect(result.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should count a series that times out and continue', async () => {
      await seedScenario(0.03);
      const hanging: Pick<BarStore, 'latestClosed'> = {
        latestClosed: (instrument) =>
          instrument === 'ETHUSDT' ? new Promise<StoredBar | null>(() => undefined) : store.latestClosed(instrument, '15m'),
      };
      const config = parseDetectorConfig({ minAbsReturn: 0.01, scoringTimeoutMs: 20 });
      const windows = new WindowManager(store, { windowSize: 16, volumeSource: 'quoteVolume' });
      const engine = new AnomalyScoringEngine(windows, sink, hanging, config);

      const result = await engine.runPass([
        { instrument: 'ETHUSDT', interval: '15m' },
        { instrument: 'BTCUSDT', interval: '15m' },
      ]);

      expect(result).toMatchObject({ scored: 1, failed: 1 });
    });

    it('should count a series whose read fails', async () => {
      const failing: Pick<BarStore, 'latestClosed'> = {
        latestClosed: () => Promise.reject(new Error('disk I/O error')),
      };
      const windows = new WindowManager(store, { windowSize: 16, volumeSource: 'quoteVolume' });
      const engine = new AnomalyScoringEngine(windows, sink, failing, parseDetectorConfig());

      const result = await engine.runPass([{ instrument: 'BTCUSDT', interval: '15m' }]);

      expect(result).toMatchObject({ series: 1, scored: 0, failed: 1 });
    });
  });
});
