/**
 * Wiring test: fixture source through storage, scoring, retention and the
 * one-shot commands, all in process on sqlite :memory:.
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { createSilentLogger } from '@barwatch/logger';
import type { BarUpdate } from '@barwatch/contracts';
import { loadConfig } from '../src/config/index.js';
import { createApp, createCommands, reportHealth } from '../src/app.js';
import type { AppContainer } from '../src/app.js';
import { TOKENS } from '../src/container/tokens.js';
import { FixtureMarketSource } from '../src/services/fixture-source.js';
import { ScriptedMarketSource } from './scripted-source.js';

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;
const T0 = Date.UTC(2026, 0, 1, 0, 0, 0);
const NOW = T0 + 7 * MINUTE;
const now = (): number => NOW;
const FIFTEEN_MINUTES = 15 * MINUTE;

/** Final flat 15m BTCUSDT bar; bar 17 opens at T0 */
function btcBar(i: number, close: number, isFinal = true): BarUpdate {
  const openTime = T0 + (i - 17) * FIFTEEN_MINUTES;
  return {
    instrument: 'BTCUSDT',
    interval: '15m',
    openTime,
    closeTime: openTime + FIFTEEN_MINUTES - 1,
    open: close,
    high: close,
    low: close,
    close,
    volume: 10,
    quoteVolume: 1000,
    tradeCount: 50,
    isFinal,
  };
}

/** 17 closes whose 16 returns alternate ±a with mean 0 and sample std 0.01 */
function alternatingCloses(): number[] {
  const a = 0.01 * Math.sqrt(15 / 16);
  const closes = [100];
  for (let i = 1; i < 17; i++) {
    const previous = closes[i - 1] ?? 100;
    closes.push(previous * (i % 2 === 1 ? 1 + a : 1 - a));
  }
  return closes;
}

const ENV = {
  NODE_ENV: 'test',
  DATABASE_URL: 'sqlite::memory:',
  UNIVERSE_TOP_N: '3',
  FIXTURE_INSTRUMENTS: '5',
  FIXTURE_TICK_MS: '60000',
  SCORING_PASS_MS: '3600000',
};

describe('barwatch app', () => {
  let container: AppContainer | undefined;

  afterEach(async () => {
    await container?.shutdownAll();
    container = undefined;
  });

  async function startApp(): Promise<AppContainer> {
    const config = loadConfig(ENV);
    const source = new FixtureMarketSource({ seed: 42, instruments: 5, tickMs: 60_000, now });
    const app = createApp(config, createSilentLogger(), { mode: 'run', source, now });
    container = app;
    await app.initializeAll();

    const storage = app.resolve(TOKENS.StorageService);
    // W + 1 bars for each of the three instruments
    await vi.waitFor(async () => {
      expect((await storage.bars.stats()).rowCount).toBe(51);
    });
    return app;
  }

  it('should backfill the selected universe and report healthy', async () => {
    const app = await startApp();

    expect(app.resolve(TOKENS.IngestionService).activeSeries()).toHaveLength(3);

    const report = await reportHealth(app, now);
    expect(report).toEqual({
      status: 'ok',
      checkedAt: NOW,
      storedRowCount: 51,
      // Oldest backfilled bar opened 17 bars before T0
      oldestBarAge: 7 * MINUTE + 17 * 15 * MINUTE,
      activeUniverseSize: 3,
      lastScoringPassTime: null,
      lastRetentionSweepTime: null,
      anomalyRowCount: 0,
      estimatedStorageBytes: 51 * 160,
      degradedInstruments: [],
      retentionFailures: 0,
    });
  });

  it('should score the latest closed bar of every series in a pass', async () => {
    const app = await startApp();
    const detection = app.resolve(TOKENS.DetectionService);

    const result = await detection.runPass();

    expect(result).toMatchObject({ series: 3, scored: 3, skipped: 0, failed: 0 });
    expect(detection.lastPassTime).toBe(NOW);
    expect((await reportHealth(app, now)).lastScoringPassTime).toBe(NOW);
  });

  it('should run the one-shot commands against the same store', async () => {
    const app = await startApp();
    const commands = createCommands(app, createSilentLogger(), now);

    const health = await commands.get('health')?.execute([], {});
    expect(health?.success).toBe(true);
    expect(health?.output.split('\n').slice(0, 5)).toEqual([
      'Status: OK',
      'Checked: 2026-01-01T00:07:00.000Z',
      'Stored bars: 51',
      'Oldest bar age: 4h 22m',
      'Universe size: 3',
    ]);

    // Cutoff 20:07 removes the 19:45 and 20:00 bars of each series
    const sweep = await commands.get('sweep')?.execute(['--max-age-hours', '4'], {});
    expect(sweep?.success).toBe(true);
    expect(sweep?.output).toContain('  bars-age: 6 deleted');
    expect(sweep?.output).toContain('Total deleted: 6');

    const storage = app.resolve(TOKENS.StorageService);
    expect((await storage.bars.stats()).rowCount).toBe(45);
    expect((await reportHealth(app, now)).lastRetentionSweepTime).toBe(NOW);

    const anomalies = await commands.get('anomalies')?.execute(['--since-hours', '1'], {});
    expect(anomalies?.output).toBe('No anomaly records found');
  });

  it('should wire only storage and retention for one-shot mode', async () => {
    const config = loadConfig(ENV);
    const app = createApp(config, createSilentLogger(), { mode: 'storage', now });
    container = app;

    expect(app.has(TOKENS.StorageService)).toBe(true);
    expect(app.has(TOKENS.RetentionService)).toBe(true);
    expect(app.has(TOKENS.IngestionService)).toBe(false);

    await app.initializeAll();
    const report = await reportHealth(app, now);

    expect(report).toMatchObject({ status: 'ok', storedRowCount: 0, oldestBarAge: null, activeUniverseSize: 0 });
  });

  it('should score a live final bar once through the finalized event', async () => {
    const closes = alternatingCloses();
    const lastClose = closes[closes.length - 1] ?? 100;
    const source = new ScriptedMarketSource(
      [{ instrument: 'BTCUSDT', quoteVolume24h: 1e9 }],
      new Map([['BTCUSDT:15m', closes.map((close, i) => btcBar(i, close))]])
    );
    const app = createApp(loadConfig(ENV), createSilentLogger(), { mode: 'run', source, now });
    container = app;
    await app.initializeAll();

    const storage = app.resolve(TOKENS.StorageService);
    const ingestion = app.resolve(TOKENS.IngestionService);
    const detection = app.resolve(TOKENS.DetectionService);
    await vi.waitFor(() => {
      expect(source.subscribeCalls).toEqual(['BTCUSDT:15m']);
    });
    expect(await storage.bars.countClosed('BTCUSDT', '15m')).toBe(17);

    const final = btcBar(17, lastClose * 1.03);
    source.push(btcBar(17, lastClose, false), final, final);
    await vi.waitFor(() => {
      expect(ingestion.pipeline.stats().outcomes).toEqual({ inserted: 1, updated: 0, finalized: 1, rejected: 1 });
    });
    await detection.settle();

    expect(await storage.anomalies.count()).toBe(1);
    const record = await storage.anomalies.get('BTCUSDT', T0, '15m');
    expect(record?.priceZ).toBeCloseTo(3, 6);
    expect(record?.reasons).toEqual(['price']);
    expect(record?.compositeScore).toBeCloseTo(1.2, 6);
    expect(record?.quoteVolume24h).toBe(1e9);
    expect(record?.createdAt).toBe(NOW);

    const pass = await detection.runPass();
    expect(pass).toMatchObject({ series: 1, scored: 1, written: 0, anomalies: 1 });
    expect(await storage.anomalies.count()).toBe(1);
  });
});
