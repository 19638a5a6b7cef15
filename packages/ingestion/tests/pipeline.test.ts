import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { BarStore } from '@barwatch/bar-store';
import { StoreWriteFailedError } from '@barwatch/contracts';
import type { BarUpdate, UpsertOutcome } from '@barwatch/contracts';
import { IngestionPipeline } from '../src/pipeline.js';
import type { IngestionPipelineOptions, IngestionStore } from '../src/pipeline.js';
import { BASE_TIME, FIFTEEN_MINUTES, FakeMarketSource, makeUpdate, openStore } from './fakeSource.js';

const BTC = 'BTCUSDT:15m';
const FAST_BACKOFF = { initialDelayMs: 1, maxDelayMs: 5, multiplier: 2, jitter: 0 };

describe('IngestionPipeline', () => {
  let source: FakeMarketSource;
  let store: BarStore;
  let pipeline: IngestionPipeline;

  function createPipeline(options: Partial<IngestionPipelineOptions> = {}, target: IngestionStore = store) {
    return new IngestionPipeline(source, target, {
      intervals: ['15m'],
      windowSize: 4,
      backoff: FAST_BACKOFF,
      ...options,
    });
  }

  async function subscribed(id: string, times = 1): Promise<void> {
    await vi.waitFor(() => {
      expect(source.subscribeCalls.filter((call) => call === id)).toHaveLength(times);
    });
  }

  beforeEach(async () => {
    source = new FakeMarketSource();
    store = await openStore();
    pipeline = createPipeline();
  });

  afterEach(async () => {
    await pipeline.stop();
  });

  describe('backfill', () => {
    it('should fetch W + 1 bars and ignore open ones', async () => {
      source.history.set(BTC, [0, 1, 2, 3, 4].map((i) => makeUpdate(i)).concat(makeUpdate(5, { isFinal: false })));

      await pipeline.applyUniverse({ added: ['BTCUSDT'], removed: [] });
      await subscribed(BTC);

      expect(source.fetchCalls).toEqual([{ id: BTC, limit: 5 }]);
      expect(await store.countClosed('BTCUSDT', '15m')).toBe(4);
      expect(await store.count()).toBe(4);
      expect(pipeline.stats().backfilledBars).toBe(4);
    });

    it('should never overwrite a stored bar', async () => {
      await store.upsert(makeUpdate(2, { close: 100.5 }));
      source.history.set(BTC, [0, 1, 2, 3, 4].map((i) => makeUpdate(i)));

      await pipeline.applyUniverse({ added: ['BTCUSDT'], removed: [] });
      await subscribed(BTC);

      const kept = await store.get({ instrument: 'BTCUSDT', interval: '15m', openTime: BASE_TIME + 2 * FIFTEEN_MINUTES });
      expect(kept?.close).toBe(100.5);
      expect(pipeline.stats().backfilledBars).toBe(4);
    });

    it('should skip a series that already holds a full window', async () => {
      for (const i of [0, 1, 2, 3]) {
        await store.upsert(makeUpdate(i));
      }

      await pipeline.applyUniverse({ added: ['BTCUSDT'], removed: [] });
      await subscribed(BTC);

      expect(source.fetchCalls).toEqual([]);
    });

    it('should mark the instrument degraded after repeated failures and recover on the next refresh', async () => {
      source.backfillFailures.set(BTC, 3);
      source.history.set(BTC, [0, 1, 2, 3, 4].map((i) => makeUpdate(i)));

      await pipeline.applyUniverse({ added: ['BTCUSDT'], removed: [] });
      await subscribed(BTC);

      expect(source.fetchCalls).toHaveLength(3);
      expect(pipeline.isDegraded('BTCUSDT')).toBe(true);
      expect(pipeline.stats().degradedInstruments).toEqual(['BTCUSDT']);

      await pipeline.applyUniverse({ added: [], removed: [] });
      await vi.waitFor(() => {
        expect(pipeline.isDegraded('BTCUSDT')).toBe(false);
      });
      expect(await store.countClosed('BTCUSDT', '15m')).toBe(5);
    });

    it('should mark the instrument degraded when every backfill times out', async () => {
      source.backfillHangs.add(BTC);
      pipeline = createPipeline({ backfillTimeoutMs: 5 });

      await pipeline.applyUniverse({ added: ['BTCUSDT'], removed: [] });
      await subscribed(BTC);

      expect(source.fetchCalls).toHaveLength(3);
      expect(pipeline.isDegraded('BTCUSDT')).toBe(true);
      expect(await store.count()).toBe(0);
    });
  });

  describe('live updates', () => {
    beforeEach(async () => {
      source.history.set(BTC, [0, 1, 2, 3, 4].map((i) => makeUpdate(i)));
      await pipeline.applyUniverse({ added: ['BTCUSDT'], removed: [] });
      await subscribed(BTC);
    });

    it('should apply updates in order and count each outcome', async () => {
      source.stream(BTC).push(
        makeUpdate(5, { isFinal: false, close: 100 }),
        makeUpdate(5, { isFinal: false, close: 101.5 }),
        makeUpdate(5, { close: 101.8 }),
        makeUpdate(5, { close: 90, low: 89 })
      );

      await vi.waitFor(() => {
        const expected: Record<UpsertOutcome, number> = { inserted: 1, updated: 1, finalized: 1, rejected: 1 };
        expect(pipeline.stats().outcomes).toEqual(expected);
      });
      const bar = await store.get({ instrument: 'BTCUSDT', interval: '15m', openTime: BASE_TIME + 5 * FIFTEEN_MINUTES });
      expect(bar?.close).toBe(101.8);
      expect(bar?.isFinal).toBe(true);
    });

    it('should drop malformed and misrouted updates', async () => {
      source.stream(BTC).push(
        makeUpdate(5, { high: 90 }),
        makeUpdate(5, { instrument: 'ETHUSDT' }),
        makeUpdate(5)
      );

      await vi.waitFor(() => {
        expect(pipeline.stats().outcomes.inserted).toBe(1);
      });
      expect(pipeline.stats().invalidUpdates).toBe(2);
    });

    it('should resubscribe after the feed fails', async () => {
      source.stream(BTC).fail(new Error('socket closed'));

      await subscribed(BTC, 2);
      expect(pipeline.stats().reconnects).toBe(1);

      source.stream(BTC).push(makeUpdate(5));
      await vi.waitFor(() => {
        expect(pipeline.stats().outcomes.inserted).toBe(1);
      });
    });

    it('should resubscribe after the feed ends', async () => {
      source.stream(BTC).end();
      await subscribed(BTC, 2);
      expect(pipeline.subscriptionStats()[0]?.reconnects).toBe(1);
    });

    it('should unsubscribe removed instruments without deleting their bars', async () => {
      await pipeline.applyUniverse({ added: [], removed: ['BTCUSDT'] });

      expect(pipeline.activeSeries()).toEqual([]);
      expect(await store.count()).toBe(5);
    });
  });

  it('should subscribe every configured interval', async () => {
    pipeline = createPipeline({ intervals: ['5m', '15m'] });
    await pipeline.applyUniverse({ added: ['BTCUSDT', 'ETHUSDT'], removed: [] });

    expect(pipeline.activeSeries()).toEqual([
      { instrument: 'BTCUSDT', interval: '5m' },
      { instrument: 'BTCUSDT', interval: '15m' },
      { instrument: 'ETHUSDT', interval: '5m' },
      { instrument: 'ETHUSDT', interval: '15m' },
    ]);
    expect(pipeline.stats()).toMatchObject({ subscriptions: 4, instruments: 2 });
  });

  it('should log and drop an update whose write fails', async () => {
    let calls = 0;
    const flaky: IngestionStore = {
      countClosed: async () => 10,
      insertIfAbsent: async () => true,
      upsert: async (bar: BarUpdate) => {
        calls++;
        if (calls === 1) {
          throw new StoreWriteFailedError('database is locked', {
            instrument: bar.instrument,
            interval: bar.interval,
            openTime: bar.openTime,
          });
        }
        return 'inserted';
      },
    };
    pipeline = createPipeline({}, flaky);

    await pipeline.applyUniverse({ added: ['BTCUSDT'], removed: [] });
    await subscribed(BTC);
    source.stream(BTC).push(makeUpdate(5, { isFinal: false }), makeUpdate(5));

    await vi.waitFor(() => {
      expect(pipeline.stats().outcomes.inserted).toBe(1);
    });
    expect(pipeline.stats().writeFailures).toBe(1);
  });

  it('should stop every subscription and ignore later additions', async () => {
    await pipeline.applyUniverse({ added: ['BTCUSDT'], removed: [] });
    await subscribed(BTC);

    await pipeline.stop();
    await pipeline.applyUniverse({ added: ['ETHUSDT'], removed: [] });

    expect(pipeline.stats().subscriptions).toBe(0);
    expect(source.subscribeCalls).toEqual([BTC]);
  });
});
