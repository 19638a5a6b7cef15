/**
 * Shared helpers for detector tests
 */

import { connect } from '@barwatch/db-simple';
import { AnomalySink, BarStore, migrateBarStore } from '@barwatch/bar-store';
import type { BarUpdate, StoredBar } from '@barwatch/contracts';

export const BASE_TIME = Date.UTC(2024, 0, 1);
export const FIFTEEN_MINUTES = 15 * 60 * 1000;

export async function openStores(): Promise<{ store: BarStore; sink: AnomalySink }> {
  const db = await connect('sqlite::memory:');
  await migrateBarStore(db);
  return { store: new BarStore(db), sink: new AnomalySink(db) };
}

/**
 * A final 15m bar with open, high, low and close all equal, so its range is zero.
 */
export function flatBar(i: number, close: number, overrides: Partial<BarUpdate> = {}): BarUpdate {
  const openTime = BASE_TIME + i * FIFTEEN_MINUTES;
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
    isFinal: true,
    ...overrides,
  };
}

export function stored(bar: BarUpdate): StoredBar {
  return { ...bar, updatedAt: bar.closeTime + 1 };
}

/** Half-amplitude giving alternating returns a sample std of exactly 0.01 over 16 returns */
export const ALTERNATING_RETURN = 0.01 * Math.sqrt(15 / 16);

/**
 * Closes of `count` bars starting at 100 whose returns alternate +a, −a.
 */
export function alternatingCloses(count: number): number[] {
  const closes = [100];
  for (let i = 1; i < count; i++) {
    const previous = closes[i - 1] ?? 100;
    closes.push(previous * (i % 2 === 1 ? 1 + ALTERNATING_RETURN : 1 - ALTERNATING_RETURN));
  }
  return closes;
}

export async function seed(store: BarStore, bars: readonly BarUpdate[]): Promise<void> {
  for (const bar of bars) {
    await store.upsert(bar);
  }
}
