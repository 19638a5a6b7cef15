/**
 * Shared helpers for bar-store tests
 */

import { connect } from '@barwatch/db-simple'
import type { DbConnection } from '@barwatch/db-simple'
import type { AnomalyRecord, BarUpdate } from '@barwatch/contracts'
import { migrateBarStore } from '../src/migrations.js'

export const BASE_TIME = Date.UTC(2024, 0, 1)
export const FIFTEEN_MINUTES = 15 * 60 * 1000

export async function openStoreDb(): Promise<DbConnection> {
  const db = await connect('sqlite::memory:')
  await migrateBarStore(db)
  return db
}

/**
 * The i-th 15m bar of a series starting at BASE_TIME
 */
export function makeBar(i: number, overrides: Partial<BarUpdate> = {}): BarUpdate {
  const openTime = BASE_TIME + i * FIFTEEN_MINUTES
  return {
    instrument: 'BTCUSDT',
    interval: '15m',
    openTime,
    closeTime: openTime + FIFTEEN_MINUTES - 1,
    open: 100,
    high: 102,
    low: 99,
    close: 101,
    volume: 10,
    quoteVolume: 1000,
    tradeCount: 50,
    isFinal: true,
    ...overrides,
  }
}

export function makeRecord(overrides: Partial<AnomalyRecord> = {}): AnomalyRecord {
  return {
    instrument: 'BTCUSDT',
    timestamp: BASE_TIME,
    intervalType: '15m',
    closePrice: 101,
    currentReturn: 0.03,
    currentVolume: 1000,
    currentVolatility: 0.02,
    priceZ: 3,
    volumeZ: 0.5,
    volatilityZ: 0.1,
    compositeScore: 1.2,
    reasons: ['price'],
    isAnomaly: true,
    quoteVolume24h: 5_000_000,
    createdAt: BASE_TIME + FIFTEEN_MINUTES,
    ...overrides,
  }
}
