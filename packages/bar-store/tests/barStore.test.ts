/**
 * Test suite for BarStore
 *
 * Test coverage:
 * 1. Identity uniqueness - one row per (instrument, interval, openTime)
 * 2. Immutability - final rows reject later updates
 * 3. Backfill inserts never overwrite stored bars
 * 4. Window queries - final bars only, oldest first, optional anchor
 * 5. Bulk deletes - by age, per series, global row/byte caps
 * 6. Finalized events
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { DbConnection } from '@barwatch/db-simple'
import { createSilentLogger } from '@barwatch/logger'
import { ClosedBarImmutableError, StoreWriteFailedError } from '@barwatch/contracts'
import { BarStore, BAR_ROW_BYTES, rowLimitFor } from '../src/barStore.js'
import { StoreEventBus } from '../src/events.js'
import type { BarFinalizedEvent } from '../src/events.js'
import { BASE_TIME, FIFTEEN_MINUTES, makeBar, openStoreDb } from './fixtures.js'

const NOW = BASE_TIME + 1_000_000

describe('BarStore', () => {
  let db: DbConnection
  let store: BarStore

  beforeEach(async () => {
    db = await openStoreDb()
    store = new BarStore(db, { now: () => NOW })
  })

  afterEach(async () => {
    await db.close()
  })

  // ===========================================================================
  // Upsert semantics
  // ===========================================================================

  describe('upsert', () => {
    it('should walk an open bar through updated to finalized', async () => {
      expect(await store.upsert(makeBar(0, { isFinal: false, close: 100.5 }))).toBe('inserted')
      expect(await store.upsert(makeBar(0, { isFinal: false, close: 100.7 }))).toBe('updated')
      expect(await store.upsert(makeBar(0, { isFinal: true, close: 101 }))).toBe('finalized')

      const stored = await store.get({ instrument: 'BTCUSDT', interval: '15m', openTime: BASE_TIME })
      expect(stored?.close).toBe(101)
      expect(stored?.isFinal).toBe(true)
      expect(stored?.updatedAt).toBe(NOW)
    })

    it('should keep exactly one row per key', async () => {
      for (let i = 0; i < 5; i++) {
        await store.upsert(makeBar(0, { isFinal: false, close: 100 + i / 10 }))
      }

      expect(await store.count()).toBe(1)
    })

    it('should reject updates to a final bar and keep its values', async () => {
      await store.upsert(makeBar(0, { close: 101 }))

      expect(await store.upsert(makeBar(0, { close: 150, high: 150, isFinal: true }))).toBe('rejected')
      expect(await store.upsert(makeBar(0, { close: 90, low: 90, isFinal: false }))).toBe('rejected')

      const stored = await store.get({ instrument: 'BTCUSDT', interval: '15m', openTime: BASE_TIME })
      expect(stored?.close).toBe(101)
      expect(stored?.isFinal).toBe(true)
    })

    it('should throw from upsertOrThrow on a final bar', async () => {
      await store.upsert(makeBar(0))

      await expect(store.upsertOrThrow(makeBar(0, { close: 100.2 }))).rejects.toBeInstanceOf(
        ClosedBarImmutableError
      )
    })

    it('should accept concurrent writes to different series', async () => {
      const outcomes = await Promise.all([
        store.upsert(makeBar(0)),
        store.upsert(makeBar(0, { instrument: 'ETHUSDT' })),
        store.upsert(makeBar(0, { interval: '5m' })),
        store.upsert(makeBar(1)),
      ])

      expect(outcomes).toEqual(['inserted', 'inserted', 'inserted', 'inserted'])
      expect(await store.count()).toBe(4)
    })

    it('should apply concurrent updates of one key in submission order', async () => {
      await Promise.all([
        store.upsert(makeBar(0, { isFinal: false, close: 100.1 })),
        store.upsert(makeBar(0, { isFinal: false, close: 100.2 })),
        store.upsert(makeBar(0, { isFinal: true, close: 100.3 })),
        store.upsert(makeBar(0, { isFinal: false, close: 100.4 })),
      ])

      const stored = await store.get({ instrument: 'BTCUSDT', interval: '15m', openTime: BASE_TIME })
      expect(stored?.close).toBe(100.3)
      expect(stored?.isFinal).toBe(true)
    })

    it('should wrap database failures in StoreWriteFailedError', async () => {
      await db.close()

      const error = await store.upsert(makeBar(0)).catch((e: unknown) => e)
      expect(error).toBeInstanceOf(StoreWriteFailedError)
      expect(error).toMatchObject({ code: 'STORE_WRITE_FAILED', data: { instrument: 'BTCUSDT', openTime: BASE_TIME } })
    })
  })

  describe('insertIfAbsent', () => {
    it('should insert a missing bar', async () => {
      expect(await store.insertIfAbsent(makeBar(3))).toBe(true)
      expect(await store.countClosed('BTCUSDT', '15m')).toBe(1)
    })

    it('should never overwrite a stored bar', async () => {
      await store.upsert(makeBar(0, { isFinal: false, close: 100.5 }))
      await store.upsert(makeBar(1, { close: 101.5, high: 102 }))

      expect(await store.insertIfAbsent(makeBar(0, { close: 99.5 }))).toBe(false)
      expect(await store.insertIfAbsent(makeBar(1, { close: 99.5 }))).toBe(false)

      const open = await store.get({ instrument: 'BTCUSDT', interval: '15m', openTime: BASE_TIME })
      const closed = await store.get({ instrument: 'BTCUSDT', interval: '15m', openTime: BASE_TIME + FIFTEEN_MINUTES })
      expect(open?.close).toBe(100.5)
      expect(open?.isFinal).toBe(false)
      expect(closed?.close).toBe(101.5)
    })
  })

  // ===========================================================================
  // Reads
  // ===========================================================================

  describe('queryWindow', () => {
    beforeEach(async () => {
      for (let i = 0; i < 6; i++) {
        await store.upsert(makeBar(i, { close: 100 + i, high: 110 }))
      }
      await store.upsert(makeBar(6, { isFinal: false, close: 200, high: 210 }))
    })

    it('should return the most recent final bars, oldest first', async () => {
      const window = await store.queryWindow('BTCUSDT', '15m', 3)

      expect(window.map((b) => b.close)).toEqual([103, 104, 105])
    })

    it('should anchor strictly before an open time', async () => {
      const window = await store.queryWindow('BTCUSDT', '15m', 3, { before: BASE_TIME + 4 * FIFTEEN_MINUTES })

      expect(window.map((b) => b.close)).toEqual([101, 102, 103])
    })

    it('should return fewer bars when history is short', async () => {
      const window = await store.queryWindow('BTCUSDT', '15m', 50)

      expect(window).toHaveLength(6)
    })

    it('should count and find final bars only', async () => {
      expect(await store.countClosed('BTCUSDT', '15m')).toBe(6)
      expect((await store.latestClosed('BTCUSDT', '15m'))?.close).toBe(105)
      expect(await store.latestClosed('ETHUSDT', '15m')).toBeNull()
    })

    it('should list stored series', async () => {
      await store.upsert(makeBar(0, { instrument: 'ETHUSDT', interval: '1h' }))

      expect(await store.listSeries()).toEqual([
        { instrument: 'BTCUSDT', interval: '15m' },
        { instrument: 'ETHUSDT', interval: '1h' },
      ])
    })
  })

  // ===========================================================================
  // Bulk deletes
  // ===========================================================================

  describe('deleteOlderThan', () => {
    it('should delete bars opening before the cutoff in batches', async () => {
      const small = new BarStore(db, { deleteBatchSize: 2 })
      for (let i = 0; i < 7; i++) {
        await small.upsert(makeBar(i))
      }

      const deleted = await small.deleteOlderThan(BASE_TIME + 5 * FIFTEEN_MINUTES)

      expect(deleted).toBe(5)
      const remaining = await small.queryWindow('BTCUSDT', '15m', 10)
      expect(remaining.map((b) => b.openTime)).toEqual([
        BASE_TIME + 5 * FIFTEEN_MINUTES,
        BASE_TIME + 6 * FIFTEEN_MINUTES,
      ])
    })
  })

  describe('deleteExcessPerSeries', () => {
    it('should keep the newest rows of every series', async () => {
      for (let i = 0; i < 5; i++) {
        await store.upsert(makeBar(i))
        await store.upsert(makeBar(i, { instrument: 'ETHUSDT' }))
      }
      await store.upsert(makeBar(0, { instrument: 'SOLUSDT' }))

      const deleted = await store.deleteExcessPerSeries(3)

      expect(deleted).toBe(4)
      expect((await store.queryWindow('BTCUSDT', '15m', 10)).map((b) => b.openTime)).toEqual([
        BASE_TIME + 2 * FIFTEEN_MINUTES,
        BASE_TIME + 3 * FIFTEEN_MINUTES,
        BASE_TIME + 4 * FIFTEEN_MINUTES,
      ])
      expect(await store.countClosed('ETHUSDT', '15m')).toBe(3)
      expect(await store.countClosed('SOLUSDT', '15m')).toBe(1)
    })

    it('should treat a cap of 0 as unlimited', async () => {
      await store.upsert(makeBar(0))

      expect(await store.deleteExcessPerSeries(0)).toBe(0)
    })
  })

  describe('deleteOldestUntilWithinCap', () => {
    beforeEach(async () => {
      for (let i = 0; i < 4; i++) {
        await store.upsert(makeBar(i, { instrument: 'ETHUSDT' }))
        await store.upsert(makeBar(i, { instrument: 'BTCUSDT' }))
      }
    })

    it('should evict the globally oldest rows down to the row cap', async () => {
      const deleted = await store.deleteOldestUntilWithinCap(5, 0)

      expect(deleted).toBe(3)
      expect(await store.count()).toBe(5)
      // openTime ties are broken by instrument name
      expect(await store.countClosed('BTCUSDT', '15m')).toBe(2)
      expect(await store.countClosed('ETHUSDT', '15m')).toBe(3)
    })

    it('should convert the byte cap into a row cap', async () => {
      const deleted = await store.deleteOldestUntilWithinCap(0, BAR_ROW_BYTES * 6 + BAR_ROW_BYTES / 2)

      expect(deleted).toBe(2)
      expect((await store.stats()).estimatedBytes).toBe(6 * BAR_ROW_BYTES)
    })

    it('should honour the tighter of both caps', async () => {
      await store.deleteOldestUntilWithinCap(7, BAR_ROW_BYTES * 3)

      expect(await store.count()).toBe(3)
    })

    it('should do nothing when both caps are unlimited', async () => {
      expect(await store.deleteOldestUntilWithinCap(0, 0)).toBe(0)
      expect(await store.count()).toBe(8)
    })
  })

  describe('rowLimitFor', () => {
    it('should combine caps', () => {
      expect(rowLimitFor(0, 0)).toBeNull()
      expect(rowLimitFor(10, 0)).toBe(10)
      expect(rowLimitFor(0, BAR_ROW_BYTES * 4)).toBe(4)
      expect(rowLimitFor(3, BAR_ROW_BYTES * 4)).toBe(3)
    })
  })

  describe('stats', () => {
    it('should report an empty store', async () => {
      expect(await store.stats()).toEqual({
        rowCount: 0,
        seriesCount: 0,
        oldestOpenTime: null,
        newestOpenTime: null,
        estimatedBytes: 0,
      })
    })

    it('should summarise stored rows', async () => {
      await store.upsert(makeBar(0))
      await store.upsert(makeBar(2))
      await store.upsert(makeBar(1, { instrument: 'ETHUSDT' }))

      expect(await store.stats()).toEqual({
        rowCount: 3,
        seriesCount: 2,
        oldestOpenTime: BASE_TIME,
        newestOpenTime: BASE_TIME + 2 * FIFTEEN_MINUTES,
        estimatedBytes: 3 * BAR_ROW_BYTES,
      })
    })
  })
})

// =============================================================================
// Events
// =============================================================================

describe('BarStore finalized events', () => {
  let db: DbConnection
  let events: StoreEventBus
  let store: BarStore
  let received: BarFinalizedEvent[]

  beforeEach(async () => {
    db = await openStoreDb()
    events = new StoreEventBus(createSilentLogger())
    store = new BarStore(db, { events, now: () => NOW })
    received = []
    events.on('finalized', (event) => {
      received.push(event)
    })
  })

  afterEach(async () => {
    await db.close()
  })

  it('should emit when a bar arrives final or becomes final', async () => {
    await store.upsert(makeBar(0))
    await store.upsert(makeBar(1, { isFinal: false }))
    await store.upsert(makeBar(1, { isFinal: false, close: 100.5 }))
    await store.upsert(makeBar(1))

    expect(received.map((e) => [e.bar.openTime, e.transition])).toEqual([
      [BASE_TIME, 'inserted'],
      [BASE_TIME + FIFTEEN_MINUTES, 'finalized'],
    ])
    expect(received[0]?.bar.updatedAt).toBe(NOW)
  })

  it('should not emit for rejected updates or backfill inserts', async () => {
    await store.upsert(makeBar(0))
    await store.upsert(makeBar(0, { close: 100.5 }))
    await store.insertIfAbsent(makeBar(5))

    expect(received).toHaveLength(1)
  })

  it('should contain listener failures', async () => {
    const logger = createSilentLogger()
    const errorSpy = vi.spyOn(logger, 'error')
    const bus = new StoreEventBus(logger)
    const failing = new BarStore(db, { events: bus })
    bus.on('finalized', () => {
      throw new Error('listener broke')
    })
    bus.on('finalized', async () => {
      throw new Error('async listener broke')
    })

    await expect(failing.upsert(makeBar(9))).resolves.toBe('inserted')
    await new Promise((resolve) => setTimeout(resolve, 0))

    expect(errorSpy).toHaveBeenCalledTimes(2)
    expect(errorSpy).toHaveBeenCalledWith('Store event listener failed', {
      event: 'finalized',
      error: 'listener broke',
    })
  })

  it('should stop delivering after unsubscribe', async () => {
    const bus = new StoreEventBus()
    const listener = vi.fn()
    const unsubscribe = bus.on('finalized', listener)
    const other = new BarStore(db, { events: bus })

    unsubscribe()
    await other.upsert(makeBar(4))

    expect(listener).not.toHaveBeenCalled()
    expect(bus.listenerCount('finalized')).toBe(0)
  })
})
