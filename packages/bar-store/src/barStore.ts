/**
 * Database-backed bar store.
 *
 * Holds at most one row per (instrument, interval, openTime). Open bars are
 * replaced in place as updates arrive; once a bar is final its row never
 * changes again and only retention removes it.
 */

import type { DbConnection } from '@barwatch/db-simple'
import { createSilentLogger } from '@barwatch/logger'
import type { Logger } from '@barwatch/logger'
import {
  ClosedBarImmutableError,
  StoreWriteFailedError,
  isInterval,
  seriesId,
} from '@barwatch/contracts'
import type { BarKey, BarUpdate, Interval, SeriesKey, StoredBar, UpsertOutcome } from '@barwatch/contracts'
import { KeyedMutex, AsyncRwLock } from './locks.js'
import type { StoreEventBus } from './events.js'

/**
 * Estimated on-disk size of one bar row including index overhead. Storage
 * caps are enforced against rowCount × BAR_ROW_BYTES.
 */
export const BAR_ROW_BYTES = 160

/**
 * Rows removed per statement by bulk deletes.
 */
export const DEFAULT_DELETE_BATCH_SIZE = 5000

/**
 * Database row type for the bars table.
 */
interface BarRow {
  instrument: string
  bar_interval: string
  open_time: number
  close_time: number
  open: number
  high: number
  low: number
  close: number
  volume: number
  quote_volume: number
  trade_count: number
  is_final: number
  updated_at: number
}

const BAR_COLUMNS = `instrument, bar_interval, open_time, close_time, open, high, low, close,
  volume, quote_volume, trade_count, is_final, updated_at`

export interface BarStoreOptions {
  logger?: Logger
  /** Receives 'finalized' events */
  events?: StoreEventBus
  /** Clock for updatedAt; injected by tests */
  now?: () => number
  deleteBatchSize?: number
}

export interface WindowQueryOptions {
  /** Only bars with openTime strictly before this value */
  before?: number
}

export interface BarStoreStats {
  rowCount: number
  seriesCount: number
  oldestOpenTime: number | null
  newestOpenTime: number | null
  estimatedBytes: number
}

/**
 * Bar store for SQLite and PostgreSQL.
 *
 * Writers are serialised per series; writes to different series run
 * concurrently. Each bulk delete batch holds the store exclusively for the
 * duration of that batch only.
 *
 * Example:
 * ```typescript
 * const store = new BarStore(db, { logger, events })
 *
 * const outcome = await store.upsert(update) // 'inserted' | 'updated' | 'finalized' | 'rejected'
 * const window = await store.queryWindow('BTCUSDT', '15m', 17)
 * ```
 */
export class BarStore {
  private logger: Logger
  private events: StoreEventBus | undefined
  private now: () => number
  private deleteBatchSize: number
  private seriesLocks = new KeyedMutex()
  private storeLock = new AsyncRwLock()

  constructor(
    private db: DbConnection,
    options: BarStoreOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger()
    this.events = options.events
    this.now = options.now ?? Date.now
    this.deleteBatchSize = options.deleteBatchSize ?? DEFAULT_DELETE_BATCH_SIZE
  }

  /**
   * Insert a bar, or replace the stored bar with the same key if that bar is
   * not final yet.
   *
   * @throws StoreWriteFailedError if the database write fails
   */
  async upsert(bar: BarUpdate): Promise<UpsertOutcome> {
    const updatedAt = this.now()
    const outcome = await this.seriesLocks.runExclusive(seriesId(bar), () =>
      this.storeLock.runShared(() => this.writeBar(bar, updatedAt))
    )

    if (bar.isFinal && (outcome === 'inserted' || outcome === 'finalized')) {
      this.events?.emit('finalized', {
        bar: { ...bar, updatedAt },
        transition: outcome,
        emittedAt: this.now(),
      })
    }

    return outcome
  }

  /**
   * Same as upsert(), but a write to a final bar throws.
   *
   * @throws ClosedBarImmutableError if the stored bar is final
   */
  async upsertOrThrow(bar: BarUpdate): Promise<Exclude<UpsertOutcome, 'rejected'>> {
    const outcome = await this.upsert(bar)
    if (outcome === 'rejected') {
      throw new ClosedBarImmutableError(`Bar ${seriesId(bar)}@${bar.openTime} is final`, {
        instrument: bar.instrument,
        interval: bar.interval,
        openTime: bar.openTime,
      })
    }
    return outcome
  }

  /**
   * Insert a bar only if no bar with its key is stored.
   *
   * @returns true if the bar was inserted
   */
  async insertIfAbsent(bar: BarUpdate): Promise<boolean> {
    return this.seriesLocks.runExclusive(seriesId(bar), () =>
      this.storeLock.runShared(async () => {
        try {
          const result = await this.db.exec(
            `INSERT INTO bars (${BAR_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
             ON CONFLICT (instrument, bar_interval, open_time) DO NOTHING`,
            this.toParams(bar, this.now())
          )
          return result.changes > 0
        } catch (error) {
          throw this.writeError(bar, error)
        }
      })
    )
  }

  async get(key: BarKey): Promise<StoredBar | null> {
    const rows = await this.db.query<BarRow>(
      `SELECT ${BAR_COLUMNS} FROM bars WHERE instrument = ? AND bar_interval = ? AND open_time = ?`,
      [key.instrument, key.interval, key.openTime]
    )
    const row = rows[0]
    return row ? this.fromRow(row) : null
  }

  async countClosed(instrument: string, interval: Interval): Promise<number> {
    const rows = await this.db.query<{ n: number }>(
      'SELECT COUNT(*) AS n FROM bars WHERE instrument = ? AND bar_interval = ? AND is_final = 1',
      [instrument, interval]
    )
    return Number(rows[0]?.n ?? 0)
  }

  /**
   * Most recent `limit` final bars of a series, oldest first.
   */
  async queryWindow(
    instrument: string,
    interval: Interval,
    limit: number,
    options: WindowQueryOptions = {}
  ): Promise<StoredBar[]> {
    if (limit <= 0) {
      return []
    }

    const params: unknown[] = [instrument, interval]
    let beforeClause = ''
    if (options.before !== undefined) {
      beforeClause = 'AND open_time < ?'
      params.push(options.before)
    }
    params.push(limit)

    const rows = await this.db.query<BarRow>(
      `SELECT ${BAR_COLUMNS} FROM bars
       WHERE instrument = ? AND bar_interval = ? AND is_final = 1 ${beforeClause}
       ORDER BY open_time DESC
       LIMIT ?`,
      params
    )

    return rows.map((row) => this.fromRow(row)).reverse()
  }

  async latestClosed(instrument: string, interval: Interval): Promise<StoredBar | null> {
    const [bar] = await this.queryWindow(instrument, interval, 1)
    return bar ?? null
  }

  /**
   * Every series with at least one stored bar.
   */
  async listSeries(): Promise<SeriesKey[]> {
    const rows = await this.db.query<{ instrument: string; bar_interval: string }>(
      'SELECT DISTINCT instrument, bar_interval FROM bars ORDER BY instrument, bar_interval'
    )
    const series: SeriesKey[] = []
    for (const row of rows) {
      if (isInterval(row.bar_interval)) {
        series.push({ instrument: row.instrument, interval: row.bar_interval })
      }
    }
    return series
  }

  /**
   * Delete every bar with openTime < cutoff.
   *
   * @returns Number of rows deleted
   */
  async deleteOlderThan(cutoff: number): Promise<number> {
    return this.deleteInBatches(
      `DELETE FROM bars WHERE (instrument, bar_interval, open_time) IN (
         SELECT instrument, bar_interval, open_time FROM bars
         WHERE open_time < ?
         ORDER BY open_time ASC
         LIMIT ?
       )`,
      [cutoff]
    )
  }

  /**
   * Keep only the newest `maxRowsPerSeries` bars of every series.
   * A cap of 0 disables the step.
   */
  async deleteExcessPerSeries(maxRowsPerSeries: number): Promise<number> {
    if (maxRowsPerSeries <= 0) {
      return 0
    }
    return this.deleteInBatches(
      `DELETE FROM bars WHERE (instrument, bar_interval, open_time) IN (
         SELECT instrument, bar_interval, open_time FROM (
           SELECT instrument, bar_interval, open_time,
                  ROW_NUMBER() OVER (PARTITION BY instrument, bar_interval ORDER BY open_time DESC) AS rn
           FROM bars
         ) ranked
         WHERE rn > ?
         LIMIT ?
       )`,
      [maxRowsPerSeries]
    )
  }

  /**
   * Evict the globally oldest bars (by openTime, then instrument, then
   * interval) until the row count is within both caps. A cap of 0 is
   * unlimited.
   *
   * @returns Number of rows deleted
   */
  async deleteOldestUntilWithinCap(maxRows: number, maxBytes: number): Promise<number> {
    const limit = rowLimitFor(maxRows, maxBytes)
    if (limit === null) {
      return 0
    }

    let deleted = 0
    for (;;) {
      const excess = (await this.count()) - limit
      if (excess <= 0) {
        return deleted
      }
      const batch = Math.min(excess, this.deleteBatchSize)
      const result = await this.storeLock.runExclusive(() =>
        this.db.exec(
          `DELETE FROM bars WHERE (instrument, bar_interval, open_time) IN (
             SELECT instrument, bar_interval, open_time FROM bars
             ORDER BY open_time ASC, instrument ASC, bar_interval ASC
             LIMIT ?
           )`,
          [batch]
        )
      )
      deleted += result.changes
      if (result.changes === 0) {
        return deleted
      }
    }
  }

  async count(): Promise<number> {
    const rows = await this.db.query<{ n: number }>('SELECT COUNT(*) AS n FROM bars')
    return Number(rows[0]?.n ?? 0)
  }

  async stats(): Promise<BarStoreStats> {
    const rows = await this.db.query<{ n: number; oldest: number | null; newest: number | null }>(
      'SELECT COUNT(*) AS n, MIN(open_time) AS oldest, MAX(open_time) AS newest FROM bars'
    )
    const series = await this.db.query<{ n: number }>(
      'SELECT COUNT(*) AS n FROM (SELECT DISTINCT instrument, bar_interval FROM bars) s'
    )
    const rowCount = Number(rows[0]?.n ?? 0)
    const oldest = rows[0]?.oldest
    const newest = rows[0]?.newest

    return {
      rowCount,
      seriesCount: Number(series[0]?.n ?? 0),
      oldestOpenTime: oldest === null || oldest === undefined ? null : Number(oldest),
      newestOpenTime: newest === null || newest === undefined ? null : Number(newest),
      estimatedBytes: rowCount * BAR_ROW_BYTES,
    }
  }

  private async writeBar(bar: BarUpdate, updatedAt: number): Promise<UpsertOutcome> {
    try {
      const existing = await this.db.query<{ is_final: number }>(
        'SELECT is_final FROM bars WHERE instrument = ? AND bar_interval = ? AND open_time = ?',
        [bar.instrument, bar.interval, bar.openTime]
      )
      const stored = existing[0]
      if (stored && stored.is_final === 1) {
        this.logger.debug('Rejected update to final bar', {
          instrument: bar.instrument,
          interval: bar.interval,
          open_time: bar.openTime,
        })
        return 'rejected'
      }

      const result = await this.db.exec(
        `INSERT INTO bars (${BAR_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (instrument, bar_interval, open_time) DO UPDATE SET
           close_time = excluded.close_time,
           open = excluded.open,
           high = excluded.high,
           low = excluded.low,
           close = excluded.close,
           volume = excluded.volume,
           quote_volume = excluded.quote_volume,
           trade_count = excluded.trade_count,
           is_final = excluded.is_final,
           updated_at = excluded.updated_at
         WHERE bars.is_final = 0`,
        this.toParams(bar, updatedAt)
      )

      if (result.changes === 0) {
        // Another writer finalized the row between the read and the write
        return 'rejected'
      }
      if (!stored) {
        return 'inserted'
      }
      return bar.isFinal ? 'finalized' : 'updated'
    } catch (error) {
      throw this.writeError(bar, error)
    }
  }

  private async deleteInBatches(sql: string, params: unknown[]): Promise<number> {
    let deleted = 0
    for (;;) {
      const result = await this.storeLock.runExclusive(() =>
        this.db.exec(sql, [...params, this.deleteBatchSize])
      )
      deleted += result.changes
      if (result.changes < this.deleteBatchSize) {
        return deleted
      }
    }
  }

  private writeError(bar: BarUpdate, error: unknown): StoreWriteFailedError {
    return new StoreWriteFailedError(
      `Failed to write bar ${seriesId(bar)}@${bar.openTime}: ${error instanceof Error ? error.message : String(error)}`,
      { instrument: bar.instrument, interval: bar.interval, openTime: bar.openTime },
      { cause: error }
    )
  }

  private toParams(bar: BarUpdate, updatedAt: number): unknown[] {
    return [
      bar.instrument,
      bar.interval,
      bar.openTime,
      bar.closeTime,
      bar.open,
      bar.high,
      bar.low,
      bar.close,
      bar.volume,
      bar.quoteVolume,
      bar.tradeCount,
      bar.isFinal ? 1 : 0,
      updatedAt,
    ]
  }

  private fromRow(row: BarRow): StoredBar {
    if (!isInterval(row.bar_interval)) {
      throw new Error(`Stored bar has unknown interval: ${row.bar_interval}`)
    }
    return {
      instrument: row.instrument,
      interval: row.bar_interval,
      openTime: Number(row.open_time),
      closeTime: Number(row.close_time),
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
      volume: row.volume,
      quoteVolume: row.quote_volume,
      tradeCount: Number(row.trade_count),
      isFinal: Number(row.is_final) === 1,
      updatedAt: Number(row.updated_at),
    }
  }
}

/**
 * Row ceiling implied by a row cap and a byte cap, or null when both are
 * unlimited (0).
 */
export function rowLimitFor(maxRows: number, maxBytes: number): number | null {
  const limits: number[] = []
  if (maxRows > 0) limits.push(maxRows)
  if (maxBytes > 0) limits.push(Math.floor(maxBytes / BAR_ROW_BYTES))
  return limits.length === 0 ? null : Math.min(...limits)
}
