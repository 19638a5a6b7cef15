/**
 * Persistent sink for anomaly records.
 *
 * A record is written once per (instrument, timestamp, intervalType);
 * writing the same key again is a no-op, so re-scoring a bar never changes
 * or duplicates its record.
 */

import type { DbConnection } from '@barwatch/db-simple'
import { ANOMALY_DIMENSIONS, isInterval } from '@barwatch/contracts'
import type { AnomalyDimension, AnomalyQuery, AnomalyRecord, Interval } from '@barwatch/contracts'
import { DEFAULT_DELETE_BATCH_SIZE } from './barStore.js'

interface AnomalyRow {
  instrument: string
  timestamp: number
  interval_type: string
  close_price: number
  current_return: number
  current_volume: number
  current_volatility: number
  price_z: number
  volume_z: number
  volatility_z: number
  composite_score: number
  reasons: string
  is_anomaly: number
  quote_volume_24h: number | null
  created_at: number
}

const ANOMALY_COLUMNS = `instrument, timestamp, interval_type, close_price, current_return,
  current_volume, current_volatility, price_z, volume_z, volatility_z, composite_score,
  reasons, is_anomaly, quote_volume_24h, created_at`

export interface AnomalySinkStats {
  rowCount: number
  /** Rows with isAnomaly = true */
  anomalyCount: number
  oldestTimestamp: number | null
  newestTimestamp: number | null
}

export interface AnomalySinkOptions {
  deleteBatchSize?: number
}

/**
 * Example:
 * ```typescript
 * const sink = new AnomalySink(db)
 *
 * const written = await sink.upsert(record) // false if already recorded
 * const top = await sink.query({ minScore: 1, anomalyOnly: true, limit: 20, orderBy: 'score' })
 * ```
 */
export class AnomalySink {
  private deleteBatchSize: number

  constructor(
    private db: DbConnection,
    options: AnomalySinkOptions = {}
  ) {
    this.deleteBatchSize = options.deleteBatchSize ?? DEFAULT_DELETE_BATCH_SIZE
  }

  /**
   * @returns true if the record was written, false if its key already existed
   */
  async upsert(record: AnomalyRecord): Promise<boolean> {
    const result = await this.db.exec(
      `INSERT INTO anomalies (${ANOMALY_COLUMNS})
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT (instrument, timestamp, interval_type) DO NOTHING`,
      [
        record.instrument,
        record.timestamp,
        record.intervalType,
        record.closePrice,
        record.currentReturn,
        record.currentVolume,
        record.currentVolatility,
        record.priceZ,
        record.volumeZ,
        record.volatilityZ,
        record.compositeScore,
        record.reasons.join(','),
        record.isAnomaly ? 1 : 0,
        record.quoteVolume24h,
        record.createdAt,
      ]
    )
    return result.changes > 0
  }

  async get(instrument: string, timestamp: number, intervalType: Interval): Promise<AnomalyRecord | null> {
    const rows = await this.db.query<AnomalyRow>(
      `SELECT ${ANOMALY_COLUMNS} FROM anomalies
       WHERE instrument = ? AND timestamp = ? AND interval_type = ?`,
      [instrument, timestamp, intervalType]
    )
    const row = rows[0]
    return row ? fromRow(row) : null
  }

  /**
   * Records matching every given filter, newest first unless
   * orderBy is 'score'.
   */
  async query(query: AnomalyQuery): Promise<AnomalyRecord[]> {
    const conditions: string[] = []
    const params: unknown[] = []

    if (query.instrument !== undefined) {
      conditions.push('instrument = ?')
      params.push(query.instrument)
    }
    if (query.interval !== undefined) {
      conditions.push('interval_type = ?')
      params.push(query.interval)
    }
    if (query.minScore !== undefined) {
      conditions.push('composite_score >= ?')
      params.push(query.minScore)
    }
    if (query.anomalyOnly === true) {
      conditions.push('is_anomaly = 1')
    }
    if (query.since !== undefined) {
      conditions.push('timestamp >= ?')
      params.push(query.since)
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : ''
    const orderBy =
      query.orderBy === 'score'
        ? 'ORDER BY composite_score DESC, timestamp DESC, instrument ASC'
        : 'ORDER BY timestamp DESC, composite_score DESC, instrument ASC'
    params.push(Math.max(0, Math.floor(query.limit)))

    const rows = await this.db.query<AnomalyRow>(
      `SELECT ${ANOMALY_COLUMNS} FROM anomalies ${where} ${orderBy} LIMIT ?`,
      params
    )
    return rows.map(fromRow)
  }

  /**
   * Delete every record with timestamp < cutoff.
   */
  async deleteOlderThan(cutoff: number): Promise<number> {
    return this.deleteInBatches(
      `DELETE FROM anomalies WHERE (instrument, timestamp, interval_type) IN (
         SELECT instrument, timestamp, interval_type FROM anomalies
         WHERE timestamp < ?
         ORDER BY timestamp ASC
         LIMIT ?
       )`,
      [cutoff]
    )
  }

  /**
   * Evict the oldest records until at most maxRows remain. 0 is unlimited.
   */
  async deleteOldestUntilWithinCap(maxRows: number): Promise<number> {
    if (maxRows <= 0) {
      return 0
    }

    let deleted = 0
    for (;;) {
      const excess = (await this.count()) - maxRows
      if (excess <= 0) {
        return deleted
      }
      const result = await this.db.exec(
        `DELETE FROM anomalies WHERE (instrument, timestamp, interval_type) IN (
           SELECT instrument, timestamp, interval_type FROM anomalies
           ORDER BY timestamp ASC, instrument ASC, interval_type ASC
           LIMIT ?
         )`,
        [Math.min(excess, this.deleteBatchSize)]
      )
      deleted += result.changes
      if (result.changes === 0) {
        return deleted
      }
    }
  }

  async count(): Promise<number> {
    const rows = await this.db.query<{ n: number }>('SELECT COUNT(*) AS n FROM anomalies')
    return Number(rows[0]?.n ?? 0)
  }

  async stats(): Promise<AnomalySinkStats> {
    const rows = await this.db.query<{
      n: number
      anomalies: number | null
      oldest: number | null
      newest: number | null
    }>(
      `SELECT COUNT(*) AS n, SUM(is_anomaly) AS anomalies,
              MIN(timestamp) AS oldest, MAX(timestamp) AS newest
       FROM anomalies`
    )
    const row = rows[0]
    return {
      rowCount: Number(row?.n ?? 0),
      anomalyCount: Number(row?.anomalies ?? 0),
      oldestTimestamp: row?.oldest === null || row?.oldest === undefined ? null : Number(row.oldest),
      newestTimestamp: row?.newest === null || row?.newest === undefined ? null : Number(row.newest),
    }
  }

  private async deleteInBatches(sql: string, params: unknown[]): Promise<number> {
    let deleted = 0
    for (;;) {
      const result = await this.db.exec(sql, [...params, this.deleteBatchSize])
      deleted += result.changes
      if (result.changes < this.deleteBatchSize) {
        return deleted
      }
    }
  }
}

function parseReasons(value: string): AnomalyDimension[] {
  const parts = value.split(',')
  return ANOMALY_DIMENSIONS.filter((dimension) => parts.includes(dimension))
}

function fromRow(row: AnomalyRow): AnomalyRecord {
  if (!isInterval(row.interval_type)) {
    throw new Error(`Stored anomaly has unknown interval: ${row.interval_type}`)
  }
  return {
    instrument: row.instrument,
    timestamp: Number(row.timestamp),
    intervalType: row.interval_type,
    closePrice: row.close_price,
    currentReturn: row.current_return,
    currentVolume: row.current_volume,
    currentVolatility: row.current_volatility,
    priceZ: row.price_z,
    volumeZ: row.volume_z,
    volatilityZ: row.volatility_z,
    compositeScore: row.composite_score,
    reasons: parseReasons(row.reasons),
    isAnomaly: Number(row.is_anomaly) === 1,
    quoteVolume24h: row.quote_volume_24h === null ? null : Number(row.quote_volume_24h),
    createdAt: Number(row.created_at),
  }
}
