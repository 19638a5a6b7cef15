/**
 * @fileoverview Anomaly record contracts.
 *
 * @module @barwatch/contracts/anomaly
 */

import type { Interval } from './intervals.js';

/**
 * A dimension along which a bar can be anomalous. Reasons are always listed
 * in this order.
 */
export type AnomalyDimension = 'price' | 'volume' | 'volatility';

export const ANOMALY_DIMENSIONS: readonly AnomalyDimension[] = ['price', 'volume', 'volatility'];

/**
 * Scoring result for one closed bar.
 *
 * Identity is (instrument, timestamp, intervalType). A record is written
 * once and never updated.
 */
export interface AnomalyRecord {
  instrument: string;
  /** openTime of the scored bar, epoch milliseconds */
  timestamp: number;
  intervalType: Interval;
  closePrice: number;
  currentReturn: number;
  currentVolume: number;
  currentVolatility: number;
  priceZ: number;
  volumeZ: number;
  volatilityZ: number;
  /** Weighted sum of |z| over triggered dimensions; 0 when none triggered */
  compositeScore: number;
  reasons: AnomalyDimension[];
  isAnomaly: boolean;
  /** 24h quote volume of the instrument when scored, if known */
  quoteVolume24h: number | null;
  /** Epoch milliseconds */
  createdAt: number;
}

/**
 * Filters for reading anomaly records.
 */
export interface AnomalyQuery {
  instrument?: string;
  interval?: Interval;
  minScore?: number;
  /** Only records with isAnomaly = true */
  anomalyOnly?: boolean;
  /** Only records with timestamp >= since */
  since?: number;
  limit: number;
  /** Defaults to 'timestamp' (newest first) */
  orderBy?: 'timestamp' | 'score';
}
