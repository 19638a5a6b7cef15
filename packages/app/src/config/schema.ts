/**
 * Configuration schema using Zod
 */

import { z } from 'zod';
import { errorMessage } from '@barwatch/contracts';
import { normalizeInterval } from '@barwatch/market-data-core';
import { detectorConfigSchema } from '@barwatch/detector';

const intervalSchema = z.string().transform((value, ctx) => {
  try {
    return normalizeInterval(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(error) });
    return z.NEVER;
  }
});

const instrumentList = z.array(z.string().trim().min(1).toUpperCase()).default([]);

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'staging', 'production', 'test']).default('development'),
      name: z.string().default('barwatch'),
      version: z.string().default('0.1.0'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  database: z
    .object({
      /** sqlite:<path>, sqlite::memory: or postgres://... */
      url: z.string().min(1).default('sqlite:barwatch.db'),
    })
    .default({}),

  source: z
    .object({
      type: z.enum(['fixture']).default('fixture'),
      seed: z.number().int().default(42),
      /** Instruments listed by the fixture snapshot */
      instruments: z.number().int().positive().default(40),
      /** Delay between live updates of one series */
      tickMs: z.number().int().positive().default(5000),
    })
    .default({}),

  universe: z
    .object({
      topN: z.number().int().positive().default(150),
      minQuoteVolume: z.number().min(0).default(5000),
      quoteAsset: z.string().min(1).optional(),
      include: instrumentList,
      exclude: instrumentList,
      refreshIntervalMs: z.number().int().positive().default(60 * 60 * 1000),
    })
    .default({}),

  ingestion: z
    .object({
      intervals: z.array(intervalSchema).min(1).default(['15m']),
      channelCapacity: z.number().int().positive().default(256),
      maxBackfillAttempts: z.number().int().positive().default(3),
      backfillTimeoutMs: z.number().int().positive().default(10_000),
    })
    .default({}),

  detector: detectorConfigSchema.default({}),

  scoring: z
    .object({
      passIntervalMs: z.number().int().positive().default(60 * 1000),
    })
    .default({}),

  retention: z
    .object({
      sweepIntervalMs: z.number().int().positive().default(60 * 60 * 1000),
      maxAgeHours: z.number().positive().default(24),
      maxRowsPerSeries: z.number().int().min(0).default(10_000),
      maxTotalRows: z.number().int().min(0).default(0),
      maxStorageMb: z.number().min(0).default(100),
      maxAnomalyRows: z.number().int().min(0).default(0),
      deleteBatchSize: z.number().int().positive().default(5000),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  DATABASE_URL: 'database.url',
  FIXTURE_SEED: 'source.seed',
  FIXTURE_INSTRUMENTS: 'source.instruments',
  FIXTURE_TICK_MS: 'source.tickMs',
  UNIVERSE_TOP_N: 'universe.topN',
  UNIVERSE_MIN_QUOTE_VOLUME: 'universe.minQuoteVolume',
  UNIVERSE_QUOTE_ASSET: 'universe.quoteAsset',
  UNIVERSE_INCLUDE: 'universe.include',
  UNIVERSE_EXCLUDE: 'universe.exclude',
  UNIVERSE_REFRESH_MS: 'universe.refreshIntervalMs',
  INTERVALS: 'ingestion.intervals',
  CHANNEL_CAPACITY: 'ingestion.channelCapacity',
  WINDOW_SIZE: 'detector.windowSize',
  PRICE_Z_THRESHOLD: 'detector.priceZThreshold',
  VOLUME_Z_THRESHOLD: 'detector.volumeZThreshold',
  VOLATILITY_Z_THRESHOLD: 'detector.volatilityZThreshold',
  MIN_ABS_RETURN: 'detector.minAbsReturn',
  RECORD_POLICY: 'detector.recordPolicy',
  VOLUME_SOURCE: 'detector.volumeSource',
  SCORING_PASS_MS: 'scoring.passIntervalMs',
  RETENTION_SWEEP_MS: 'retention.sweepIntervalMs',
  RETENTION_MAX_AGE_HOURS: 'retention.maxAgeHours',
  RETENTION_MAX_ROWS_PER_SERIES: 'retention.maxRowsPerSeries',
  RETENTION_MAX_TOTAL_ROWS: 'retention.maxTotalRows',
  RETENTION_MAX_STORAGE_MB: 'retention.maxStorageMb',
  RETENTION_MAX_ANOMALY_ROWS: 'retention.maxAnomalyRows',
};

/** Comma-separated variables */
export const listEnvKeys = new Set(['INTERVALS', 'UNIVERSE_INCLUDE', 'UNIVERSE_EXCLUDE']);

/** Kept as strings even when they look numeric or boolean */
export const stringEnvKeys = new Set(['LOG_FILE', 'DATABASE_URL', 'UNIVERSE_QUOTE_ASSET']);
