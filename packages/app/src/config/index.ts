/**
 * Configuration loading and management
 */

import type { Logger } from '@barwatch/logger';
import { ConfigValidationError } from '@barwatch/contracts';
import { validateRetentionPolicy } from '@barwatch/bar-store';
import type { RetentionPolicy } from '@barwatch/bar-store';
import { configSchema, envMapping, listEnvKeys, stringEnvKeys } from './schema.js';
import type { Config } from './schema.js';

const HOUR_MS = 60 * 60 * 1000;
const MEGABYTE = 1024 * 1024;

type Environment = Record<string, string | undefined>;

/**
 * Loads configuration from environment variables over the schema defaults.
 * `.env` is read into process.env at startup, before this runs.
 *
 * @throws ConfigValidationError listing every invalid setting
 */
export function loadConfig(env: Environment = process.env, logger?: Logger): Config {
  const rawConfig: Record<string, unknown> = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(envKey, value));
    }
  }

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigValidationError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
  }

  const config = result.data;
  validateRetentionPolicy(toRetentionPolicy(config), config.detector.windowSize, config.ingestion.intervals);

  logger?.info('Configuration loaded', getConfigSummary(config));
  return config;
}

export function toRetentionPolicy(config: Config): RetentionPolicy {
  const { retention } = config;
  return {
    maxAgeMs: Math.round(retention.maxAgeHours * HOUR_MS),
    maxRowsPerSeries: retention.maxRowsPerSeries,
    maxTotalRows: retention.maxTotalRows,
    maxStorageBytes: Math.round(retention.maxStorageMb * MEGABYTE),
    maxAnomalyRows: retention.maxAnomalyRows,
  };
}

function setNestedProperty(target: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (lastKey === undefined) return;

  let current = target;
  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
  current[lastKey] = value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(key: string, value: string): unknown {
  if (listEnvKeys.has(key)) {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item !== '');
  }
  if (stringEnvKeys.has(key)) return value;

  if (value === 'true') return true;
  if (value === 'false') return false;

  const num = Number(value);
  if (!Number.isNaN(num)) return num;

  return value;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    database: config.database.url.startsWith('postgres') ? 'postgres' : 'sqlite',
    source: config.source.type,
    intervals: config.ingestion.intervals,
    universe: { topN: config.universe.topN, minQuoteVolume: config.universe.minQuoteVolume },
    windowSize: config.detector.windowSize,
    recordPolicy: config.detector.recordPolicy,
    retention: { maxAgeHours: config.retention.maxAgeHours, maxStorageMb: config.retention.maxStorageMb },
    logging: { level: config.logging.level, format: config.logging.format },
  };
}

export { configSchema, envMapping } from './schema.js';
export type { Config, ConfigInput } from './schema.js';
