/**
 * @fileoverview Custom Winston formats for the barwatch logger
 * Secret redaction, standard fields with job id injection, and pretty output.
 */

import { format } from 'winston';
import { getJobContext } from './job-context.js';

/**
 * Field names whose values never reach a transport. Matches are
 * case-insensitive so apiKey, API_KEY and api-key are all caught.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
  /connection[_-]?string/i,
];

export const REDACTED = '[REDACTED]';

/**
 * Winston-internal fields that are never redacted or re-printed.
 */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack', 'splat']);

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of the value with every sensitive key replaced by
 * REDACTED, descending into nested objects and arrays.
 *
 * @example
 * ```typescript
 * redactValue({ user: 'ops', dbPassword: 'x' });
 * // { user: 'ops', dbPassword: '[REDACTED]' }
 * ```
 */
export function redactValue(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }

  // Error instances keep their prototype so format.errors() still sees them
  if (value instanceof Error) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    result[key] = isSensitiveKey(key) ? REDACTED : redactValue(nested);
  }
  return result;
}

/**
 * Redacts sensitive metadata. Must run first in the format chain.
 *
 * @example
 * ```typescript
 * logger.info('connecting', { databaseUrl: 'postgres://...', password: 'x' });
 * // {"message":"connecting","databaseUrl":"postgres://...","password":"[REDACTED]"}
 * ```
 */
export const redactSecrets = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) continue;
    info[key] = isSensitiveKey(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * Timestamp, error stacks, and job correlation fields from AsyncLocalStorage.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const context = getJobContext();
    if (context) {
      if (info['job_id'] === undefined) info['job_id'] = context.job_id;
      if (info['job'] === undefined) info['job'] = context.job;
    }
    return info;
  })()
);

/**
 * Human-readable single line output for development.
 *
 * @example
 * ```
 * [2026-10-19T12:34:56.789+00:00] info: Bar finalized component=ingestion instrument=BTCUSDT interval=15m
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, instrument, interval, job_id, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (instrument) context.push(`instrument=${String(instrument)}`);
    if (interval) context.push(`interval=${String(interval)}`);
    if (job_id) context.push(`job_id=${String(job_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (CORE_FIELDS.has(key)) continue;
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    const stack = info['stack'];
    return typeof stack === 'string' ? `${baseMsg}\n${stack}` : baseMsg;
  })
);
