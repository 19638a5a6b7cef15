/**
 * @fileoverview Type definitions for the barwatch logger
 * Strongly-typed configuration and standard log entry fields.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity that will be written.
 * - 'error': failures that lose data or stop a component
 * - 'warn': contained failures (retries, degraded instruments)
 * - 'info': lifecycle events and pass summaries
 * - 'debug': per-bar detail
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/barwatch.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Machine-readable JSON lines when true, colourised single lines otherwise.
   * @default true in production, false elsewhere
   */
  json?: boolean;

  /**
   * Optional file transport, written in addition to the console.
   */
  filePath?: string;

  /**
   * Disable console output (tests, file-only deployments).
   * @default true
   */
  console?: boolean;
}

/**
 * Structured log entry with the fields barwatch components emit.
 * Additional custom fields can be added via the index signature.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** ISO 8601 timestamp */
  timestamp: string;

  /** Instrument symbol (e.g. "BTCUSDT") */
  instrument?: string;

  /** Bar interval (e.g. "15m") */
  interval?: string;

  /** Component name, set by child loggers */
  component?: string;

  /** Periodic job name ('scoring-pass', 'retention-sweep', ...) */
  job?: string;

  /** Correlation id of the job run */
  job_id?: string;

  operation?: string;
  duration_ms?: number;

  /** 'success' | 'error' | 'skipped' | 'partial' */
  result?: string;

  /** Error taxonomy code when result is error */
  error_code?: string;

  count?: number;

  [key: string]: unknown;
}

/**
 * Context fields attached through logger.child().
 */
export interface ChildLoggerContext {
  component?: string;
  instrument?: string;
  interval?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Winston's logger, re-exported so packages depend on @barwatch/logger only.
 */
export type Logger = WinstonLogger;
