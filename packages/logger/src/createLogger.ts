/**
 * @fileoverview Logger factory for barwatch
 * Creates Winston loggers with structured fields, secret redaction and
 * console/file transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactSecrets, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * The format chain is fixed: redaction, then standard fields (timestamp,
 * error stacks, job id), then JSON or pretty output.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * const ingestLogger = logger.child({ component: 'ingestion' });
 * ingestLogger.warn('Feed disconnected', { instrument: 'BTCUSDT', interval: '15m' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  const logFormat = format.combine(redactSecrets(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(new winston.transports.Console({ level, format: logFormat }));
  }

  if (filePath) {
    // File output is always JSON lines, whatever the console format
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: format.combine(redactSecrets(), standardFields, format.json()),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  // winston warns on a logger without transports; tests create silent loggers
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ level, silent: true }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // Process exit is decided by attachGlobalHandlers, not by winston
    exitOnError: false,
  });
}

/**
 * Creates a child logger whose entries always carry the given context.
 *
 * @example
 * ```typescript
 * const seriesLogger = createChildLogger(logger, {
 *   component: 'ingestion',
 *   instrument: 'ETHUSDT',
 *   interval: '15m',
 * });
 * seriesLogger.info('Backfill complete', { count: 17 });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}

/**
 * A logger that discards everything. Default for components constructed
 * without one (tests, library use).
 */
export function createSilentLogger(): Logger {
  return winston.createLogger({
    level: 'error',
    transports: [new winston.transports.Console({ silent: true })],
  });
}
