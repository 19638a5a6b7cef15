/**
 * @fileoverview Public API exports for @barwatch/logger
 * Structured logging and process error handling for barwatch
 */

export { createLogger, createChildLogger, createSilentLogger } from './createLogger.js';

export { attachGlobalHandlers } from './errorHandler.js';
export type { GlobalHandlerOptions } from './errorHandler.js';

export { generateJobId, getJobContext, getJobId, withJobContext } from './job-context.js';
export type { JobContext } from './job-context.js';

export { startTimer, measureAsync } from './perf-timer.js';
export type { PerfTimer } from './perf-timer.js';

export { redactValue, isSensitiveKey, REDACTED } from './formats.js';

export type { Logger, LoggerConfig, LogLevel, LogEntry, ChildLoggerContext } from './types.js';
