/**
 * @fileoverview Process-level error handlers
 * Uncaught exceptions are fatal; unhandled rejections are logged and the
 * process keeps running, since every pipeline task contains its own errors.
 */

import type { Logger } from './types.js';

/**
 * Time allowed for transports to flush before a forced exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

export interface GlobalHandlerOptions {
  /**
   * Exit on unhandled promise rejections as well.
   * @default false
   */
  exitOnRejection?: boolean;

  /**
   * Injected for tests.
   * @default process.exit
   */
  exit?: (code: number) => void;
}

function describeError(reason: unknown): Record<string, unknown> {
  if (reason instanceof Error) {
    return { name: reason.name, message: reason.message, stack: reason.stack };
  }
  return { message: String(reason) };
}

/**
 * Attaches uncaughtException, unhandledRejection and warning handlers.
 * Safe to call more than once; later calls are ignored.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger, options: GlobalHandlerOptions = {}): void {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return;
  }

  const exit = options.exit ?? ((code: number) => process.exit(code));

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception - process will exit', {
      error: describeError(error),
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1, exit);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    const fatal = options.exitOnRejection === true;
    logger.error('Unhandled promise rejection', {
      error: describeError(reason),
      event: 'unhandledRejection',
      fatal,
    });
    if (fatal) {
      gracefulExit(logger, 1, exit);
    }
  });

  process.on('warning', (warning: Error) => {
    logger.warn('Process warning emitted', {
      warning: describeError(warning),
      event: 'warning',
    });
  });

  handlersAttached = true;

  logger.info('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });
}

/**
 * Ends the logger and exits once it has flushed, or after FLUSH_TIMEOUT_MS.
 */
function gracefulExit(logger: Logger, exitCode: number, exit: (code: number) => void): void {
  const timeoutId = setTimeout(() => {
    console.error(`[Logger] Flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit`);
    exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    exit(exitCode);
  });

  logger.end();
}
