/**
 * @fileoverview Global error handlers for uncaught exceptions and unhandled rejections
 * Ensures all errors are logged before process termination.
 */

import type { Logger } from './types.js';

/**
 * Timeout in milliseconds to wait for logger flush before forceful exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

/**
 * Removes handlers installed by {@link attachGlobalHandlers}.
 */
export type DetachHandlers = () => void;

/**
 * Detach function of the currently attached handlers, if any.
 */
let attached: DetachHandlers | null = null;

/**
 * Attaches global error handlers to the Node.js process.
 * Captures uncaught exceptions and unhandled promise rejections,
 * logs them with full stack traces, then terminates the process.
 *
 * Errors are logged and the process exits with code 1; there is no attempt
 * to continue after an unhandled error.
 *
 * @returns Function that removes the handlers again
 *
 * @example
 * ```typescript
 * import { createLogger, attachGlobalHandlers } from '@numerals/logger';
 *
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): DetachHandlers {
  if (attached) {
    logger.warn('Global error handlers already attached, skipping');
    return attached;
  }

  const uncaughtExceptionHandler = (error: Error) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      event: 'uncaughtException',
      fatal: true,
    });

    gracefulExit(logger, 1);
  };

  const unhandledRejectionHandler = (reason: unknown) => {
    // Rejection reasons are not always Error objects
    const errorInfo =
      reason instanceof Error
        ? {
            name: reason.name,
            message: reason.message,
            stack: reason.stack,
          }
        : {
            message: String(reason),
          };

    logger.error('Unhandled promise rejection detected - process will exit', {
      error: errorInfo,
      event: 'unhandledRejection',
      fatal: true,
    });

    gracefulExit(logger, 1);
  };

  // Warnings are logged only; the process keeps running
  const warningHandler = (warning: Error) => {
    logger.warn('Process warning emitted', {
      warning: {
        name: warning.name,
        message: warning.message,
      },
      event: 'warning',
    });
  };

  process.on('uncaughtException', uncaughtExceptionHandler);
  process.on('unhandledRejection', unhandledRejectionHandler);
  process.on('warning', warningHandler);

  const detach: DetachHandlers = () => {
    process.off('uncaughtException', uncaughtExceptionHandler);
    process.off('unhandledRejection', unhandledRejectionHandler);
    process.off('warning', warningHandler);
    if (attached === detach) {
      attached = null;
    }
  };
  attached = detach;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });

  return detach;
}

/**
 * Exits the process once the logger has flushed, or after
 * {@link FLUSH_TIMEOUT_MS} if it never does.
 */
function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    console.error(`[Logger] Flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit`);
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  // Ending the logger triggers the flush
  logger.end();
}
