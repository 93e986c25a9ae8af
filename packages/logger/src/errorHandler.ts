/**
 * @fileoverview Global error handlers for uncaught exceptions and unhandled rejections
 * Ensures all errors are logged before process termination.
 */

import type { Logger } from './types.js';

/**
 * Timeout in milliseconds to wait for logger flush before forceful exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

/**
 * Serializes an unknown thrown value for a log entry. Error subclasses that
 * carry a `code` (FeatureKitError and friends) keep it.
 */
function describeError(reason: unknown): Record<string, unknown> {
  if (reason instanceof Error) {
    const code: unknown = Reflect.get(reason, 'code');
    return {
      name: reason.name,
      message: reason.message,
      ...(typeof code === 'string' ? { code } : {}),
      stack: reason.stack,
    };
  }
  return { message: String(reason), value: reason };
}

/**
 * Attaches global error handlers to the Node.js process.
 * Uncaught exceptions and unhandled rejections are logged with their stack,
 * then the process exits with code 1. Warnings are logged and ignored.
 *
 * @returns Function that removes the handlers again
 *
 * @example
 * ```typescript
 * import { createLogger, attachGlobalHandlers } from '@featurekit/logger';
 *
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): () => void {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return () => undefined;
  }

  const uncaughtExceptionHandler = (error: Error): void => {
    logger.error('Uncaught exception detected - process will exit', {
      error: describeError(error),
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1);
  };

  const unhandledRejectionHandler = (reason: unknown): void => {
    logger.error('Unhandled promise rejection detected - process will exit', {
      error: describeError(reason),
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1);
  };

  const warningHandler = (warning: Error): void => {
    logger.warn('Process warning emitted', {
      warning: describeError(warning),
      event: 'warning',
    });
  };

  process.on('uncaughtException', uncaughtExceptionHandler);
  process.on('unhandledRejection', unhandledRejectionHandler);
  process.on('warning', warningHandler);
  handlersAttached = true;

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });

  return () => {
    process.off('uncaughtException', uncaughtExceptionHandler);
    process.off('unhandledRejection', unhandledRejectionHandler);
    process.off('warning', warningHandler);
    handlersAttached = false;
  };
}

/**
 * Exits once the logger has flushed, or after FLUSH_TIMEOUT_MS.
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

  logger.end();
}
