/**
 * @fileoverview Logger factory for featurekit
 * Creates configured Winston logger instances with structured logging,
 * sensitive-field redaction and flexible transport options.
 */

import winston, { format } from 'winston';
import type { ChildLoggerContext, LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Features built', { symbol: 'DEMO', rows: 120 });
 * ```
 *
 * @example
 * ```typescript
 * // With file transport and child logger
 * const logger = createLogger({
 *   level: 'debug',
 *   json: false,
 *   filePath: './logs/featurekit.log',
 * });
 *
 * const pipelineLogger = logger.child({ component: 'pipeline' });
 * pipelineLogger.info('Step complete', { transform: 'rsi', duration_ms: 2 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stream,
  } = config;

  // Order is important: redact first, then standard fields, then output format
  const logFormat = format.combine(
    redactPII(),
    standardFields,
    json ? format.json() : prettyPrint
  );

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        // Keep stdout free for command output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: logFormat,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (stream) {
    transports.push(new winston.transports.Stream({ stream, level, format: logFormat }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // Exit handling lives in errorHandler.ts
    exitOnError: false,
    // Winston warns when a logger has no transports
    silent: transports.length === 0,
  });
}

/**
 * Creates a child logger with additional context fields.
 * Child loggers inherit all configuration from the parent logger
 * and include the context fields in every log entry.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * const providerLogger = createChildLogger(logger, { component: 'provider', provider: 'yahoo' });
 * providerLogger.info('Series loaded', { rows: 120 });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
