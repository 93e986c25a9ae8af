/**
 * @fileoverview Public API exports for @featurekit/logger
 * Structured logging and error handling for featurekit
 */

// Core logger creation
export { createLogger, createChildLogger } from './createLogger.js';

// Global error handlers
export { attachGlobalHandlers } from './errorHandler.js';

// Redaction helpers
export { redactValue, isSensitiveKey, REDACTED } from './formats.js';

// Performance timing utilities
export { startTimer, measureSync, measureAsync } from './perf-timer.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
export type { PerfTimer } from './perf-timer.js';
