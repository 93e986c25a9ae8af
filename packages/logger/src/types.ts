/**
 * @fileoverview Type definitions for @featurekit/logger
 * Provides strongly-typed interfaces for logger configuration and usage.
 */

import type { Writable } from 'node:stream';
import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Failures that abort a command
 * - 'warn': Conditions worth reviewing (e.g. columns that are entirely missing)
 * - 'info': Command progress (series loaded, pipeline complete)
 * - 'debug': Configuration and per-step detail
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
 *   filePath: './logs/featurekit.log'
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
   * Whether to output logs in JSON format.
   * - true: Machine-readable JSON
   * - false: Human-readable pretty-print
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path for file transport, written in addition to console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Extra destination stream. Receives the same formatted lines as the
   * console transport.
   */
  stream?: Writable;
}

/**
 * Child logger context fields, included in every entry the child writes.
 */
export interface ChildLoggerContext {
  /** Component or module name (e.g. 'features', 'provider') */
  component?: string;
  /** Ticker the work runs on */
  symbol?: string;
  [key: string]: unknown;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;
