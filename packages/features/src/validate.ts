/**
 * @fileoverview Parameter validation shared by transforms and labelers.
 *
 * All checks run when a transform or labeler is constructed, so a bad
 * configuration fails before any row is computed.
 *
 * @module @featurekit/features/validate
 */

import { ParameterError } from '@featurekit/contracts';

/**
 * @throws {ParameterError} Unless value is an integer >= 1
 */
export function requirePositiveInteger(parameter: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ParameterError(`${parameter} must be a positive integer, got ${value}`, {
      parameter,
      value,
    });
  }
  return value;
}

/**
 * @throws {ParameterError} Unless value is a finite number > 0
 */
export function requirePositiveNumber(parameter: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ParameterError(`${parameter} must be a finite number greater than 0, got ${value}`, {
      parameter,
      value,
    });
  }
  return value;
}

/**
 * @throws {ParameterError} Unless value is a non-blank string
 */
export function requireColumnName(parameter: string, value: string): string {
  if (value.trim().length === 0) {
    throw new ParameterError(`${parameter} must be a non-empty column name`, {
      parameter,
      value,
    });
  }
  return value;
}
