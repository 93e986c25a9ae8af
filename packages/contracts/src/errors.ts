/**
 * @fileoverview Error taxonomy for the featurekit pipeline.
 *
 * Every failure that aborts a build is a FeatureKitError subclass carrying a
 * machine-readable code, a structured data payload and an ISO timestamp.
 * Row-level numeric gaps are never errors; they are the missing sentinel.
 *
 * @module @featurekit/contracts/errors
 */

/**
 * Base error class for all featurekit errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new FeatureKitError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class FeatureKitError extends Error {
  /** Machine-readable error code (e.g., 'PARAMETER_ERROR'). */
  public readonly code: string;

  /** Structured context for debugging. Format varies by error type. */
  public readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created. */
  public readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();

    // Keep instanceof working when compiled down to ES5-style classes
    Object.setPrototypeOf(this, new.target.prototype);

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when the input price series is malformed: empty, timestamps not
 * strictly increasing, a missing close, or a column whose length does not
 * match the series.
 *
 * @example
 * ```typescript
 * throw new StructuralError('Timestamps must be strictly increasing', {
 *   index: 12,
 *   timestamp: '2024-03-01T00:00:00.000Z',
 * });
 * ```
 */
export class StructuralError extends FeatureKitError {
  constructor(message: string, data?: Record<string, unknown>) {
    super('STRUCTURAL_ERROR', message, data);
  }
}

/**
 * Thrown when a transform, labeler or configuration value is invalid.
 * Raised at construction time, before any computation runs.
 *
 * @example
 * ```typescript
 * throw new ParameterError('window must be a positive integer', {
 *   parameter: 'window',
 *   value: 0,
 * });
 * ```
 */
export class ParameterError extends FeatureKitError {
  constructor(
    message: string,
    data: {
      parameter: string;
      value?: unknown;
      [key: string]: unknown;
    }
  ) {
    super('PARAMETER_ERROR', message, data);
  }

  /** Name of the offending parameter. */
  get parameter(): string {
    const parameter = this.data?.['parameter'];
    return typeof parameter === 'string' ? parameter : '';
  }
}

/**
 * Thrown when a transform reads a column the table does not hold yet.
 */
export class ColumnNotFoundError extends FeatureKitError {
  constructor(
    message: string,
    data: {
      column: string;
      available: string[];
      transform?: string;
      [key: string]: unknown;
    }
  ) {
    super('COLUMN_NOT_FOUND', message, data);
  }
}

/**
 * Thrown when a column name would be written twice.
 */
export class ColumnCollisionError extends FeatureKitError {
  constructor(
    message: string,
    data: {
      column: string;
      transform?: string;
      [key: string]: unknown;
    }
  ) {
    super('COLUMN_COLLISION', message, data);
  }
}

/**
 * Thrown by a price provider that has no rows for the requested range.
 * Providers raise this instead of returning an empty series.
 *
 * @example
 * ```typescript
 * throw new NoDataError('SPY: no data returned', {
 *   symbol: 'SPY',
 *   from: '2010-01-01',
 *   to: '2010-01-02',
 * });
 * ```
 */
export class NoDataError extends FeatureKitError {
  constructor(
    message: string,
    data: {
      symbol: string;
      from?: string;
      to?: string;
      [key: string]: unknown;
    }
  ) {
    super('NO_DATA', message, data);
  }
}

/**
 * Thrown when a provider cannot resolve a symbol (typo, delisted, unknown).
 */
export class SymbolResolutionError extends FeatureKitError {
  constructor(
    message: string,
    data: {
      symbol: string;
      provider?: string;
      [key: string]: unknown;
    }
  ) {
    super('SYMBOL_RESOLUTION', message, data);
  }
}

/**
 * Type guard for FeatureKitError.
 *
 * @example
 * ```typescript
 * try {
 *   pipeline.run(series);
 * } catch (err) {
 *   if (isFeatureKitError(err)) {
 *     console.error(err.code, err.data);
 *   }
 * }
 * ```
 */
export function isFeatureKitError(error: unknown): error is FeatureKitError {
  return error instanceof FeatureKitError;
}

export function isStructuralError(error: unknown): error is StructuralError {
  return error instanceof StructuralError;
}

export function isParameterError(error: unknown): error is ParameterError {
  return error instanceof ParameterError;
}

export function isColumnNotFoundError(error: unknown): error is ColumnNotFoundError {
  return error instanceof ColumnNotFoundError;
}

export function isColumnCollisionError(error: unknown): error is ColumnCollisionError {
  return error instanceof ColumnCollisionError;
}

export function isNoDataError(error: unknown): error is NoDataError {
  return error instanceof NoDataError;
}

export function isSymbolResolutionError(error: unknown): error is SymbolResolutionError {
  return error instanceof SymbolResolutionError;
}
