/**
 * @fileoverview Single-period, log and compounded returns.
 *
 * @module @featurekit/features/returns
 */

import type { FeatureColumn, FeatureValue } from '@featurekit/contracts';
import type { FeatureTransform } from './transform.js';
import { add, completeWindow, div, ln, mul, sub } from './missing.js';
import { requireColumnName, requirePositiveInteger } from './validate.js';

/**
 * r[i] = x[i] / x[i-1] - 1. Missing at row 0 and wherever x[i-1] is zero
 * or either price is missing.
 *
 * @example
 * ```typescript
 * simpleReturns([100, 110, 99]); // [null, 0.1, -0.1]
 * ```
 */
export function simpleReturns(values: FeatureColumn): FeatureColumn {
  const out: FeatureValue[] = [];
  for (let i = 0; i < values.length; i++) {
    out.push(i === 0 ? null : sub(div(values[i], values[i - 1]), 1));
  }
  return Object.freeze(out);
}

/**
 * ln(1 + r[i]); missing where r[i] <= -1.
 */
export function logReturns(returns: FeatureColumn): FeatureColumn {
  return Object.freeze(returns.map((r) => ln(add(1, r))));
}

/**
 * Compounded return of the last `period` single-period returns:
 * prod(1 + r[k]) - 1 for k in i-period+1..i.
 *
 * Missing when any of those returns is missing, so with returns taken from
 * prices the first defined row is i = period.
 */
export function cumulatedReturns(returns: FeatureColumn, period: number): FeatureColumn {
  requirePositiveInteger('period', period);

  const out: FeatureValue[] = [];
  for (let i = 0; i < returns.length; i++) {
    const window = completeWindow(returns, i, period);
    if (window === null) {
      out.push(null);
      continue;
    }
    let growth: FeatureValue = 1;
    for (const r of window) {
      growth = mul(growth, 1 + r);
    }
    out.push(sub(growth, 1));
  }
  return Object.freeze(out);
}

export interface ReturnsOptions {
  /** Price column (default 'close') */
  source?: string;
  /** Simple return column (default 'Return') */
  output?: string;
  /** Log return column (default 'Log Return') */
  logOutput?: string;
}

/**
 * Appends simple and log return columns.
 */
export function returns(options: ReturnsOptions = {}): FeatureTransform {
  const source = requireColumnName('source', options.source ?? 'close');
  const output = requireColumnName('output', options.output ?? 'Return');
  const logOutput = requireColumnName('logOutput', options.logOutput ?? 'Log Return');

  return {
    name: 'returns',
    inputs: [source],
    outputs: [output, logOutput],
    compute: (table) => {
      const simple = simpleReturns(table.column(source));
      return { [output]: simple, [logOutput]: logReturns(simple) };
    },
  };
}

export interface CumulatedReturnOptions {
  period: number;
  /** Price column (default 'close') */
  source?: string;
  /** Output column (default `Cumulated_Return_<period>d`) */
  output?: string;
}

/**
 * Appends the compounded return over the last `period` days.
 *
 * @throws {ParameterError} If period is not a positive integer
 */
export function cumulatedReturn(options: CumulatedReturnOptions): FeatureTransform {
  const period = requirePositiveInteger('period', options.period);
  const source = requireColumnName('source', options.source ?? 'close');
  const output = requireColumnName('output', options.output ?? `Cumulated_Return_${period}d`);

  return {
    name: 'cumulatedReturn',
    inputs: [source],
    outputs: [output],
    compute: (table) => ({
      [output]: cumulatedReturns(simpleReturns(table.column(source)), period),
    }),
  };
}
