/**
 * @fileoverview Simple and exponential moving averages.
 *
 * EMA convention: weights are bias-adjusted from the first observation,
 *
 *   ema[t] = sum_k (1 - a)^(t - k) * x[k] / sum_k (1 - a)^(t - k),  a = 2 / (span + 1)
 *
 * so ema[0] equals the first value and no warm-up rows are missing. Every
 * EMA-based transform (ema, distance to EMA) uses this convention.
 *
 * @module @featurekit/features/moving-average
 */

import type { FeatureColumn, FeatureValue } from '@featurekit/contracts';
import type { FeatureTransform } from './transform.js';
import { completeWindow, finiteOrMissing, mean } from './missing.js';
import { requireColumnName, requirePositiveInteger } from './validate.js';

/**
 * Rolling arithmetic mean over the last `window` rows.
 *
 * Row i is missing when i < window - 1 or when any value in the window is
 * missing.
 *
 * @example
 * ```typescript
 * simpleMovingAverage([1, 2, 3, 4], 2); // [null, 1.5, 2.5, 3.5]
 * ```
 */
export function simpleMovingAverage(values: FeatureColumn, window: number): FeatureColumn {
  requirePositiveInteger('window', window);

  const out: FeatureValue[] = [];
  for (let i = 0; i < values.length; i++) {
    const slice = completeWindow(values, i, window);
    out.push(slice === null ? null : mean(slice));
  }
  return Object.freeze(out);
}

/**
 * Bias-adjusted exponential moving average with decay a = 2 / (span + 1).
 *
 * Leading missing values stay missing and the average starts at the first
 * present value. An interior missing value yields a missing output and does
 * not advance the running sums.
 *
 * @example
 * ```typescript
 * exponentialMovingAverage([1, 2, 3], 3); // [1, 1.666..., 2.428...]
 * ```
 */
export function exponentialMovingAverage(values: FeatureColumn, span: number): FeatureColumn {
  requirePositiveInteger('span', span);

  const decay = 1 - 2 / (span + 1);
  let weightedSum = 0;
  let weightTotal = 0;

  const out: FeatureValue[] = [];
  for (const value of values) {
    if (value === null) {
      out.push(null);
      continue;
    }
    weightedSum = value + decay * weightedSum;
    weightTotal = 1 + decay * weightTotal;
    out.push(finiteOrMissing(weightedSum / weightTotal));
  }
  return Object.freeze(out);
}

export interface SmaOptions {
  window: number;
  /** Column to average (default 'close') */
  source?: string;
  /** Output column (default `MA<window>`) */
  output?: string;
}

/**
 * Appends a simple moving average column.
 *
 * @throws {ParameterError} If window is not a positive integer
 */
export function sma(options: SmaOptions): FeatureTransform {
  const window = requirePositiveInteger('window', options.window);
  const source = requireColumnName('source', options.source ?? 'close');
  const output = requireColumnName('output', options.output ?? `MA${window}`);

  return {
    name: 'sma',
    inputs: [source],
    outputs: [output],
    compute: (table) => ({ [output]: simpleMovingAverage(table.column(source), window) }),
  };
}

export interface EmaOptions {
  span: number;
  /** Column to average (default 'close') */
  source?: string;
  /** Output column (default `EMA<span>`) */
  output?: string;
}

/**
 * Appends an exponential moving average column.
 *
 * @throws {ParameterError} If span is not a positive integer
 */
export function ema(options: EmaOptions): FeatureTransform {
  const span = requirePositiveInteger('span', options.span);
  const source = requireColumnName('source', options.source ?? 'close');
  const output = requireColumnName('output', options.output ?? `EMA${span}`);

  return {
    name: 'ema',
    inputs: [source],
    outputs: [output],
    compute: (table) => ({ [output]: exponentialMovingAverage(table.column(source), span) }),
  };
}
