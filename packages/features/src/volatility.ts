/**
 * @fileoverview Rolling volatility of daily returns.
 *
 * @module @featurekit/features/volatility
 */

import type { FeatureColumn, FeatureValue } from '@featurekit/contracts';
import type { FeatureTransform } from './transform.js';
import { completeWindow, sampleStd } from './missing.js';
import { simpleReturns } from './returns.js';
import { requireColumnName, requirePositiveInteger } from './validate.js';

/**
 * Sample standard deviation (n - 1) of the last `window` values.
 * Missing until `window` values exist, and always missing for window = 1.
 */
export function rollingStd(values: FeatureColumn, window: number): FeatureColumn {
  requirePositiveInteger('window', window);

  const out: FeatureValue[] = [];
  for (let i = 0; i < values.length; i++) {
    const slice = completeWindow(values, i, window);
    out.push(slice === null ? null : sampleStd(slice));
  }
  return Object.freeze(out);
}

export interface VolatilityOptions {
  window: number;
  /** Price column (default 'close') */
  source?: string;
  /** Output column (default 'Volatility') */
  output?: string;
}

/**
 * Appends the rolling standard deviation of simple returns. Needs
 * window + 1 prices before the first value.
 *
 * @throws {ParameterError} If window is not a positive integer
 */
export function volatility(options: VolatilityOptions): FeatureTransform {
  const window = requirePositiveInteger('window', options.window);
  const source = requireColumnName('source', options.source ?? 'close');
  const output = requireColumnName('output', options.output ?? 'Volatility');

  return {
    name: 'volatility',
    inputs: [source],
    outputs: [output],
    compute: (table) => ({ [output]: rollingStd(simpleReturns(table.column(source)), window) }),
  };
}
