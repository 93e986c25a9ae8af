/**
 * @fileoverview Relative Strength Index.
 *
 * Gains and losses are averaged with a simple rolling mean over `period`
 * daily changes. A window with no losses has no finite relative strength,
 * so it is pinned: RSI = 100 when the window gained, 50 when it was flat.
 *
 * @module @featurekit/features/rsi
 */

import type { FeatureColumn, FeatureValue } from '@featurekit/contracts';
import type { FeatureTransform } from './transform.js';
import { div, finiteOrMissing, sub } from './missing.js';
import { simpleMovingAverage } from './moving-average.js';
import { requireColumnName, requirePositiveInteger } from './validate.js';

/** RSI of a window that rose without any losing day. */
export const RSI_NO_LOSS = 100;

/** RSI of a window without any change. */
export const RSI_FLAT = 50;

/**
 * Row i is defined from i = period on (the first change is at row 1).
 *
 * @example
 * ```typescript
 * relativeStrengthIndex([1, 2, 3, 4], 2); // [null, null, 100, 100]
 * ```
 */
export function relativeStrengthIndex(values: FeatureColumn, period: number): FeatureColumn {
  requirePositiveInteger('period', period);

  const gains: FeatureValue[] = [];
  const losses: FeatureValue[] = [];
  for (let i = 0; i < values.length; i++) {
    const change = i === 0 ? null : sub(values[i], values[i - 1]);
    gains.push(change === null ? null : Math.max(change, 0));
    losses.push(change === null ? null : Math.max(-change, 0));
  }

  const avgGain = simpleMovingAverage(gains, period);
  const avgLoss = simpleMovingAverage(losses, period);

  const out: FeatureValue[] = [];
  for (let i = 0; i < values.length; i++) {
    const gain = avgGain[i];
    const loss = avgLoss[i];
    if (gain === null || gain === undefined || loss === null || loss === undefined) {
      out.push(null);
    } else if (loss === 0) {
      out.push(gain === 0 ? RSI_FLAT : RSI_NO_LOSS);
    } else {
      const rs = div(gain, loss);
      out.push(rs === null ? null : finiteOrMissing(100 - 100 / (1 + rs)));
    }
  }
  return Object.freeze(out);
}

export interface RsiOptions {
  period: number;
  /** Price column (default 'close') */
  source?: string;
  /** Output column (default `RSI<period>`) */
  output?: string;
}

/**
 * Appends an RSI column.
 *
 * @throws {ParameterError} If period is not a positive integer
 */
export function rsi(options: RsiOptions): FeatureTransform {
  const period = requirePositiveInteger('period', options.period);
  const source = requireColumnName('source', options.source ?? 'close');
  const output = requireColumnName('output', options.output ?? `RSI${period}`);

  return {
    name: 'rsi',
    inputs: [source],
    outputs: [output],
    compute: (table) => ({ [output]: relativeStrengthIndex(table.column(source), period) }),
  };
}
