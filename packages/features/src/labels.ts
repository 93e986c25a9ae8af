/**
 * @fileoverview Regime label constructors.
 *
 * Label constructors are the only code in this package allowed to look at
 * future rows: the threshold-horizon labeler compares close[i] with
 * close[i + horizon]. Their output is a LabelColumn, never a FeatureColumn,
 * so a label cannot be appended to a FeatureTable or read by a transform.
 * Rows without a valid label are null and must be dropped downstream, not
 * defaulted to a class.
 *
 * @module @featurekit/features/labels
 */

import {
  BINARY_LABELS,
  ParameterError,
  TERNARY_LABELS,
  type BinaryLabel,
  type FeatureColumn,
  type FeatureValue,
  type LabelColumn,
  type LabelSummary,
  type PriceBar,
  type RegimeLabel,
  type TernaryLabel,
} from '@featurekit/contracts';
import { createPriceSeries, priceColumn } from './series.js';
import { div, ln, sub } from './missing.js';
import { simpleMovingAverage } from './moving-average.js';
import { requireColumnName, requirePositiveInteger, requirePositiveNumber } from './validate.js';

/** How forward returns map to classes. */
export type RegimePolicy = 'binary' | 'ternary';

export interface LabelConstructor<L extends RegimeLabel> {
  /** Output column name */
  readonly name: string;

  /** Number of future rows each label depends on (0 for causal labels) */
  readonly lookahead: number;

  /** Classes this constructor can emit */
  readonly alphabet: readonly L[];

  /**
   * Labels every row of the series.
   *
   * @throws {StructuralError} If the bars do not form a valid series
   */
  label(bars: readonly PriceBar[]): LabelColumn<L>;
}

/**
 * close[i + horizon] / close[i] - 1, or ln(close[i + horizon] / close[i])
 * when `useLog` is set. Missing for the last `horizon` rows and wherever the
 * ratio is undefined.
 *
 * @example
 * ```typescript
 * forwardReturns([100, 110, 121], 1, false); // [0.1, 0.1, null]
 * ```
 */
export function forwardReturns(values: FeatureColumn, horizon: number, useLog: boolean): FeatureColumn {
  requirePositiveInteger('horizon', horizon);

  const out: FeatureValue[] = [];
  for (let i = 0; i < values.length; i++) {
    if (i + horizon >= values.length) {
      out.push(null);
      continue;
    }
    const ratio = div(values[i + horizon], values[i]);
    out.push(useLog ? ln(ratio) : sub(ratio, 1));
  }
  return Object.freeze(out);
}

export interface ThresholdHorizonOptions {
  /** Rows to look ahead (>= 1) */
  horizon: number;
  /** Bullish cut-off for the forward return (> 0); ternary uses -threshold for bearish */
  threshold: number;
  /** Use the log forward return (default false) */
  useLog?: boolean;
  /** Class policy (default 'binary') */
  policy?: RegimePolicy;
  /** Output column name (default `Label_H<horizon>`) */
  name?: string;
}

/**
 * Labels each row by the return `horizon` rows ahead.
 *
 * - binary: BULLISH if forward return > threshold, else NON_BULLISH
 * - ternary: BULL if > threshold, BEAR if < -threshold, else RANGE
 *
 * @throws {ParameterError} If horizon is not a positive integer or threshold is not > 0
 *
 * @example
 * ```typescript
 * const labeler = thresholdHorizonLabeler({ horizon: 10, threshold: 0.05 });
 * const labels = labeler.label(series);
 * ```
 */
export function thresholdHorizonLabeler(
  options: ThresholdHorizonOptions & { policy: 'ternary' }
): LabelConstructor<TernaryLabel>;
export function thresholdHorizonLabeler(
  options: ThresholdHorizonOptions & { policy?: 'binary' }
): LabelConstructor<BinaryLabel>;
export function thresholdHorizonLabeler(
  options: ThresholdHorizonOptions
): LabelConstructor<BinaryLabel> | LabelConstructor<TernaryLabel>;
export function thresholdHorizonLabeler(
  options: ThresholdHorizonOptions
): LabelConstructor<BinaryLabel> | LabelConstructor<TernaryLabel> {
  const horizon = requirePositiveInteger('horizon', options.horizon);
  const threshold = requirePositiveNumber('threshold', options.threshold);
  const useLog = options.useLog ?? false;
  const name = requireColumnName('name', options.name ?? `Label_H${horizon}`);
  const policy = options.policy ?? 'binary';

  const forward = (bars: readonly PriceBar[]): FeatureColumn =>
    forwardReturns(priceColumn(createPriceSeries(bars), 'close'), horizon, useLog);

  if (policy === 'ternary') {
    return {
      name,
      lookahead: horizon,
      alphabet: TERNARY_LABELS,
      label: (bars: readonly PriceBar[]) => ({
        name,
        alphabet: TERNARY_LABELS,
        values: Object.freeze(
          forward(bars).map((r): TernaryLabel | null => {
            if (r === null) return null;
            if (r > threshold) return 'BULL';
            if (r < -threshold) return 'BEAR';
            return 'RANGE';
          })
        ),
      }),
    };
  }

  if (policy !== 'binary') {
    throw new ParameterError(`policy must be 'binary' or 'ternary', got ${String(policy)}`, {
      parameter: 'policy',
      value: policy,
    });
  }

  return {
    name,
    lookahead: horizon,
    alphabet: BINARY_LABELS,
    label: (bars: readonly PriceBar[]) => ({
      name,
      alphabet: BINARY_LABELS,
      values: Object.freeze(
        forward(bars).map((r): BinaryLabel | null => {
          if (r === null) return null;
          return r > threshold ? 'BULLISH' : 'NON_BULLISH';
        })
      ),
    }),
  };
}

export interface CrossoverOptions {
  /** Fast average window; must be smaller than longWindow */
  shortWindow: number;
  /** Slow average window */
  longWindow: number;
  /** Output column name (default `Label_MA<short>_<long>`) */
  name?: string;
}

/**
 * BULLISH where SMA(shortWindow) > SMA(longWindow), else NON_BULLISH;
 * missing until both averages exist (row longWindow - 1).
 *
 * @throws {ParameterError} If either window is invalid or shortWindow >= longWindow
 */
export function crossoverLabeler(options: CrossoverOptions): LabelConstructor<BinaryLabel> {
  const shortWindow = requirePositiveInteger('shortWindow', options.shortWindow);
  const longWindow = requirePositiveInteger('longWindow', options.longWindow);
  if (shortWindow >= longWindow) {
    throw new ParameterError(
      `shortWindow (${shortWindow}) must be smaller than longWindow (${longWindow})`,
      { parameter: 'shortWindow', value: shortWindow, longWindow }
    );
  }
  const name = requireColumnName('name', options.name ?? `Label_MA${shortWindow}_${longWindow}`);

  return {
    name,
    lookahead: 0,
    alphabet: BINARY_LABELS,
    label: (bars: readonly PriceBar[]) => {
      const close = priceColumn(createPriceSeries(bars), 'close');
      const fast = simpleMovingAverage(close, shortWindow);
      const slow = simpleMovingAverage(close, longWindow);

      const values: (BinaryLabel | null)[] = [];
      for (let i = 0; i < close.length; i++) {
        const f = fast[i];
        const s = slow[i];
        if (f === null || f === undefined || s === null || s === undefined) {
          values.push(null);
        } else {
          values.push(f > s ? 'BULLISH' : 'NON_BULLISH');
        }
      }
      return { name, alphabet: BINARY_LABELS, values: Object.freeze(values) };
    },
  };
}

/**
 * Counts each class of a label column plus the rows without a label.
 *
 * @example
 * ```typescript
 * const summary = summarizeLabels(column);
 * summary.counts.get('BULLISH'); // 40
 * summary.missing; // 10
 * ```
 */
export function summarizeLabels<L extends RegimeLabel>(column: LabelColumn<L>): LabelSummary<L> {
  const counts = new Map<L, number>(column.alphabet.map((label) => [label, 0]));
  let missing = 0;

  for (const value of column.values) {
    if (value === null) {
      missing++;
    } else {
      counts.set(value, (counts.get(value) ?? 0) + 1);
    }
  }

  return { counts, missing, total: column.values.length };
}
