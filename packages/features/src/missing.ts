/**
 * @fileoverview Missing-value arithmetic.
 *
 * Every numeric operation the transforms perform on feature values goes
 * through this module, so the propagation rules live in one place:
 *
 * - a missing operand (`null`) makes the result missing;
 * - a result that is not a finite number (division by zero, log of a
 *   non-positive number, overflow) is missing.
 *
 * NaN and Infinity never reach a feature column.
 *
 * @module @featurekit/features/missing
 */

import type { FeatureColumn, FeatureValue } from '@featurekit/contracts';

/**
 * True when the cell holds no value. `undefined` (out of range) counts as
 * missing so callers can index past either end of a column safely.
 */
export function isMissing(value: FeatureValue | undefined): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Maps non-finite numbers to missing.
 */
export function finiteOrMissing(value: number): FeatureValue {
  return Number.isFinite(value) ? value : null;
}

export function add(a: FeatureValue | undefined, b: FeatureValue | undefined): FeatureValue {
  if (isMissing(a) || isMissing(b)) return null;
  return finiteOrMissing(a + b);
}

export function sub(a: FeatureValue | undefined, b: FeatureValue | undefined): FeatureValue {
  if (isMissing(a) || isMissing(b)) return null;
  return finiteOrMissing(a - b);
}

export function mul(a: FeatureValue | undefined, b: FeatureValue | undefined): FeatureValue {
  if (isMissing(a) || isMissing(b)) return null;
  return finiteOrMissing(a * b);
}

/**
 * Division with a zero denominator yields missing, never ±Infinity.
 */
export function div(a: FeatureValue | undefined, b: FeatureValue | undefined): FeatureValue {
  if (isMissing(a) || isMissing(b) || b === 0) return null;
  return finiteOrMissing(a / b);
}

/**
 * Natural log; missing for non-positive input.
 */
export function ln(a: FeatureValue | undefined): FeatureValue {
  if (isMissing(a) || a <= 0) return null;
  return finiteOrMissing(Math.log(a));
}

/**
 * Copies `values[end - size + 1 .. end]` when every cell in that window is
 * present, otherwise returns null. Also null when the window starts before
 * row 0.
 *
 * @example
 * ```typescript
 * completeWindow([1, 2, null, 4, 5], 4, 2); // [4, 5]
 * completeWindow([1, 2, null, 4, 5], 3, 2); // null
 * completeWindow([1, 2, null, 4, 5], 0, 2); // null (not enough history)
 * ```
 */
export function completeWindow(
  values: FeatureColumn,
  end: number,
  size: number
): number[] | null {
  const start = end - size + 1;
  if (start < 0 || end >= values.length) return null;

  const window: number[] = [];
  for (let k = start; k <= end; k++) {
    const value = values[k];
    if (isMissing(value)) return null;
    window.push(value);
  }
  return window;
}

/**
 * Arithmetic mean, summed oldest to newest. Missing for an empty window.
 */
export function mean(values: readonly number[]): FeatureValue {
  if (values.length === 0) return null;
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return finiteOrMissing(sum / values.length);
}

/**
 * Sample standard deviation (n - 1 denominator). Missing below two values.
 */
export function sampleStd(values: readonly number[]): FeatureValue {
  if (values.length < 2) return null;
  const avg = mean(values);
  if (avg === null) return null;

  let squares = 0;
  for (const value of values) {
    squares += (value - avg) ** 2;
  }
  return finiteOrMissing(Math.sqrt(squares / (values.length - 1)));
}

/**
 * Applies `fn` row by row over equally long columns and freezes the result.
 */
export function zipColumns(
  a: FeatureColumn,
  b: FeatureColumn,
  fn: (x: FeatureValue | undefined, y: FeatureValue | undefined) => FeatureValue
): FeatureColumn {
  const out: FeatureValue[] = [];
  for (let i = 0; i < a.length; i++) {
    out.push(fn(a[i], b[i]));
  }
  return Object.freeze(out);
}

/**
 * Number of missing cells in a column.
 */
export function countMissing(values: FeatureColumn): number {
  let count = 0;
  for (const value of values) {
    if (value === null) count++;
  }
  return count;
}
