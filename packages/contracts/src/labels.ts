/**
 * @fileoverview Regime label alphabets and label column shape.
 *
 * Labels are forward-looking by construction and are kept out of the causal
 * feature table; they are joined to it by row position downstream.
 *
 * @module @featurekit/contracts/labels
 */

/** Two-class regime: forward move beat the threshold or not. */
export type BinaryLabel = 'BULLISH' | 'NON_BULLISH';

/** Three-class regime around a symmetric threshold. */
export type TernaryLabel = 'BULL' | 'BEAR' | 'RANGE';

/** Any regime label. */
export type RegimeLabel = BinaryLabel | TernaryLabel;

export const BINARY_LABELS: readonly BinaryLabel[] = ['BULLISH', 'NON_BULLISH'];

export const TERNARY_LABELS: readonly TernaryLabel[] = ['BULL', 'BEAR', 'RANGE'];

/**
 * A categorical column produced by a label constructor.
 *
 * @invariant values.length equals the length of the labelled series
 * @invariant every non-null value is a member of alphabet
 */
export interface LabelColumn<L extends RegimeLabel = RegimeLabel> {
  /** Column name (e.g., 'Label_H10') */
  readonly name: string;

  /** Finite set of classes this column draws from */
  readonly alphabet: readonly L[];

  /** One label per row; null where the forward horizon is unavailable */
  readonly values: readonly (L | null)[];
}

/**
 * Class counts of a label column, plus rows without a label.
 */
export interface LabelSummary<L extends RegimeLabel = RegimeLabel> {
  /** Rows per class, in alphabet order */
  readonly counts: ReadonlyMap<L, number>;

  /** Rows without a valid label */
  readonly missing: number;

  /** All rows */
  readonly total: number;
}
