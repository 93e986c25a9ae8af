/**
 * @fileoverview Feature value and column types.
 *
 * @module @featurekit/contracts/features
 */

/**
 * A single cell of a feature column. `null` is the missing sentinel: it is
 * distinct from zero, never NaN, and any arithmetic touching it is missing.
 */
export type FeatureValue = number | null;

/**
 * A named, row-aligned column of feature values. Always has exactly one
 * entry per row of the series it was computed from.
 */
export type FeatureColumn = readonly FeatureValue[];

/**
 * One row of a feature table as a plain record, keyed by column name.
 */
export type FeatureRecord = Record<string, FeatureValue | string>;
