/**
 * @fileoverview Feature transform contract.
 *
 * A transform is a causal function of the table: row i of every column it
 * writes depends only on rows <= i of the columns it reads. It declares what
 * it reads and writes up front so a pipeline can be checked before it runs.
 *
 * @module @featurekit/features/transform
 */

import type { FeatureColumn } from '@featurekit/contracts';
import type { FeatureTable } from './table.js';

export interface FeatureTransform {
  /** Short identifier used in errors and logs (e.g., 'sma') */
  readonly name: string;

  /** Columns read from the table; each must exist before the transform runs */
  readonly inputs: readonly string[];

  /** Columns appended, in order */
  readonly outputs: readonly string[];

  /**
   * Computes the output columns. Must not modify the table and must return
   * exactly the declared outputs, each with one value per row.
   */
  compute(table: FeatureTable): Readonly<Record<string, FeatureColumn>>;
}
