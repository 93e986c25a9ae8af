/**
 * @fileoverview Relative distance of a column to an average column.
 *
 * @module @featurekit/features/distance
 */

import type { FeatureColumn } from '@featurekit/contracts';
import type { FeatureTransform } from './transform.js';
import { div, sub, zipColumns } from './missing.js';
import { requireColumnName } from './validate.js';

/**
 * (x[i] - avg[i]) / avg[i]. Missing where either side is missing and where
 * avg[i] is zero.
 *
 * @example
 * ```typescript
 * relativeDistance([110, 90, 5], [100, 100, 0]); // [0.1, -0.1, null]
 * ```
 */
export function relativeDistance(values: FeatureColumn, average: FeatureColumn): FeatureColumn {
  return zipColumns(values, average, (x, avg) => div(sub(x, avg), avg));
}

export interface DistanceOptions {
  /** Average column to measure against; must already be in the table */
  average: string;
  /** Column measured (default 'close') */
  source?: string;
  /** Output column (default `Distance_<average>`) */
  output?: string;
}

/**
 * Appends the normalized distance of `source` to an existing average
 * column, e.g. distance({ average: 'MA50' }) writes 'Distance_MA50'.
 */
export function distance(options: DistanceOptions): FeatureTransform {
  const average = requireColumnName('average', options.average);
  const source = requireColumnName('source', options.source ?? 'close');
  const output = requireColumnName('output', options.output ?? `Distance_${average}`);

  return {
    name: 'distance',
    inputs: [source, average],
    outputs: [output],
    compute: (table) => ({
      [output]: relativeDistance(table.column(source), table.column(average)),
    }),
  };
}
