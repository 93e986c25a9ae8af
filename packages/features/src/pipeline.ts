/**
 * @fileoverview Feature pipeline orchestration.
 *
 * A pipeline is an ordered list of transforms checked once at construction:
 * every column a transform reads must be a base price column or written by
 * an earlier transform, and no column may be written twice. Running it
 * validates the series, then threads a FeatureTable through each transform,
 * appending its columns. Any error aborts the run; no partial table is
 * returned.
 *
 * @module @featurekit/features/pipeline
 */

import {
  ColumnCollisionError,
  ColumnNotFoundError,
  PRICE_FIELDS,
  StructuralError,
  type FeatureColumn,
  type PriceBar,
} from '@featurekit/contracts';
import { FeatureTable } from './table.js';
import type { FeatureTransform } from './transform.js';

/**
 * Reported after each transform has appended its columns.
 */
export interface TransformEvent {
  /** Position of the transform in the pipeline */
  index: number;
  transform: FeatureTransform;
  /** Table including the transform's columns */
  table: FeatureTable;
}

export interface PipelineRunOptions {
  /** Called after every transform, in order */
  onTransform?: (event: TransformEvent) => void;
}

export interface FeaturePipeline {
  readonly transforms: readonly FeatureTransform[];

  /** Every column the pipeline appends, in order */
  readonly outputs: readonly string[];

  /**
   * @throws {StructuralError} If the bars do not form a valid series
   */
  run(bars: readonly PriceBar[], options?: PipelineRunOptions): FeatureTable;
}

/**
 * Checks the transform plan and returns a runnable pipeline.
 *
 * @throws {ColumnNotFoundError} If a transform reads a column nothing earlier provides
 * @throws {ColumnCollisionError} If two transforms (or a transform and a base column) write the same name
 *
 * @example
 * ```typescript
 * const pipeline = createFeaturePipeline([
 *   sma({ window: 50 }),
 *   distance({ average: 'MA50' }),
 * ]);
 * const table = pipeline.run(series);
 * ```
 */
export function createFeaturePipeline(transforms: readonly FeatureTransform[]): FeaturePipeline {
  const available = new Set<string>(PRICE_FIELDS);
  const outputs: string[] = [];

  for (const transform of transforms) {
    for (const input of transform.inputs) {
      if (!available.has(input)) {
        throw new ColumnNotFoundError(
          `Transform "${transform.name}" reads column "${input}" which no earlier step provides`,
          { column: input, available: [...available], transform: transform.name }
        );
      }
    }

    for (const output of transform.outputs) {
      if (available.has(output)) {
        throw new ColumnCollisionError(
          `Transform "${transform.name}" writes column "${output}" which already exists`,
          { column: output, transform: transform.name }
        );
      }
      available.add(output);
      outputs.push(output);
    }
  }

  const steps = Object.freeze([...transforms]);

  return {
    transforms: steps,
    outputs: Object.freeze(outputs),
    run(bars, options = {}) {
      let table = FeatureTable.fromSeries(bars);

      steps.forEach((transform, index) => {
        const computed = transform.compute(table);
        table = table.withColumns(orderedOutputs(transform, computed));
        options.onTransform?.({ index, transform, table });
      });

      return table;
    },
  };
}

/**
 * Validates the transforms, then builds the feature table for the bars.
 */
export function buildFeatureTable(
  bars: readonly PriceBar[],
  transforms: readonly FeatureTransform[],
  options?: PipelineRunOptions
): FeatureTable {
  return createFeaturePipeline(transforms).run(bars, options);
}

/**
 * Pairs computed columns with the declared outputs, in declared order.
 *
 * @throws {StructuralError} If the transform returned a different set of columns
 */
function orderedOutputs(
  transform: FeatureTransform,
  computed: Readonly<Record<string, FeatureColumn>>
): Array<readonly [string, FeatureColumn]> {
  const returned = Object.keys(computed);
  const declared = transform.outputs;

  const mismatch =
    returned.length !== declared.length || returned.some((name) => !declared.includes(name));
  if (mismatch) {
    throw new StructuralError(
      `Transform "${transform.name}" returned columns [${returned.join(', ')}], declared [${declared.join(', ')}]`,
      { transform: transform.name, returned, declared: [...declared] }
    );
  }

  return declared.map((name) => {
    const values = computed[name];
    if (values === undefined) {
      throw new StructuralError(`Transform "${transform.name}" did not return column "${name}"`, {
        transform: transform.name,
        column: name,
      });
    }
    return [name, values] as const;
  });
}
