/**
 * @fileoverview Append-only feature table.
 *
 * A FeatureTable pairs a validated price series with an ordered set of
 * row-aligned columns. It starts with the base price columns and grows only
 * by appending; every append returns a new table and leaves the columns
 * already computed untouched (they are frozen arrays shared between the
 * old and new table).
 *
 * @module @featurekit/features/table
 */

import {
  ColumnCollisionError,
  ColumnNotFoundError,
  PRICE_FIELDS,
  StructuralError,
  type FeatureColumn,
  type FeatureRecord,
  type FeatureValue,
  type PriceBar,
  type PriceSeries,
} from '@featurekit/contracts';
import { createPriceSeries, priceColumn } from './series.js';
import { countMissing } from './missing.js';

/**
 * Immutable table of feature columns over one price series.
 *
 * @invariant every column has exactly series.length entries
 * @invariant column names are unique
 *
 * @example
 * ```typescript
 * const table = FeatureTable.fromSeries(bars);
 * const next = table.withColumn('Double', table.column('close').map((c) => c === null ? null : c * 2));
 * next.columnNames(); // ['open', 'high', 'low', 'close', 'volume', 'Double']
 * table.has('Double'); // false
 * ```
 */
export class FeatureTable {
  private constructor(
    /** The validated input series; never modified */
    public readonly series: PriceSeries,
    private readonly columns: ReadonlyMap<string, FeatureColumn>
  ) {}

  /**
   * Validates the bars and builds a table holding the base price columns
   * (open, high, low, close, volume).
   *
   * @throws {StructuralError} If the bars do not form a valid series
   */
  static fromSeries(bars: readonly PriceBar[]): FeatureTable {
    const series = createPriceSeries(bars);
    const columns = new Map<string, FeatureColumn>();
    for (const field of PRICE_FIELDS) {
      columns.set(field, priceColumn(series, field));
    }
    return new FeatureTable(series, columns);
  }

  /** Number of rows. */
  get length(): number {
    return this.series.length;
  }

  has(name: string): boolean {
    return this.columns.has(name);
  }

  /**
   * Column names in insertion order.
   */
  columnNames(): string[] {
    return [...this.columns.keys()];
  }

  /**
   * @throws {ColumnNotFoundError} If no column has this name
   */
  column(name: string): FeatureColumn {
    const values = this.columns.get(name);
    if (values === undefined) {
      throw new ColumnNotFoundError(`Column "${name}" not found`, {
        column: name,
        available: this.columnNames(),
      });
    }
    return values;
  }

  /**
   * Returns a new table with one more column.
   *
   * @throws {ColumnCollisionError} If the name is already taken
   * @throws {StructuralError} If the column length differs from the series
   */
  withColumn(name: string, values: readonly FeatureValue[]): FeatureTable {
    return this.withColumns([[name, values]]);
  }

  /**
   * Returns a new table with several columns appended in the given order.
   * Nothing is appended unless every column is accepted.
   *
   * @throws {ColumnCollisionError} If a name is already taken or repeated
   * @throws {StructuralError} If a column length differs from the series
   */
  withColumns(entries: Iterable<readonly [string, readonly FeatureValue[]]>): FeatureTable {
    const next = new Map(this.columns);

    for (const [name, values] of entries) {
      if (next.has(name)) {
        throw new ColumnCollisionError(`Column "${name}" already exists`, { column: name });
      }
      if (values.length !== this.length) {
        throw new StructuralError(
          `Column "${name}" has ${values.length} rows, expected ${this.length}`,
          { column: name, rows: values.length, expected: this.length }
        );
      }
      next.set(name, Object.isFrozen(values) ? values : Object.freeze([...values]));
    }

    return new FeatureTable(this.series, next);
  }

  /**
   * Number of missing cells in a column.
   */
  missingCount(name: string): number {
    return countMissing(this.column(name));
  }

  /**
   * Index of the first non-missing row, or -1 when the column is all missing.
   */
  firstValidIndex(name: string): number {
    return this.column(name).findIndex((value) => value !== null);
  }

  /**
   * One row as a record: the bar timestamp followed by every column.
   *
   * @throws {RangeError} If index is outside the table
   */
  row(index: number): FeatureRecord {
    const bar = this.series[index];
    if (bar === undefined) {
      throw new RangeError(`Row ${index} is outside the table (0..${this.length - 1})`);
    }

    const record: FeatureRecord = { timestamp: bar.timestamp };
    for (const [name, values] of this.columns) {
      record[name] = values[index] ?? null;
    }
    return record;
  }

  /**
   * Every row as a record, in series order.
   */
  toRecords(): FeatureRecord[] {
    return this.series.map((_, index) => this.row(index));
  }
}
