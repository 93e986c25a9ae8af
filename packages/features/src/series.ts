/**
 * @fileoverview Price series validation.
 *
 * The pipeline only ever sees a series that passed `createPriceSeries`:
 * non-empty, strictly increasing timestamps and a finite close on every row.
 * Gaps between trading days are left as they are.
 *
 * @module @featurekit/features/series
 */

import { StructuralError, type FeatureColumn, type PriceBar, type PriceField, type PriceSeries } from '@featurekit/contracts';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const EXPLICIT_ZONE = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Validates bars and returns a frozen copy usable as a PriceSeries.
 *
 * Checks, in order:
 * 1. The series holds at least one bar
 * 2. Every timestamp parses as a date
 * 3. Every timestamp is date-only or carries an explicit zone (`Z`, `+hh:mm`),
 *    so ordering does not depend on the host time zone
 * 4. Every close is a finite number
 * 5. Timestamps are strictly increasing (no duplicates, no reordering)
 *
 * Open, high, low and volume are copied as given; only close is required by
 * the transforms.
 *
 * @param bars - Bars in time order
 * @returns Frozen series; the input array is not modified
 * @throws {StructuralError} On the first violated invariant, naming the row
 *
 * @example
 * ```typescript
 * const series = createPriceSeries([
 *   { timestamp: '2024-01-02', open: 1, high: 1, low: 1, close: 1, volume: 0 },
 *   { timestamp: '2024-01-03', open: 1, high: 1, low: 1, close: 2, volume: 0 },
 * ]);
 * ```
 */
export function createPriceSeries(bars: readonly PriceBar[]): PriceSeries {
  if (bars.length === 0) {
    throw new StructuralError('Price series is empty', { length: 0 });
  }

  const frozen: PriceBar[] = [];
  let previousTime = Number.NEGATIVE_INFINITY;

  bars.forEach((bar, index) => {
    const time = Date.parse(bar.timestamp);
    if (Number.isNaN(time)) {
      throw new StructuralError(`Invalid timestamp at row ${index}: ${bar.timestamp}`, {
        index,
        timestamp: bar.timestamp,
      });
    }

    if (!DATE_ONLY.test(bar.timestamp) && !EXPLICIT_ZONE.test(bar.timestamp)) {
      throw new StructuralError(`Timestamp without time zone at row ${index}: ${bar.timestamp}`, {
        index,
        timestamp: bar.timestamp,
      });
    }

    if (typeof bar.close !== 'number' || !Number.isFinite(bar.close)) {
      throw new StructuralError(`Missing close price at row ${index}`, {
        index,
        timestamp: bar.timestamp,
        close: bar.close,
      });
    }

    if (time <= previousTime) {
      throw new StructuralError(
        `Timestamps must be strictly increasing: row ${index} (${bar.timestamp}) does not follow row ${index - 1}`,
        { index, timestamp: bar.timestamp }
      );
    }
    previousTime = time;

    frozen.push(
      Object.freeze({
        timestamp: bar.timestamp,
        open: bar.open,
        high: bar.high,
        low: bar.low,
        close: bar.close,
        volume: bar.volume,
      })
    );
  });

  return Object.freeze(frozen);
}

/**
 * Extracts one price field as a feature column. Non-finite values other
 * than close (which validation guarantees) become missing.
 */
export function priceColumn(series: PriceSeries, field: PriceField): FeatureColumn {
  return Object.freeze(
    series.map((bar) => {
      const value = bar[field];
      return Number.isFinite(value) ? value : null;
    })
  );
}
