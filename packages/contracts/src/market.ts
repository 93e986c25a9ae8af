/**
 * @fileoverview Price data types and provider contracts.
 *
 * Provider-agnostic shapes for daily OHLCV bars, the validated series the
 * pipeline consumes, and the query a provider answers. Pure data, no I/O.
 *
 * @module @featurekit/contracts/market
 */

/**
 * A single daily OHLCV bar.
 *
 * @invariant close is a finite number
 * @invariant timestamp is a parseable ISO 8601 string
 *
 * @example
 * ```typescript
 * const bar: PriceBar = {
 *   timestamp: '2024-01-02T00:00:00.000Z',
 *   open: 472.16,
 *   high: 473.67,
 *   low: 470.49,
 *   close: 472.65,
 *   volume: 123623700
 * };
 * ```
 */
export interface PriceBar {
  /** ISO 8601 timestamp of the trading day (UTC) */
  readonly timestamp: string;

  /** Opening price */
  readonly open: number;

  /** Highest price of the day */
  readonly high: number;

  /** Lowest price of the day */
  readonly low: number;

  /** Closing price */
  readonly close: number;

  /** Traded volume */
  readonly volume: number;
}

/**
 * An ordered, validated, read-only sequence of daily bars.
 *
 * Row i of the series is position i. Absent trading days are absent rows;
 * nothing is filled in.
 *
 * @invariant length > 0
 * @invariant timestamps strictly increasing (no duplicates)
 */
export type PriceSeries = readonly PriceBar[];

/**
 * Names of the per-bar numeric fields, available as base table columns.
 */
export type PriceField = 'open' | 'high' | 'low' | 'close' | 'volume';

/**
 * All price fields in canonical column order.
 */
export const PRICE_FIELDS: readonly PriceField[] = ['open', 'high', 'low', 'close', 'volume'];

/**
 * Parameters for requesting a daily series from a provider.
 *
 * @invariant from <= to (if to is specified)
 *
 * @example
 * ```typescript
 * const params: GetSeriesParams = {
 *   symbol: 'SPY',
 *   from: '2010-01-01',
 *   to: '2024-12-31'
 * };
 * ```
 */
export interface GetSeriesParams {
  /** Ticker symbol (e.g., 'SPY') */
  symbol: string;

  /** Start of the range (ISO 8601 date or timestamp, inclusive) */
  from: string;

  /** End of the range (inclusive). Open-ended when omitted. */
  to?: string;
}

/**
 * Describes what a price provider can serve.
 */
export interface ProviderCapabilities {
  /** Provider identifier (e.g., 'yahoo') */
  name: string;

  /** Bar interval served; only daily bars are supported */
  interval: '1d';

  /** Whether API keys/auth are required */
  requiresAuthentication: boolean;

  /** Optional: earliest date with data (ISO 8601) */
  historicalDataFrom?: string;
}
