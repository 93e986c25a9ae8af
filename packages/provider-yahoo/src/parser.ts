/**
 * @fileoverview Parser utilities for Yahoo Finance data.
 *
 * Converts raw Yahoo Finance bars into the PriceBar shape defined in
 * @featurekit/contracts.
 *
 * @module @featurekit/provider-yahoo/parser
 */

import type { PriceBar } from '@featurekit/contracts';
import type { YahooRawBar } from './types.js';

/**
 * Parses a single raw Yahoo Finance bar into PriceBar format.
 *
 * @param raw - Raw bar data from Yahoo Finance
 * @returns Parsed PriceBar
 * @throws {Error} If bar data is invalid (missing fields, broken OHLC invariants, bad timestamp)
 *
 * @example
 * ```typescript
 * const bar = parseYahooBar({
 *   symbol: 'SPY',
 *   date: '2024-01-02T00:00:00.000Z',
 *   open: 472.16,
 *   high: 473.67,
 *   low: 470.49,
 *   close: 472.65,
 *   volume: 123623700
 * });
 * // bar.timestamp === '2024-01-02T00:00:00.000Z'
 * ```
 */
export function parseYahooBar(raw: YahooRawBar): PriceBar {
  if (!raw.date) {
    throw new Error('Yahoo bar missing required field: date');
  }

  const { open, high, low, close, volume } = raw;
  if (open === null || high === null || low === null || close === null) {
    throw new Error(`Yahoo bar ${raw.date} has missing OHLC data`);
  }
  if (![open, high, low, close].every(Number.isFinite)) {
    throw new Error(`Yahoo bar ${raw.date} has invalid OHLC data`);
  }
  if (volume === null || !Number.isFinite(volume) || volume < 0) {
    throw new Error(`Yahoo bar ${raw.date} has invalid volume`);
  }

  // OHLC invariants
  if (high < low) {
    throw new Error(`Invalid bar: high (${high}) < low (${low})`);
  }
  if (high < open || high < close) {
    throw new Error(`Invalid bar: high (${high}) < open/close`);
  }
  if (low > open || low > close) {
    throw new Error(`Invalid bar: low (${low}) > open/close`);
  }

  if (Number.isNaN(Date.parse(raw.date))) {
    throw new Error(`Invalid timestamp: ${raw.date}`);
  }

  return { timestamp: raw.date, open, high, low, close, volume };
}

/**
 * Result of parsing Yahoo Finance bars.
 */
export interface ParseResult {
  bars: PriceBar[];
  errors: Array<{ bar: YahooRawBar; error: Error }>;
}

/**
 * Parses an array of raw bars, collecting parse errors for the caller
 * instead of throwing on the first one.
 *
 * @example
 * ```typescript
 * const { bars, errors } = parseYahooBars(rawBars);
 * ```
 */
export function parseYahooBars(rawBars: readonly YahooRawBar[]): ParseResult {
  const parsed: PriceBar[] = [];
  const errors: Array<{ bar: YahooRawBar; error: Error }> = [];

  for (const raw of rawBars) {
    try {
      parsed.push(parseYahooBar(raw));
    } catch (error) {
      errors.push({ bar: raw, error: error instanceof Error ? error : new Error(String(error)) });
    }
  }

  return { bars: parsed, errors };
}
