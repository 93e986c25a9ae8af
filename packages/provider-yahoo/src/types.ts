/**
 * @fileoverview Yahoo Finance provider-specific types.
 *
 * @module @featurekit/provider-yahoo/types
 */

import { z } from 'zod';

/**
 * Raw daily bar as Yahoo Finance returns it. Prices are null on days the
 * quote is unavailable; the parser rejects such rows.
 */
export const yahooRawBarSchema = z.object({
  /** Symbol identifier (e.g., 'SPY') */
  symbol: z.string().optional(),
  /** ISO 8601 timestamp string */
  date: z.string(),
  open: z.number().nullable(),
  high: z.number().nullable(),
  low: z.number().nullable(),
  close: z.number().nullable(),
  volume: z.number().nullable(),
});

export const yahooRawBarsSchema = z.array(yahooRawBarSchema);

export type YahooRawBar = z.infer<typeof yahooRawBarSchema>;

/**
 * Options for YahooProvider configuration.
 */
export interface YahooProviderOptions {
  /**
   * Directory holding `<SYMBOL>-1d.json` files.
   * Defaults to '../__fixtures__' relative to the provider module.
   */
  fixturePath?: string;
}
