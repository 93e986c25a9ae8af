/**
 * @fileoverview Public API for @featurekit/provider-yahoo package.
 *
 * @module @featurekit/provider-yahoo
 * @example
 * ```typescript
 * import { YahooProvider } from '@featurekit/provider-yahoo';
 *
 * const provider = new YahooProvider();
 * const series = await provider.getSeries({ symbol: 'SPY', from: '2010-01-01', to: '2024-12-31' });
 * ```
 */

// Export main provider class
export { YahooProvider, endOfRange } from './yahoo-provider.js';
export type { PriceProvider } from './yahoo-provider.js';

// Export parser utilities
export { parseYahooBar, parseYahooBars } from './parser.js';
export { yahooRawBarSchema, yahooRawBarsSchema } from './types.js';

// Export types
export type { YahooRawBar, YahooProviderOptions } from './types.js';
export type { ParseResult } from './parser.js';
