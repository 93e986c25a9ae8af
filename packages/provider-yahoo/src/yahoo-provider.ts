/**
 * @fileoverview Yahoo Finance daily price provider.
 *
 * Resolves a symbol and date range to a validated PriceSeries. Bars are
 * read from `<SYMBOL>-1d.json` files in the fixture directory; the HTTP
 * client is not part of this package.
 *
 * The provider never hands an empty or corrupted series to the pipeline:
 * an unknown symbol, an empty range and unparseable rows each raise their
 * own error.
 *
 * @module @featurekit/provider-yahoo
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import {
  NoDataError,
  ParameterError,
  StructuralError,
  SymbolResolutionError,
  type GetSeriesParams,
  type PriceBar,
  type PriceSeries,
  type ProviderCapabilities,
} from '@featurekit/contracts';
import { createPriceSeries } from '@featurekit/features';
import { parseYahooBars } from './parser.js';
import { yahooRawBarsSchema, type YahooRawBar, type YahooProviderOptions } from './types.js';

/** Ticker characters Yahoo accepts: letters, digits, '.', '-', '^', '='. */
const SYMBOL_PATTERN = /^[A-Z0-9.^=-]{1,15}$/;

/**
 * Source of daily price series.
 */
export interface PriceProvider {
  capabilities(): ProviderCapabilities;
  getSeries(params: GetSeriesParams): Promise<PriceSeries>;
}

/**
 * Yahoo Finance data provider.
 */
export class YahooProvider implements PriceProvider {
  private readonly fixturePath: string;

  /**
   * Creates a new Yahoo Finance provider.
   *
   * @param options - Provider configuration options
   */
  constructor(options: YahooProviderOptions = {}) {
    const moduleDir = dirname(fileURLToPath(import.meta.url));
    this.fixturePath = options.fixturePath ?? join(moduleDir, '..', '__fixtures__');
  }

  capabilities(): ProviderCapabilities {
    return {
      name: 'yahoo',
      interval: '1d',
      requiresAuthentication: false,
      historicalDataFrom: '2000-01-01T00:00:00.000Z',
    };
  }

  /**
   * Fetches the daily series for a symbol, inclusive of both range ends.
   *
   * @param params - Query parameters (symbol, from, to)
   * @returns Validated, frozen price series with at least one bar
   * @throws {ParameterError} If symbol or dates are invalid
   * @throws {SymbolResolutionError} If the symbol is unknown
   * @throws {NoDataError} If no bar falls inside the range
   * @throws {StructuralError} If stored bars fail parsing or ordering checks
   *
   * @example
   * ```typescript
   * const provider = new YahooProvider();
   * const series = await provider.getSeries({
   *   symbol: 'SPY',
   *   from: '2010-01-01',
   *   to: '2024-12-31'
   * });
   * ```
   */
  async getSeries(params: GetSeriesParams): Promise<PriceSeries> {
    const symbol = this.validateParams(params);

    const rawBars = this.loadFixture(symbol);
    const { bars, errors } = parseYahooBars(rawBars);

    if (errors.length > 0) {
      const first = errors[0];
      throw new StructuralError(
        `${symbol}: ${errors.length} bar(s) failed to parse${first ? ` (first: ${first.error.message})` : ''}`,
        { symbol, failed: errors.length, total: rawBars.length }
      );
    }

    const inRange = this.filterByDateRange(bars, params.from, params.to);
    if (inRange.length === 0) {
      throw new NoDataError(`${symbol}: no data returned`, {
        symbol,
        from: params.from,
        to: params.to,
      });
    }

    return createPriceSeries(inRange);
  }

  /**
   * Validates getSeries parameters.
   *
   * @returns Normalized (upper-case, trimmed) symbol
   * @throws {ParameterError} If parameters are invalid
   */
  private validateParams(params: GetSeriesParams): string {
    const symbol = params.symbol.trim().toUpperCase();
    if (!SYMBOL_PATTERN.test(symbol)) {
      throw new ParameterError(`Invalid symbol: ${JSON.stringify(params.symbol)}`, {
        parameter: 'symbol',
        value: params.symbol,
      });
    }

    if (Number.isNaN(Date.parse(params.from))) {
      throw new ParameterError(`Invalid from date: ${params.from}`, {
        parameter: 'from',
        value: params.from,
      });
    }

    if (params.to !== undefined) {
      if (Number.isNaN(Date.parse(params.to))) {
        throw new ParameterError(`Invalid to date: ${params.to}`, {
          parameter: 'to',
          value: params.to,
        });
      }
      if (Date.parse(params.from) > Date.parse(params.to)) {
        throw new ParameterError('Invalid date range: from must be <= to', {
          parameter: 'to',
          value: params.to,
          from: params.from,
        });
      }
    }

    return symbol;
  }

  /**
   * Loads stored bars for a symbol.
   *
   * @throws {SymbolResolutionError} If no file exists for the symbol
   * @throws {StructuralError} If the file is not a list of bars
   */
  private loadFixture(symbol: string): YahooRawBar[] {
    const fixturePath = join(this.fixturePath, `${symbol}-1d.json`);

    let content: string;
    try {
      content = readFileSync(fixturePath, 'utf-8');
    } catch (error) {
      throw new SymbolResolutionError(`Symbol "${symbol}" not found`, {
        symbol,
        provider: 'yahoo',
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new StructuralError(`${symbol}: stored bars are not valid JSON`, {
        symbol,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const result = yahooRawBarsSchema.safeParse(json);
    if (!result.success) {
      throw new StructuralError(`${symbol}: stored bars do not match the expected shape`, {
        symbol,
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return result.data;
  }

  /**
   * Keeps bars inside [from, to]; `to` defaults to open-ended. A date-only
   * `to` covers the whole of that day (or month, or year).
   */
  private filterByDateRange(bars: PriceBar[], from: string, to?: string): PriceBar[] {
    const fromTime = Date.parse(from);
    const toTime = to !== undefined ? endOfRange(to) : Number.POSITIVE_INFINITY;

    return bars.filter((bar) => {
      const time = Date.parse(bar.timestamp);
      return time >= fromTime && time <= toTime;
    });
  }
}

const DATE_ONLY = /^(\d{4})(?:-(\d{2})(?:-(\d{2}))?)?$/;

/**
 * Last millisecond (UTC) covered by `to`. Date-only forms (`YYYY`, `YYYY-MM`,
 * `YYYY-MM-DD`) extend to the end of the period; anything else is exact.
 */
export function endOfRange(to: string): number {
  const match = DATE_ONLY.exec(to);
  if (!match) return Date.parse(to);

  const year = Number(match[1]);
  if (match[3] !== undefined) {
    return Date.UTC(year, Number(match[2]) - 1, Number(match[3]) + 1) - 1;
  }
  if (match[2] !== undefined) {
    return Date.UTC(year, Number(match[2]), 1) - 1;
  }
  return Date.UTC(year + 1, 0, 1) - 1;
}
