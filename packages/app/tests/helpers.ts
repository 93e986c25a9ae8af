/**
 * Shared test doubles for the app package
 */

import type { GetSeriesParams, PriceBar, PriceSeries, ProviderCapabilities } from '@featurekit/contracts';
import type { PriceProvider } from '@featurekit/provider-yahoo';

const DAY_MS = 24 * 60 * 60 * 1000;
const START = Date.UTC(2024, 0, 1);

/** One bar per calendar day from 2024-01-01, OHLC all equal to the close. */
export function barsFromCloses(closes: readonly number[]): PriceBar[] {
  return closes.map((close, i) => ({
    timestamp: new Date(START + i * DAY_MS).toISOString(),
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000 + i,
  }));
}

/** 100, 101, ..., 160 */
export const LINEAR_CLOSES: readonly number[] = Array.from({ length: 61 }, (_, i) => 100 + i);

/**
 * In-memory provider that records every request.
 */
export class StubProvider implements PriceProvider {
  readonly calls: GetSeriesParams[] = [];

  constructor(private readonly respond: (params: GetSeriesParams) => PriceSeries) {}

  capabilities(): ProviderCapabilities {
    return { name: 'stub', interval: '1d', requiresAuthentication: false };
  }

  async getSeries(params: GetSeriesParams): Promise<PriceSeries> {
    this.calls.push(params);
    return this.respond(params);
  }
}

export interface CapturedIO {
  stdout: string[];
  stderr: string[];
  io: { stdout(text: string): void; stderr(text: string): void };
}

export function captureIO(): CapturedIO {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    io: {
      stdout: (text) => {
        stdout.push(text);
      },
      stderr: (text) => {
        stderr.push(text);
      },
    },
  };
}
