/**
 * Synthetic daily bars for tests.
 */

import type { PriceBar } from '@featurekit/contracts';

const DAY_MS = 24 * 60 * 60 * 1000;
const START = Date.UTC(2024, 0, 1);

/**
 * One bar per calendar day starting 2024-01-01, with open/high/low equal to
 * the close.
 */
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

/**
 * [start, start + 1, ..., start + count - 1]
 */
export function linearCloses(start: number, count: number): number[] {
  return Array.from({ length: count }, (_, i) => start + i);
}

/**
 * Closes compounding by `rate` per day from `start`.
 */
export function compoundingCloses(start: number, rate: number, count: number): number[] {
  const closes: number[] = [];
  let close = start;
  for (let i = 0; i < count; i++) {
    closes.push(close);
    close = close * (1 + rate);
  }
  return closes;
}
