/**
 * Tests for regime label constructors.
 */

import { describe, it, expect } from 'vitest';
import { ParameterError, StructuralError } from '@featurekit/contracts';
import {
  crossoverLabeler,
  forwardReturns,
  summarizeLabels,
  thresholdHorizonLabeler,
} from '../src/labels.js';
import { barsFromCloses, compoundingCloses, linearCloses } from './fixtures.js';

describe('forwardReturns', () => {
  it('should look horizon rows ahead and leave the tail missing', () => {
    const out = forwardReturns([100, 110, 121], 1, false);

    expect(out[0]).toBeCloseTo(0.1, 12);
    expect(out[1]).toBeCloseTo(0.1, 12);
    expect(out[2]).toBeNull();
  });

  it('should use the log ratio when asked', () => {
    const out = forwardReturns([100, 150], 1, true);

    expect(out[0]).toBeCloseTo(Math.log(1.5), 12);
    expect(out[1]).toBeNull();
  });

  it('should be missing when the current price is zero', () => {
    expect(forwardReturns([0, 1, 2], 1, false)).toEqual([null, 1, null]);
  });
});

describe('thresholdHorizonLabeler (binary)', () => {
  const rising = barsFromCloses(compoundingCloses(100, 0.01, 30));

  it('should label every row with a full horizon BULLISH on a +1%/day series', () => {
    const column = thresholdHorizonLabeler({ horizon: 10, threshold: 0.05 }).label(rising);

    expect(column.name).toBe('Label_H10');
    expect(column.alphabet).toEqual(['BULLISH', 'NON_BULLISH']);
    expect(column.values).toHaveLength(30);
    expect(column.values.slice(0, 20)).toEqual(new Array(20).fill('BULLISH'));
    expect(column.values.slice(20)).toEqual(new Array(10).fill(null));
  });

  it('should give the same classes with the log form', () => {
    const column = thresholdHorizonLabeler({ horizon: 10, threshold: 0.05, useLog: true }).label(rising);

    expect(column.values.slice(0, 20)).toEqual(new Array(20).fill('BULLISH'));
    expect(column.values.slice(20)).toEqual(new Array(10).fill(null));
  });

  it('should label a move below the threshold NON_BULLISH', () => {
    const bars = barsFromCloses([100, 104, 100, 104]);
    const column = thresholdHorizonLabeler({ horizon: 1, threshold: 0.05 }).label(bars);

    expect(column.values[0]).toBe('NON_BULLISH');
    expect(column.values[1]).toBe('NON_BULLISH');
    expect(column.values[2]).toBe('NON_BULLISH');
    expect(column.values[3]).toBeNull();
  });

  it('should leave every row missing when the horizon exceeds the series', () => {
    const column = thresholdHorizonLabeler({ horizon: 10, threshold: 0.01 }).label(barsFromCloses([1, 2, 3]));

    expect(column.values).toEqual([null, null, null]);
  });

  it('should report its lookahead', () => {
    expect(thresholdHorizonLabeler({ horizon: 7, threshold: 0.02 }).lookahead).toBe(7);
  });
});

describe('thresholdHorizonLabeler (ternary)', () => {
  it('should split forward returns into BULL, BEAR and RANGE', () => {
    const labeler = thresholdHorizonLabeler({ horizon: 1, threshold: 0.05, policy: 'ternary' });
    const column = labeler.label(barsFromCloses([100, 110, 100, 100, 90]));

    expect(column.alphabet).toEqual(['BULL', 'BEAR', 'RANGE']);
    expect(column.values).toEqual(['BULL', 'BEAR', 'RANGE', 'BEAR', null]);
  });
});

describe('thresholdHorizonLabeler parameters', () => {
  it('should reject a non-positive horizon', () => {
    try {
      thresholdHorizonLabeler({ horizon: 0, threshold: 0.05 });
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ParameterError);
      if (error instanceof ParameterError) {
        expect(error.parameter).toBe('horizon');
      }
    }
  });

  it('should reject a non-positive or non-finite threshold', () => {
    expect(() => thresholdHorizonLabeler({ horizon: 5, threshold: 0 })).toThrow(ParameterError);
    expect(() => thresholdHorizonLabeler({ horizon: 5, threshold: -0.1 })).toThrow(ParameterError);
    expect(() => thresholdHorizonLabeler({ horizon: 5, threshold: Number.NaN })).toThrow(
      'threshold must be a finite number greater than 0, got NaN'
    );
  });

  it('should reject a malformed series when labelling', () => {
    const labeler = thresholdHorizonLabeler({ horizon: 1, threshold: 0.05 });

    expect(() => labeler.label([])).toThrow(StructuralError);
  });
});

describe('crossoverLabeler', () => {
  it('should reject shortWindow > longWindow before computing anything', () => {
    try {
      crossoverLabeler({ shortWindow: 50, longWindow: 10 });
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ParameterError);
      if (error instanceof ParameterError) {
        expect(error.parameter).toBe('shortWindow');
        expect(error.message).toBe('shortWindow (50) must be smaller than longWindow (10)');
      }
    }
  });

  it('should reject equal windows', () => {
    expect(() => crossoverLabeler({ shortWindow: 10, longWindow: 10 })).toThrow(ParameterError);
  });

  it('should label a rising series BULLISH once both averages exist', () => {
    const column = crossoverLabeler({ shortWindow: 2, longWindow: 4 }).label(barsFromCloses(linearCloses(1, 10)));

    expect(column.name).toBe('Label_MA2_4');
    expect(column.values.slice(0, 3)).toEqual([null, null, null]);
    expect(column.values.slice(3)).toEqual(new Array(7).fill('BULLISH'));
  });

  it('should label a falling series NON_BULLISH', () => {
    const closes = linearCloses(1, 10).reverse();
    const column = crossoverLabeler({ shortWindow: 2, longWindow: 4 }).label(barsFromCloses(closes));

    expect(column.values.slice(3)).toEqual(new Array(7).fill('NON_BULLISH'));
  });

  it('should look no rows ahead', () => {
    expect(crossoverLabeler({ shortWindow: 10, longWindow: 50 }).lookahead).toBe(0);
  });
});

describe('summarizeLabels', () => {
  it('should count each class and the missing rows', () => {
    const bars = barsFromCloses(compoundingCloses(100, 0.01, 30));
    const summary = summarizeLabels(thresholdHorizonLabeler({ horizon: 10, threshold: 0.05 }).label(bars));

    expect(summary.counts.get('BULLISH')).toBe(20);
    expect(summary.counts.get('NON_BULLISH')).toBe(0);
    expect(summary.missing).toBe(10);
    expect(summary.total).toBe(30);
  });

  it('should list classes in alphabet order', () => {
    const column = thresholdHorizonLabeler({ horizon: 1, threshold: 0.05, policy: 'ternary' }).label(
      barsFromCloses([100, 110, 100])
    );

    expect([...summarizeLabels(column).counts.keys()]).toEqual(['BULL', 'BEAR', 'RANGE']);
  });
});
