/**
 * Tests for feature pipeline composition.
 */

import { describe, it, expect } from 'vitest';
import { ColumnCollisionError, ColumnNotFoundError, StructuralError, type FeatureColumn } from '@featurekit/contracts';
import { buildFeatureTable, createFeaturePipeline, type TransformEvent } from '../src/pipeline.js';
import { defaultTransforms } from '../src/config.js';
import { ema, sma } from '../src/moving-average.js';
import { distance } from '../src/distance.js';
import { returns } from '../src/returns.js';
import type { FeatureTransform } from '../src/transform.js';
import { barsFromCloses, linearCloses } from './fixtures.js';

describe('buildFeatureTable end-to-end', () => {
  // close prices 100, 101, ..., 160
  const bars = barsFromCloses(linearCloses(100, 61));
  const table = buildFeatureTable(bars, defaultTransforms());

  it('should append the standard feature set in order', () => {
    expect(table.columnNames()).toEqual([
      'open',
      'high',
      'low',
      'close',
      'volume',
      'MA10',
      'MA50',
      'EMA20',
      'Return',
      'Log Return',
      'Volatility',
      'Distance_MA50',
      'Distance_EMA20',
      'Cumulated_Return_5d',
      'RSI14',
    ]);
  });

  it('should compute MA10 and leave MA50 missing before row 49', () => {
    const ma10 = table.column('MA10');
    const ma50 = table.column('MA50');

    expect(ma10[9]).toBe(104.5);
    expect(ma50.slice(0, 49).every((v) => v === null)).toBe(true);
    expect(ma50[49]).toBe(124.5);
  });

  it('should start each feature after its warm-up', () => {
    expect(table.firstValidIndex('MA10')).toBe(9);
    expect(table.firstValidIndex('MA50')).toBe(49);
    expect(table.firstValidIndex('EMA20')).toBe(0);
    expect(table.firstValidIndex('Return')).toBe(1);
    expect(table.firstValidIndex('Log Return')).toBe(1);
    expect(table.firstValidIndex('Volatility')).toBe(20);
    expect(table.firstValidIndex('Distance_MA50')).toBe(49);
    expect(table.firstValidIndex('Distance_EMA20')).toBe(0);
    expect(table.firstValidIndex('Cumulated_Return_5d')).toBe(5);
    expect(table.firstValidIndex('RSI14')).toBe(14);
  });

  it('should give every column one entry per row', () => {
    for (const name of table.columnNames()) {
      expect(table.column(name)).toHaveLength(61);
    }
  });

  it('should pin RSI at 100 on a series without losses', () => {
    expect(table.column('RSI14').slice(14).every((v) => v === 100)).toBe(true);
  });

  it('should compute distance to EMA from the first row', () => {
    expect(table.column('Distance_EMA20')[0]).toBe(0);
  });

  it('should not modify the input bars', () => {
    const before = JSON.stringify(bars);
    buildFeatureTable(bars, defaultTransforms());

    expect(JSON.stringify(bars)).toBe(before);
    expect(Object.isFrozen(bars)).toBe(false);
  });

  it('should be bit-identical across runs', () => {
    const again = buildFeatureTable(bars, defaultTransforms());

    for (const name of table.columnNames()) {
      expect(again.column(name)).toStrictEqual(table.column(name));
    }
  });
});

describe('createFeaturePipeline plan checks', () => {
  it('should fail fast when a transform reads a column nothing provides', () => {
    try {
      createFeaturePipeline([distance({ average: 'MA50' })]);
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ColumnNotFoundError);
      if (error instanceof ColumnNotFoundError) {
        expect(error.data?.column).toBe('MA50');
        expect(error.data?.transform).toBe('distance');
      }
    }
  });

  it('should require the provider to come first', () => {
    expect(() => createFeaturePipeline([distance({ average: 'MA50' }), sma({ window: 50 })])).toThrow(
      ColumnNotFoundError
    );
    expect(() => createFeaturePipeline([sma({ window: 50 }), distance({ average: 'MA50' })])).not.toThrow();
  });

  it('should reject two transforms writing the same column', () => {
    expect(() => createFeaturePipeline([sma({ window: 10 }), sma({ window: 10 })])).toThrow(
      'Transform "sma" writes column "MA10" which already exists'
    );
  });

  it('should reject a transform overwriting a base column', () => {
    expect(() => createFeaturePipeline([sma({ window: 3, output: 'close' })])).toThrow(ColumnCollisionError);
  });

  it('should list every output in order', () => {
    const pipeline = createFeaturePipeline([sma({ window: 5 }), returns()]);

    expect(pipeline.outputs).toEqual(['MA5', 'Return', 'Log Return']);
    expect(pipeline.transforms).toHaveLength(2);
  });

  it('should accept an empty plan and return the base table', () => {
    const table = createFeaturePipeline([]).run(barsFromCloses([1, 2]));

    expect(table.columnNames()).toEqual(['open', 'high', 'low', 'close', 'volume']);
  });
});

describe('FeaturePipeline.run', () => {
  const bars = barsFromCloses(linearCloses(10, 12));

  it('should reject a malformed series before any transform runs', () => {
    const events: TransformEvent[] = [];
    const pipeline = createFeaturePipeline([sma({ window: 2 })]);

    expect(() => pipeline.run([], { onTransform: (event) => events.push(event) })).toThrow(StructuralError);
    expect(events).toHaveLength(0);
  });

  it('should report each transform in order', () => {
    const names: string[] = [];
    const indices: number[] = [];
    createFeaturePipeline([sma({ window: 2 }), ema({ span: 3 }), returns()]).run(bars, {
      onTransform: ({ index, transform, table }) => {
        indices.push(index);
        names.push(transform.name);
        expect(transform.outputs.every((output) => table.has(output))).toBe(true);
      },
    });

    expect(indices).toEqual([0, 1, 2]);
    expect(names).toEqual(['sma', 'ema', 'returns']);
  });

  it('should give the same columns regardless of the order of independent transforms', () => {
    const forward = buildFeatureTable(bars, [sma({ window: 3 }), ema({ span: 4 })]);
    const backward = buildFeatureTable(bars, [ema({ span: 4 }), sma({ window: 3 })]);

    expect(forward.column('MA3')).toStrictEqual(backward.column('MA3'));
    expect(forward.column('EMA4')).toStrictEqual(backward.column('EMA4'));
  });

  it('should reject a transform returning undeclared columns', () => {
    const rogue: FeatureTransform = {
      name: 'rogue',
      inputs: ['close'],
      outputs: ['Declared'],
      compute: (table): Record<string, FeatureColumn> => ({ Other: table.column('close') }),
    };

    expect(() => buildFeatureTable(bars, [rogue])).toThrow(
      'Transform "rogue" returned columns [Other], declared [Declared]'
    );
  });

  it('should reject a transform returning a column of the wrong length', () => {
    const short: FeatureTransform = {
      name: 'short',
      inputs: [],
      outputs: ['Short'],
      compute: () => ({ Short: [1] }),
    };

    expect(() => buildFeatureTable(bars, [short])).toThrow(StructuralError);
  });
});
