/**
 * Tests for distance to an average.
 */

import { describe, it, expect } from 'vitest';
import { distance, relativeDistance } from '../src/distance.js';
import { FeatureTable } from '../src/table.js';
import { barsFromCloses } from './fixtures.js';

describe('relativeDistance', () => {
  it('should normalize the gap by the average', () => {
    expect(relativeDistance([110, 90, 100], [100, 100, 100])).toEqual([0.1, -0.1, 0]);
  });

  it('should be missing where the average is zero', () => {
    expect(relativeDistance([5, 0], [0, 0])).toEqual([null, null]);
  });

  it('should be missing where the average is missing', () => {
    expect(relativeDistance([1, 2, 3], [null, null, 2])).toEqual([null, null, 0.5]);
  });
});

describe('distance transform', () => {
  it('should read the source and the average column', () => {
    const transform = distance({ average: 'MA50' });

    expect(transform.inputs).toEqual(['close', 'MA50']);
    expect(transform.outputs).toEqual(['Distance_MA50']);
  });

  it('should compute against a column already in the table', () => {
    const table = FeatureTable.fromSeries(barsFromCloses([110, 90])).withColumn('Avg', [100, null]);
    const columns = distance({ average: 'Avg', output: 'Gap' }).compute(table);

    expect(columns).toEqual({ Gap: [0.1, null] });
  });
});
