import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { nearestIndex, slice, sliceOptions } from '../data/slice.js';
import { isLoaderError } from '../errors.js';
import type { OneDGrid, TwoDGrid } from '../types.js';

// (0,0)=10, (0,1)=20, (1,0)=30, (1,1) missing
const square: TwoDGrid = {
  kind: 'twoD',
  xAxis: [0, 1],
  yAxis: [0, 1],
  values: [[10, 20], [30, null]],
};

describe('slice()', () => {
  it('cuts at a fixed x', () => {
    assert.deepEqual(slice(square, 'x', 0), {
      axis: 'x',
      index: 0,
      coordinate: 0,
      points: [{ coordinate: 0, value: 10 }, { coordinate: 1, value: 20 }],
    });
  });

  it('omits missing cells', () => {
    assert.deepEqual(slice(square, 'x', 1).points, [{ coordinate: 0, value: 30 }]);
  });

  it('cuts at a fixed y', () => {
    assert.deepEqual(slice(square, 'y', 1).points, [{ coordinate: 0, value: 20 }]);
    assert.deepEqual(slice(square, 'y', 0).points, [
      { coordinate: 0, value: 10 },
      { coordinate: 1, value: 30 },
    ]);
  });

  it('uses the exact index when the target is on the axis', () => {
    const grid: TwoDGrid = { kind: 'twoD', xAxis: [-2, 0.5, 3], yAxis: [0], values: [[1], [2], [3]] };
    const cut = slice(grid, 'x', 0.5);
    assert.equal(cut.index, 1);
    assert.equal(cut.coordinate, 0.5);
  });

  it('takes the nearest coordinate for an off-axis target', () => {
    const cut = slice(square, 'x', 0.8);
    assert.equal(cut.index, 1);
    assert.equal(cut.coordinate, 1);
  });

  it('takes the lower coordinate halfway between two', () => {
    const cut = slice(square, 'x', 0.5);
    assert.equal(cut.index, 0);
    assert.equal(cut.coordinate, 0);
  });

  it('clamps targets outside the axis range', () => {
    assert.equal(slice(square, 'y', -100).index, 0);
    assert.equal(slice(square, 'y', 100).index, 1);
  });

  it('rejects a 1D grid with DimensionMismatch', () => {
    const line: OneDGrid = { kind: 'oneD', points: [{ x: 0, y: 1 }] };
    assert.throws(() => slice(line, 'x', 0), (err: unknown) => isLoaderError(err, 'DimensionMismatch'));
  });

  it('rejects an empty axis with EmptyAxis', () => {
    const empty: TwoDGrid = { kind: 'twoD', xAxis: [], yAxis: [], values: [] };
    assert.throws(() => slice(empty, 'y', 0), (err: unknown) => isLoaderError(err, 'EmptyAxis'));
  });

  it('rejects a non-finite target with InvalidSlice', () => {
    assert.throws(() => slice(square, 'x', Number.NaN), (err: unknown) => isLoaderError(err, 'InvalidSlice'));
  });
});

describe('sliceOptions()', () => {
  it('returns the coordinates of the chosen axis', () => {
    const grid: TwoDGrid = { kind: 'twoD', xAxis: [1, 2], yAxis: [7], values: [[0], [0]] };
    assert.deepEqual(sliceOptions(grid, 'x'), [1, 2]);
    assert.deepEqual(sliceOptions(grid, 'y'), [7]);
  });
});

describe('nearestIndex()', () => {
  it('keeps the first of equally near coordinates', () => {
    assert.equal(nearestIndex([0, 2, 4], 3), 1);
    assert.equal(nearestIndex([0, 2, 4], 1), 0);
  });

  it('handles unevenly spaced axes', () => {
    assert.equal(nearestIndex([0, 0.1, 10], 4), 1);
    assert.equal(nearestIndex([0, 0.1, 10], 6), 2);
  });
});
