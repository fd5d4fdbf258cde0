import type { Grid, Slice, SliceAxis, SlicePoint, TwoDGrid } from '../types.js';
import { LoaderError } from '../errors.js';

/**
 * Cut a 2D grid at the coordinate nearest `target` on `axis`.
 * The result runs along the other axis; missing cells are left out.
 */
export function slice(grid: Grid, axis: SliceAxis, target: number): Slice {
  if (grid.kind !== 'twoD') {
    throw new LoaderError('DimensionMismatch', 'slices can only be taken through 2D data');
  }
  const fixed = sliceOptions(grid, axis);
  if (fixed.length === 0) {
    throw new LoaderError('EmptyAxis', `the ${axis} axis has no coordinates yet`);
  }
  if (!Number.isFinite(target)) {
    throw new LoaderError('InvalidSlice', `slice target must be a finite number, got ${target}`);
  }

  const index = nearestIndex(fixed, target);
  const points: SlicePoint[] = [];

  if (axis === 'x') {
    const column = grid.values[index];
    grid.yAxis.forEach((y, yi) => {
      const value = column[yi];
      if (value !== null) points.push({ coordinate: y, value });
    });
  } else {
    grid.xAxis.forEach((x, xi) => {
      const value = grid.values[xi][index];
      if (value !== null) points.push({ coordinate: x, value });
    });
  }

  return { axis, index, coordinate: fixed[index], points };
}

/** Coordinates a slice can be taken at on the given axis. */
export function sliceOptions(grid: TwoDGrid, axis: SliceAxis): number[] {
  return axis === 'x' ? grid.xAxis : grid.yAxis;
}

/**
 * Index of the coordinate closest to target. Strictly-less comparison keeps
 * the lower index on a tie.
 */
export function nearestIndex(coordinates: number[], target: number): number {
  let best = 0;
  for (let i = 1; i < coordinates.length; i++) {
    if (Math.abs(coordinates[i] - target) < Math.abs(coordinates[best] - target)) {
      best = i;
    }
  }
  return best;
}
