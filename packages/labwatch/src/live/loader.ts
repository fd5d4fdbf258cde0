import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type {
  Grid, OneDGrid, PlotPayload, PlotTarget, Run, RunStore, Shape, Slice, TwoDGrid, TwoDPayload,
} from '../types.js';
import { GridAccumulator } from '../data/grid.js';
import { axisLabel, resolveShape } from '../data/shape.js';
import { slice } from '../data/slice.js';
import { isLoaderError } from '../errors.js';

/** Rows ingested between cancellation checks. */
export const CHUNK_SIZE = 5_000;

export interface LoaderOptions {
  /** Fetch only rows newer than the last refresh (default true). */
  incremental?: boolean;
  chunkSize?: number;
}

/**
 * One run's fetch → resolve → assemble → slice pipeline.
 *
 * Keeps a GridAccumulator between refreshes so each tick only reads new
 * rows. The accumulator is replaced when the resolved shape changes or when
 * incremental loading is off.
 */
export class RunLoader {
  private acc: GridAccumulator | null = null;
  private accKey = '';
  private readonly incremental: boolean;
  private readonly chunkSize: number;

  constructor(
    private readonly store: RunStore,
    readonly target: PlotTarget,
    opts: LoaderOptions = {},
  ) {
    this.incremental = opts.incremental ?? true;
    this.chunkSize = Math.max(1, opts.chunkSize ?? CHUNK_SIZE);
  }

  /**
   * Run the pipeline once. Resolves to null when `isCurrent` turns false at
   * any await point; the caller has moved on and the result must not be shown.
   */
  async refresh(generation: number, isCurrent: () => boolean = () => true): Promise<PlotPayload | null> {
    const { runId } = this.target;
    const run = await this.store.fetchMetadata(runId);
    if (!isCurrent()) return null;

    const shape = resolveShape(run, this.target.parameter);
    const acc = this.accumulatorFor(shape);

    const rows = await this.store.fetchRows(runId, acc.lastPosition + 1);
    if (!isCurrent()) return null;

    for (let i = 0; i < rows.length; i += this.chunkSize) {
      acc.ingest(rows.slice(i, i + this.chunkSize));
      if (i + this.chunkSize < rows.length) {
        await yieldToEventLoop();
        if (!isCurrent()) return null;
      }
    }

    return buildPayload(run, shape, acc, this.target, generation);
  }

  private accumulatorFor(shape: Shape): GridAccumulator {
    const key = [shape.dependentParam.name, ...shape.independentAxes.map(a => a.name)].join('|');
    if (!this.acc || !this.incremental || key !== this.accKey) {
      this.acc = new GridAccumulator(shape);
      this.accKey = key;
    }
    return this.acc;
  }
}

/** Single pipeline pass over the full history, for one-shot plots. */
export async function loadPlot(store: RunStore, target: PlotTarget): Promise<PlotPayload> {
  const loader = new RunLoader(store, target, { incremental: false });
  const payload = await loader.refresh(0);
  if (!payload) throw new Error(`refresh of run ${target.runId} was cancelled`);
  return payload;
}

export function buildPayload(
  run: Run,
  shape: Shape,
  acc: GridAccumulator,
  target: PlotTarget,
  generation: number,
): PlotPayload {
  const valueLabel = axisLabel(shape.dependentParam);
  const withImag = Boolean(target.showImaginary) && acc.complex;
  const base = {
    runId: run.id,
    parameter: shape.dependentParam.name,
    xLabel: axisLabel(shape.independentAxes[0]),
    valueLabel,
    complex: acc.complex,
    rowCount: run.rowCount,
    completed: run.completed,
    generation,
  };

  if (shape.kind === 'oneD') {
    const real = asOneD(acc.snapshot('real'));
    return {
      ...base,
      dimension: 1,
      yLabel: valueLabel,
      points: real.points,
      ...(withImag ? { imaginary: asOneD(acc.snapshot('imag')).points } : {}),
      sliceAvailable: false,
      ...(target.slice ? { sliceError: 'slices can only be taken through 2D data' } : {}),
    };
  }

  const matrix = asTwoD(acc.snapshot('real'));
  const imaginary = withImag ? asTwoD(acc.snapshot('imag')) : undefined;
  const payload: TwoDPayload = {
    ...base,
    dimension: 2,
    yLabel: axisLabel(shape.independentAxes[1]),
    matrix,
    ...(imaginary ? { imaginary } : {}),
    sliceAvailable: true,
    sliceOptions: { x: matrix.xAxis, y: matrix.yAxis },
  };

  const request = target.slice;
  if (!request) return payload;

  const latest = acc.latest;
  const followed = request.follow && latest ? latest[request.axis] : undefined;
  const at = followed ?? request.target ?? (request.axis === 'x' ? matrix.xAxis[0] : matrix.yAxis[0]);
  try {
    payload.slice = slice(matrix, request.axis, at ?? Number.NaN);
    if (imaginary) payload.imaginarySlice = takeAt(imaginary, payload.slice);
  } catch (err) {
    if (!isLoaderError(err)) throw err;
    payload.sliceError = err.message;
  }
  return payload;
}

/** Same cut through a companion grid with identical axes. */
function takeAt(grid: TwoDGrid, cut: Slice): Slice {
  return slice(grid, cut.axis, cut.coordinate);
}

function asOneD(grid: Grid): OneDGrid {
  if (grid.kind !== 'oneD') throw new Error('expected a 1D grid');
  return grid;
}

function asTwoD(grid: Grid): TwoDGrid {
  if (grid.kind !== 'twoD') throw new Error('expected a 2D grid');
  return grid;
}
