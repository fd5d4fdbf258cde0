import type {
  Grid, OneDGrid, Row, Sample, Shape, TwoDGrid, ValuePart,
} from '../types.js';

interface Cell {
  sample: Sample;
  position: number;
}

export interface Coordinates {
  x: number;
  y?: number;
}

/**
 * Append-only store of the latest sample per coordinate for one run.
 *
 * Rows can be fed in any order and any number of batches; for each
 * coordinate the row with the highest position wins. Coordinates are matched
 * exactly. `snapshot()` always builds a fresh Grid, so a published grid is
 * never touched by later ingestion.
 */
export class GridAccumulator {
  private readonly cells1d = new Map<number, Cell>();
  private readonly cells2d = new Map<number, Map<number, Cell>>();
  private readonly yValues = new Set<number>();
  private _lastPosition = -1;
  private _latest: { coordinates: Coordinates; position: number } | null = null;
  private _complex = false;

  constructor(readonly shape: Shape) {}

  /** Highest row position ingested so far, -1 before the first row. */
  get lastPosition(): number {
    return this._lastPosition;
  }

  /** Coordinates of the most recently written usable row. */
  get latest(): Coordinates | null {
    return this._latest?.coordinates ?? null;
  }

  /** True once any complex sample has been ingested. */
  get complex(): boolean {
    return this._complex;
  }

  /** Ingest rows; returns how many carried a usable point. */
  ingest(rows: Iterable<Row>): number {
    const shape = this.shape;
    const xName = shape.independentAxes[0].name;
    const valueName = shape.dependentParam.name;
    let accepted = 0;

    for (const row of rows) {
      if (row.position > this._lastPosition) this._lastPosition = row.position;

      const x = coordinate(row.values[xName]);
      const sample = row.values[valueName];
      if (x === null || !isUsableSample(sample)) continue;

      if (shape.kind === 'oneD') {
        if (!put(this.cells1d, x, sample, row.position)) continue;
        this.markLatest({ x }, row.position);
      } else {
        const y = coordinate(row.values[shape.independentAxes[1].name]);
        if (y === null) continue;
        let column = this.cells2d.get(x);
        if (!column) {
          column = new Map();
          this.cells2d.set(x, column);
        }
        if (!put(column, y, sample, row.position)) continue;
        this.yValues.add(y);
        this.markLatest({ x, y }, row.position);
      }

      if (typeof sample !== 'number') this._complex = true;
      accepted++;
    }
    return accepted;
  }

  snapshot(part: ValuePart = 'real'): Grid {
    return this.shape.kind === 'oneD' ? this.snapshot1d(part) : this.snapshot2d(part);
  }

  private snapshot1d(part: ValuePart): OneDGrid {
    const points = Array.from(this.cells1d, ([x, cell]) => ({ x, y: project(cell.sample, part) }));
    points.sort((a, b) => a.x - b.x);
    return { kind: 'oneD', points };
  }

  private snapshot2d(part: ValuePart): TwoDGrid {
    const xAxis = sortedNumbers(this.cells2d.keys());
    const yAxis = sortedNumbers(this.yValues);
    const yIndex = new Map<number, number>(yAxis.map((y, i) => [y, i]));

    const values = xAxis.map(x => {
      const row = new Array<number | null>(yAxis.length).fill(null);
      const column = this.cells2d.get(x);
      if (column) {
        for (const [y, cell] of column) {
          const yi = yIndex.get(y);
          if (yi !== undefined) row[yi] = project(cell.sample, part);
        }
      }
      return row;
    });

    return { kind: 'twoD', xAxis, yAxis, values };
  }

  private markLatest(coordinates: Coordinates, position: number): void {
    if (!this._latest || position >= this._latest.position) {
      this._latest = { coordinates, position };
    }
  }
}

/** Build a grid from a complete row history in one pass. */
export function assemble(rows: Iterable<Row>, shape: Shape, part: ValuePart = 'real'): Grid {
  const acc = new GridAccumulator(shape);
  acc.ingest(rows);
  return acc.snapshot(part);
}

export function project(sample: Sample, part: ValuePart): number {
  if (typeof sample === 'number') return part === 'real' ? sample : 0;
  return part === 'real' ? sample.re : sample.im;
}

/** Store the sample unless a later write already holds this key. */
function put<K>(cells: Map<K, Cell>, key: K, sample: Sample, position: number): boolean {
  const existing = cells.get(key);
  if (existing && existing.position > position) return false;
  cells.set(key, { sample, position });
  return true;
}

function coordinate(value: Sample | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function isUsableSample(value: Sample | null | undefined): value is Sample {
  if (value === null || value === undefined) return false;
  if (typeof value === 'number') return Number.isFinite(value);
  return Number.isFinite(value.re) && Number.isFinite(value.im);
}

function sortedNumbers(values: Iterable<number>): number[] {
  return Array.from(values).sort((a, b) => a - b);
}
