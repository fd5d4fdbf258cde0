import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { RunLoader, loadPlot } from '../live/loader.js';
import { isLoaderError } from '../errors.js';
import type { PlotPayload, TwoDPayload } from '../types.js';
import { FakeStore, makeRun, param, rowsOf } from './fixtures.js';

const LINE = makeRun([
  param('t', [], { label: 'Time', unit: 's' }),
  param('v', ['t'], { label: 'Voltage', unit: 'V' }),
]);

const MAP = makeRun([param('x'), param('y'), param('g', ['x', 'y'])], { id: 2 });

function twoD(payload: PlotPayload | null): TwoDPayload {
  assert.ok(payload);
  assert.equal(payload.dimension, 2);
  if (payload.dimension !== 2) throw new Error('unreachable');
  return payload;
}

function mapStore(): FakeStore {
  const store = new FakeStore();
  // (0,0)=10, (0,1)=20, (1,0)=30
  store.addRun(MAP, rowsOf(['x', 'y', 'g'], [[0, 0, 10], [0, 1, 20], [1, 0, 30]]));
  return store;
}

describe('loadPlot() — 1D', () => {
  it('returns labelled points for the run', async () => {
    const store = new FakeStore();
    store.addRun(LINE, rowsOf(['t', 'v'], [[0, 1], [1, 3], [0, 5]]));
    const payload = await loadPlot(store, { runId: 1 });

    assert.deepEqual(payload, {
      runId: 1,
      parameter: 'v',
      xLabel: 'Time (s)',
      valueLabel: 'Voltage (V)',
      complex: false,
      rowCount: 0,
      completed: false,
      generation: 0,
      dimension: 1,
      yLabel: 'Voltage (V)',
      points: [{ x: 0, y: 5 }, { x: 1, y: 3 }],
      sliceAvailable: false,
    });
  });

  it('reports a slice request on 1D data inline', async () => {
    const store = new FakeStore();
    store.addRun(LINE, rowsOf(['t', 'v'], [[0, 1]]));
    const payload = await loadPlot(store, { runId: 1, slice: { axis: 'x', target: 0, follow: false } });
    assert.equal(payload.sliceError, 'slices can only be taken through 2D data');
  });

  it('adds the imaginary part of complex data on request', async () => {
    const store = new FakeStore();
    store.addRun(LINE, rowsOf(['t', 'v'], [[0, { re: 1, im: 2 }]]));
    const payload = await loadPlot(store, { runId: 1, showImaginary: true });
    assert.equal(payload.dimension, 1);
    assert.equal(payload.complex, true);
    if (payload.dimension === 1) {
      assert.deepEqual(payload.points, [{ x: 0, y: 1 }]);
      assert.deepEqual(payload.imaginary, [{ x: 0, y: 2 }]);
    }
  });

  it('propagates shape errors', async () => {
    const store = new FakeStore();
    store.addRun(makeRun([param('a'), param('b'), param('c'), param('v', ['a', 'b', 'c'])]));
    await assert.rejects(loadPlot(store, { runId: 1 }), (err: unknown) => isLoaderError(err, 'UnsupportedShape'));
  });

  it('propagates NotFound for a missing run', async () => {
    await assert.rejects(loadPlot(new FakeStore(), { runId: 5 }), (err: unknown) => isLoaderError(err, 'NotFound'));
  });
});

describe('loadPlot() — 2D', () => {
  it('returns the matrix and slice options', async () => {
    const payload = twoD(await loadPlot(mapStore(), { runId: 2 }));
    assert.deepEqual(payload.matrix, {
      kind: 'twoD',
      xAxis: [0, 1],
      yAxis: [0, 1],
      values: [[10, 20], [30, null]],
    });
    assert.deepEqual(payload.sliceOptions, { x: [0, 1], y: [0, 1] });
    assert.equal(payload.slice, undefined);
  });

  it('slices at the requested coordinate', async () => {
    const payload = twoD(await loadPlot(mapStore(), {
      runId: 2,
      slice: { axis: 'x', target: 1, follow: false },
    }));
    assert.deepEqual(payload.slice, { axis: 'x', index: 1, coordinate: 1, points: [{ coordinate: 0, value: 30 }] });
  });

  it('slices at the first coordinate when no target is given', async () => {
    const payload = twoD(await loadPlot(mapStore(), {
      runId: 2,
      slice: { axis: 'y', target: null, follow: false },
    }));
    assert.equal(payload.slice?.coordinate, 0);
  });

  it('follows the newest coordinate', async () => {
    const payload = twoD(await loadPlot(mapStore(), {
      runId: 2,
      slice: { axis: 'x', target: 0, follow: true },
    }));
    assert.equal(payload.slice?.coordinate, 1);
  });

  it('reports slicing an empty grid inline', async () => {
    const store = new FakeStore();
    store.addRun(MAP);
    const payload = twoD(await loadPlot(store, { runId: 2, slice: { axis: 'x', target: 0, follow: false } }));
    assert.equal(payload.slice, undefined);
    assert.equal(payload.sliceError, 'the x axis has no coordinates yet');
  });
});

describe('RunLoader.refresh()', () => {
  it('fetches only rows newer than the last refresh', async () => {
    const store = new FakeStore();
    store.addRun(LINE, rowsOf(['t', 'v'], [[0, 1], [1, 2]]));
    const loader = new RunLoader(store, { runId: 1 });

    await loader.refresh(1);
    store.append(1, rowsOf(['t', 'v'], [[2, 4]], 3));
    const payload = await loader.refresh(2);

    assert.deepEqual(store.fetchRowsCalls.map(c => c.since), [0, 3]);
    assert.ok(payload);
    assert.equal(payload.generation, 2);
    assert.equal(payload.rowCount, 3);
    if (payload.dimension === 1) {
      assert.deepEqual(payload.points, [{ x: 0, y: 1 }, { x: 1, y: 2 }, { x: 2, y: 4 }]);
    }
  });

  it('re-reads everything when incremental loading is off', async () => {
    const store = new FakeStore();
    store.addRun(LINE, rowsOf(['t', 'v'], [[0, 1]]));
    const loader = new RunLoader(store, { runId: 1 }, { incremental: false });
    await loader.refresh(1);
    await loader.refresh(2);
    assert.deepEqual(store.fetchRowsCalls.map(c => c.since), [0, 0]);
  });

  it('returns null when cancelled after the metadata fetch', async () => {
    const store = new FakeStore();
    store.addRun(LINE, rowsOf(['t', 'v'], [[0, 1]]));
    const loader = new RunLoader(store, { runId: 1 });
    assert.equal(await loader.refresh(1, () => false), null);
    assert.equal(store.fetchRowsCalls.length, 0);
  });

  it('checks for cancellation between chunks', async () => {
    const store = new FakeStore();
    store.addRun(LINE, rowsOf(['t', 'v'], [[0, 1], [1, 2], [2, 3], [3, 4], [4, 5]]));
    const loader = new RunLoader(store, { runId: 1 }, { chunkSize: 2 });

    let checks = 0;
    const payload = await loader.refresh(1, () => ++checks < 4);
    // After metadata, after rows, then once per chunk boundary.
    assert.equal(payload, null);
    assert.equal(checks, 4);
  });

  it('produces the same grid in chunks as in one pass', async () => {
    const store = mapStore();
    const chunked = await new RunLoader(store, { runId: 2 }, { chunkSize: 1 }).refresh(1);
    const whole = await new RunLoader(store, { runId: 2 }).refresh(1);
    assert.deepEqual(twoD(chunked).matrix, twoD(whole).matrix);
  });
});
