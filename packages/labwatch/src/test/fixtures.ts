import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type {
  Parameter, ParamType, Row, Run, RunStore, RunSummary, Sample,
} from '../types.js';
import type { Timers } from '../live/types.js';
import { LoaderError } from '../errors.js';

// ── On-disk measurement database ─────────────────────────────

export interface SpecFixture {
  name: string;
  depends_on?: string[];
  type?: ParamType;
  label?: string;
  unit?: string;
}

export interface RunFixture {
  runId: number;
  name?: string;
  expId?: number;
  description: string | null;
  /** Results table name; null leaves the table out. */
  table?: string | null;
  columns: string[];
  rows?: (number | string | Buffer | null)[][];
  completed?: boolean;
}

/** Run description in the paramspecs layout. */
export function describeParams(specs: SpecFixture[]): string {
  return JSON.stringify({
    version: 0,
    interdependencies: {
      paramspecs: specs.map(s => ({
        name: s.name,
        paramtype: s.type ?? 'numeric',
        label: s.label ?? '',
        unit: s.unit ?? '',
        inferred_from: [],
        depends_on: s.depends_on ?? [],
      })),
    },
  });
}

/** A scratch directory removed by the returned cleanup function. */
export function makeTmpDir(prefix: string): { dir: string; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), `labwatch-${prefix}-`));
  return { dir, cleanup: () => fs.rmSync(dir, { recursive: true, force: true }) };
}

/**
 * Create a measurement database file with the runs/experiments layout and
 * one results table per run. Returns a writable connection so tests can keep
 * appending rows like a running measurement would.
 */
export function createMeasurementDb(file: string, runs: RunFixture[]): Database.Database {
  const db = new Database(file);
  db.exec(`
    CREATE TABLE experiments (
      exp_id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT,
      sample_name TEXT
    );
    CREATE TABLE runs (
      run_id INTEGER PRIMARY KEY AUTOINCREMENT,
      exp_id INTEGER,
      name TEXT,
      result_table_name TEXT,
      run_timestamp INTEGER,
      completed_timestamp INTEGER,
      is_completed INTEGER,
      run_description TEXT,
      captured_run_id INTEGER,
      captured_counter INTEGER
    );
  `);
  db.prepare('INSERT INTO experiments (exp_id, name, sample_name) VALUES (1, ?, ?)').run('cooldown', 'sample-a');
  for (const run of runs) addRun(db, run);
  return db;
}

export function addRun(db: Database.Database, run: RunFixture): void {
  const table = run.table === undefined ? `results-1-${run.runId}` : run.table;
  db.prepare(`
    INSERT INTO runs (run_id, exp_id, name, result_table_name, run_timestamp,
      completed_timestamp, is_completed, run_description, captured_run_id, captured_counter)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    run.runId,
    run.expId ?? 1,
    run.name ?? `run-${run.runId}`,
    table ?? `results-1-${run.runId}`,
    1_700_000_000,
    run.completed ? 1_700_000_060 : null,
    run.completed ? 1 : 0,
    run.description,
    run.runId,
    run.runId,
  );
  if (table === null) return;

  const columns = run.columns.map(c => `"${c}"`).join(', ');
  db.exec(`CREATE TABLE "${table}" (id INTEGER PRIMARY KEY AUTOINCREMENT, ${columns})`);
  for (const values of run.rows ?? []) appendRow(db, table, run.columns, values);
}

export function appendRow(
  db: Database.Database,
  table: string,
  columns: string[],
  values: (number | string | Buffer | null)[],
): void {
  const names = columns.map(c => `"${c}"`).join(', ');
  const marks = columns.map(() => '?').join(', ');
  db.prepare(`INSERT INTO "${table}" (${names}) VALUES (${marks})`).run(...values);
}

/** Serialized float64 array with the given elements, little-endian. */
export function float64Blob(values: number[]): Buffer {
  const buf = Buffer.alloc(values.length * 8);
  values.forEach((v, i) => buf.writeDoubleLE(v, i * 8));
  return buf;
}

/** Serialized complex128 array: (re, im) pairs. */
export function complexBlob(values: [number, number][]): Buffer {
  return float64Blob(values.flat());
}

// ── In-memory model ──────────────────────────────────────────

export function param(name: string, dependsOn: string[] = [], overrides: Partial<Parameter> = {}): Parameter {
  return {
    name,
    role: dependsOn.length > 0 ? 'dependent' : 'independent',
    dependsOn,
    label: '',
    unit: '',
    paramType: 'numeric',
    ...overrides,
  };
}

export function makeRun(parameters: Parameter[], overrides: Partial<Run> = {}): Run {
  return {
    id: 1,
    name: 'sweep',
    experimentName: 'cooldown',
    sampleName: 'sample-a',
    capturedRunId: 1,
    capturedCounter: 1,
    startedAt: null,
    completedAt: null,
    completed: false,
    rowCount: 0,
    parameters,
    ...overrides,
  };
}

/** Rows at positions 1..n from tuples in the order of `names`. */
export function rowsOf(names: string[], tuples: (Sample | null)[][], firstPosition = 1): Row[] {
  return tuples.map((tuple, i) => {
    const values: Record<string, Sample | null> = {};
    names.forEach((name, j) => { values[name] = tuple[j] ?? null; });
    return { position: firstPosition + i, values };
  });
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => { resolve = res; reject = rej; });
  return { promise, resolve, reject };
}

/**
 * RunStore over in-memory runs. Rows can be appended between refreshes, and
 * `hold()` makes the next fetches wait until `release()` to simulate a slow
 * database.
 */
export class FakeStore implements RunStore {
  readonly runs = new Map<number, { run: Run; rows: Row[] }>();
  readonly fetchRowsCalls: { runId: number; since: number }[] = [];
  metadataCalls = 0;
  failWith: Error | null = null;
  private gate: Deferred<void> | null = null;
  closed = false;

  addRun(run: Run, rows: Row[] = []): void {
    this.runs.set(run.id, { run, rows: [...rows] });
  }

  append(runId: number, rows: Row[]): void {
    const entry = this.runs.get(runId);
    if (!entry) throw new Error(`no fake run ${runId}`);
    entry.rows.push(...rows);
    entry.run = { ...entry.run, rowCount: entry.rows.length };
  }

  hold(): void {
    this.gate = deferred<void>();
  }

  release(): void {
    const gate = this.gate;
    this.gate = null;
    gate?.resolve();
  }

  async fetchMetadata(runId: number): Promise<Run> {
    this.metadataCalls++;
    await this.wait();
    const entry = this.lookup(runId);
    return entry.run;
  }

  async fetchRows(runId: number, sincePosition: number): Promise<Row[]> {
    this.fetchRowsCalls.push({ runId, since: sincePosition });
    await this.wait();
    return this.lookup(runId).rows.filter(r => r.position >= sincePosition);
  }

  async latestRunId(): Promise<number | null> {
    const ids = [...this.runs.keys()];
    return ids.length > 0 ? Math.max(...ids) : null;
  }

  async listRuns(): Promise<RunSummary[]> {
    return [...this.runs.values()].map(({ run }) => ({
      id: run.id,
      name: run.name,
      experimentName: run.experimentName,
      sampleName: run.sampleName,
      completed: run.completed,
      rowCount: run.rowCount,
      startedAt: run.startedAt,
    }));
  }

  close(): void {
    this.closed = true;
  }

  private async wait(): Promise<void> {
    if (this.gate) await this.gate.promise;
    if (this.failWith) throw this.failWith;
  }

  private lookup(runId: number): { run: Run; rows: Row[] } {
    const entry = this.runs.get(runId);
    if (!entry) throw new LoaderError('NotFound', `run ${runId} does not exist`, { runId });
    return entry;
  }
}

/** Timers driven by hand: `fire()` runs every registered callback once. */
export class ManualTimers implements Timers {
  private readonly callbacks = new Map<number, () => void>();
  private nextId = 0;
  readonly intervals: number[] = [];

  every(fn: () => void, ms: number): () => void {
    const id = this.nextId++;
    this.callbacks.set(id, fn);
    this.intervals.push(ms);
    return () => { this.callbacks.delete(id); };
  }

  get active(): number {
    return this.callbacks.size;
  }

  fire(): void {
    for (const fn of [...this.callbacks.values()]) fn();
  }
}

/** Let queued promise callbacks and setImmediate work run. */
export function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}
