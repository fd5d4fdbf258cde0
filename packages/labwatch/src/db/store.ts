import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import Database from 'better-sqlite3';
import type {
  ParamType, Row, Run, RunStore, RunSummary, Sample,
} from '../types.js';
import { LoaderError } from '../errors.js';
import { openReadOnly } from './connection.js';
import { parseRunDescription } from './description.js';
import {
  getLatestRunId,
  getResultRowCount,
  getRunRecord,
  listRunRecords,
  readResultRows,
} from './queries.js';
import type { RawCell, RunRecord } from './queries.js';

/** Rows read per query; the event loop gets a turn between pages. */
export const PAGE_SIZE = 5_000;

/**
 * RunStore over a SQLite measurement database.
 *
 * better-sqlite3 is synchronous; the async surface lets callers interleave
 * other work between queries and lets tests substitute slow fakes.
 */
export class SqliteStore implements RunStore {
  private db: Database.Database | null = null;

  constructor(
    private readonly dbPath: string,
    private readonly busyTimeoutMs = 250,
    private readonly pageSize = PAGE_SIZE,
  ) {}

  async fetchMetadata(runId: number): Promise<Run> {
    return this.guard(runId, db => {
      const record = getRunRecord(db, runId);
      if (!record) {
        throw new LoaderError('NotFound', `run ${runId} does not exist`, { runId });
      }
      const parameters = parseRunDescription(record.run_description, runId);
      return {
        ...toSummaryFields(record),
        capturedRunId: record.captured_run_id ?? record.run_id,
        capturedCounter: record.captured_counter ?? 0,
        completedAt: toIso(record.completed_timestamp),
        rowCount: getResultRowCount(db, record.result_table_name),
        parameters,
      };
    });
  }

  async fetchRows(runId: number, sincePosition: number): Promise<Row[]> {
    const { table, parameters } = this.guard(runId, db => {
      const record = getRunRecord(db, runId);
      if (!record) {
        throw new LoaderError('NotFound', `run ${runId} no longer exists`, { runId });
      }
      return {
        table: record.result_table_name,
        parameters: parseRunDescription(record.run_description, runId),
      };
    });
    const columns = parameters.map(p => p.name);

    const rows: Row[] = [];
    let next = sincePosition;
    for (;;) {
      const page = this.guard(runId, db => readResultRows(db, table, columns, next, this.pageSize));
      for (const r of page) {
        const values: Record<string, Sample | null> = {};
        for (const p of parameters) {
          values[p.name] = decodeCell(r[p.name] ?? null, p.paramType);
        }
        rows.push({ position: r.id, values });
      }
      if (page.length < this.pageSize) return rows;
      next = page[page.length - 1].id + 1;
      await yieldToEventLoop();
    }
  }

  async latestRunId(): Promise<number | null> {
    return this.guard(undefined, db => getLatestRunId(db));
  }

  async listRuns(): Promise<RunSummary[]> {
    return this.guard(undefined, db =>
      listRunRecords(db).map(record => ({
        ...toSummaryFields(record),
        rowCount: safeRowCount(db, record.result_table_name),
      })),
    );
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private connection(): Database.Database {
    if (!this.db) {
      this.db = openReadOnly(this.dbPath, this.busyTimeoutMs);
    }
    return this.db;
  }

  /**
   * Run a read and translate driver failures into the loader taxonomy.
   * A broken connection is dropped so the next call reopens it.
   */
  private guard<T>(runId: number | undefined, read: (db: Database.Database) => T): T {
    try {
      return read(this.connection());
    } catch (err) {
      if (err instanceof LoaderError) throw err;
      const msg = err instanceof Error ? err.message : String(err);
      if (err instanceof Database.SqliteError) {
        if (msg.includes('no such table') && runId !== undefined) {
          throw new LoaderError('NotFound', `results for run ${runId} are missing: ${msg}`, { runId, cause: err });
        }
        if (msg.includes('no such column')) {
          throw new LoaderError('SchemaInconsistency', `run ${runId ?? '?'} results do not match its description: ${msg}`, { runId, cause: err });
        }
      }
      this.close();
      throw new LoaderError('StoreUnavailable', msg, { runId, cause: err });
    }
  }
}

function toSummaryFields(record: RunRecord): Omit<RunSummary, 'rowCount'> {
  return {
    id: record.run_id,
    name: record.name ?? '',
    experimentName: record.experiment_name ?? '',
    sampleName: record.sample_name ?? '',
    completed: record.is_completed === 1,
    startedAt: toIso(record.run_timestamp),
  };
}

function safeRowCount(db: Database.Database, table: string): number {
  try {
    return getResultRowCount(db, table);
  } catch (err) {
    if (err instanceof Database.SqliteError && err.message.includes('no such table')) return 0;
    throw err;
  }
}

/** Timestamps are stored as unix seconds. */
function toIso(seconds: number | null): string | null {
  if (seconds === null || !Number.isFinite(seconds)) return null;
  return new Date(seconds * 1000).toISOString();
}

/**
 * Convert a stored cell to a Sample.
 * Array and complex values are serialized arrays; the newest element sits in
 * the trailing bytes (8 for a float64, 16 for a complex128 pair).
 */
export function decodeCell(cell: RawCell, paramType: ParamType): Sample | null {
  if (cell === null) return null;
  if (typeof cell === 'number') return cell;
  if (typeof cell === 'bigint') return Number(cell);
  if (typeof cell === 'string') {
    if (paramType === 'text') return null;
    const n = Number(cell);
    return cell.trim() !== '' && Number.isFinite(n) ? n : null;
  }
  if (paramType === 'complex') {
    if (cell.byteLength < 16) return null;
    const off = cell.byteLength - 16;
    return { re: cell.readDoubleLE(off), im: cell.readDoubleLE(off + 8) };
  }
  if (paramType === 'array') {
    if (cell.byteLength < 8) return null;
    return cell.readDoubleLE(cell.byteLength - 8);
  }
  return null;
}
