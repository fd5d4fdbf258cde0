import type Database from 'better-sqlite3';

/**
 * Read-only queries against the measurement database, as named functions.
 * Each takes a db instance so tests can point them at a fixture file.
 */

export interface RunRecord {
  run_id: number;
  exp_id: number | null;
  name: string | null;
  result_table_name: string;
  run_timestamp: number | null;
  completed_timestamp: number | null;
  is_completed: number | null;
  run_description: string | null;
  captured_run_id: number | null;
  captured_counter: number | null;
  experiment_name: string | null;
  sample_name: string | null;
}

export type RawCell = number | bigint | string | Buffer | null;

export interface RawRow {
  id: number;
  [column: string]: RawCell;
}

const RUN_COLUMNS = `
  r.run_id, r.exp_id, r.name, r.result_table_name, r.run_timestamp,
  r.completed_timestamp, r.is_completed, r.run_description,
  r.captured_run_id, r.captured_counter,
  e.name AS experiment_name, e.sample_name
`;

/** Double-quote an identifier for interpolation into SQL. */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

// ── Runs ─────────────────────────────────────────────────────

export function getRunRecord(db: Database.Database, runId: number): RunRecord | null {
  const row = db.prepare(`
    SELECT ${RUN_COLUMNS}
    FROM runs r LEFT JOIN experiments e ON e.exp_id = r.exp_id
    WHERE r.run_id = ?
  `).get(runId) as RunRecord | undefined;
  return row ?? null;
}

export function listRunRecords(db: Database.Database): RunRecord[] {
  return db.prepare(`
    SELECT ${RUN_COLUMNS}
    FROM runs r LEFT JOIN experiments e ON e.exp_id = r.exp_id
    ORDER BY r.run_id
  `).all() as RunRecord[];
}

export function getLatestRunId(db: Database.Database): number | null {
  const row = db.prepare('SELECT MAX(run_id) AS run_id FROM runs').get() as { run_id: number | null } | undefined;
  return row?.run_id ?? null;
}

export function countRuns(db: Database.Database): number {
  const row = db.prepare('SELECT COUNT(*) AS n FROM runs').get() as { n: number };
  return row.n;
}

export function hasTable(db: Database.Database, table: string): boolean {
  const row = db.prepare(`
    SELECT 1 AS found FROM sqlite_master WHERE type = 'table' AND name = ?
  `).get(table);
  return row !== undefined;
}

// ── Results tables ───────────────────────────────────────────

/**
 * Row ids in a results table run 1..n in write order, so the largest id is
 * the row count without a full COUNT(*) scan.
 */
export function getResultRowCount(db: Database.Database, table: string): number {
  const row = db.prepare(`SELECT MAX(id) AS n FROM ${quoteIdent(table)}`).get() as { n: number | null };
  return row.n ?? 0;
}

export function readResultRows(
  db: Database.Database,
  table: string,
  columns: string[],
  sincePosition: number,
  limit: number,
): RawRow[] {
  const selected = ['id', ...columns].map(quoteIdent).join(', ');
  return db.prepare(`
    SELECT ${selected} FROM ${quoteIdent(table)}
    WHERE id >= ?
    ORDER BY id
    LIMIT ?
  `).all(sincePosition, limit) as RawRow[];
}
