import Database from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';
import type { LabwatchConfig } from '../types.js';

export const PROJECT_DIR = '.labwatch';

/**
 * Walk up from startDir looking for a directory containing `.labwatch/`.
 */
export function findProjectRoot(startDir?: string): string | null {
  let dir = startDir ?? process.cwd();
  const root = path.parse(dir).root;

  while (true) {
    if (fs.existsSync(path.join(dir, PROJECT_DIR))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir || parent === root) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Resolve the database path. Precedence: --db flag, LABWATCH_DB, config.
 * Relative config paths are taken from the project root.
 */
export function resolveDatabasePath(
  config: LabwatchConfig,
  projectRoot: string | null,
  flagValue?: string,
): string {
  if (flagValue) return path.resolve(flagValue);
  const fromEnv = process.env.LABWATCH_DB?.trim();
  if (fromEnv) return path.resolve(fromEnv);
  const configured = config.database.path.trim();
  if (!configured) {
    throw new Error('No database configured. Pass --db PATH, set LABWATCH_DB, or run `labwatch init --db PATH`.');
  }
  return path.isAbsolute(configured) || !projectRoot
    ? path.resolve(configured)
    : path.join(projectRoot, configured);
}

/**
 * Open the measurement database read-only. The writer keeps going while we
 * read, so a short busy timeout is all we wait on its locks.
 */
export function openReadOnly(dbPath: string, busyTimeoutMs: number): Database.Database {
  return new Database(dbPath, {
    readonly: true,
    fileMustExist: true,
    timeout: busyTimeoutMs,
  });
}
