import type Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { configTemplate, formatValidation, mkdirSafe, validateStore } from '@labwatch/shared';
import { PROJECT_DIR, openReadOnly } from '../db/connection.js';
import { countRuns, getLatestRunId, hasTable } from '../db/queries.js';
import { configPath, getFlagValue, hasFlag, loadConfig, resetConfigCache } from '../config.js';
import * as fmt from '../output/format.js';

/**
 * `labwatch init [--db PATH] [--interval S] [--force]`
 * Writes .labwatch/config.json in the current directory and checks that the
 * database can be read.
 */
export async function init(args: string[]): Promise<void> {
  const root = process.cwd();
  const file = configPath(root);
  const dbArg = getFlagValue(args, '--db');
  const intervalArg = getFlagValue(args, '--interval');

  const intervalSeconds = intervalArg !== undefined ? Number(intervalArg) : undefined;
  if (intervalSeconds !== undefined && !(intervalSeconds > 0)) {
    throw new Error(`--interval must be a positive number of seconds, got ${intervalArg}`);
  }

  fmt.header('Initializing');

  if (mkdirSafe(path.join(root, PROJECT_DIR))) {
    fmt.info(`Created ${PROJECT_DIR}/`);
  }

  if (fs.existsSync(file) && !hasFlag(args, '--force')) {
    fmt.warn(`${path.relative(root, file)} already exists — keeping it (use --force to overwrite).`);
  } else {
    fs.writeFileSync(file, configTemplate({
      databasePath: dbArg ?? '',
      intervalSeconds,
    }) + '\n');
    fmt.success(`Wrote ${path.relative(root, file)}`);
  }

  resetConfigCache();
  const config = loadConfig(root);
  const configured = config.database.path;
  const dbPath = configured ? path.resolve(root, configured) : '';

  console.log();
  console.log(formatValidation(validateStore({
    ...inspectDatabase(dbPath, config.database.busy_timeout_ms),
    databasePath: dbPath,
    intervalSeconds: config.refresh.interval_seconds,
  })));
  console.log();
}

interface DatabaseFacts {
  databaseExists: boolean;
  databaseReadable: boolean;
  hasRunsTable: boolean;
  runCount: number;
  latestRunId: number | null;
}

function inspectDatabase(dbPath: string, busyTimeoutMs: number): DatabaseFacts {
  const result: DatabaseFacts = {
    databaseExists: dbPath !== '' && fs.existsSync(dbPath),
    databaseReadable: false,
    hasRunsTable: false,
    runCount: 0,
    latestRunId: null,
  };
  if (!result.databaseExists) return result;

  let db: Database.Database | undefined;
  try {
    db = openReadOnly(dbPath, busyTimeoutMs);
    result.hasRunsTable = hasTable(db, 'runs');
    result.databaseReadable = true;
    if (result.hasRunsTable) {
      result.runCount = countRuns(db);
      result.latestRunId = getLatestRunId(db);
    }
  } catch (err) {
    fmt.debug(`could not inspect ${dbPath}: ${err instanceof Error ? err.message : String(err)}`);
  } finally {
    db?.close();
  }
  return result;
}
