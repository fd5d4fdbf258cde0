import { findProjectRoot, resolveDatabasePath } from '../db/connection.js';
import { SqliteStore } from '../db/store.js';
import { loadConfig, getFlagValue, hasFlag } from '../config.js';
import type { LabwatchConfig, PlotTarget, RunStore, SliceAxis, SliceRequest } from '../types.js';

export interface CommandContext {
  root: string | null;
  config: LabwatchConfig;
  dbPath: string;
  store: RunStore;
}

/** Resolve project, config and database for a command that reads runs. */
export function openContext(args: string[]): CommandContext {
  const root = findProjectRoot();
  const config = loadConfig(root);
  const dbPath = resolveDatabasePath(config, root, getFlagValue(args, '--db'));
  const store = new SqliteStore(dbPath, config.database.busy_timeout_ms);
  return { root, config, dbPath, store };
}

/** The run id from the first positional argument, or the newest run. */
export async function resolveRunId(store: RunStore, positional: string | undefined): Promise<number> {
  if (positional !== undefined) {
    const id = Number(positional);
    if (!Number.isInteger(id) || id < 1) {
      throw new Error(`Invalid run id: ${positional}`);
    }
    return id;
  }
  const latest = await store.latestRunId();
  if (latest === null) throw new Error('The database has no runs yet.');
  return latest;
}

/** Build a plot target from --param, --slice, --at, --follow and --imag. */
export function parsePlotTarget(args: string[], runId: number, config: LabwatchConfig): PlotTarget {
  const target: PlotTarget = {
    runId,
    showImaginary: hasFlag(args, '--imag') || config.plot.show_imaginary,
  };
  const parameter = getFlagValue(args, '--param');
  if (parameter) target.parameter = parameter;

  const slice = parseSlice(args);
  if (slice) target.slice = slice;
  return target;
}

function parseSlice(args: string[]): SliceRequest | undefined {
  const axisArg = getFlagValue(args, '--slice');
  const atArg = getFlagValue(args, '--at');
  const follow = hasFlag(args, '--follow');

  if (axisArg === undefined) {
    if (atArg !== undefined || follow) throw new Error('--at and --follow need --slice x|y');
    return undefined;
  }
  if (!isSliceAxis(axisArg)) {
    throw new Error(`--slice must be x or y, got ${axisArg}`);
  }

  let target: number | null = null;
  if (atArg !== undefined) {
    target = Number(atArg);
    if (atArg.trim() === '' || !Number.isFinite(target)) {
      throw new Error(`--at must be a number, got ${atArg}`);
    }
  }
  return { axis: axisArg, target, follow };
}

function isSliceAxis(value: string): value is SliceAxis {
  return value === 'x' || value === 'y';
}
