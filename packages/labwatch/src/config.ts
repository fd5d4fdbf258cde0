import * as fs from 'node:fs';
import * as path from 'node:path';
import { DEFAULT_CONFIG } from '@labwatch/shared';
import type { LabwatchConfig } from './types.js';
import { PROJECT_DIR } from './db/connection.js';

let _cachedConfig: LabwatchConfig | null = null;
let _cachedRoot: string | null = null;

export function configPath(projectRoot: string): string {
  return path.join(projectRoot, PROJECT_DIR, 'config.json');
}

/**
 * Load .labwatch/config.json merged over defaults. Cached per project root.
 * A null root (no project found) yields the defaults.
 */
export function loadConfig(projectRoot: string | null): LabwatchConfig {
  if (_cachedConfig && _cachedRoot === projectRoot) return _cachedConfig;

  const file = projectRoot ? configPath(projectRoot) : null;
  const loaded: Record<string, unknown> = file && fs.existsSync(file) ? parseConfigFile(file) : {};

  const database = record(loaded.database);
  const refresh = record(loaded.refresh);
  const plot = record(loaded.plot);
  const d = DEFAULT_CONFIG;

  _cachedConfig = {
    database: {
      path: str(database.path, d.database.path),
      busy_timeout_ms: num(database.busy_timeout_ms, d.database.busy_timeout_ms),
    },
    refresh: {
      interval_seconds: num(refresh.interval_seconds, d.refresh.interval_seconds),
      incremental: bool(refresh.incremental, d.refresh.incremental),
    },
    plot: {
      show_imaginary: bool(plot.show_imaginary, d.plot.show_imaginary),
      heatmap_width: num(plot.heatmap_width, d.plot.heatmap_width),
      max_rows: num(plot.max_rows, d.plot.max_rows),
    },
  };
  _cachedRoot = projectRoot;
  return _cachedConfig;
}

/** Clear cached config (for testing). */
export function resetConfigCache(): void {
  _cachedConfig = null;
  _cachedRoot = null;
}

function parseConfigFile(file: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid ${file}: ${msg}`, { cause: err });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Invalid ${file}: expected a JSON object`);
  }
  return record(parsed);
}

function record(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

// Loaded values replace defaults only when they have the default's type.
function str(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

function num(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function bool(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

/** Extract a flag's value from args array with bounds checking. */
export function getFlagValue(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx < 0 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

const VALUE_FLAGS = new Set(['--db', '--param', '--slice', '--at', '--interval']);

/** Positional arguments: everything that is neither a flag nor a flag's value. */
export function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (VALUE_FLAGS.has(a)) {
      i++;
      continue;
    }
    if (!a.startsWith('--')) out.push(a);
  }
  return out;
}
