/**
 * Database readiness validation for labwatch.
 * Reports what the configured database provides and what is missing.
 * Informational only; never blocks.
 */

export interface ValidationCheck {
  label: string;
  status: 'pass' | 'warn' | 'fail';
  detail: string;
}

/**
 * Validate a store given pre-resolved facts so the caller handles fs/sqlite logic.
 */
export function validateStore(checks: {
  databasePath: string;
  databaseExists: boolean;
  databaseReadable: boolean;
  hasRunsTable: boolean;
  runCount: number;
  latestRunId: number | null;
  intervalSeconds: number;
}): ValidationCheck[] {
  const results: ValidationCheck[] = [];

  if (!checks.databasePath) {
    results.push({ label: 'Database path', status: 'fail', detail: 'Not set — pass --db or set database.path in .labwatch/config.json' });
    return results;
  }

  results.push(checks.databaseExists
    ? { label: 'Database file', status: 'pass', detail: checks.databasePath }
    : { label: 'Database file', status: 'fail', detail: `Not found: ${checks.databasePath}` }
  );
  if (!checks.databaseExists) return results;

  results.push(checks.databaseReadable
    ? { label: 'Read access', status: 'pass', detail: 'Opened read-only' }
    : { label: 'Read access', status: 'fail', detail: 'Could not open — the file may be locked or not a SQLite database' }
  );
  if (!checks.databaseReadable) return results;

  results.push(checks.hasRunsTable
    ? { label: 'Runs table', status: 'pass', detail: 'Found' }
    : { label: 'Runs table', status: 'fail', detail: 'Missing — this does not look like a measurement database' }
  );

  if (checks.hasRunsTable) {
    results.push(checks.runCount > 0
      ? { label: 'Runs', status: 'pass', detail: `${checks.runCount} run(s), latest #${checks.latestRunId ?? '?'}` }
      : { label: 'Runs', status: 'warn', detail: 'None yet — watch will wait for the first run' }
    );
  }

  results.push(checks.intervalSeconds >= 0.5
    ? { label: 'Refresh interval', status: 'pass', detail: `${checks.intervalSeconds}s` }
    : { label: 'Refresh interval', status: 'warn', detail: `${checks.intervalSeconds}s is very short — slow queries will skip ticks` }
  );

  return results;
}

// Local NO_COLOR gate: shared does not import from labwatch.
const _useColor = !process.env.NO_COLOR && (process.stderr?.isTTY !== false);

/**
 * Format validation results for terminal output.
 */
export function formatValidation(checks: ValidationCheck[]): string {
  const lines: string[] = [];
  for (const c of checks) {
    const icon = c.status === 'pass' ? (_useColor ? '\x1b[32m✓\x1b[0m' : '✓')
               : c.status === 'warn' ? (_useColor ? '\x1b[33m⚠\x1b[0m' : '⚠')
               : (_useColor ? '\x1b[31m✗\x1b[0m' : '✗');
    lines.push(`  ${icon} ${c.label}: ${c.detail}`);
  }
  return lines.join('\n');
}
