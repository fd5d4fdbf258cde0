// Raw ANSI codes, no color library

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const BLUE = '\x1b[34m';
const CYAN = '\x1b[36m';

const useColor = !process.env.NO_COLOR;

function paint(code: string, s: string): string {
  return useColor ? `${code}${s}${RESET}` : s;
}

export function bold(s: string): string { return paint(BOLD, s); }
export function dim(s: string): string { return paint(DIM, s); }
export function red(s: string): string { return paint(RED, s); }
export function green(s: string): string { return paint(GREEN, s); }
export function yellow(s: string): string { return paint(YELLOW, s); }
export function blue(s: string): string { return paint(BLUE, s); }
export function cyan(s: string): string { return paint(CYAN, s); }

export function runStatusColor(completed: boolean): string {
  return completed ? green('completed') : yellow('running');
}

export function roleColor(role: string): string {
  switch (role) {
    case 'independent': return cyan(role);
    case 'dependent': return blue(role);
    default: return role;
  }
}

/** Compact numeric formatting for tables and axis ticks. */
export function num(value: number): string {
  if (value === 0) return '0';
  const abs = Math.abs(value);
  if (abs >= 1e5 || abs < 1e-3) return value.toExponential(3);
  return String(Number(value.toPrecision(6)));
}

/**
 * Format data as a simple table with column headers.
 */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map(r => stripAnsi(r[i] ?? '').length))
  );

  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join('  ');
  const separator = widths.map(w => '─'.repeat(w)).join('──');
  const bodyLines = rows.map(row =>
    row.map((cell, i) => {
      const stripped = stripAnsi(cell);
      const padding = widths[i] - stripped.length;
      return cell + ' '.repeat(Math.max(0, padding));
    }).join('  ')
  );

  return [bold(headerLine), separator, ...bodyLines].join('\n');
}

export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

/**
 * Print header banner for a command.
 */
export function header(title: string): void {
  console.log(`\n${bold(`[labwatch] ${title}`)}\n`);
}

export function warn(msg: string): void {
  console.log(`${yellow('[labwatch]')} ${msg}`);
}

export function info(msg: string): void {
  console.log(`${cyan('[labwatch]')} ${msg}`);
}

export function success(msg: string): void {
  console.log(`${green('[labwatch]')} ${msg}`);
}

/** Errors go to stderr so --json output stays parseable. */
export function error(msg: string): void {
  console.error(`${red('[labwatch]')} ${msg}`);
}

/** Printed only when LABWATCH_DEBUG is set. */
export function debug(msg: string): void {
  if (process.env.LABWATCH_DEBUG) {
    console.error(`${dim('[labwatch:debug]')} ${msg}`);
  }
}
