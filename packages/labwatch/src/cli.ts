#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { requestShutdown } from './shutdown.js';
import { describeError, isLoaderError } from './errors.js';
import * as fmt from './output/format.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const VERSION = readVersion();

function readVersion(): string {
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8'));
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
}

async function main(): Promise<void> {
  // Graceful shutdown on Ctrl+C
  let sigintCount = 0;
  process.on('SIGINT', () => {
    sigintCount++;
    if (sigintCount >= 2) process.exit(130);
    requestShutdown();
  });

  const args = process.argv.slice(2);

  if (args.includes('--version') || args.includes('-v')) {
    console.log(VERSION);
    return;
  }

  if (args.includes('--help') || args.includes('-h') || args.length === 0) {
    printHelp();
    return;
  }

  const isJson = args.includes('--json');
  const command = args[0];
  const rest = args.slice(1).filter(a => a !== '--json');

  try {
    switch (command) {
      case 'init': {
        const { init } = await import('./commands/init.js');
        await init(rest);
        break;
      }
      case 'runs': {
        const { runs } = await import('./commands/runs.js');
        await runs(rest, isJson);
        break;
      }
      case 'info': {
        const { info } = await import('./commands/info.js');
        await info(rest, isJson);
        break;
      }
      case 'plot': {
        const { plot } = await import('./commands/plot.js');
        await plot(rest, isJson);
        break;
      }
      case 'watch': {
        const { watch } = await import('./commands/watch.js');
        await watch(rest, isJson);
        break;
      }
      default:
        console.error(`Unknown command: ${command}`);
        printHelp();
        process.exit(1);
    }
  } catch (err: unknown) {
    const msg = isLoaderError(err) ? describeError(err)
      : err instanceof Error ? err.message
      : String(err);
    fmt.error(`Error: ${msg}`);
    process.exit(1);
  }
}

function printHelp(): void {
  console.log(`
labwatch v${VERSION} — Live plots of in-progress measurement runs

Usage: labwatch <command> [options]

Setup:
  init [--db PATH] [--interval S] [--force]
                             Write .labwatch/config.json and check the database

Browse:
  runs [--json]              List runs with row counts and status
  info [RUN] [--json]        Sample, experiment, parameters and plot shape

Plot:
  plot [RUN] [--json]        Plot the run's current data once
  watch [RUN] [--json]       Re-plot every interval until Ctrl+C
    --param NAME             Dependent parameter to plot (default: first)
    --slice x|y              Cut 2D data at a fixed x or y
    --at VALUE               Where to cut (nearest coordinate)
    --follow                 Cut at the newest coordinate as data arrives
    --imag                   Also show the imaginary part of complex data
    --interval S             Refresh interval in seconds (watch)
    --latest                 Jump to each new run as it starts (watch)

RUN defaults to the most recent run.

Flags:
  --db PATH                  Database file (overrides LABWATCH_DB and config)
  --json                     Output as JSON (watch: one line per refresh)
  --version, -v              Print version
  --help, -h                 Print this help
`);
}

void main();
