import { openContext, parsePlotTarget, resolveRunId } from './context.js';
import { getFlagValue, hasFlag, positionals } from '../config.js';
import { RefreshScheduler } from '../live/scheduler.js';
import type { RefreshUpdate } from '../live/types.js';
import type { PlotTarget } from '../types.js';
import { describeError } from '../errors.js';
import { renderPayload } from '../output/plot.js';
import { isShutdownRequested, onShutdown } from '../shutdown.js';
import * as fmt from '../output/format.js';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

/**
 * Live mode: `labwatch watch [run]`.
 * Re-plots on every interval until Ctrl+C. With --latest the view jumps
 * to each new run as the measurement software starts it.
 */
export async function watch(args: string[], isJson: boolean): Promise<void> {
  const { config, store } = openContext(args);
  const explicitRun = positionals(args)[0];
  const followLatest = hasFlag(args, '--latest') && explicitRun === undefined;

  const intervalArg = getFlagValue(args, '--interval');
  const intervalSeconds = intervalArg !== undefined ? Number(intervalArg) : config.refresh.interval_seconds;
  if (!(intervalSeconds > 0)) {
    store.close();
    throw new Error(`--interval must be a positive number of seconds, got ${intervalArg}`);
  }

  let target: PlotTarget;
  try {
    target = parsePlotTarget(args, await resolveRunId(store, explicitRun), config);
  } catch (err) {
    store.close();
    throw err;
  }

  const renderOpts = { heatmapWidth: config.plot.heatmap_width, maxRows: config.plot.max_rows };
  let lastStatus = '';

  const show = (update: RefreshUpdate): void => {
    if (isJson) {
      console.log(JSON.stringify(update.kind === 'data'
        ? { kind: 'data', payload: update.payload }
        : { kind: 'error', error: update.error.kind, message: update.error.message, halted: update.halted }));
      return;
    }
    if (update.kind === 'data') {
      process.stdout.write(CLEAR_SCREEN);
      console.log(renderPayload(update.payload, renderOpts));
      console.log(`\n${fmt.dim(`Refreshing every ${intervalSeconds}s — Ctrl+C to stop.`)}`);
      if (lastStatus) fmt.warn(lastStatus);
      lastStatus = '';
      return;
    }
    lastStatus = describeError(update.error);
    if (update.halted) fmt.error(`${lastStatus} — not retrying until the run changes.`);
    else fmt.warn(lastStatus);
  };

  let shownRun = target.runId;
  const scheduler = new RefreshScheduler(store, {
    incremental: config.refresh.incremental,
    followLatest,
    onUpdate: update => {
      if (update.target.runId !== shownRun) {
        fmt.debug(`switched to new run #${update.target.runId}`);
        shownRun = update.target.runId;
      }
      show(update);
    },
  });

  await new Promise<void>(resolve => {
    if (isShutdownRequested()) {
      store.close();
      resolve();
      return;
    }
    const unregister = onShutdown(() => {
      unregister();
      scheduler.stop();
      store.close();
      if (!isJson) fmt.info('Stopped.');
      resolve();
    });
    void scheduler.start(target, intervalSeconds);
  });
}
