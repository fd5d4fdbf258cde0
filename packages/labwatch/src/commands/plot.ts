import { openContext, parsePlotTarget, resolveRunId } from './context.js';
import { positionals } from '../config.js';
import { loadPlot } from '../live/loader.js';
import { renderPayload } from '../output/plot.js';

/** One-shot plot of a run's current data. */
export async function plot(args: string[], isJson: boolean): Promise<void> {
  const { config, store } = openContext(args);
  try {
    const runId = await resolveRunId(store, positionals(args)[0]);
    const target = parsePlotTarget(args, runId, config);
    const payload = await loadPlot(store, target);

    if (isJson) {
      console.log(JSON.stringify(payload, null, 2));
      return;
    }
    console.log(renderPayload(payload, {
      heatmapWidth: config.plot.heatmap_width,
      maxRows: config.plot.max_rows,
    }));
  } finally {
    store.close();
  }
}
