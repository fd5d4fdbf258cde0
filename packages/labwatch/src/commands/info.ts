import { openContext, resolveRunId } from './context.js';
import { positionals } from '../config.js';
import { dependentParameters, resolveShape, axisLabel } from '../data/shape.js';
import { isLoaderError } from '../errors.js';
import * as fmt from '../output/format.js';

/**
 * Show what a run is: sample, experiment, start time, parameters and the
 * shape labwatch would plot it as.
 */
export async function info(args: string[], isJson: boolean): Promise<void> {
  const { store } = openContext(args);
  try {
    const runId = await resolveRunId(store, positionals(args)[0]);
    const run = await store.fetchMetadata(runId);

    let shapeText: string;
    try {
      const shape = resolveShape(run);
      shapeText = `${shape.dimension}D: ${axisLabel(shape.dependentParam)} over ${shape.independentAxes.map(axisLabel).join(' × ')}`;
    } catch (err) {
      if (!isLoaderError(err)) throw err;
      shapeText = `not plottable (${err.kind}: ${err.message})`;
    }

    if (isJson) {
      console.log(JSON.stringify({ ...run, shape: shapeText }, null, 2));
      return;
    }

    fmt.header(`${run.sampleName || 'Unnamed sample'} — ${run.experimentName || 'experiment'} run ${run.capturedCounter}`);
    console.log(`  Run id:   ${run.id} (captured ${run.capturedRunId})`);
    console.log(`  Name:     ${run.name || '—'}`);
    console.log(`  Started:  ${run.startedAt ?? '—'}`);
    console.log(`  Status:   ${fmt.runStatusColor(run.completed)}${run.completedAt ? ` at ${run.completedAt}` : ''}`);
    console.log(`  Rows:     ${run.rowCount}`);
    console.log(`  Shape:    ${shapeText}`);
    console.log();

    const rows = run.parameters.map(p => [
      p.name,
      fmt.roleColor(p.role),
      p.dependsOn.join(', ') || '—',
      p.label || '—',
      p.unit || '—',
      p.paramType,
    ]);
    console.log(fmt.table(['Parameter', 'Role', 'Depends on', 'Label', 'Unit', 'Type'], rows));

    const plottable = dependentParameters(run).map(p => p.name);
    if (plottable.length > 1) {
      console.log(`\n  ${fmt.dim(`Pick one with --param: ${plottable.join(', ')}`)}`);
    }
  } finally {
    store.close();
  }
}
