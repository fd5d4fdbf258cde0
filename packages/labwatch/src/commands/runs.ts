import { openContext } from './context.js';
import * as fmt from '../output/format.js';

export async function runs(args: string[], isJson: boolean): Promise<void> {
  const { store } = openContext(args);
  try {
    const all = await store.listRuns();

    if (isJson) {
      console.log(JSON.stringify(all, null, 2));
      return;
    }

    if (all.length === 0) {
      fmt.info('No runs in this database yet.');
      return;
    }

    fmt.header('Runs');
    const rows = all.map(r => [
      String(r.id),
      r.experimentName || '—',
      r.sampleName || '—',
      r.name || '—',
      String(r.rowCount),
      fmt.runStatusColor(r.completed),
      r.startedAt ?? '—',
    ]);
    console.log(fmt.table(['ID', 'Experiment', 'Sample', 'Name', 'Rows', 'Status', 'Started'], rows));
  } finally {
    store.close();
  }
}
