import type { OneDPayload, PlotPayload, Slice, TwoDPayload } from '../types.js';
import * as fmt from './format.js';

export interface RenderOptions {
  heatmapWidth: number;
  maxRows: number;
}

// Low to high; a blank cell means "not measured yet".
export const RAMP = '.:-=+*#%@';

/**
 * Render a plot payload as terminal text: a point table for 1D data,
 * a character heatmap (x across, y up) for 2D data, plus any slice.
 */
export function renderPayload(payload: PlotPayload, opts: RenderOptions): string {
  const lines = [summaryLine(payload)];
  if (payload.dimension === 1) {
    lines.push(render1d(payload, opts));
  } else {
    lines.push(render2d(payload, opts));
    if (payload.slice) lines.push(renderSlice(payload, payload.slice, payload.imaginarySlice, opts));
  }
  if (payload.sliceError) lines.push(fmt.yellow(`Slice: ${payload.sliceError}`));
  return lines.join('\n\n');
}

export function summaryLine(payload: PlotPayload): string {
  const axes = payload.dimension === 1
    ? `${payload.valueLabel} vs ${payload.xLabel}`
    : `${payload.valueLabel} over ${payload.xLabel} × ${payload.yLabel}`;
  return `${fmt.bold(`Run #${payload.runId}`)}  ${axes}  ${fmt.dim(`${payload.rowCount} rows`)}  ${fmt.runStatusColor(payload.completed)}`;
}

function render1d(payload: OneDPayload, opts: RenderOptions): string {
  if (payload.points.length === 0) return fmt.dim('No data yet.');
  const imag = payload.imaginary;
  const headers = imag ? [payload.xLabel, `Re ${payload.valueLabel}`, `Im ${payload.valueLabel}`] : [payload.xLabel, payload.valueLabel];
  const rows = sampleIndices(payload.points.length, opts.maxRows).map(i => {
    const p = payload.points[i];
    return imag ? [fmt.num(p.x), fmt.num(p.y), fmt.num(imag[i].y)] : [fmt.num(p.x), fmt.num(p.y)];
  });
  return fmt.table(headers, rows);
}

function render2d(payload: TwoDPayload, opts: RenderOptions): string {
  const { xAxis, yAxis, values } = payload.matrix;
  if (xAxis.length === 0 || yAxis.length === 0) return fmt.dim('No data yet.');

  let min = Infinity;
  let max = -Infinity;
  for (const column of values) {
    for (const v of column) {
      if (v === null) continue;
      if (v < min) min = v;
      if (v > max) max = v;
    }
  }

  const cols = sampleIndices(xAxis.length, opts.heatmapWidth);
  // Highest y on top.
  const rows = sampleIndices(yAxis.length, opts.maxRows).reverse();
  const labelWidth = Math.max(...rows.map(yi => fmt.num(yAxis[yi]).length));

  const body = rows.map(yi => {
    const cells = cols.map(xi => shade(values[xi][yi], min, max)).join('');
    return `${fmt.num(yAxis[yi]).padStart(labelWidth)} │${cells}`;
  });
  const footer = `${' '.repeat(labelWidth)} └${'─'.repeat(cols.length)}`;
  const legend = [
    `x: ${payload.xLabel} [${fmt.num(xAxis[0])} … ${fmt.num(xAxis[xAxis.length - 1])}]`,
    `y: ${payload.yLabel} [${fmt.num(yAxis[0])} … ${fmt.num(yAxis[yAxis.length - 1])}]`,
    `${payload.valueLabel}: ${fmt.num(min)} (${RAMP[0]}) … ${fmt.num(max)} (${RAMP[RAMP.length - 1]})`,
  ];
  return [...body, footer, ...legend].join('\n');
}

function renderSlice(payload: TwoDPayload, cut: Slice, imag: Slice | undefined, opts: RenderOptions): string {
  const fixedLabel = cut.axis === 'x' ? payload.xLabel : payload.yLabel;
  const freeLabel = cut.axis === 'x' ? payload.yLabel : payload.xLabel;
  const title = fmt.bold(`Slice at ${fixedLabel} = ${fmt.num(cut.coordinate)}`);
  if (cut.points.length === 0) return `${title}\n${fmt.dim('No points on this cut yet.')}`;

  const imagByCoordinate = new Map<number, number>((imag?.points ?? []).map(p => [p.coordinate, p.value]));
  const headers = imag ? [freeLabel, `Re ${payload.valueLabel}`, `Im ${payload.valueLabel}`] : [freeLabel, payload.valueLabel];
  const rows = sampleIndices(cut.points.length, opts.maxRows).map(i => {
    const p = cut.points[i];
    const im = imagByCoordinate.get(p.coordinate);
    return imag ? [fmt.num(p.coordinate), fmt.num(p.value), im === undefined ? '' : fmt.num(im)] : [fmt.num(p.coordinate), fmt.num(p.value)];
  });
  return `${title}\n${fmt.table(headers, rows)}`;
}

/** Map a value onto the ramp; null renders blank. */
export function shade(value: number | null, min: number, max: number): string {
  if (value === null) return ' ';
  if (!(max > min)) return RAMP[Math.floor(RAMP.length / 2)];
  const t = (value - min) / (max - min);
  const idx = Math.min(RAMP.length - 1, Math.max(0, Math.floor(t * RAMP.length)));
  return RAMP[idx];
}

/** Up to `max` evenly spaced indices into a list of length n, ends included. */
export function sampleIndices(n: number, max: number): number[] {
  if (n <= 0 || max <= 0) return [];
  if (n <= max) return Array.from({ length: n }, (_, i) => i);
  if (max === 1) return [n - 1];
  const out: number[] = [];
  for (let i = 0; i < max; i++) {
    const idx = Math.round((i * (n - 1)) / (max - 1));
    if (out[out.length - 1] !== idx) out.push(idx);
  }
  return out;
}
