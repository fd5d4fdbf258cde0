export interface LabwatchConfig {
  database: {
    path: string;
    busy_timeout_ms: number;
  };
  refresh: {
    interval_seconds: number;
    incremental: boolean;   // false re-reads the full history every tick
  };
  plot: {
    show_imaginary: boolean;
    heatmap_width: number;
    max_rows: number;
  };
}

// ── Store model ──────────────────────────────────────────────

export type ParameterRole = 'independent' | 'dependent';

export type ParamType = 'numeric' | 'array' | 'complex' | 'text';

export interface Parameter {
  name: string;
  role: ParameterRole;
  dependsOn: string[];
  label: string;
  unit: string;
  paramType: ParamType;
}

export interface Run {
  id: number;
  name: string;
  experimentName: string;
  sampleName: string;
  capturedRunId: number;
  capturedCounter: number;
  startedAt: string | null;
  completedAt: string | null;
  completed: boolean;
  rowCount: number;
  parameters: Parameter[];
}

export interface RunSummary {
  id: number;
  name: string;
  experimentName: string;
  sampleName: string;
  completed: boolean;
  rowCount: number;
  startedAt: string | null;
}

export interface ComplexValue {
  re: number;
  im: number;
}

export type Sample = number | ComplexValue;

export interface Row {
  position: number;   // results-table row id, strictly increasing in write order
  values: Record<string, Sample | null>;
}

/**
 * Read side of the measurement database. Asynchronous so a slow store
 * never holds the event loop between pipeline steps.
 */
export interface RunStore {
  fetchMetadata(runId: number): Promise<Run>;
  fetchRows(runId: number, sincePosition: number): Promise<Row[]>;
  latestRunId(): Promise<number | null>;
  listRuns(): Promise<RunSummary[]>;
  close(): void;
}

// ── Shapes and grids ─────────────────────────────────────────

export type Shape =
  | {
      kind: 'oneD';
      dimension: 1;
      independentAxes: [Parameter];
      dependentParam: Parameter;
    }
  | {
      kind: 'twoD';
      dimension: 2;
      independentAxes: [Parameter, Parameter];
      dependentParam: Parameter;
    };

export type ValuePart = 'real' | 'imag';

export interface Point {
  x: number;
  y: number;
}

export interface OneDGrid {
  kind: 'oneD';
  points: Point[];
}

export interface TwoDGrid {
  kind: 'twoD';
  xAxis: number[];
  yAxis: number[];
  values: (number | null)[][];   // values[xi][yi], null = not measured yet
}

export type Grid = OneDGrid | TwoDGrid;

export type SliceAxis = 'x' | 'y';

export interface SlicePoint {
  coordinate: number;
  value: number;
}

export interface Slice {
  axis: SliceAxis;
  index: number;
  coordinate: number;
  points: SlicePoint[];
}

// ── UI contract ──────────────────────────────────────────────

export interface SliceRequest {
  axis: SliceAxis;
  target: number | null;   // null with follow=false means "first coordinate"
  follow: boolean;         // track the newest coordinate written on the axis
}

export interface PlotTarget {
  runId: number;
  parameter?: string;
  slice?: SliceRequest;
  showImaginary?: boolean;
}

interface PayloadBase {
  runId: number;
  parameter: string;
  xLabel: string;
  yLabel: string;
  valueLabel: string;
  complex: boolean;
  rowCount: number;
  completed: boolean;
  generation: number;
  sliceError?: string;     // slice misuse is reported inline, never fatal
}

export interface OneDPayload extends PayloadBase {
  dimension: 1;
  points: Point[];
  imaginary?: Point[];
  sliceAvailable: false;
}

export interface TwoDPayload extends PayloadBase {
  dimension: 2;
  matrix: TwoDGrid;
  imaginary?: TwoDGrid;
  sliceAvailable: true;
  sliceOptions: { x: number[]; y: number[] };
  slice?: Slice;
  imaginarySlice?: Slice;
}

export type PlotPayload = OneDPayload | TwoDPayload;
