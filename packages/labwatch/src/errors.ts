export type LoaderErrorKind =
  | 'NotFound'
  | 'StoreUnavailable'
  | 'UnsupportedShape'
  | 'SchemaInconsistency'
  | 'EmptyAxis'
  | 'DimensionMismatch'
  | 'InvalidSlice';

// Metadata is static for a run, so shape errors never clear up by themselves.
const RETRYABLE: Record<LoaderErrorKind, boolean> = {
  NotFound: true,
  StoreUnavailable: true,
  UnsupportedShape: false,
  SchemaInconsistency: false,
  EmptyAxis: true,
  DimensionMismatch: false,
  InvalidSlice: false,
};

export class LoaderError extends Error {
  public readonly kind: LoaderErrorKind;
  public readonly runId?: number;

  constructor(kind: LoaderErrorKind, message: string, opts?: { runId?: number; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'LoaderError';
    this.kind = kind;
    this.runId = opts?.runId;
  }

  get retryable(): boolean {
    return RETRYABLE[this.kind];
  }
}

export function isLoaderError(err: unknown, kind?: LoaderErrorKind): err is LoaderError {
  return err instanceof LoaderError && (kind === undefined || err.kind === kind);
}

/**
 * Normalize anything thrown inside a refresh into a LoaderError.
 * Unknown failures are treated as a transient store problem.
 */
export function toLoaderError(err: unknown, runId?: number): LoaderError {
  if (err instanceof LoaderError) return err;
  const msg = err instanceof Error ? err.message : String(err);
  return new LoaderError('StoreUnavailable', msg, { runId, cause: err });
}

/** One-line status text for the terminal UI. */
export function describeError(err: LoaderError): string {
  switch (err.kind) {
    case 'NotFound':
      return `No such run or parameter: ${err.message}`;
    case 'StoreUnavailable':
      return `Database unavailable (will retry): ${err.message}`;
    case 'UnsupportedShape':
    case 'SchemaInconsistency':
      return `Cannot plot this run: ${err.message}`;
    default:
      return err.message;
  }
}
