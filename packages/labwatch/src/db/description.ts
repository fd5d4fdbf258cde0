import type { Parameter, ParamType } from '../types.js';
import { LoaderError } from '../errors.js';

/**
 * Parse the JSON run description stored with every run into Parameters.
 *
 * Two layouts occur in the wild:
 *   - `interdependencies.paramspecs`: a list of param specs, each carrying
 *     its own `depends_on` (list, or comma-separated string in old files)
 *   - `interdependencies_`: `parameters` keyed by name plus a separate
 *     `dependencies` map
 * The first is preferred when both are present.
 */
export function parseRunDescription(raw: string | null, runId: number): Parameter[] {
  if (!raw) {
    throw new LoaderError('SchemaInconsistency', `run ${runId} has no description`, { runId });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new LoaderError('SchemaInconsistency', `run ${runId} description is not valid JSON`, { runId, cause: err });
  }
  if (!isRecord(parsed)) {
    throw new LoaderError('SchemaInconsistency', `run ${runId} description is not an object`, { runId });
  }

  const legacy = parsed.interdependencies;
  if (isRecord(legacy) && Array.isArray(legacy.paramspecs)) {
    return legacy.paramspecs.map((spec, i) => toParameter(spec, undefined, runId, i));
  }

  const modern = parsed.interdependencies_;
  if (isRecord(modern) && isRecord(modern.parameters)) {
    const deps = isRecord(modern.dependencies) ? modern.dependencies : {};
    return Object.entries(modern.parameters).map(([name, spec], i) =>
      toParameter(spec, deps[name], runId, i, name),
    );
  }

  throw new LoaderError('SchemaInconsistency', `run ${runId} description lists no parameters`, { runId });
}

function toParameter(
  spec: unknown,
  externalDeps: unknown,
  runId: number,
  index: number,
  fallbackName?: string,
): Parameter {
  if (!isRecord(spec)) {
    throw new LoaderError('SchemaInconsistency', `run ${runId} param spec #${index} is not an object`, { runId });
  }
  const name = typeof spec.name === 'string' ? spec.name : fallbackName;
  if (!name) {
    throw new LoaderError('SchemaInconsistency', `run ${runId} param spec #${index} has no name`, { runId });
  }

  const dependsOn = externalDeps !== undefined ? toNameList(externalDeps) : toNameList(spec.depends_on);
  return {
    name,
    role: dependsOn.length > 0 ? 'dependent' : 'independent',
    dependsOn,
    label: typeof spec.label === 'string' ? spec.label : '',
    unit: typeof spec.unit === 'string' ? spec.unit : '',
    paramType: toParamType(spec.paramtype ?? spec.type),
  };
}

function toNameList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === 'string' && v.length > 0);
  }
  if (typeof value === 'string') {
    return value.split(',').map(s => s.trim()).filter(Boolean);
  }
  return [];
}

function toParamType(value: unknown): ParamType {
  switch (value) {
    case 'array':
    case 'complex':
    case 'text':
      return value;
    default:
      return 'numeric';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
