import type { Parameter, Run, Shape } from '../types.js';
import { LoaderError } from '../errors.js';

/** Dependent parameters a user can pick for plotting, in declaration order. */
export function dependentParameters(run: Run): Parameter[] {
  return run.parameters.filter(p => p.role === 'dependent');
}

/**
 * Classify a run as 1D or 2D for the chosen dependent parameter.
 *
 * Without a name the first dependent parameter that declares dependencies
 * is used. The dependency count decides the dimension; every dependency
 * must be an independent parameter of the same run.
 */
export function resolveShape(run: Run, parameterName?: string): Shape {
  const dependent = pickDependent(run, parameterName);
  const count = dependent.dependsOn.length;

  if (count === 0 || count > 2) {
    throw new LoaderError(
      'UnsupportedShape',
      `${dependent.name} depends on ${count} parameter(s); only 1D and 2D runs can be plotted`,
      { runId: run.id },
    );
  }

  const independents = new Map<string, Parameter>(
    run.parameters.filter(p => p.role === 'independent').map(p => [p.name, p]),
  );
  const axes = dependent.dependsOn.map(name => {
    const axis = independents.get(name);
    if (!axis) {
      throw new LoaderError(
        'SchemaInconsistency',
        `${dependent.name} depends on ${name}, which is not an independent parameter of run ${run.id}`,
        { runId: run.id },
      );
    }
    return axis;
  });

  if (axes.length === 1) {
    return { kind: 'oneD', dimension: 1, independentAxes: [axes[0]], dependentParam: dependent };
  }
  return { kind: 'twoD', dimension: 2, independentAxes: [axes[0], axes[1]], dependentParam: dependent };
}

function pickDependent(run: Run, parameterName?: string): Parameter {
  if (parameterName !== undefined) {
    const named = run.parameters.find(p => p.name === parameterName);
    if (!named || named.role !== 'dependent') {
      throw new LoaderError(
        'NotFound',
        `run ${run.id} has no dependent parameter named ${parameterName}`,
        { runId: run.id },
      );
    }
    return named;
  }

  const candidates = dependentParameters(run);
  const withDeps = candidates.find(p => p.dependsOn.length > 0);
  if (withDeps) return withDeps;
  if (candidates.length > 0) return candidates[0];
  throw new LoaderError('UnsupportedShape', `run ${run.id} has no dependent parameter`, { runId: run.id });
}

/** Axis label in the form "label (unit)", falling back to the parameter name. */
export function axisLabel(param: Parameter): string {
  const base = param.label || param.name;
  return param.unit ? `${base} (${param.unit})` : base;
}
