/**
 * Matrix expansion
 *
 * Turns declared job variants into concrete JobSpecs. Axis order drives
 * emission order (the first declared axis is the outer loop) so two runs of
 * the same workflow always list their jobs the same way.
 */
import { interpolateEnv, interpolateMatrix } from './template';
import type { Axis, JobSpec, JobVariant, MatrixCombination } from './workflow.types';

/**
 * Cartesian product of the axes. An empty axis list yields no combinations;
 * an axis without values empties the whole product.
 */
export function expandMatrix(axes: readonly Axis[]): MatrixCombination[] {
  if (axes.length === 0) return [];

  let combinations: Record<string, string>[] = [{}];
  for (const axis of axes) {
    const next: Record<string, string>[] = [];
    for (const partial of combinations) {
      for (const value of axis.values) {
        next.push({ ...partial, [axis.name]: value });
      }
    }
    combinations = next;
  }
  return combinations;
}

export function hasMatrix(variant: JobVariant): boolean {
  return variant.axes.length > 0;
}

/** Number of jobs a variant contributes once expanded. */
export function getMatrixSize(variant: JobVariant): number {
  if (!variant.enabled) return 0;
  if (!hasMatrix(variant)) return 1;
  return variant.axes.reduce((size, axis) => size * axis.values.length, 1);
}

/**
 * Expand every enabled variant, in declaration order. Plain jobs (no matrix)
 * become exactly one JobSpec; disabled variants contribute nothing.
 */
export function expandJobs(variants: readonly JobVariant[]): JobSpec[] {
  const specs: JobSpec[] = [];

  for (const variant of variants) {
    if (!variant.enabled) continue;

    if (!hasMatrix(variant)) {
      specs.push(resolveJob(variant, variant.id, {}));
      continue;
    }

    expandMatrix(variant.axes).forEach((combination, index) => {
      specs.push(resolveJob(variant, `${variant.id}-${index}`, combination));
    });
  }

  return specs;
}

function resolveJob(variant: JobVariant, id: string, matrix: MatrixCombination): JobSpec {
  const name =
    variant.name !== null ? interpolateMatrix(variant.name, matrix) : defaultJobName(variant.id, matrix);

  return Object.freeze({
    id,
    variantId: variant.id,
    name,
    runsOn: interpolateMatrix(variant.runsOn, matrix),
    matrix: Object.freeze({ ...matrix }),
    steps: Object.freeze(
      variant.steps.map((step) =>
        Object.freeze({
          name: interpolateMatrix(step.name, matrix),
          kind: step.kind,
          run: interpolateMatrix(step.run, matrix),
          env: Object.freeze(interpolateEnv(step.env, matrix)),
        }),
      ),
    ),
  });
}

function defaultJobName(variantId: string, matrix: MatrixCombination): string {
  const values = Object.values(matrix);
  return values.length > 0 ? `${variantId} (${values.join(', ')})` : variantId;
}
