import type { MatrixCombination } from './workflow.types';

const EXPRESSION = /\$\{\{\s*([^}]*?)\s*\}\}/g;
const MATRIX_REF = /^matrix\.([A-Za-z0-9_-]+)$/;

/**
 * Problems with the `${{ … }}` expressions of a template. Only
 * `matrix.<axis>` references to declared axes are supported.
 */
export function templateIssues(template: string, axisNames: readonly string[], where: string): string[] {
  const issues: string[] = [];
  for (const match of template.matchAll(EXPRESSION)) {
    const ref = MATRIX_REF.exec(match[1]);
    if (!ref) {
      issues.push(`${where}: unsupported expression '${match[0]}'`);
    } else if (!axisNames.includes(ref[1])) {
      issues.push(`${where}: unknown matrix axis '${ref[1]}'`);
    }
  }
  return issues;
}

export function interpolateMatrix(template: string, matrix: MatrixCombination): string {
  return template.replace(EXPRESSION, (whole: string, expr: string) => {
    const ref = MATRIX_REF.exec(expr);
    if (!ref || !(ref[1] in matrix)) return whole;
    return matrix[ref[1]];
  });
}

export function interpolateEnv(
  env: Readonly<Record<string, string>>,
  matrix: MatrixCombination,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    result[key] = interpolateMatrix(value, matrix);
  }
  return result;
}
