import chalk from 'chalk';
import type { JobResult, JobSpec, PipelineResult, StepResult, Workflow } from '../workflow/workflow.types';

const ICONS: Record<JobResult['status'], string> = {
  success: '✓',
  failed: '✗',
  skipped: '-',
};

function paint(colors: chalk.Chalk, status: JobResult['status'], text: string): string {
  switch (status) {
    case 'success':
      return colors.green(text);
    case 'failed':
      return colors.red(text);
    case 'skipped':
      return colors.gray(text);
  }
}

/** Lines describing what a push to `branch` runs; `jobs` is null when the push does not trigger. */
export function formatPlan(
  workflow: Workflow,
  branch: string,
  jobs: readonly JobSpec[] | null,
  colors: chalk.Chalk = chalk,
): string[] {
  if (jobs === null) {
    return [
      colors.yellow(
        `Push to '${branch}' does not trigger '${workflow.name}' (branches: ${[...workflow.trigger.branches].join(', ')})`,
      ),
    ];
  }

  const lines = [colors.bold(`${workflow.name}: ${jobs.length} job(s) for a push to '${branch}'`)];
  for (const job of jobs) {
    lines.push(`  ${colors.cyan(job.id)}  ${job.name}  ${colors.gray(`[${job.runsOn}]`)}`);
    job.steps.forEach((step, index) => lines.push(`      ${index + 1}. ${step.name}`));
  }
  for (const variant of workflow.jobs.filter((job) => !job.enabled)) {
    lines.push(colors.gray(`  ${variant.id}  (disabled)`));
  }
  return lines;
}

function formatStep(step: StepResult, colors: chalk.Chalk): string {
  const exit = step.exitCode !== null && step.exitCode !== 0 ? ` (exit ${step.exitCode})` : '';
  return `    ${paint(colors, step.status, ICONS[step.status])} ${step.name}${exit}`;
}

export function formatJobResult(result: JobResult, colors: chalk.Chalk = chalk): string[] {
  const lines = [
    `${paint(colors, result.status, ICONS[result.status])} ${colors.bold(result.name)} ${colors.gray(`[${result.runsOn}]`)} ${paint(colors, result.status, result.status)}`,
    ...result.steps.map((step) => formatStep(step, colors)),
  ];
  if (result.failure) lines.push(colors.red(`    ${result.failure.message}`));
  return lines;
}

export function formatSummary(result: PipelineResult, colors: chalk.Chalk = chalk): string {
  const counts = `${result.succeeded} succeeded, ${result.failed} failed, ${result.skipped} skipped (${result.total} total)`;
  switch (result.status) {
    case 'success':
      return colors.green(`SUCCESS: ${counts}`);
    case 'failed':
      return colors.red(`FAILED: ${counts}`);
    case 'cancelled':
      return colors.yellow(`CANCELLED: ${counts}`);
  }
}
