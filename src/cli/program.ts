import { Logger } from '@nestjs/common';
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LocalProvisioner, parseRunnerLabels } from '../execution/local-provisioner';
import { ShellStepExecutor } from '../execution/shell-step-executor';
import { JobRunner } from '../runner/job-runner';
import { PipelineExecutor } from '../runner/pipeline-executor';
import type { JobRunListener } from '../runner/runner.types';
import { WorkflowValidationError } from '../workflow/errors';
import { expandJobs } from '../workflow/matrix-expander';
import { matchesTrigger } from '../workflow/trigger-rule';
import { loadWorkflowFile } from '../workflow/workflow-parser';
import { formatJobResult, formatPlan, formatSummary } from './report';

/** Where commands write; replaced in tests. */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
  colors: chalk.Chalk;
}

export const processIO: CliIO = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
  setExitCode: (code) => {
    process.exitCode = code;
  },
  colors: chalk,
};

interface PlanOptions {
  branch: string;
}

interface RunOptions {
  branch: string;
  job?: string;
  maxParallel?: number;
  repository: string;
  commit?: string;
  labels?: string;
  workspaceRoot: string;
  keepWorkspaces?: boolean;
  verbose?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/** Print validation problems one per line and exit 1; anything else propagates. */
async function withWorkflowErrors(io: CliIO, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (!(err instanceof WorkflowValidationError)) throw err;
    io.err(io.colors.red('Invalid workflow:'));
    for (const issue of err.issues) io.err(`  - ${issue}`);
    io.setExitCode(1);
  }
}

function liveOutput(io: CliIO): JobRunListener {
  return {
    onStepStarted: (spec, index, step) => io.out(io.colors.cyan(`[${spec.id}] ${index + 1}/${spec.steps.length} ${step.name}`)),
    onOutput: (spec, _index, line) => io.out(io.colors.gray(`[${spec.id}] `) + line),
  };
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name('matrix-ci')
    .description('Validate, plan and run matrix CI workflows locally')
    .version('0.1.0');

  program
    .command('validate')
    .description('Check a workflow file')
    .argument('<file>', 'workflow YAML or JSON file')
    .action((file: string) =>
      withWorkflowErrors(io, async () => {
        const workflow = await loadWorkflowFile(file);
        const jobs = expandJobs(workflow.jobs);
        io.out(io.colors.green(`✓ ${workflow.name}: ${workflow.jobs.length} job variant(s), ${jobs.length} job(s)`));
      }),
    );

  program
    .command('plan')
    .description('Show the jobs a push to a branch would run')
    .argument('<file>', 'workflow YAML or JSON file')
    .requiredOption('-b, --branch <name>', 'pushed branch')
    .action((file: string, options: PlanOptions) =>
      withWorkflowErrors(io, async () => {
        const workflow = await loadWorkflowFile(file);
        const event = { type: 'push' as const, branch: options.branch };
        const jobs = matchesTrigger(workflow.trigger, event) ? expandJobs(workflow.jobs) : null;
        for (const line of formatPlan(workflow, options.branch, jobs, io.colors)) io.out(line);
      }),
    );

  program
    .command('run')
    .description('Run a workflow on this machine as if a branch had been pushed')
    .argument('<file>', 'workflow YAML or JSON file')
    .requiredOption('-b, --branch <name>', 'pushed branch')
    .option('-j, --job <id>', 'only run this job')
    .option('-p, --max-parallel <n>', 'jobs running at once', parsePositiveInt)
    .option('-r, --repository <url>', 'checkout source', process.cwd())
    .option('-c, --commit <sha>', 'commit to check out')
    .option('-l, --labels <list>', 'runner labels this machine serves (comma-separated)')
    .option('-w, --workspace-root <dir>', 'where job workspaces are created', join(tmpdir(), 'matrix-ci'))
    .option('--keep-workspaces', 'leave job workspaces on disk')
    .option('-v, --verbose', 'log runner internals')
    .action((file: string, options: RunOptions) =>
      withWorkflowErrors(io, async () => {
        const workflow = await loadWorkflowFile(file);
        if (options.job) {
          const selected = workflow.jobs.find((job) => job.id === options.job);
          if (!selected) {
            io.err(io.colors.red(`Unknown job '${options.job}'. Jobs: ${workflow.jobs.map((job) => job.id).join(', ')}`));
            io.setExitCode(1);
            return;
          }
          if (!selected.enabled) {
            io.err(io.colors.red(`Job '${selected.id}' is disabled`));
            io.setExitCode(1);
            return;
          }
        }
        if (!options.verbose) Logger.overrideLogger(['warn', 'error']);

        const provisioner = new LocalProvisioner({
          labels: parseRunnerLabels(options.labels),
          workspaceRoot: options.workspaceRoot,
          keepWorkspaces: options.keepWorkspaces ?? false,
        });
        const runner = new JobRunner(provisioner, new ShellStepExecutor(), liveOutput(io));
        const executor = new PipelineExecutor(runner, { maxParallel: options.maxParallel });

        const controller = new AbortController();
        const onInterrupt = () => controller.abort();
        process.once('SIGINT', onInterrupt);
        try {
          const outcome = await executor.execute(
            workflow,
            { type: 'push', branch: options.branch, repository: options.repository, commit: options.commit },
            {
              signal: controller.signal,
              only: options.job,
              checkout: { repository: options.repository, ref: options.branch, commit: options.commit },
            },
          );
          if (!outcome.activated) {
            for (const line of formatPlan(workflow, options.branch, null, io.colors)) io.out(line);
            return;
          }

          io.out('');
          for (const result of outcome.result.jobs) {
            for (const line of formatJobResult(result, io.colors)) io.out(line);
          }
          io.out(formatSummary(outcome.result, io.colors));
          if (outcome.result.status !== 'success') io.setExitCode(1);
        } finally {
          process.removeListener('SIGINT', onInterrupt);
        }
      }),
    );

  return program;
}
