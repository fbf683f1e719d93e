import { Logger } from '@nestjs/common';
import type {
  JobFailure,
  JobResult,
  JobSpec,
  StepDefinition,
  StepResult,
} from '../workflow/workflow.types';
import { JobLifecycle } from './job-lifecycle';
import type {
  CheckoutSource,
  Environment,
  JobRunListener,
  OutputHandler,
  Provisioner,
  StepExecutor,
} from './runner.types';

export interface JobRunContext {
  checkout?: CheckoutSource;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function skippedStep(step: StepDefinition, index: number): StepResult {
  return { index, name: step.name, kind: step.kind, status: 'skipped', exitCode: null, output: [] };
}

/**
 * Step sequencer for a single job.
 *
 * Provisions a fresh environment, runs the steps strictly in order and stops
 * at the first failing one; the rest are recorded as skipped. The environment
 * is released whatever happens. Nothing here touches other jobs.
 */
export class JobRunner {
  private readonly logger = new Logger(JobRunner.name);

  constructor(
    private readonly provisioner: Provisioner,
    private readonly executor: StepExecutor,
    private readonly listener: JobRunListener = {},
  ) {}

  async run(spec: JobSpec, context: JobRunContext = {}): Promise<JobResult> {
    const lifecycle = new JobLifecycle(spec.id);
    lifecycle.transition('running');
    await this.listener.onJobStarted?.(spec);

    let environment: Environment;
    try {
      environment = await this.provisioner.provision({
        jobId: spec.id,
        runsOn: spec.runsOn,
        checkout: context.checkout,
      });
    } catch (err) {
      lifecycle.transition('failed');
      return this.finish(spec, 'failed', await this.skipAll(spec), {
        kind: 'environment_provision_failure',
        message: errorMessage(err),
      });
    }

    const steps: StepResult[] = [];
    let failure: JobFailure | undefined;

    try {
      for (const [index, step] of spec.steps.entries()) {
        const result = failure ? skippedStep(step, index) : await this.runStep(spec, environment, step, index);
        steps.push(result);
        await this.listener.onStepFinished?.(spec, result);

        if (!failure && result.status === 'failed') {
          failure = {
            kind: 'step_failure',
            message:
              result.exitCode === null
                ? `Step '${step.name}' could not run`
                : `Step '${step.name}' exited with code ${result.exitCode}`,
            stepIndex: index,
          };
        }
      }
    } finally {
      await this.release(environment);
    }

    const status: JobResult['status'] = failure ? 'failed' : 'success';
    lifecycle.transition(status);
    return this.finish(spec, status, steps, failure);
  }

  /** Record a job that never started, e.g. because its run was cancelled. */
  async skip(spec: JobSpec): Promise<JobResult> {
    const lifecycle = new JobLifecycle(spec.id);
    lifecycle.transition('skipped');
    return this.finish(spec, 'skipped', await this.skipAll(spec));
  }

  private async runStep(
    spec: JobSpec,
    environment: Environment,
    step: StepDefinition,
    index: number,
  ): Promise<StepResult> {
    await this.listener.onStepStarted?.(spec, index, step);

    const output: string[] = [];
    const onOutput: OutputHandler = (line, stream) => {
      output.push(line);
      this.listener.onOutput?.(spec, index, line, stream);
    };

    let exitCode: number | null;
    try {
      ({ exitCode } = await this.executor.runStep(environment, step, onOutput));
    } catch (err) {
      exitCode = null;
      onOutput(`Step error: ${errorMessage(err)}`, 'stderr');
    }

    return {
      index,
      name: step.name,
      kind: step.kind,
      status: exitCode === 0 ? 'success' : 'failed',
      exitCode,
      output,
    };
  }

  private async skipAll(spec: JobSpec): Promise<StepResult[]> {
    const steps = spec.steps.map((step, index) => skippedStep(step, index));
    for (const step of steps) {
      await this.listener.onStepFinished?.(spec, step);
    }
    return steps;
  }

  private async release(environment: Environment): Promise<void> {
    try {
      await this.provisioner.release(environment);
    } catch (err) {
      this.logger.warn(`Failed to release environment ${environment.id}: ${errorMessage(err)}`);
    }
  }

  private async finish(
    spec: JobSpec,
    status: JobResult['status'],
    steps: StepResult[],
    failure?: JobFailure,
  ): Promise<JobResult> {
    const result: JobResult = {
      jobId: spec.id,
      name: spec.name,
      runsOn: spec.runsOn,
      matrix: spec.matrix,
      status,
      steps,
      ...(failure ? { failure } : {}),
    };
    await this.listener.onJobFinished?.(spec, result);
    return result;
  }
}
