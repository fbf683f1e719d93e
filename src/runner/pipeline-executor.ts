import { Logger } from '@nestjs/common';
import { from, lastValueFrom } from 'rxjs';
import { mergeMap, toArray } from 'rxjs/operators';
import { expandJobs } from '../workflow/matrix-expander';
import { summarizePipeline } from '../workflow/pipeline-result';
import { matchesTrigger } from '../workflow/trigger-rule';
import type { JobResult, JobSpec, PipelineResult, PushEvent, StepResult, Workflow } from '../workflow/workflow.types';
import type { JobRunner } from './job-runner';
import type { CheckoutSource } from './runner.types';

export interface PipelineExecutorOptions {
  /** Upper bound on jobs running at once. Unbounded when omitted. */
  maxParallel?: number;
}

export interface ExecuteOptions {
  /** Jobs not yet started when this aborts are recorded as skipped. */
  signal?: AbortSignal;
  /** Restrict the run to one job variant id. */
  only?: string;
  checkout?: CheckoutSource;
}

export type PipelineOutcome =
  | { activated: false; event: PushEvent }
  | { activated: true; event: PushEvent; jobs: JobSpec[]; result: PipelineResult };

/**
 * Runs one activation of a workflow in-process: trigger check, matrix
 * expansion, then every JobSpec through its own JobRunner call. Jobs are
 * independent; one failing never stops another.
 */
export class PipelineExecutor {
  private readonly logger = new Logger(PipelineExecutor.name);

  constructor(
    private readonly runner: JobRunner,
    private readonly options: PipelineExecutorOptions = {},
  ) {}

  async execute(workflow: Workflow, event: PushEvent, options: ExecuteOptions = {}): Promise<PipelineOutcome> {
    if (!matchesTrigger(workflow.trigger, event)) {
      this.logger.log(`Push to '${event.branch}' does not activate workflow '${workflow.name}'`);
      return { activated: false, event };
    }

    const variants = options.only ? workflow.jobs.filter((job) => job.id === options.only) : workflow.jobs;
    const jobs = expandJobs(variants);
    this.logger.log(`Workflow '${workflow.name}' expanded into ${jobs.length} job(s)`);

    const concurrency = this.options.maxParallel ?? Number.POSITIVE_INFINITY;
    const settled = await lastValueFrom(
      from(jobs.map((spec, index) => ({ spec, index }))).pipe(
        mergeMap(
          async ({ spec, index }) => ({ index, result: await this.runOne(spec, options) }),
          concurrency,
        ),
        toArray(),
      ),
    );

    const results: JobResult[] = settled.sort((a, b) => a.index - b.index).map((entry) => entry.result);
    return { activated: true, event, jobs, result: summarizePipeline(results) };
  }

  private async runOne(spec: JobSpec, options: ExecuteOptions): Promise<JobResult> {
    try {
      if (options.signal?.aborted) return await this.runner.skip(spec);
      return await this.runner.run(spec, { checkout: options.checkout });
    } catch (err) {
      // The job is lost, its siblings are not.
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Job ${spec.id} aborted: ${message}`);
      return {
        jobId: spec.id,
        name: spec.name,
        runsOn: spec.runsOn,
        matrix: spec.matrix,
        status: 'failed',
        steps: spec.steps.map((step, index): StepResult => ({
          index,
          name: step.name,
          kind: step.kind,
          status: 'skipped',
          exitCode: null,
          output: [],
        })),
        failure: { kind: 'runner_error', message },
      };
    }
  }
}
