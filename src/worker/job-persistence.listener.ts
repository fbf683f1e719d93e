import { Logger } from '@nestjs/common';
import type { JobLogService, LogLevel } from '../logs/job-log.service';
import type { JobQueueService } from '../queue/job-queue.service';
import type { JobRunListener, OutputStream } from '../runner/runner.types';
import type { JobResult, JobSpec, StepDefinition, StepResult } from '../workflow/workflow.types';

export type JobProgressStore = Pick<JobQueueService, 'markStepRunning' | 'markStepFinished' | 'markJobFinished'>;
export type JobLogSink = Pick<JobLogService, 'appendLog'>;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Mirrors a JobRunner's progress into the jobs, job_steps and job_logs tables.
 *
 * Log lines are written one after another so their ids follow output order.
 * Failing to persist a step or a log line is logged and does not abort the
 * job; failing to record the final job status propagates.
 */
export class JobPersistenceListener implements JobRunListener {
  private readonly logger = new Logger(JobPersistenceListener.name);
  private pendingLogs: Promise<void> = Promise.resolve();

  constructor(
    private readonly jobId: string,
    private readonly jobQueue: JobProgressStore,
    private readonly jobLogs: JobLogSink,
  ) {}

  onJobStarted(spec: JobSpec): Promise<void> {
    this.log(null, `Running '${spec.name}' on ${spec.runsOn}`);
    return this.flush();
  }

  async onStepStarted(spec: JobSpec, index: number, step: StepDefinition): Promise<void> {
    await this.safely(`mark step ${index} running`, () => this.jobQueue.markStepRunning(this.jobId, index));
    this.log(index, `Step ${index + 1}/${spec.steps.length}: ${step.name}`);
  }

  onOutput(_spec: JobSpec, index: number, line: string, stream: OutputStream): void {
    this.log(index, line, stream === 'stderr' ? 'error' : 'info');
  }

  async onStepFinished(_spec: JobSpec, result: StepResult): Promise<void> {
    await this.flush();
    await this.safely(`mark step ${result.index} ${result.status}`, () =>
      this.jobQueue.markStepFinished(this.jobId, result.index, result.status, result.exitCode),
    );
  }

  async onJobFinished(_spec: JobSpec, result: JobResult): Promise<void> {
    if (result.failure) this.log(null, result.failure.message, 'error');
    this.log(null, `Job finished: ${result.status}`, result.status === 'success' ? 'info' : 'warn');
    await this.flush();
    await this.jobQueue.markJobFinished(this.jobId, result);
  }

  /** Resolves once every log line queued so far has been written (or given up on). */
  flush(): Promise<void> {
    return this.pendingLogs;
  }

  private log(stepOrder: number | null, line: string, level: LogLevel = 'info'): void {
    this.pendingLogs = this.pendingLogs.then(() =>
      this.safely('append log line', async () => {
        await this.jobLogs.appendLog(this.jobId, line, level, stepOrder);
      }),
    );
  }

  private async safely(what: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (err) {
      this.logger.warn(`Job ${this.jobId}: could not ${what}: ${errorMessage(err)}`);
    }
  }
}
