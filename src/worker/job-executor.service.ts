import { Inject, Injectable, Logger } from '@nestjs/common';
import { PROVISIONER, STEP_EXECUTOR } from '../execution/execution.tokens';
import { JobLogService } from '../logs/job-log.service';
import { ClaimedJob, JobQueueService } from '../queue/job-queue.service';
import { JobRunner } from '../runner/job-runner';
import type { Provisioner, StepExecutor } from '../runner/runner.types';
import type { JobResult } from '../workflow/workflow.types';
import { HeartbeatService } from './heartbeat.service';
import { JobPersistenceListener } from './job-persistence.listener';
import { toCheckoutSource, toJobSpec } from './job-spec.mapper';

/**
 * Executes one claimed job: rebuilds its JobSpec from the queue, runs it
 * through a JobRunner and persists every step, log line and the final status.
 */
@Injectable()
export class JobExecutorService {
  private readonly logger = new Logger(JobExecutorService.name);

  constructor(
    private readonly jobQueue: JobQueueService,
    private readonly jobLogs: JobLogService,
    private readonly heartbeat: HeartbeatService,
    @Inject(PROVISIONER) private readonly provisioner: Provisioner,
    @Inject(STEP_EXECUTOR) private readonly stepExecutor: StepExecutor,
  ) {}

  async execute(job: ClaimedJob, workerId: string): Promise<JobResult> {
    const context = await this.jobQueue.loadExecutionContext(job.id);
    if (!context) {
      throw new Error(`Job ${job.id} disappeared after being claimed`);
    }

    const listener = new JobPersistenceListener(job.id, this.jobQueue, this.jobLogs);
    const runner = new JobRunner(this.provisioner, this.stepExecutor, listener);

    // Heartbeat while running
    const heartbeatTimer = setInterval(() => {
      this.heartbeat.tick(job.id).catch((err: unknown) => {
        this.logger.warn(`Heartbeat for job ${job.id} failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    }, this.heartbeat.intervalMs);

    try {
      this.logger.log(`worker=${workerId} running ${job.name} (${job.id}) on ${job.runs_on}`);
      return await runner.run(toJobSpec(context), { checkout: toCheckoutSource(context) });
    } finally {
      clearInterval(heartbeatTimer);
    }
  }
}
