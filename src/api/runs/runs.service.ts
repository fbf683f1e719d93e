import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { PipelineRun } from '../../database/entities/pipeline-run.entity';
import { Pipeline } from '../../database/entities/pipeline.entity';
import { Job } from '../../database/entities/job.entity';
import { PipelinesService } from '../pipelines/pipelines.service';
import { JobQueueService } from '../../queue/job-queue.service';
import { JobLogLine, JobLogService } from '../../logs/job-log.service';
import { expandJobs } from '../../workflow/matrix-expander';
import { matchesTrigger } from '../../workflow/trigger-rule';
import { safeParseWorkflow } from '../../workflow/workflow-parser';
import type { PipelineResult, PushEvent, Workflow } from '../../workflow/workflow.types';
import { summarizeRun } from './run-view';

export interface RunView {
  run: PipelineRun;
  jobs: Job[];
  /** null until every job has finished */
  summary: PipelineResult | null;
}

export type PushTriggerResult =
  | { triggered: false; branch: string; reason: string }
  | { triggered: true; run: PipelineRun; jobCount: number };

export interface ManualTrigger {
  triggerType?: string;
  triggerMetadata?: Record<string, unknown> | null;
  branch?: string | null;
  commit?: string | null;
}

/**
 * trigger pipeline runs, get run status, and get job logs.
 */
@Injectable()
export class RunsService {
  private readonly logger = new Logger(RunsService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly pipelinesService: PipelinesService,
    private readonly jobQueue: JobQueueService,
    private readonly jobLogs: JobLogService,
  ) {}

  async findAll(pipelineId?: string): Promise<PipelineRun[]> {
    const repo = this.dataSource.getRepository(PipelineRun);
    return repo.find({
      where: pipelineId ? { pipeline_id: pipelineId } : undefined,
      order: { created_at: 'DESC' },
      take: 100,
    });
  }

  // Get one run by id
  async findOne(runId: string): Promise<PipelineRun | null> {
    return this.dataSource.getRepository(PipelineRun).findOne({
      where: { id: runId },
    });
  }

  // Get run with its jobs and steps (for status view)
  async findOneWithJobs(runId: string): Promise<RunView | null> {
    const run = await this.dataSource.getRepository(PipelineRun).findOne({
      where: { id: runId },
      relations: { jobs: { steps: true } },
      order: { jobs: { matrix_index: 'ASC', steps: { step_order: 'ASC' } } },
    });
    if (!run) return null;
    const jobs = run.jobs ?? [];
    return { run, jobs, summary: summarizeRun(jobs) };
  }

  // Get log lines for a job (for logs view)
  async getJobLogs(jobId: string): Promise<JobLogLine[]> {
    return this.jobLogs.findByJob(jobId);
  }

  /** Manual trigger: bypasses the branch filter, runs every enabled job. */
  async triggerRun(pipelineId: string, trigger: ManualTrigger = {}): Promise<PipelineRun> {
    const pipeline = await this.pipelinesService.findOne(pipelineId);
    if (!pipeline) throw new NotFoundException('Pipeline not found');

    return this.startRun(pipeline, this.workflowOf(pipeline), {
      triggerType: trigger.triggerType ?? 'manual',
      triggerMetadata: trigger.triggerMetadata ?? null,
      branch: trigger.branch ?? null,
      commit: trigger.commit ?? null,
    });
  }

  /** A push only starts a run when its branch is in the workflow's trigger set. */
  async triggerFromPush(
    pipeline: Pipeline,
    event: PushEvent,
    payload: Record<string, unknown> | null = null,
  ): Promise<PushTriggerResult> {
    const workflow = this.workflowOf(pipeline);
    if (!matchesTrigger(workflow.trigger, event)) {
      this.logger.log(`Push to '${event.branch}' ignored by pipeline ${pipeline.name}`);
      return {
        triggered: false,
        branch: event.branch,
        reason: `Branch '${event.branch}' does not trigger workflow '${workflow.name}'`,
      };
    }

    const run = await this.startRun(pipeline, workflow, {
      triggerType: 'git_push',
      triggerMetadata: payload,
      branch: event.branch,
      commit: event.commit ?? null,
    });
    return { triggered: true, run, jobCount: expandJobs(workflow.jobs).length };
  }

  /** Cancel: pending jobs are skipped, running ones finish. Run status follows via DB trigger. */
  async cancelRun(runId: string): Promise<PipelineRun> {
    const run = await this.findOne(runId);
    if (!run) throw new NotFoundException('Run not found');

    const skipped = await this.jobQueue.skipPendingJobs(runId);
    this.logger.log(`Run ${runId} cancelled: ${skipped.length} pending job(s) skipped`);

    const updated = await this.findOne(runId);
    return updated ?? run;
  }

  private workflowOf(pipeline: Pipeline): Workflow {
    const parsed = safeParseWorkflow(pipeline.config);
    if (!parsed.ok) {
      throw new BadRequestException({ message: 'Pipeline config is not a valid workflow', issues: parsed.issues });
    }
    return parsed.workflow;
  }

  // Create run, enqueue one job per expanded JobSpec.
  private async startRun(
    pipeline: Pipeline,
    workflow: Workflow,
    input: { triggerType: string; triggerMetadata: Record<string, unknown> | null; branch: string | null; commit: string | null },
  ): Promise<PipelineRun> {
    const specs = expandJobs(workflow.jobs);
    const runRow = await this.pipelinesService.createPipelineRun(pipeline.id, input);

    if (specs.length === 0) {
      await this.pipelinesService.completeRunWithoutJobs(runRow.id);
    } else {
      await this.jobQueue.enqueueJobs(runRow.id, specs);
    }
    this.logger.log(`Run ${runRow.id} of ${pipeline.name}: ${specs.length} job(s) enqueued`);

    const run = await this.findOne(runRow.id);
    if (!run) throw new Error('Run not created');
    return run;
  }
}
