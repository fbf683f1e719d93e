import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import type { JobResult, JobSpec, StepKind, StepStatus } from '../workflow/workflow.types';

/** Columns the worker needs from a freshly claimed job row. */
export interface ClaimedJob {
  id: string;
  pipeline_run_id: string;
  job_key: string;
  variant_id: string;
  name: string;
  runs_on: string;
  matrix: Record<string, string>;
}

export interface QueuedStep {
  step_order: number;
  name: string;
  kind: StepKind;
  command: string;
  env: Record<string, string>;
}

/** Everything needed to rebuild and run a claimed job. */
export interface JobExecutionContext {
  job: ClaimedJob;
  steps: QueuedStep[];
  repository: string;
  branch: string | null;
  commit_sha: string | null;
}

@Injectable()
export class JobQueueService {
  constructor(private readonly dataSource: DataSource) {}

  /**
   * Insert one job row (plus its step rows) per JobSpec, in expansion order.
   * All or nothing: a run never ends up with half its matrix enqueued.
   */
  async enqueueJobs(pipelineRunId: string, specs: readonly JobSpec[]): Promise<string[]> {
    return this.dataSource.transaction(async (manager) => {
      const ids: string[] = [];

      for (const [index, spec] of specs.entries()) {
        const rows: { id: string }[] = await manager.query(
          `INSERT INTO jobs (
             pipeline_run_id, job_key, variant_id, name, runs_on, matrix, matrix_index, status
           ) VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7, 'pending')
           RETURNING id`,
          [pipelineRunId, spec.id, spec.variantId, spec.name, spec.runsOn, JSON.stringify(spec.matrix), index],
        );
        const jobId = rows[0].id;

        for (const [stepOrder, step] of spec.steps.entries()) {
          await manager.query(
            `INSERT INTO job_steps (job_id, step_order, name, kind, command, env, status)
             VALUES ($1, $2, $3, $4, $5, $6::jsonb, 'pending')`,
            [jobId, stepOrder, step.name, step.kind, step.run, JSON.stringify(step.env)],
          );
        }
        ids.push(jobId);
      }

      return ids;
    });
  }

  /**
   * Claims the oldest pending job this worker can run (runs_on is one of its
   * labels, case-insensitive). Jobs of one run are independent: no ordering
   * between them is enforced here.
   */
  async claimNextJob(workerId: string, labels: readonly string[]): Promise<ClaimedJob | null> {
    const result: ClaimedJob[] = await this.dataSource.query(
      `
      UPDATE jobs
      SET claimed_by = $1,
          claimed_at = NOW(),
          heartbeat_at = NOW(),
          started_at = NOW(),
          status = 'running'
      WHERE id = (
        SELECT j.id
        FROM jobs j
        WHERE j.status = 'pending'
          AND lower(j.runs_on) = ANY($2::text[])
        ORDER BY j.created_at ASC, j.matrix_index ASC
        FOR UPDATE SKIP LOCKED
        LIMIT 1
      )
      RETURNING id, pipeline_run_id, job_key, variant_id, name, runs_on, matrix;
      `,
      [workerId, labels.map((label) => label.toLowerCase())],
    );

    return result[0] ?? null;
  }

  async loadExecutionContext(jobId: string): Promise<JobExecutionContext | null> {
    const rows: (ClaimedJob & { repository: string; branch: string | null; commit_sha: string | null })[] =
      await this.dataSource.query(
        `
        SELECT j.id, j.pipeline_run_id, j.job_key, j.variant_id, j.name, j.runs_on, j.matrix,
               p.repository, pr.branch, pr.commit_sha
        FROM jobs j
        JOIN pipeline_runs pr ON pr.id = j.pipeline_run_id
        JOIN pipelines p ON p.id = pr.pipeline_id
        WHERE j.id = $1
        `,
        [jobId],
      );
    const row = rows[0];
    if (!row) return null;

    const steps: QueuedStep[] = await this.dataSource.query(
      `SELECT step_order, name, kind, command, env FROM job_steps WHERE job_id = $1 ORDER BY step_order ASC`,
      [jobId],
    );

    const { repository, branch, commit_sha, ...job } = row;
    return { job, steps, repository, branch, commit_sha };
  }

  async updateHeartbeat(jobId: string) {
    await this.dataSource.query(`UPDATE jobs SET heartbeat_at = NOW() WHERE id = $1`, [jobId]);
  }

  async markStepRunning(jobId: string, stepOrder: number) {
    await this.dataSource.query(
      `UPDATE job_steps SET status = 'running', started_at = NOW() WHERE job_id = $1 AND step_order = $2`,
      [jobId, stepOrder],
    );
  }

  async markStepFinished(jobId: string, stepOrder: number, status: StepStatus, exitCode: number | null) {
    await this.dataSource.query(
      `
      UPDATE job_steps
      SET status = $3,
          exit_code = $4,
          completed_at = NOW()
      WHERE job_id = $1 AND step_order = $2
      `,
      [jobId, stepOrder, status, exitCode],
    );
  }

  /** Terminal: no retries. Pipeline run status is updated by DB trigger. */
  async markJobFinished(jobId: string, result: JobResult) {
    await this.dataSource.query(
      `
      UPDATE jobs
      SET status = $2,
          failure_kind = $3,
          failure_message = $4,
          failed_step = $5,
          completed_at = NOW()
      WHERE id = $1 AND status = 'running'
      `,
      [
        jobId,
        result.status,
        result.failure?.kind ?? null,
        result.failure?.message ?? null,
        result.failure?.stepIndex ?? null,
      ],
    );
  }

  /**
   * Fail running jobs whose worker stopped heart-beating for longer than
   * timeoutSeconds. Their unfinished steps are closed as well. Returns the ids.
   */
  async failStuckJobs(timeoutSeconds: number): Promise<string[]> {
    const rows: { id: string }[] = await this.dataSource.query(
      `
      WITH lost AS (
        UPDATE jobs
        SET status = 'failed',
            failure_kind = 'worker_lost',
            failure_message = 'Worker stopped sending heartbeats',
            completed_at = NOW()
        WHERE status = 'running'
          AND heartbeat_at < NOW() - ($1::text || ' seconds')::interval
        RETURNING id
      ), closed_steps AS (
        UPDATE job_steps
        SET status = CASE WHEN status = 'running' THEN 'failed' ELSE 'skipped' END,
            completed_at = NOW()
        WHERE job_id IN (SELECT id FROM lost)
          AND status IN ('pending', 'running')
      )
      SELECT id FROM lost
      `,
      [timeoutSeconds],
    );
    return rows.map((row) => row.id);
  }

  /** Cancel: jobs of the run that have not started become skipped. Running jobs finish. */
  async skipPendingJobs(pipelineRunId: string): Promise<string[]> {
    const rows: { id: string }[] = await this.dataSource.query(
      `
      WITH skipped AS (
        UPDATE jobs
        SET status = 'skipped',
            completed_at = NOW()
        WHERE pipeline_run_id = $1
          AND status = 'pending'
        RETURNING id
      ), skipped_steps AS (
        UPDATE job_steps
        SET status = 'skipped'
        WHERE job_id IN (SELECT id FROM skipped)
      )
      SELECT id FROM skipped
      `,
      [pipelineRunId],
    );
    return rows.map((row) => row.id);
  }
}
