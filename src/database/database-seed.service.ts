import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import type { AppEnv } from '../config/env.validation';
import { Pipeline } from './entities/pipeline.entity';
import { PIPELINE_SEED } from './seed/pipeline.seed';

// Sync pipeline_runs.status/started_at/completed_at from jobs (DB is source of truth).
// Job statuses: pending, running, success, failed, skipped. Run statuses: pending, running,
// success, failed, cancelled (no failure, but some jobs were skipped by a cancel).
const SYNC_PIPELINE_RUN_STATUS_TRIGGER_SQL = `
CREATE OR REPLACE FUNCTION sync_pipeline_run_status_from_jobs()
RETURNS TRIGGER AS $$
DECLARE
  run_id uuid := COALESCE(NEW.pipeline_run_id, OLD.pipeline_run_id);
  has_running boolean;
  all_terminal boolean;
  has_failed boolean;
  has_skipped boolean;
BEGIN
  -- One recompute per run at a time; later reads see sibling jobs that finished meanwhile
  PERFORM 1 FROM pipeline_runs WHERE id = run_id FOR UPDATE;

  -- Any job running → run is running, set started_at if null
  SELECT EXISTS (
    SELECT 1 FROM jobs WHERE pipeline_run_id = run_id AND status = 'running'
  ) INTO has_running;

  IF has_running THEN
    UPDATE pipeline_runs
    SET status = 'running',
        started_at = COALESCE(started_at, NOW())
    WHERE id = run_id AND (status IS DISTINCT FROM 'running' OR started_at IS NULL);
    RETURN COALESCE(NEW, OLD);
  END IF;

  -- All jobs terminal → failed if any failed, cancelled if any skipped, else success
  SELECT
    NOT EXISTS (SELECT 1 FROM jobs WHERE pipeline_run_id = run_id AND status NOT IN ('success', 'failed', 'skipped')),
    EXISTS (SELECT 1 FROM jobs WHERE pipeline_run_id = run_id AND status = 'failed'),
    EXISTS (SELECT 1 FROM jobs WHERE pipeline_run_id = run_id AND status = 'skipped')
  INTO all_terminal, has_failed, has_skipped;

  IF all_terminal THEN
    UPDATE pipeline_runs
    SET status = CASE
          WHEN has_failed THEN 'failed'
          WHEN has_skipped THEN 'cancelled'
          ELSE 'success'
        END,
        completed_at = COALESCE(completed_at, NOW())
    WHERE id = run_id;
  END IF;

  RETURN COALESCE(NEW, OLD);
END;
$$ LANGUAGE plpgsql;

DROP TRIGGER IF EXISTS jobs_sync_pipeline_run_status ON jobs;
CREATE TRIGGER jobs_sync_pipeline_run_status
  AFTER INSERT OR UPDATE OF status
  ON jobs
  FOR EACH ROW
  EXECUTE PROCEDURE sync_pipeline_run_status_from_jobs();
`;

/**
 * Runs on app startup: seeds example pipelines when the table is empty and installs
 * the run-status trigger. Only the API process (SYNC_DATABASE=true) touches the schema.
 */
@Injectable()
export class DatabaseSeedService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseSeedService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly config: ConfigService<AppEnv, true>,
  ) {}

  async onModuleInit(): Promise<void> {
    if (this.config.get('SYNC_DATABASE', { infer: true }) !== 'true') return;
    await this.ensureSyncPipelineRunStatusTrigger();
    await this.seedPipelinesIfEmpty();
  }

  private async seedPipelinesIfEmpty(): Promise<void> {
    const repo = this.dataSource.getRepository(Pipeline);
    const count = await repo.count();
    if (count > 0) return;

    for (const row of PIPELINE_SEED) {
      const pipeline = repo.create(row);
      await repo.save(pipeline);
    }
    this.logger.log(`Seeded ${PIPELINE_SEED.length} pipeline(s)`);
  }

  /**
   * Trigger on jobs: when any job becomes running → run = running + started_at;
   * when all jobs are terminal → run = success|failed|cancelled + completed_at.
   */
  private async ensureSyncPipelineRunStatusTrigger(): Promise<void> {
    await this.dataSource.query(SYNC_PIPELINE_RUN_STATUS_TRIGGER_SQL);
  }
}
