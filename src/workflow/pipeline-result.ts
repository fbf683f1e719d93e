import type { JobResult, PipelineResult, PipelineStatus } from './workflow.types';

/**
 * Aggregate job results. A pipeline succeeds only when every job did, so an
 * empty pipeline succeeds; any failure wins over skipped jobs.
 */
export function summarizePipeline(jobs: JobResult[]): PipelineResult {
  let succeeded = 0;
  let failed = 0;
  let skipped = 0;

  for (const job of jobs) {
    switch (job.status) {
      case 'success':
        succeeded++;
        break;
      case 'failed':
        failed++;
        break;
      case 'skipped':
        skipped++;
        break;
    }
  }

  let status: PipelineStatus = 'success';
  if (failed > 0) status = 'failed';
  else if (skipped > 0) status = 'cancelled';

  return { status, total: jobs.length, succeeded, failed, skipped, jobs };
}
