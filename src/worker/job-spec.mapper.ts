import type { JobExecutionContext } from '../queue/job-queue.service';
import type { CheckoutSource } from '../runner/runner.types';
import type { JobSpec } from '../workflow/workflow.types';

/** Rebuild the JobSpec a job row was enqueued from. Commands are stored interpolated. */
export function toJobSpec(context: JobExecutionContext): JobSpec {
  const { job, steps } = context;
  return {
    id: job.job_key,
    variantId: job.variant_id,
    name: job.name,
    runsOn: job.runs_on,
    matrix: { ...job.matrix },
    steps: steps.map((step) => ({
      name: step.name,
      kind: step.kind,
      run: step.command,
      env: { ...step.env },
    })),
  };
}

export function toCheckoutSource(context: JobExecutionContext): CheckoutSource {
  return {
    repository: context.repository,
    ...(context.branch ? { ref: context.branch } : {}),
    ...(context.commit_sha ? { commit: context.commit_sha } : {}),
  };
}
