import type { Job } from '../../database/entities/job.entity';
import type { JobStep } from '../../database/entities/job-step.entity';
import { summarizePipeline } from '../../workflow/pipeline-result';
import type {
  JobFailureKind,
  JobResult,
  PipelineResult,
  StepKind,
  StepResult,
  StepStatus,
} from '../../workflow/workflow.types';

const FINISHED_JOB: readonly JobResult['status'][] = ['success', 'failed', 'skipped'];
const FINISHED_STEP: readonly StepStatus[] = ['success', 'failed', 'skipped'];
const STEP_KINDS: readonly StepKind[] = ['checkout', 'toolchain-setup', 'shell'];
const FAILURE_KINDS: readonly JobFailureKind[] = [
  'step_failure',
  'environment_provision_failure',
  'worker_lost',
  'runner_error',
];

function oneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

function toStepResult(step: JobStep): StepResult {
  return {
    index: step.step_order,
    name: step.name,
    kind: oneOf(STEP_KINDS, step.kind) ? step.kind : 'shell',
    // a step left pending by a finished job never ran
    status: oneOf(FINISHED_STEP, step.status) ? step.status : 'skipped',
    exitCode: step.exit_code,
    output: [],
  };
}

/** Result of a finished job row; null while it is pending or running. Log lines are not included. */
export function toJobResult(job: Job): JobResult | null {
  if (!oneOf(FINISHED_JOB, job.status)) return null;

  const steps = [...(job.steps ?? [])].sort((a, b) => a.step_order - b.step_order).map(toStepResult);
  const result: JobResult = {
    jobId: job.job_key,
    name: job.name,
    runsOn: job.runs_on,
    matrix: job.matrix,
    status: job.status,
    steps,
  };
  if (job.failure_kind && oneOf(FAILURE_KINDS, job.failure_kind)) {
    result.failure = {
      kind: job.failure_kind,
      message: job.failure_message ?? '',
      ...(job.failed_step !== null ? { stepIndex: job.failed_step } : {}),
    };
  }
  return result;
}

/** Pipeline summary once every job has finished, null before. */
export function summarizeRun(jobs: Job[]): PipelineResult | null {
  const results: JobResult[] = [];
  for (const job of [...jobs].sort((a, b) => a.matrix_index - b.matrix_index)) {
    const result = toJobResult(job);
    if (!result) return null;
    results.push(result);
  }
  return summarizePipeline(results);
}
