/**
 * Workflow model: what a parsed workflow document turns into, and what the
 * matrix expander and job runner pass between each other.
 */

export type StepKind = 'checkout' | 'toolchain-setup' | 'shell';

/** Branch names that activate a workflow on push. Exact matches only. */
export interface TriggerRule {
  branches: ReadonlySet<string>;
}

export interface Axis {
  name: string;
  /** Ordered, unique within the axis. */
  values: readonly string[];
}

export interface StepDefinition {
  name: string;
  kind: StepKind;
  /** Shell command. Empty for checkout steps. */
  run: string;
  env: Readonly<Record<string, string>>;
}

/**
 * One declared job. A variant with `enabled: false` stays in the workflow
 * but is never expanded into jobs.
 */
export interface JobVariant {
  id: string;
  /** Display name template; may reference `${{ matrix.<axis> }}`. */
  name: string | null;
  /** Runner label template. */
  runsOn: string;
  enabled: boolean;
  /** Empty when the job declares no matrix. */
  axes: readonly Axis[];
  /** Environment already merged from workflow, job and step level. */
  steps: readonly StepDefinition[];
}

export interface Workflow {
  name: string;
  trigger: TriggerRule;
  jobs: readonly JobVariant[];
}

export type MatrixCombination = Readonly<Record<string, string>>;

/** A fully resolved unit of work: one variant at one axis combination. */
export interface JobSpec {
  id: string;
  variantId: string;
  name: string;
  runsOn: string;
  matrix: MatrixCombination;
  steps: readonly StepDefinition[];
}

export interface PushEvent {
  type: 'push';
  branch: string;
  repository?: string;
  commit?: string;
}

export type JobStatus = 'pending' | 'running' | 'success' | 'failed' | 'skipped';

export type StepStatus = 'success' | 'failed' | 'skipped';

export type JobFailureKind =
  | 'step_failure'
  | 'environment_provision_failure'
  | 'worker_lost'
  /** The job's own bookkeeping threw; it is failed on its own. */
  | 'runner_error';

export interface StepResult {
  index: number;
  name: string;
  kind: StepKind;
  status: StepStatus;
  /** null when the step never ran or its process could not be started. */
  exitCode: number | null;
  output: string[];
}

export interface JobFailure {
  kind: JobFailureKind;
  message: string;
  stepIndex?: number;
}

export interface JobResult {
  jobId: string;
  name: string;
  runsOn: string;
  matrix: MatrixCombination;
  status: Extract<JobStatus, 'success' | 'failed' | 'skipped'>;
  steps: StepResult[];
  failure?: JobFailure;
}

export type PipelineStatus = 'success' | 'failed' | 'cancelled';

export interface PipelineResult {
  status: PipelineStatus;
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  jobs: JobResult[];
}
