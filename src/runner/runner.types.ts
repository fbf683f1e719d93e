import type { JobResult, JobSpec, StepDefinition, StepResult } from '../workflow/workflow.types';

/** Where a job's checkout step clones from. */
export interface CheckoutSource {
  repository: string;
  /** Branch to check out when no commit is given. */
  ref?: string;
  commit?: string;
}

export interface ProvisionRequest {
  jobId: string;
  runsOn: string;
  checkout?: CheckoutSource;
}

/** An isolated, per-job execution environment. Never shared between jobs. */
export interface Environment {
  id: string;
  runsOn: string;
  workspace: string;
  checkout?: CheckoutSource;
  /** Variables every step of the job sees. */
  variables: Record<string, string>;
}

export interface Provisioner {
  /** @throws when no environment can be allocated for `request.runsOn` */
  provision(request: ProvisionRequest): Promise<Environment>;
  release(environment: Environment): Promise<void>;
}

export type OutputStream = 'stdout' | 'stderr';

export type OutputHandler = (line: string, stream: OutputStream) => void;

export interface StepOutcome {
  exitCode: number;
}

export interface StepExecutor {
  runStep(environment: Environment, step: StepDefinition, onOutput: OutputHandler): Promise<StepOutcome>;
}

/** Lifecycle hooks; the runner awaits each one before moving on. */
export interface JobRunListener {
  onJobStarted?(spec: JobSpec): void | Promise<void>;
  onStepStarted?(spec: JobSpec, index: number, step: StepDefinition): void | Promise<void>;
  onOutput?(spec: JobSpec, index: number, line: string, stream: OutputStream): void;
  onStepFinished?(spec: JobSpec, result: StepResult): void | Promise<void>;
  onJobFinished?(spec: JobSpec, result: JobResult): void | Promise<void>;
}
