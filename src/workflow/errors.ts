import type { JobStatus } from './workflow.types';

/** Workflow document failed schema or template checks. */
export class WorkflowValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid workflow: ${issues.join('; ')}`);
    this.name = 'WorkflowValidationError';
  }
}

/** The execution environment for a runner label could not be allocated. */
export class EnvironmentProvisionError extends Error {
  constructor(
    readonly runsOn: string,
    message: string,
  ) {
    super(message);
    this.name = 'EnvironmentProvisionError';
  }
}

export class InvalidJobTransitionError extends Error {
  constructor(
    readonly jobId: string,
    readonly from: JobStatus,
    readonly to: JobStatus,
  ) {
    super(`Job '${jobId}' cannot move from ${from} to ${to}`);
    this.name = 'InvalidJobTransitionError';
  }
}
