import { InvalidJobTransitionError } from '../workflow/errors';
import type { JobStatus } from '../workflow/workflow.types';

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running', 'skipped'],
  running: ['success', 'failed'],
  success: [],
  failed: [],
  skipped: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/**
 * pending → running → success | failed, or pending → skipped when the job
 * is cancelled before it starts. Terminal states never change again.
 */
export class JobLifecycle {
  private current: JobStatus = 'pending';

  constructor(readonly jobId: string) {}

  get status(): JobStatus {
    return this.current;
  }

  transition(to: JobStatus): void {
    if (!canTransition(this.current, to)) {
      throw new InvalidJobTransitionError(this.jobId, this.current, to);
    }
    this.current = to;
  }
}
