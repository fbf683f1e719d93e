import { Injectable } from '@nestjs/common';
import { ClaimedJob, JobQueueService } from '../queue/job-queue.service';

/**
 * Claims jobs from the postgres queue, see {@link JobQueueService.claimNextJob}.
 * Thin wrapper so the worker loop has a clean "claimer" abstraction.
 */
@Injectable()
export class JobClaimerService {
  constructor(private readonly jobQueue: JobQueueService) {}

  /** returns a job this worker's labels can run, or null if none pending. */
  async claimNext(workerId: string, labels: readonly string[]): Promise<ClaimedJob | null> {
    return this.jobQueue.claimNextJob(workerId, labels);
  }
}
