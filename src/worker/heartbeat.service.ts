import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppEnv } from '../config/env.validation';
import { JobQueueService } from '../queue/job-queue.service';

const DEFAULT_RECLAIM_INTERVAL_MS = 15_000;

/**
 * Heartbeat: workers call tick(jobId) while running a job; the reclaim loop
 * fails jobs whose worker went quiet (failure kind `worker_lost`). Jobs are
 * never put back in the queue.
 */
@Injectable()
export class HeartbeatService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(HeartbeatService.name);
  private reclaimTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly jobQueue: JobQueueService,
    private readonly config: ConfigService<AppEnv, true>,
  ) {}

  get intervalMs(): number {
    return this.config.get('HEARTBEAT_INTERVAL_MS', { infer: true });
  }

  onModuleInit(): void {
    this.startReclaimLoop(DEFAULT_RECLAIM_INTERVAL_MS, this.config.get('HEARTBEAT_TIMEOUT_SECONDS', { infer: true }));
  }

  onModuleDestroy(): void {
    this.stopReclaimLoop();
  }

  /** Keeps heartbeat_at fresh so the job is not failed as stuck. */
  async tick(jobId: string): Promise<void> {
    await this.jobQueue.updateHeartbeat(jobId);
  }

  async runReclaimOnce(timeoutSeconds: number): Promise<string[]> {
    const lost = await this.jobQueue.failStuckJobs(timeoutSeconds);
    if (lost.length > 0) {
      this.logger.warn(`Failed ${lost.length} job(s) without heartbeat for ${timeoutSeconds}s: ${lost.join(', ')}`);
    }
    return lost;
  }

  startReclaimLoop(intervalMs: number, timeoutSeconds: number): void {
    this.stopReclaimLoop();
    this.reclaimTimer = setInterval(() => {
      this.runReclaimOnce(timeoutSeconds).catch((err: unknown) => {
        // next interval retries
        this.logger.warn(`Reclaim failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    }, intervalMs);
  }

  stopReclaimLoop(): void {
    if (this.reclaimTimer) {
      clearInterval(this.reclaimTimer);
      this.reclaimTimer = null;
    }
  }
}
