import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import type { AppEnv } from '../config/env.validation';
import { parseRunnerLabels } from '../execution/local-provisioner';
import { JobClaimerService } from './job-claimer.service';
import { JobExecutorService } from './job-executor.service';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Worker main loop (RUN_WORKER_LOOP=true only):
 * - claim the next pending job whose runs-on is one of this worker's labels
 * - execute it (persists steps, logs and final status, heartbeats meanwhile)
 * - when no job is available, sleep WORKER_POLL_MS
 *
 * A job that crashes the executor keeps its running status; it stops
 * heart-beating and the reclaim loop fails it as `worker_lost`.
 */
@Injectable()
export class WorkerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(WorkerService.name);
  private abort = new AbortController();
  private loopPromise: Promise<void> | null = null;

  readonly workerId: string;
  readonly labels: string[];

  constructor(
    private readonly claimer: JobClaimerService,
    private readonly executor: JobExecutorService,
    private readonly config: ConfigService<AppEnv, true>,
  ) {
    this.workerId =
      config.get('WORKER_ID', { infer: true }) ?? process.env.HOSTNAME ?? `worker-${randomUUID().slice(0, 8)}`;
    this.labels = parseRunnerLabels(config.get('WORKER_LABELS', { infer: true }));
  }

  onModuleInit(): void {
    if (this.config.get('RUN_WORKER_LOOP', { infer: true }) !== 'true') return;
    this.logger.log(`Worker ${this.workerId} serving: ${this.labels.join(', ')}`);
    this.loopPromise = this.runLoop();
  }

  async onModuleDestroy(): Promise<void> {
    this.abort.abort();
    if (this.loopPromise) {
      await Promise.race([this.loopPromise, sleep(2000)]);
    }
  }

  /** Claim and run at most one job. Returns whether a job was found. */
  async processNext(): Promise<boolean> {
    const job = await this.claimer.claimNext(this.workerId, this.labels);
    if (!job) return false;

    try {
      const result = await this.executor.execute(job, this.workerId);
      this.logger.log(`Job ${job.name} (${job.id}) finished: ${result.status}`);
    } catch (err) {
      this.logger.error(`Job ${job.name} (${job.id}) crashed: ${err instanceof Error ? err.message : String(err)}`);
    }
    return true;
  }

  private async runLoop(): Promise<void> {
    const pollMs = this.config.get('WORKER_POLL_MS', { infer: true });

    while (!this.abort.signal.aborted) {
      try {
        if (await this.processNext()) continue;
        await sleep(pollMs);
      } catch (err) {
        if (this.abort.signal.aborted) return;
        this.logger.warn(`Claim failed: ${err instanceof Error ? err.message : String(err)}`);
        await sleep(pollMs);
      }
    }
  }
}
