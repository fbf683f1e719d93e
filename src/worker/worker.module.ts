import { Module } from '@nestjs/common';
import { ExecutionModule } from '../execution/execution.module';
import { LogsModule } from '../logs/logs.module';
import { QueueModule } from '../queue/queue.module';
import { HeartbeatService } from './heartbeat.service';
import { JobClaimerService } from './job-claimer.service';
import { JobExecutorService } from './job-executor.service';
import { WorkerService } from './worker.service';

@Module({
  imports: [ExecutionModule, LogsModule, QueueModule],
  providers: [HeartbeatService, JobExecutorService, JobClaimerService, WorkerService],
  exports: [HeartbeatService],
})
export class WorkerModule {}
