import { Module } from '@nestjs/common';
import { RunsController } from './runs.controller';
import { RunsService } from './runs.service';
import { PipelinesModule } from '../pipelines/pipelines.module';
import { QueueModule } from '../../queue/queue.module';
import { LogsModule } from '../../logs/logs.module';

@Module({
  imports: [PipelinesModule, QueueModule, LogsModule],
  controllers: [RunsController],
  providers: [RunsService],
  exports: [RunsService],
})
export class RunsModule {}
