import { Module } from '@nestjs/common';
import { JobLogService } from './job-log.service';

@Module({
  providers: [JobLogService],
  exports: [JobLogService],
})
export class LogsModule {}
