import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { PipelinesModule } from './api/pipelines/pipelines.module';
import { RunsModule } from './api/runs/runs.module';
import { WebhooksModule } from './api/webhooks/webhooks.module';
import { WorkerModule } from './worker/worker.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    DatabaseModule,
    PipelinesModule,
    RunsModule,
    WebhooksModule,
    WorkerModule,
  ],
})
export class AppModule {}
