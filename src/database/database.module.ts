import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import type { AppEnv } from '../config/env.validation';
import { Pipeline, PipelineRun, Job, JobStep, JobLog } from './entities';
import { DatabaseSeedService } from './database-seed.service';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (config: ConfigService<AppEnv, true>) => ({
        type: 'postgres',
        url: config.get('DATABASE_URL', { infer: true }),
        entities: [Pipeline, PipelineRun, Job, JobStep, JobLog],
        // Only one process should synchronize the database (workers run with SYNC_DATABASE=false)
        synchronize: config.get('SYNC_DATABASE', { infer: true }) === 'true',
      }),
      inject: [ConfigService],
    }),
  ],
  providers: [DatabaseSeedService],
})
export class DatabaseModule {}
