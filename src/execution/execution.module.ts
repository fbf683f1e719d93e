import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppEnv } from '../config/env.validation';
import { PROVISIONER, STEP_EXECUTOR } from './execution.tokens';
import { LocalProvisioner, parseRunnerLabels } from './local-provisioner';
import { ShellStepExecutor } from './shell-step-executor';

/**
 * Execution environment for workers: jobs run on this host, in a temporary
 * workspace each, for the runner labels the worker is configured with.
 */
@Module({
  providers: [
    {
      provide: PROVISIONER,
      useFactory: (config: ConfigService<AppEnv, true>) =>
        new LocalProvisioner({
          labels: parseRunnerLabels(config.get('WORKER_LABELS', { infer: true })),
          workspaceRoot: config.get('WORKSPACE_ROOT', { infer: true }),
        }),
      inject: [ConfigService],
    },
    { provide: STEP_EXECUTOR, useClass: ShellStepExecutor },
  ],
  exports: [PROVISIONER, STEP_EXECUTOR],
})
export class ExecutionModule {}
