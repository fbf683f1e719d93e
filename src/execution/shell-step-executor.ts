import { Injectable } from '@nestjs/common';
import { spawn } from 'node:child_process';
import type {
  Environment,
  OutputHandler,
  StepExecutor,
  StepOutcome,
} from '../runner/runner.types';
import type { StepDefinition } from '../workflow/workflow.types';
import { createLineBuffer } from './line-buffer';

interface SpawnPlan {
  command: string;
  args: string[];
  shell: boolean;
}

/**
 * Runs steps as child processes inside the job's workspace. Checkout steps
 * clone the job's source; every other kind is handed to the shell as is.
 * stdout and stderr are forwarded line by line.
 */
@Injectable()
export class ShellStepExecutor implements StepExecutor {
  async runStep(environment: Environment, step: StepDefinition, onOutput: OutputHandler): Promise<StepOutcome> {
    if (step.kind === 'checkout') {
      return this.checkout(environment, step, onOutput);
    }

    onOutput(`$ ${step.run}`, 'stdout');
    return this.spawnStreaming({ command: step.run, args: [], shell: true }, environment, step, onOutput);
  }

  private async checkout(environment: Environment, step: StepDefinition, onOutput: OutputHandler): Promise<StepOutcome> {
    const source = environment.checkout;
    if (!source) {
      onOutput('No checkout source configured for this job', 'stderr');
      return { exitCode: 1 };
    }

    onOutput(`Cloning ${source.repository}`, 'stdout');
    const clone = await this.spawnStreaming(
      { command: 'git', args: ['clone', '--quiet', source.repository, '.'], shell: false },
      environment,
      step,
      onOutput,
    );
    const target = source.commit ?? source.ref;
    if (clone.exitCode !== 0 || !target) return clone;

    onOutput(`Checking out ${target}`, 'stdout');
    return this.spawnStreaming(
      { command: 'git', args: ['checkout', '--quiet', target], shell: false },
      environment,
      step,
      onOutput,
    );
  }

  private spawnStreaming(
    plan: SpawnPlan,
    environment: Environment,
    step: StepDefinition,
    onOutput: OutputHandler,
  ): Promise<StepOutcome> {
    return new Promise<StepOutcome>((resolve) => {
      let settled = false;
      const stdoutBuffer = createLineBuffer((line) => onOutput(line, 'stdout'));
      const stderrBuffer = createLineBuffer((line) => onOutput(line, 'stderr'));

      const settle = (exitCode: number) => {
        if (settled) return;
        settled = true;
        // Flush any partial line that didn't end in \n
        stdoutBuffer.flush();
        stderrBuffer.flush();
        resolve({ exitCode });
      };

      const child = spawn(plan.command, plan.args, {
        cwd: environment.workspace,
        shell: plan.shell,
        env: { ...process.env, ...environment.variables, ...step.env },
      });

      child.stdout?.on('data', (buf: Buffer) => stdoutBuffer.write(buf.toString('utf8')));
      child.stderr?.on('data', (buf: Buffer) => stderrBuffer.write(buf.toString('utf8')));

      child.on('close', (code) => settle(code ?? 1));
      child.on('error', (err) => {
        onOutput(`Execution error: ${err.message}`, 'stderr');
        settle(1);
      });
    });
  }
}
