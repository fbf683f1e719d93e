import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { EnvironmentProvisionError } from '../workflow/errors';
import type { Environment, ProvisionRequest, Provisioner } from '../runner/runner.types';

const PLATFORM_LABELS: Partial<Record<NodeJS.Platform, string[]>> = {
  linux: ['ubuntu-latest', 'linux'],
  win32: ['windows-latest', 'windows'],
  darwin: ['macos-latest', 'macos'],
};

/** Runner labels this host can serve when none are configured. */
export function defaultRunnerLabels(platform: NodeJS.Platform = process.platform): string[] {
  return PLATFORM_LABELS[platform] ?? [platform];
}

/** Comma-separated label list, lower-cased; falls back to the host defaults. */
export function parseRunnerLabels(value: string | undefined, platform?: NodeJS.Platform): string[] {
  const labels = (value ?? '')
    .split(',')
    .map((label) => label.trim().toLowerCase())
    .filter((label) => label.length > 0);
  return labels.length > 0 ? labels : defaultRunnerLabels(platform);
}

export interface LocalProvisionerOptions {
  labels: readonly string[];
  workspaceRoot: string;
  /** Leave workspaces on disk after the job, for debugging. */
  keepWorkspaces?: boolean;
}

/**
 * Provisions jobs on the current host: one fresh temporary workspace per
 * job. Labels are compared case-insensitively, so `macOS-latest` and
 * `macos-latest` are the same runner.
 */
export class LocalProvisioner implements Provisioner {
  private readonly labels: ReadonlySet<string>;

  constructor(private readonly options: LocalProvisionerOptions) {
    this.labels = new Set(options.labels.map((label) => label.toLowerCase()));
  }

  get supportedLabels(): string[] {
    return [...this.labels];
  }

  supports(runsOn: string): boolean {
    return this.labels.has(runsOn.toLowerCase());
  }

  async provision(request: ProvisionRequest): Promise<Environment> {
    if (!this.supports(request.runsOn)) {
      throw new EnvironmentProvisionError(
        request.runsOn,
        `No runner available for '${request.runsOn}' (this host serves: ${this.supportedLabels.join(', ')})`,
      );
    }

    let workspace: string;
    try {
      await mkdir(this.options.workspaceRoot, { recursive: true });
      workspace = await mkdtemp(join(this.options.workspaceRoot, `${workspacePrefix(request.jobId)}-`));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new EnvironmentProvisionError(request.runsOn, `Could not create a workspace: ${reason}`);
    }

    return {
      id: basename(workspace),
      runsOn: request.runsOn,
      workspace,
      checkout: request.checkout,
      variables: {
        CI: 'true',
        MATRIX_CI: 'true',
        MATRIX_CI_JOB: request.jobId,
        MATRIX_CI_RUNNER: request.runsOn,
        MATRIX_CI_WORKSPACE: workspace,
      },
    };
  }

  async release(environment: Environment): Promise<void> {
    if (this.options.keepWorkspaces) return;
    await rm(environment.workspace, { recursive: true, force: true });
  }
}

function workspacePrefix(jobId: string): string {
  return jobId.replace(/[^A-Za-z0-9_.-]/g, '_');
}
