import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';
import { EnvironmentProvisionError } from '../workflow/errors';
import { defaultRunnerLabels, LocalProvisioner, parseRunnerLabels } from './local-provisioner';

describe('runner labels', () => {
  it('derives labels from the platform', () => {
    expect(defaultRunnerLabels('linux')).toEqual(['ubuntu-latest', 'linux']);
    expect(defaultRunnerLabels('win32')).toEqual(['windows-latest', 'windows']);
    expect(defaultRunnerLabels('darwin')).toEqual(['macos-latest', 'macos']);
    expect(defaultRunnerLabels('aix')).toEqual(['aix']);
  });

  it('parses a configured list and falls back to the platform defaults', () => {
    expect(parseRunnerLabels(' Ubuntu-Latest , ,linux')).toEqual(['ubuntu-latest', 'linux']);
    expect(parseRunnerLabels(undefined, 'win32')).toEqual(['windows-latest', 'windows']);
    expect(parseRunnerLabels(' , ', 'darwin')).toEqual(['macos-latest', 'macos']);
  });
});

describe('LocalProvisioner', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'local-provisioner-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('creates a fresh workspace per job and removes it on release', async () => {
    const provisioner = new LocalProvisioner({ labels: ['ubuntu-latest', 'linux'], workspaceRoot: join(root, 'jobs') });
    const first = await provisioner.provision({ jobId: 'test-0', runsOn: 'ubuntu-latest' });
    const second = await provisioner.provision({ jobId: 'test-0', runsOn: 'ubuntu-latest' });

    expect(first.workspace).not.toBe(second.workspace);
    expect(dirname(first.workspace)).toBe(join(root, 'jobs'));
    expect(basename(first.workspace).startsWith('test-0-')).toBe(true);
    expect((await stat(first.workspace)).isDirectory()).toBe(true);
    expect(first.variables).toEqual({
      CI: 'true',
      MATRIX_CI: 'true',
      MATRIX_CI_JOB: 'test-0',
      MATRIX_CI_RUNNER: 'ubuntu-latest',
      MATRIX_CI_WORKSPACE: first.workspace,
    });

    await provisioner.release(first);
    await expect(stat(first.workspace)).rejects.toThrow();
    await provisioner.release(second);
  });

  it('compares labels case-insensitively', async () => {
    const provisioner = new LocalProvisioner({ labels: ['macos-latest'], workspaceRoot: root });
    expect(provisioner.supports('macOS-latest')).toBe(true);

    const environment = await provisioner.provision({ jobId: 'build_macos', runsOn: 'macOS-latest' });
    expect(environment.runsOn).toBe('macOS-latest');
    await provisioner.release(environment);
  });

  it('refuses labels it does not serve', async () => {
    const provisioner = new LocalProvisioner({ labels: ['ubuntu-latest', 'linux'], workspaceRoot: root });
    const attempt = provisioner.provision({ jobId: 'test-1', runsOn: 'windows-latest' });

    await expect(attempt).rejects.toBeInstanceOf(EnvironmentProvisionError);
    await expect(attempt).rejects.toThrow("No runner available for 'windows-latest' (this host serves: ubuntu-latest, linux)");
  });

  it('keeps workspaces when asked to', async () => {
    const provisioner = new LocalProvisioner({ labels: ['linux'], workspaceRoot: root, keepWorkspaces: true });
    const environment = await provisioner.provision({ jobId: 'keep', runsOn: 'linux' });
    await provisioner.release(environment);
    expect((await stat(environment.workspace)).isDirectory()).toBe(true);
  });

  it('sanitises job ids used as workspace prefixes', async () => {
    const provisioner = new LocalProvisioner({ labels: ['linux'], workspaceRoot: root });
    const environment = await provisioner.provision({ jobId: 'a/b c', runsOn: 'linux' });
    expect(basename(environment.workspace).startsWith('a_b_c-')).toBe(true);
    await provisioner.release(environment);
  });
});
