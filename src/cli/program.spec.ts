import chalk from 'chalk';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CliIO, createProgram } from './program';

interface CapturedIO extends CliIO {
  stdout: string[];
  stderr: string[];
  exitCode: number | undefined;
}

function captureIO(): CapturedIO {
  const io: CapturedIO = {
    stdout: [],
    stderr: [],
    exitCode: undefined,
    out: (line) => io.stdout.push(line),
    err: (line) => io.stderr.push(line),
    setExitCode: (code) => {
      io.exitCode = code;
    },
    colors: new chalk.Instance({ level: 0 }),
  };
  return io;
}

// Steps run the node binary executing these tests.
const NODE = `"${process.execPath}"`;

const workflow = {
  name: 'test',
  on: { push: { branches: ['master', 'develop'] } },
  jobs: {
    test: {
      'runs-on': '${{ matrix.os }}',
      strategy: { matrix: { os: ['ubuntu-latest', 'windows-latest'] } },
      steps: [{ name: 'Test', run: 'cargo test' }],
    },
    build_redox: { enabled: false, 'runs-on': 'ubuntu-latest', steps: [{ run: 'cargo build' }] },
  },
};

describe('matrix-ci CLI', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'matrix-ci-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeWorkflow(document: unknown): Promise<string> {
    const file = join(dir, 'ci.yml');
    await writeFile(file, JSON.stringify(document), 'utf8');
    return file;
  }

  async function cli(io: CliIO, ...args: string[]): Promise<void> {
    await createProgram(io).parseAsync(['node', 'matrix-ci', ...args]);
  }

  it('validates a workflow file', async () => {
    const io = captureIO();
    await cli(io, 'validate', await writeWorkflow(workflow));

    expect(io.stdout).toEqual(['✓ test: 2 job variant(s), 2 job(s)']);
    expect(io.exitCode).toBeUndefined();
  });

  it('lists validation issues and exits with 1', async () => {
    const io = captureIO();
    const broken = { ...workflow, jobs: { test: { ...workflow.jobs.test, 'runs-on': '${{ matrix.platform }}' } } };
    await cli(io, 'validate', await writeWorkflow(broken));

    expect(io.stderr).toEqual(['Invalid workflow:', "  - jobs.test.runs-on: unknown matrix axis 'platform'"]);
    expect(io.exitCode).toBe(1);
  });

  it('plans the jobs of a triggering push', async () => {
    const io = captureIO();
    await cli(io, 'plan', await writeWorkflow(workflow), '--branch', 'develop');

    expect(io.stdout).toEqual([
      "test: 2 job(s) for a push to 'develop'",
      '  test-0  test (ubuntu-latest)  [ubuntu-latest]',
      '      1. Test',
      '  test-1  test (windows-latest)  [windows-latest]',
      '      1. Test',
      '  build_redox  (disabled)',
    ]);
  });

  it('plans nothing for other branches', async () => {
    const io = captureIO();
    await cli(io, 'plan', await writeWorkflow(workflow), '-b', 'feature/x');

    expect(io.stdout).toEqual(["Push to 'feature/x' does not trigger 'test' (branches: master, develop)"]);
    expect(io.exitCode).toBeUndefined();
  });

  it('refuses to run an unknown job', async () => {
    const io = captureIO();
    await cli(io, 'run', await writeWorkflow(workflow), '--branch', 'master', '--job', 'lint');

    expect(io.stderr).toEqual(["Unknown job 'lint'. Jobs: test, build_redox"]);
    expect(io.exitCode).toBe(1);
  });

  it('refuses to run a disabled job', async () => {
    const io = captureIO();
    await cli(io, 'run', await writeWorkflow(workflow), '--branch', 'master', '--job', 'build_redox');

    expect(io.stderr).toEqual(["Job 'build_redox' is disabled"]);
    expect(io.exitCode).toBe(1);
  });

  it('runs nothing for a push that does not trigger', async () => {
    const io = captureIO();
    await cli(io, 'run', await writeWorkflow(workflow), '--branch', 'feature/x');

    expect(io.stdout).toEqual(["Push to 'feature/x' does not trigger 'test' (branches: master, develop)"]);
    expect(io.exitCode).toBeUndefined();
  });

  it('fails jobs for runners this host does not serve and exits with 1', async () => {
    const io = captureIO();
    await cli(
      io,
      'run',
      await writeWorkflow(workflow),
      '--branch',
      'master',
      '--labels',
      'redox',
      '--workspace-root',
      join(dir, 'workspaces'),
    );

    expect(io.stdout).toEqual([
      '',
      '✗ test (ubuntu-latest) [ubuntu-latest] failed',
      '    - Test',
      "    No runner available for 'ubuntu-latest' (this host serves: redox)",
      '✗ test (windows-latest) [windows-latest] failed',
      '    - Test',
      "    No runner available for 'windows-latest' (this host serves: redox)",
      'FAILED: 0 succeeded, 2 failed, 0 skipped (2 total)',
    ]);
    expect(io.exitCode).toBe(1);
  });

  it('runs the steps of a job and prints a summary', async () => {
    const io = captureIO();
    const command = `${NODE} -e "console.log('built')"`;
    const local = {
      name: 'local',
      on: { push: { branches: ['master'] } },
      jobs: { build: { 'runs-on': 'local', steps: [{ name: 'Build', run: command }] } },
    };
    await cli(
      io,
      'run',
      await writeWorkflow(local),
      '--branch',
      'master',
      '--labels',
      'local',
      '--workspace-root',
      join(dir, 'workspaces'),
    );

    expect(io.stdout).toEqual([
      '[build] 1/1 Build',
      `[build] $ ${command}`,
      '[build] built',
      '',
      '✓ build [local] success',
      '    ✓ Build',
      'SUCCESS: 1 succeeded, 0 failed, 0 skipped (1 total)',
    ]);
    expect(io.exitCode).toBeUndefined();
  });
});
