import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { WorkflowValidationError } from './errors';
import { expandJobs } from './matrix-expander';
import { loadWorkflowFile, parseWorkflow, parseWorkflowYaml, safeParseWorkflow } from './workflow-parser';

const document = {
  name: 'test',
  on: { push: { branches: ['master', 'develop'] } },
  env: { RUST_BACKTRACE: 1 },
  jobs: {
    test: {
      name: 'Test on ${{ matrix.os }}',
      'runs-on': '${{ matrix.os }}',
      strategy: { matrix: { os: ['ubuntu-latest', 'windows-latest'] } },
      env: { TARGET_OS: '${{ matrix.os }}' },
      steps: [
        { uses: 'actions/checkout@v1' },
        { name: 'Test', run: 'cargo test --all' },
        { run: 'cargo build --example simple\ncargo build --example advanced', env: { PROFILE: 'release' } },
      ],
    },
    build_redox: {
      enabled: false,
      'runs-on': 'ubuntu-latest',
      steps: [{ kind: 'toolchain-setup', run: 'rustup target add x86_64-unknown-redox' }],
    },
  },
};

function withJob(job: Record<string, unknown>) {
  return { name: 'test', on: { push: { branches: ['master'] } }, jobs: { test: job } };
}

function issuesOf(doc: unknown): string[] {
  const result = safeParseWorkflow(doc);
  return result.ok ? [] : result.issues;
}

describe('parseWorkflow', () => {
  it('reads trigger branches and jobs in declaration order', () => {
    const workflow = parseWorkflow(document);

    expect(workflow.name).toBe('test');
    expect([...workflow.trigger.branches]).toEqual(['master', 'develop']);
    expect(workflow.jobs.map((job) => job.id)).toEqual(['test', 'build_redox']);
    expect(workflow.jobs[0].axes).toEqual([{ name: 'os', values: ['ubuntu-latest', 'windows-latest'] }]);
  });

  it('recognises checkout actions and names steps without a name', () => {
    const [test, redox] = parseWorkflow(document).jobs;

    expect(test.steps.map((step) => [step.name, step.kind])).toEqual([
      ['Checkout', 'checkout'],
      ['Test', 'shell'],
      ['Run cargo build --example simple', 'shell'],
    ]);
    expect(test.steps[0].run).toBe('');
    expect(redox.steps[0]).toMatchObject({ name: 'Run rustup target add x86_64-unknown-redox', kind: 'toolchain-setup' });
  });

  it('merges workflow, job and step env, the innermost winning', () => {
    const steps = parseWorkflow(document).jobs[0].steps;

    expect(steps[0].env).toEqual({ RUST_BACKTRACE: '1', TARGET_OS: '${{ matrix.os }}' });
    expect(steps[2].env).toEqual({ RUST_BACKTRACE: '1', TARGET_OS: '${{ matrix.os }}', PROFILE: 'release' });
  });

  it('keeps disabled variants without expanding them', () => {
    const workflow = parseWorkflow(document);
    expect(workflow.jobs[1].enabled).toBe(false);

    const specs = expandJobs(workflow.jobs);
    expect(specs.map((spec) => [spec.id, spec.name, spec.runsOn])).toEqual([
      ['test-0', 'Test on ubuntu-latest', 'ubuntu-latest'],
      ['test-1', 'Test on windows-latest', 'windows-latest'],
    ]);
    expect(specs[1].steps[0].env.TARGET_OS).toBe('windows-latest');
  });

  it('stringifies scalar matrix values', () => {
    const workflow = parseWorkflow(
      withJob({ 'runs-on': 'ubuntu-latest', strategy: { matrix: { node: [18, 20] } }, steps: [{ run: 'node -v' }] }),
    );
    expect(workflow.jobs[0].axes[0].values).toEqual(['18', '20']);
  });

  it('throws a WorkflowValidationError listing every issue', () => {
    const invalid = withJob({
      'runs-on': '${{ matrix.platform }}',
      strategy: { matrix: { os: ['a', 'a'] } },
      steps: [{ run: 'echo ${{ secrets.TOKEN }}' }, {}],
    });

    expect(() => parseWorkflow(invalid)).toThrow(WorkflowValidationError);
    expect(issuesOf(invalid)).toEqual([
      "jobs.test.strategy.matrix.os: duplicate value 'a'",
      "jobs.test.runs-on: unknown matrix axis 'platform'",
      "jobs.test.steps.0.run: unsupported expression '${{ secrets.TOKEN }}'",
      "jobs.test.steps.1: a step needs 'run' or 'uses'",
    ]);
  });

  it('only supports the checkout action', () => {
    expect(issuesOf(withJob({ 'runs-on': 'ubuntu-latest', steps: [{ uses: 'actions/setup-node@v4' }] }))).toEqual([
      "jobs.test.steps.0.uses: unsupported action 'actions/setup-node@v4'",
    ]);
    expect(
      issuesOf(withJob({ 'runs-on': 'ubuntu-latest', steps: [{ uses: 'actions/checkout@v4', run: 'ls' }] })),
    ).toEqual(["jobs.test.steps.0: a step takes either 'uses' or 'run', not both"]);
  });

  it('rejects jobs whose expanded ids collide', () => {
    const colliding = {
      name: 'test',
      on: { push: { branches: ['master'] } },
      jobs: {
        test: { 'runs-on': 'ubuntu-latest', strategy: { matrix: { os: ['a', 'b'] } }, steps: [{ run: 'true' }] },
        'test-0': { enabled: false, 'runs-on': 'ubuntu-latest', steps: [{ run: 'true' }] },
      },
    };

    expect(issuesOf(colliding)).toEqual(["jobs.test-0: job id 'test-0' is also produced by jobs.test"]);
  });

  it('reports schema problems with their path', () => {
    expect(issuesOf({ name: 'test', on: { push: { branches: [] } }, jobs: { test: document.jobs.test } })).toEqual([
      expect.stringMatching(/^on\.push\.branches: /),
    ]);
    expect(issuesOf({ name: 'test', on: { push: { branches: ['master'] } }, jobs: {} })).toEqual([
      'jobs: at least one job is required',
    ]);
  });
});

describe('parseWorkflowYaml', () => {
  const source = [
    'name: docs',
    'on:',
    '  push:',
    '    branches: [main]',
    'jobs:',
    '  build:',
    '    runs-on: ubuntu-latest',
    '    steps:',
    '      - uses: actions/checkout@v4',
    '      - run: npm ci',
    '',
  ].join('\n');

  it('parses YAML documents', () => {
    const workflow = parseWorkflowYaml(source);
    expect([...workflow.trigger.branches]).toEqual(['main']);
    expect(workflow.jobs[0].steps.map((step) => step.name)).toEqual(['Checkout', 'Run npm ci']);
  });

  it('turns YAML syntax errors into validation errors', () => {
    expect.assertions(2);
    try {
      parseWorkflowYaml('name: [unclosed');
    } catch (err) {
      expect(err).toBeInstanceOf(WorkflowValidationError);
      expect(err instanceof WorkflowValidationError && err.issues[0].startsWith('invalid YAML: ')).toBe(true);
    }
  });

  it('loads the sample workflow', async () => {
    const workflow = await loadWorkflowFile(join(__dirname, '..', '..', 'workflows', 'ci.yml'));

    expect(workflow.jobs.map((job) => [job.id, job.enabled])).toEqual([
      ['test', true],
      ['build_redox', false],
      ['build_macos', true],
    ]);
    expect(expandJobs(workflow.jobs).map((spec) => [spec.id, spec.name, spec.runsOn])).toEqual([
      ['test-0', 'Test on ubuntu-latest', 'ubuntu-latest'],
      ['test-1', 'Test on windows-latest', 'windows-latest'],
      ['build_macos', 'Test on macOS-latest', 'macOS-latest'],
    ]);
    expect(workflow.jobs[0].steps[1].env).toEqual({});
    expect(workflow.jobs[1].steps.map((step) => [step.name, step.kind])).toEqual([
      ['Checkout', 'checkout'],
      ['Set nightly default', 'toolchain-setup'],
      ['Update', 'toolchain-setup'],
      ['Install fuse', 'toolchain-setup'],
      ['Install redoxer', 'toolchain-setup'],
      ['Install redoxer toolchain', 'toolchain-setup'],
      ['Test', 'shell'],
    ]);
  });

  it('loads a workflow file from disk', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'workflow-parser-'));
    try {
      const file = join(dir, 'ci.yml');
      await writeFile(file, source, 'utf8');
      expect((await loadWorkflowFile(file)).name).toBe('docs');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
