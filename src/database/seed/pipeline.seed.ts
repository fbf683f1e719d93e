import { Pipeline } from '../entities/pipeline.entity';

/**
 * Example pipelines inserted on first app start when no pipelines exist.
 */
export const PIPELINE_SEED: Partial<Pipeline>[] = [
  {
    name: 'widgets',
    repository: 'https://github.com/example/widgets.git',
    config: {
      name: 'test',
      on: { push: { branches: ['master', 'develop'] } },
      jobs: {
        test: {
          name: 'Test on ${{ matrix.os }}',
          'runs-on': '${{ matrix.os }}',
          strategy: { matrix: { os: ['ubuntu-latest', 'windows-latest'] } },
          steps: [
            { uses: 'actions/checkout@v1' },
            { name: 'Test', run: 'cargo test --lib --all --verbose' },
            { name: 'Test example', run: 'cargo build --example widgets --verbose' },
          ],
        },
        build_redox: {
          name: 'Test on Redox OS',
          'runs-on': 'ubuntu-latest',
          enabled: false,
          steps: [
            { uses: 'actions/checkout@v1' },
            { name: 'Set nightly default', kind: 'toolchain-setup', run: 'rustup default nightly' },
            { name: 'Update', kind: 'toolchain-setup', run: 'sudo apt update' },
            { name: 'Install fuse', kind: 'toolchain-setup', run: 'sudo apt install libfuse-dev' },
            { name: 'Install redoxer', kind: 'toolchain-setup', run: 'cargo +nightly install redoxer' },
            { name: 'Install redoxer toolchain', kind: 'toolchain-setup', run: 'redoxer install' },
            { name: 'Test', run: 'redoxer test --lib --all' },
          ],
        },
        build_macos: {
          name: 'Test on macOS-latest',
          'runs-on': 'macOS-latest',
          steps: [
            { uses: 'actions/checkout@v1' },
            { name: 'Install rust', kind: 'toolchain-setup', run: 'brew install rust' },
            { name: 'Test', run: 'cargo test --lib --all --verbose' },
          ],
        },
      },
    },
  },
  {
    name: 'docs',
    repository: 'https://github.com/example/docs.git',
    config: {
      name: 'docs',
      on: { push: { branches: ['main'] } },
      jobs: {
        build: {
          'runs-on': 'ubuntu-latest',
          steps: [
            { uses: 'actions/checkout@v1' },
            { name: 'Install', run: 'npm ci' },
            { name: 'Build', run: 'npm run build' },
          ],
        },
      },
    },
  },
];
