import { ApiProperty } from '@nestjs/swagger';

export const WORKFLOW_EXAMPLE = {
  name: 'CI',
  on: { push: { branches: ['master', 'develop'] } },
  jobs: {
    test: {
      'runs-on': '${{ matrix.os }}',
      strategy: { matrix: { os: ['ubuntu-latest', 'windows-latest'] } },
      steps: [{ uses: 'actions/checkout@v4' }, { name: 'Test', run: 'npm test' }],
    },
  },
};

export class CreatePipelineDto {
  @ApiProperty({ example: 'widgets' })
  name!: string;

  @ApiProperty({
    example: 'https://github.com/example/widgets.git',
    description: 'Must match what your git webhook sends; also the checkout source',
  })
  repository!: string;

  @ApiProperty({
    description: 'Workflow document (trigger, jobs, matrix, steps). Stored in pipelines.config (jsonb).',
    example: WORKFLOW_EXAMPLE,
  })
  config!: Record<string, unknown>;
}
