import { ApiPropertyOptional } from '@nestjs/swagger';
import { WORKFLOW_EXAMPLE } from './create-pipeline.dto';

export class UpdatePipelineDto {
  @ApiPropertyOptional({ example: 'widgets' })
  name?: string;

  @ApiPropertyOptional({ example: 'https://github.com/example/widgets.git' })
  repository?: string;

  @ApiPropertyOptional({
    description: 'Workflow document, validated before it is stored in pipelines.config (jsonb).',
    example: WORKFLOW_EXAMPLE,
  })
  config?: Record<string, unknown>;
}
