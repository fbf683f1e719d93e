import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class TriggerRunDto {
  @ApiProperty({ description: 'Pipeline id to run' })
  pipelineId!: string;

  @ApiPropertyOptional({ description: "Trigger type (default: 'manual')", example: 'manual' })
  triggerType?: string;

  @ApiPropertyOptional({ description: 'Branch to check out; the trigger branch filter is not applied', example: 'master' })
  branch?: string;

  @ApiPropertyOptional({ description: 'Commit to check out', example: '9fceb02d0ae598e95dc970b74767f19372d61af8' })
  commit?: string;

  @ApiPropertyOptional({
    description: 'Arbitrary metadata stored as pipeline_runs.trigger_metadata (jsonb)',
    example: { requested_by: 'release-bot' },
  })
  trigger_metadata?: Record<string, unknown>;
}
