import { Controller, Post, Body, BadRequestException, NotFoundException } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { PipelinesService } from '../pipelines/pipelines.service';
import { RunsService } from '../runs/runs.service';
import { getRepoFromPayload, toPushEvent } from './push-payload';

@Controller('webhooks/git')
@ApiTags('webhooks')
export class GitWebhookController {
  constructor(
    private readonly pipelinesService: PipelinesService,
    private readonly runsService: RunsService,
  ) {}

  /**
   * Receive Git push webhook (GitHub, GitLab, or any POST with repo/repository).
   * Resolves pipeline by repository; a run is only created when the pushed
   * branch is one of the workflow's trigger branches.
   */
  @Post('push')
  @ApiOperation({ summary: 'Receive a git push webhook and trigger a run' })
  @ApiBody({
    description:
      'GitHub/GitLab push payload. We derive repo from repo/repository/project fields, the branch from branch or ref (refs/heads/...), and store the full body in trigger_metadata.',
    schema: { type: 'object', additionalProperties: true },
  })
  async handlePush(@Body() body: Record<string, unknown>) {
    const repo = getRepoFromPayload(body);
    if (!repo) {
      throw new BadRequestException(
        'Missing repo. Send repo, repository.full_name, repository.clone_url, or project.path_with_namespace',
      );
    }

    const pipeline = await this.pipelinesService.findByRepository(repo);
    if (!pipeline) {
      throw new NotFoundException(`No pipeline found for repository: ${repo}`);
    }

    const event = toPushEvent(body, repo);
    if (!event) {
      return { triggered: false, pipelineId: pipeline.id, reason: 'Not a branch push' };
    }

    const outcome = await this.runsService.triggerFromPush(pipeline, event, body);
    if (!outcome.triggered) {
      return { triggered: false, pipelineId: pipeline.id, branch: outcome.branch, reason: outcome.reason };
    }
    return {
      triggered: true,
      runId: outcome.run.id,
      pipelineId: pipeline.id,
      status: outcome.run.status,
      jobs: outcome.jobCount,
    };
  }
}
