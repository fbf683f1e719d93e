import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Pipeline } from '../../database/entities/pipeline.entity';
import { PipelineRun } from '../../database/entities/pipeline-run.entity';
import { safeParseWorkflow } from '../../workflow/workflow-parser';

export interface PipelineRunInput {
  triggerType: string;
  triggerMetadata: Record<string, unknown> | null;
  branch: string | null;
  commit: string | null;
}

@Injectable()
export class PipelinesService {
  constructor(private readonly dataSource: DataSource) {}

  private get repo() {
    return this.dataSource.getRepository(Pipeline);
  }

  async findAll(): Promise<Pipeline[]> {
    return this.repo.find({ order: { created_at: 'DESC' } });
  }

  async findOne(id: string): Promise<Pipeline | null> {
    return this.repo.findOne({ where: { id } });
  }

  async findByRepository(repo: string): Promise<Pipeline | null> {
    return this.repo.findOne({ where: { repository: repo } });
  }

  /** Problems with a workflow document; empty when it can be stored. */
  validateConfig(config: Record<string, unknown>): string[] {
    const parsed = safeParseWorkflow(config);
    return parsed.ok ? [] : parsed.issues;
  }

  async create(dto: {
    name: string;
    repository: string;
    config: Record<string, unknown>;
  }): Promise<Pipeline> {
    const pipeline = this.repo.create(dto);
    return this.repo.save(pipeline);
  }

  async update(
    id: string,
    dto: Partial<{ name: string; repository: string; config: Record<string, unknown> }>,
  ): Promise<Pipeline> {
    const pipeline = await this.repo.findOne({ where: { id } });
    if (!pipeline) throw new Error('Pipeline not found');
    Object.assign(pipeline, dto);
    return this.repo.save(pipeline);
  }

  async remove(id: string): Promise<void> {
    const result = await this.repo.delete(id);
    if (result.affected === 0) throw new Error('Pipeline not found');
  }

  async createPipelineRun(pipelineId: string, input: PipelineRunInput): Promise<PipelineRun> {
    const result: PipelineRun[] = await this.dataSource.query(
      `
      INSERT INTO pipeline_runs (pipeline_id, trigger_type, trigger_metadata, branch, commit_sha, status)
      VALUES ($1, $2, $3, $4, $5, 'pending')
      RETURNING *
      `,
      [pipelineId, input.triggerType, input.triggerMetadata ?? {}, input.branch, input.commit],
    );
    return result[0];
  }

  /** A run whose workflow expanded into zero jobs succeeds on the spot. */
  async completeRunWithoutJobs(runId: string): Promise<void> {
    await this.dataSource.query(
      `
      UPDATE pipeline_runs
      SET status = 'success',
          started_at = NOW(),
          completed_at = NOW()
      WHERE id = $1
      `,
      [runId],
    );
  }
}
