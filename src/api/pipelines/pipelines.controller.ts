import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  BadRequestException,
  NotFoundException,
} from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { PipelinesService } from './pipelines.service';
import { CreatePipelineDto } from '../../dto/create-pipeline.dto';
import { UpdatePipelineDto } from '../../dto/update-pipeline.dto';
import { expandJobs } from '../../workflow/matrix-expander';
import { matchesTrigger } from '../../workflow/trigger-rule';
import { safeParseWorkflow } from '../../workflow/workflow-parser';

@ApiTags('pipelines')
@Controller('pipelines')
export class PipelinesController {
  constructor(private readonly pipelinesService: PipelinesService) {}

  @Get()
  @ApiOperation({ summary: 'List pipelines' })
  async findAll() {
    return this.pipelinesService.findAll();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one pipeline' })
  async findOne(@Param('id') id: string) {
    const pipeline = await this.pipelinesService.findOne(id);
    if (!pipeline) throw new NotFoundException('Pipeline not found');
    return pipeline;
  }

  // Dry run: what a push to `branch` would enqueue
  @Get(':id/plan')
  @ApiOperation({ summary: 'Show the jobs a push to a branch would run' })
  @ApiQuery({ name: 'branch', example: 'master' })
  async plan(@Param('id') id: string, @Query('branch') branch?: string) {
    if (!branch) throw new BadRequestException('branch is required');
    const pipeline = await this.pipelinesService.findOne(id);
    if (!pipeline) throw new NotFoundException('Pipeline not found');

    const parsed = safeParseWorkflow(pipeline.config);
    if (!parsed.ok) {
      throw new BadRequestException({ message: 'Pipeline config is not a valid workflow', issues: parsed.issues });
    }
    const activated = matchesTrigger(parsed.workflow.trigger, { type: 'push', branch });
    return { branch, activated, jobs: activated ? expandJobs(parsed.workflow.jobs) : [] };
  }

  @Post()
  @ApiOperation({ summary: 'Create a pipeline' })
  async create(@Body() dto: CreatePipelineDto) {
    this.assertValidConfig(dto.config);
    return this.pipelinesService.create(dto);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a pipeline' })
  async update(@Param('id') id: string, @Body() dto: UpdatePipelineDto) {
    const pipeline = await this.pipelinesService.findOne(id);
    if (!pipeline) throw new NotFoundException('Pipeline not found');
    if (dto.config !== undefined) this.assertValidConfig(dto.config);
    return this.pipelinesService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a pipeline' })
  async remove(@Param('id') id: string) {
    try {
      await this.pipelinesService.remove(id);
    } catch {
      throw new NotFoundException('Pipeline not found');
    }
  }

  private assertValidConfig(config: Record<string, unknown>): void {
    const issues = this.pipelinesService.validateConfig(config);
    if (issues.length > 0) {
      throw new BadRequestException({ message: 'Pipeline config is not a valid workflow', issues });
    }
  }
}
