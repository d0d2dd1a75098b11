import { Body, Controller, Get, HttpCode, NotFoundException, Post, Query } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiQuery, ApiSecurity, ApiTags } from '@nestjs/swagger';

import { RepositoryNotFoundError } from '../activity/activity.errors.js';
import { PreviewSummaryDto, RunSummaryDto } from './dto/run-summary.dto.js';
import { PipelineService, type PreviewOutcome, type RunOutcome } from './pipeline.service.js';
import type { SummaryRun } from './summary-run.entity.js';

async function orNotFound<T>(work: Promise<T>): Promise<T> {
  try {
    return await work;
  } catch (error: unknown) {
    if (error instanceof RepositoryNotFoundError) throw new NotFoundException(error.message);
    throw error;
  }
}

@ApiTags('pipeline')
@ApiSecurity('X-API-Key')
@Controller('pipeline')
export class PipelineController {
  constructor(private readonly pipeline: PipelineService) {}

  @Post('run')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Collect activity since the last published summary, summarize it and post it as a discussion',
  })
  @ApiBody({ type: RunSummaryDto })
  run(@Body() body: RunSummaryDto): Promise<RunOutcome> {
    return orNotFound(this.pipeline.runAndRecord(body, 'api'));
  }

  @Post('preview')
  @HttpCode(200)
  @ApiOperation({ summary: 'Build the activity report without calling the LLM or publishing' })
  @ApiBody({ type: PreviewSummaryDto })
  preview(@Body() body: PreviewSummaryDto): Promise<PreviewOutcome> {
    return orNotFound(this.pipeline.preview(body.repository, body.startDate));
  }

  @Get('runs')
  @ApiOperation({ summary: 'List recent summary runs, newest first' })
  @ApiQuery({ name: 'repository', required: false, example: 'octo-org/octo-repo' })
  listRuns(@Query('repository') repository?: string): Promise<SummaryRun[]> {
    return this.pipeline.listRuns(repository);
  }
}
