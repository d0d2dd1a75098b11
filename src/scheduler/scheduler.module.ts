import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';

import { GithubModule } from '../github/github.module.js';
import { PipelineModule } from '../pipeline/pipeline.module.js';
import { SchedulerService } from './scheduler.service.js';

@Module({
  imports: [ScheduleModule.forRoot(), GithubModule, PipelineModule],
  providers: [SchedulerService],
  exports: [SchedulerService],
})
export class SchedulerModule {}
