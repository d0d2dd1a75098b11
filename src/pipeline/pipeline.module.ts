import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { ActivityModule } from '../activity/activity.module.js';
import { ReportModule } from '../report/report.module.js';
import { PipelineController } from './pipeline.controller.js';
import { PipelineService } from './pipeline.service.js';
import { SummaryRun } from './summary-run.entity.js';
import { SummaryRunRepo } from './summary-run.repo.js';

@Module({
  imports: [TypeOrmModule.forFeature([SummaryRun]), ActivityModule, ReportModule],
  controllers: [PipelineController],
  providers: [PipelineService, SummaryRunRepo],
  exports: [PipelineService],
})
export class PipelineModule {}
