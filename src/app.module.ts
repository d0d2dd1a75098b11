// src/app.module.ts
import 'dotenv/config';
import { Module } from '@nestjs/common';
import { TypeOrmModule, type TypeOrmModuleOptions } from '@nestjs/typeorm';
import { APP_GUARD } from '@nestjs/core';

import { postgresOptions } from './database/data-source.js';
import { AppController } from './app.controller.js';
import { ApiKeyGuard } from './auth/api-key.guard.js';
import { ConfigModule } from './config/config.module.js';
import { ActivityModule } from './activity/activity.module.js';
import { ReportModule } from './report/report.module.js';
import { PipelineModule } from './pipeline/pipeline.module.js';
import { SchedulerModule } from './scheduler/scheduler.module.js';

function pgConfig(): TypeOrmModuleOptions {
  return {
    ...postgresOptions,
    autoLoadEntities: true,
    synchronize: false,
  };
}

@Module({
  imports: [
    ConfigModule,
    TypeOrmModule.forRoot(pgConfig()),
    ActivityModule,
    ReportModule,
    PipelineModule,
    SchedulerModule,
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ApiKeyGuard,
    },
  ],
})
export class AppModule {}
