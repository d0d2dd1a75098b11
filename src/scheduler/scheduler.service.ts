import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';

import { ACTIVITY_CONFIG } from '../config/activity.config.js';
import type { ActivityConfig } from '../config/activity.config.js';
import { TypeOrmQueryCacheStore } from '../github/cache/query-cache.typeorm.store.js';
import { PipelineService, type RunOutcome } from '../pipeline/pipeline.service.js';

export interface ScheduledResult {
  repository: string;
  status: RunOutcome['status'] | 'failed';
  error?: string;
}

@Injectable()
export class SchedulerService {
  private readonly logger = new Logger(SchedulerService.name);
  private running = false;

  constructor(
    private readonly pipelineService: PipelineService,
    private readonly cacheStore: TypeOrmQueryCacheStore,
    @Inject(ACTIVITY_CONFIG) private readonly config: ActivityConfig,
  ) {}

  // Mondays 00:00 UTC, right after the week closes
  @Cron('0 0 * * 1', { name: 'weekly-summaries', timeZone: 'UTC' })
  async handleWeeklySummaries(): Promise<void> {
    if (this.running) {
      this.logger.warn('Previous summary run still in progress; skipping this tick');
      return;
    }
    this.running = true;
    try {
      await this.summarizeAll();
      if (this.config.cache.mode === 'database') {
        const purged = await this.cacheStore.purgeExpired();
        this.logger.log(`Purged ${purged} expired query cache entries`);
      }
    } catch (error: unknown) {
      this.logger.error('Weekly summary run failed', error instanceof Error ? error.stack : String(error));
    } finally {
      this.running = false;
    }
  }

  /** One repository at a time; a failure is recorded and the next one still runs. */
  async summarizeAll(repositories = this.config.summaries.repositories): Promise<ScheduledResult[]> {
    if (repositories.length === 0) {
      this.logger.log('SUMMARY_REPOSITORIES is empty; nothing to summarize');
      return [];
    }
    this.logger.log(`Summarizing ${repositories.length} repositories...`);

    const results: ScheduledResult[] = [];
    for (const repository of repositories) {
      results.push(await this.summarizeRepository(repository));
    }

    const failed = results.filter((r) => r.status === 'failed').length;
    this.logger.log(`Summary run complete: ${results.length - failed} succeeded, ${failed} failed`);
    return results;
  }

  async summarizeRepository(repository: string): Promise<ScheduledResult> {
    try {
      const outcome = await this.pipelineService.runAndRecord({ repository }, 'cron');
      this.logger.log(`${repository}: ${outcome.status}`);
      return { repository, status: outcome.status };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`❌ ${repository}: ${message}`);
      return { repository, status: 'failed', error: message };
    }
  }
}
