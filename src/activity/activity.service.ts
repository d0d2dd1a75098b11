import { randomUUID } from 'crypto';
import { Injectable, Logger } from '@nestjs/common';

import type { RepositoryRef } from '../github/repository-ref.js';
import { InsufficientContentError } from './activity.errors.js';
import { ContinuationResolver, nextStartDate } from './continuation-resolver.js';
import { addDays, toIsoDate } from './dates.js';
import { RepositoryService } from './repository.service.js';
import type { ActivityReport, ActivityStats, ContinuationRecord, RepositoryInfo } from './types.js';
import { AdaptiveWindowController, assertSatisfied } from './window-controller.js';

export interface CollectOptions {
  /** overrides the start recovered from previous reports */
  startDate?: Date;
  /** discussion category holding previous reports; null skips continuation */
  category: string | null;
  signal?: AbortSignal;
}

export type CollectResult =
  | { status: 'ready'; report: ActivityReport }
  | {
      status: 'insufficient-content';
      repository: RepositoryInfo;
      window: { startDate: string; endDate: string };
      stats: ActivityStats;
      previousSummaries: ContinuationRecord[];
      reason: string;
    };

/** Continuation → adaptive window → classified items, for one repository. */
@Injectable()
export class ActivityService {
  private readonly logger = new Logger(ActivityService.name);

  constructor(
    private readonly repositories: RepositoryService,
    private readonly continuation: ContinuationResolver,
    private readonly windows: AdaptiveWindowController,
  ) {}

  async collect(ref: RepositoryRef, options: CollectOptions): Promise<CollectResult> {
    const repository = await this.repositories.resolve(ref);
    const previousSummaries = options.category
      ? await this.continuation.resolve(ref, options.category)
      : [];

    let start: Date;
    if (options.startDate) {
      start = options.startDate;
    } else {
      start = nextStartDate(previousSummaries, repository.createdAt);
      this.logger.log(
        previousSummaries.length > 0
          ? `Continuing after previous summary: ${toIsoDate(start)}`
          : `Starting at repository creation day: ${toIsoDate(start)}`,
      );
    }

    // pages are shared by this run's window steps and by no other run
    const cacheScope = randomUUID();
    this.logger.debug(`Collecting ${ref.owner}/${ref.name} in cache scope ${cacheScope}`);
    const outcome = await this.windows.expand(ref, start, { signal: options.signal, cacheScope });
    const window = { startDate: toIsoDate(outcome.window.start), endDate: toIsoDate(outcome.window.end) };

    try {
      assertSatisfied(outcome);
    } catch (error: unknown) {
      if (!(error instanceof InsufficientContentError)) throw error;
      this.logger.log(`${error.message}; no report produced`);
      return {
        status: 'insufficient-content',
        repository,
        window,
        stats: outcome.stats,
        previousSummaries,
        reason: error.message,
      };
    }

    return {
      status: 'ready',
      report: {
        repository,
        window: { ...window, lastDay: toIsoDate(addDays(outcome.window.end, -1)) },
        items: outcome.items,
        previousSummaries,
        stats: outcome.stats,
      },
    };
  }
}
