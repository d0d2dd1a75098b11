import { Inject, Injectable, Logger } from '@nestjs/common';

import { ACTIVITY_CONFIG, CLOCK } from '../config/activity.config.js';
import type { ActivityConfig, Clock, WindowPolicy } from '../config/activity.config.js';
import type { RepositoryRef } from '../github/repository-ref.js';
import { InsufficientContentError } from './activity.errors.js';
import { ActivityAggregator } from './activity-aggregator.js';
import { addDays, before, minDate, startOfUtcDay, toIsoDate } from './dates.js';
import type { FetchOptions } from './stream-fetcher.js';
import type { ActivityStats, ClassifiedItem, Window } from './types.js';

export type WindowState = 'SATISFIED' | 'EXHAUSTED';

export interface WindowOutcome {
  state: WindowState;
  window: Window;
  items: ClassifiedItem[];
  stats: ActivityStats;
  /** every end date tried, in order */
  endDates: Date[];
}

export function haveEnoughContent(stats: ActivityStats, policy: WindowPolicy): boolean {
  return stats.items >= policy.minItems && stats.comments + stats.commits >= policy.minActivities;
}

export function assertSatisfied(outcome: WindowOutcome): asserts outcome is WindowOutcome & { state: 'SATISFIED' } {
  if (outcome.state === 'EXHAUSTED') {
    const { stats } = outcome;
    throw new InsufficientContentError(outcome.window, stats.items, stats.comments + stats.commits);
  }
}

/**
 * Grows `[start, end)` by a fixed step until there is enough content or the
 * end reaches today. Every step classifies the whole range again; within one
 * run the pages come back from the query cache scope.
 */
@Injectable()
export class AdaptiveWindowController {
  private readonly logger = new Logger(AdaptiveWindowController.name);

  constructor(
    private readonly aggregator: ActivityAggregator,
    @Inject(ACTIVITY_CONFIG) private readonly config: ActivityConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async expand(repo: RepositoryRef, startDate: Date, options: FetchOptions = {}): Promise<WindowOutcome> {
    const policy = this.config.window;
    const start = startOfUtcDay(startDate);
    const today = startOfUtcDay(this.clock());

    let end = start;
    let items: ClassifiedItem[] = [];
    let stats: ActivityStats = { items: 0, comments: 0, commits: 0 };
    const endDates: Date[] = [];

    while (!haveEnoughContent(stats, policy) && before(end, today)) {
      end = minDate(today, addDays(end, policy.stepDays));
      endDates.push(end);
      ({ items, stats } = await this.aggregator.aggregate(repo, { start, end }, options));
      this.logger.debug(
        `Window ${toIsoDate(start)}..${toIsoDate(end)}: ${stats.items} items, ` +
          `${stats.comments + stats.commits} comments/commits`,
      );
    }

    const state: WindowState = haveEnoughContent(stats, policy) ? 'SATISFIED' : 'EXHAUSTED';
    if (state === 'EXHAUSTED') {
      this.logger.log(`Not enough content between ${toIsoDate(start)} and ${toIsoDate(end)}`);
    }
    return { state, window: { start, end }, items, stats, endDates };
  }
}
