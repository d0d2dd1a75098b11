import { Injectable, Logger } from '@nestjs/common';

import type { RepositoryRef } from '../github/repository-ref.js';
import { countActivities, decompose } from './activity-decomposer.js';
import { toIsoDate } from './dates.js';
import { shouldInclude } from './item-classifier.js';
import { ActivityStreamFetcher, type FetchOptions } from './stream-fetcher.js';
import type { ActivityStats, ClassifiedItem, Item, Window } from './types.js';

export interface AggregateResult {
  items: ClassifiedItem[];
  stats: ActivityStats;
}

export function classifyItems(items: Item[], window: Window): ClassifiedItem[] {
  return items
    .filter((item) => shouldInclude(item, window))
    .map((item) => ({ item, activities: decompose(item, window) }));
}

export function statsOf(items: ClassifiedItem[]): ActivityStats {
  return {
    items: items.length,
    comments: countActivities(items, 'comment'),
    commits: countActivities(items, 'commit'),
  };
}

/** One full fetch + classify + decompose pass over a window. */
@Injectable()
export class ActivityAggregator {
  private readonly logger = new Logger(ActivityAggregator.name);

  constructor(private readonly fetcher: ActivityStreamFetcher) {}

  async aggregate(repo: RepositoryRef, window: Window, options: FetchOptions = {}): Promise<AggregateResult> {
    const started = Date.now();
    const { items: fetched, rounds } = await this.fetcher.fetchItems(repo, window.start, options);
    const items = classifyItems(fetched, window);
    const stats = statsOf(items);

    this.logger.log(
      `On ${toIsoDate(window.start)}..${toIsoDate(window.end)} found ${stats.items} ` +
        `PRs/issues/releases/discussions, ${stats.comments} comments and ${stats.commits} commits ` +
        `(${fetched.length} fetched in ${rounds} rounds, ${Date.now() - started}ms)`,
    );
    return { items, stats };
  }
}
