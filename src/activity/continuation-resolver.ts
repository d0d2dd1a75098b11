import { Inject, Injectable, Logger } from '@nestjs/common';

import { ACTIVITY_CONFIG } from '../config/activity.config.js';
import type { ActivityConfig } from '../config/activity.config.js';
import {
  GRAPHQL_CLIENT,
  QueryError,
  type GraphqlClient,
} from '../github/graphql-client.interface.js';
import type {
  CategoryDiscussionsResponse,
  DiscussionCategoriesResponse,
} from '../github/graphql.types.js';
import { CATEGORY_DISCUSSIONS, DISCUSSION_CATEGORIES } from '../github/queries.js';
import type { RepositoryRef } from '../github/repository-ref.js';
import { ParseError } from './activity.errors.js';
import { addDays, parseIsoDate, startOfUtcDay } from './dates.js';
import { extractSummaryFooter, stripSummaryFooter } from './summary-footer.js';
import type { ContinuationRecord } from './types.js';

export interface PublishedPost {
  title: string;
  body: string;
}

export interface ParsedPosts {
  records: ContinuationRecord[];
  skipped: Array<{ title: string; error: ParseError }>;
}

/** Newest first by end date; posts without a readable footer are skipped. */
export function parseContinuationRecords(posts: PublishedPost[], count: number): ParsedPosts {
  const records: ContinuationRecord[] = [];
  const skipped: ParsedPosts['skipped'] = [];

  for (const post of posts) {
    const body = post.body.replace(/\r\n/g, '\n');
    try {
      const footer = extractSummaryFooter(body);
      records.push({
        endDate: footer.end_date,
        startDate: footer.start_date ?? null,
        title: post.title,
        summaryText: body,
        llm: footer.llm ?? null,
      });
    } catch (error: unknown) {
      if (!(error instanceof ParseError)) throw error;
      skipped.push({ title: post.title, error });
    }
  }

  records.sort((a, b) => (a.endDate < b.endDate ? 1 : a.endDate > b.endDate ? -1 : 0));
  return { records: records.slice(0, count), skipped };
}

/** Day after the newest report, or the repository's creation day when there is none. */
export function nextStartDate(records: ContinuationRecord[], repositoryCreatedAt: Date): Date {
  const newest = records[0];
  if (!newest) return startOfUtcDay(repositoryCreatedAt);
  return addDays(parseIsoDate('continuation.endDate', newest.endDate), 1);
}

/** Title plus body, footer removed, ready for the prompt. */
export function previousSummaryTexts(records: ContinuationRecord[]): string[] {
  return records.map((r) => `${r.title}\n\n${stripSummaryFooter(r.summaryText)}`);
}

@Injectable()
export class ContinuationResolver {
  private readonly logger = new Logger(ContinuationResolver.name);

  constructor(
    @Inject(GRAPHQL_CLIENT) private readonly client: GraphqlClient,
    @Inject(ACTIVITY_CONFIG) private readonly config: ActivityConfig,
  ) {}

  async findCategoryId(repo: RepositoryRef, category: string): Promise<string | null> {
    const result = await this.client.execute<DiscussionCategoriesResponse>(DISCUSSION_CATEGORIES, {
      owner: repo.owner,
      name: repo.name,
    });
    const wanted = category.toLowerCase();
    const match = result.repository?.discussionCategories.nodes.find(
      (c) => c.name.toLowerCase() === wanted,
    );
    return match?.id ?? null;
  }

  /**
   * Reads the newest published reports of a discussion category. Resolved on
   * every run, so edited or deleted posts take effect immediately.
   */
  async resolve(
    repo: RepositoryRef,
    category: string,
    count = this.config.summaries.previousCount,
  ): Promise<ContinuationRecord[]> {
    let categoryId: string | null;
    try {
      categoryId = await this.findCategoryId(repo, category);
    } catch (error: unknown) {
      if (!(error instanceof QueryError) || !error.isNotFound) throw error;
      categoryId = null;
    }
    if (!categoryId) {
      this.logger.warn(`Discussion category "${category}" not found in ${repo.owner}/${repo.name}; no previous summaries`);
      return [];
    }

    const result = await this.client.execute<CategoryDiscussionsResponse>(CATEGORY_DISCUSSIONS, {
      owner: repo.owner,
      name: repo.name,
      categoryId,
      count,
    });
    const posts = result.repository?.discussions.nodes ?? [];
    const { records, skipped } = parseContinuationRecords(posts, count);

    for (const { title, error } of skipped) {
      this.logger.debug(`Ignoring discussion "${title}": ${error.message}`);
    }
    if (records[0]) {
      this.logger.log(`Newest previous summary "${records[0].title}" ends on ${records[0].endDate}`);
    }
    return records;
  }
}
