import { Inject, Injectable, Logger } from '@nestjs/common';

import { ACTIVITY_CONFIG } from '../config/activity.config.js';
import type { ActivityConfig } from '../config/activity.config.js';
import {
  GRAPHQL_CLIENT,
  QueryError,
  type ExecuteOptions,
  type GraphqlClient,
  type QueryDescriptor,
  type QueryVariables,
} from '../github/graphql-client.interface.js';
import type {
  Connection,
  DiscussionNode,
  DiscussionPageResponse,
  IssueNode,
  IssuePageResponse,
  PageInfo,
  PullRequestNode,
  PullRequestPageResponse,
  ReleaseNode,
  ReleasePageResponse,
} from '../github/graphql.types.js';
import {
  DISCUSSION_PAGE,
  ISSUE_PAGE,
  PULL_REQUEST_PAGE,
  RELEASE_PAGE,
} from '../github/queries.js';
import type { RepositoryRef } from '../github/repository-ref.js';
import { ParseError } from './activity.errors.js';
import { before } from './dates.js';
import {
  mapDiscussion,
  mapIssue,
  mapPullRequest,
  mapRelease,
  type SkipHandler,
} from './mappers.js';
import { isPublishedSummary } from './summary-footer.js';
import type { Item, ItemKind } from './types.js';

type NodeOutcome = { item: Item; ownSummary: boolean } | { error: ParseError };

interface CategoryPage {
  pageInfo: PageInfo;
  nodes: NodeOutcome[];
}

interface CategorySource {
  category: ItemKind;
  query: QueryDescriptor;
  /** null when the repository vanished from the response */
  fetchPage(
    client: GraphqlClient,
    variables: QueryVariables,
    onSkip: SkipHandler,
    options: ExecuteOptions,
  ): Promise<CategoryPage | null>;
}

function source<R, N>(
  category: ItemKind,
  query: QueryDescriptor,
  select: (response: R) => Connection<N> | undefined,
  toItem: (node: N, onSkip: SkipHandler) => Item,
  isOwnSummary: (node: N) => boolean = () => false,
): CategorySource {
  return {
    category,
    query,
    async fetchPage(client, variables, onSkip, options) {
      const connection = select(await client.execute<R>(query, variables, options));
      if (!connection) return null;
      return {
        pageInfo: connection.pageInfo,
        nodes: connection.nodes.map((node): NodeOutcome => {
          try {
            return { item: toItem(node, onSkip), ownSummary: isOwnSummary(node) };
          } catch (error: unknown) {
            if (error instanceof ParseError) return { error };
            throw error;
          }
        }),
      };
    },
  };
}

/** Pull requests, issues, releases, discussions; also the merge order of the output. */
export const CATEGORY_SOURCES: readonly CategorySource[] = [
  source<PullRequestPageResponse, PullRequestNode>(
    'pull_request', PULL_REQUEST_PAGE, (r) => r.repository?.pullRequests, mapPullRequest,
  ),
  source<IssuePageResponse, IssueNode>(
    'issue', ISSUE_PAGE, (r) => r.repository?.issues, mapIssue,
  ),
  source<ReleasePageResponse, ReleaseNode>(
    'release', RELEASE_PAGE, (r) => r.repository?.releases, (n) => mapRelease(n),
  ),
  source<DiscussionPageResponse, DiscussionNode>(
    'discussion', DISCUSSION_PAGE, (r) => r.repository?.discussions, mapDiscussion,
    // our own earlier reports are not activity to report on
    (n) => isPublishedSummary(n.body),
  ),
];

/** Pagination state of one category, replaced (never mutated) each round. */
export interface CategoryCursor {
  readonly category: ItemKind;
  readonly after: string | null;
  readonly active: boolean;
  readonly pages: number;
  readonly failed: boolean;
}

export function initialCursor(category: ItemKind): CategoryCursor {
  return { category, after: null, active: true, pages: 0, failed: false };
}

export interface FetchOptions {
  signal?: AbortSignal;
  /** pages are memoized among fetches that share this scope */
  cacheScope?: string;
}

export interface FetchResult {
  items: Item[];
  rounds: number;
  cursors: CategoryCursor[];
}

function itemKey(item: Item): string {
  return item.kind === 'release' ? `release:${item.url}` : `${item.kind}:${item.number}`;
}

/**
 * Pages through every category newest-first, one page per active category
 * per round, until each category hits the horizon or runs out of pages.
 */
@Injectable()
export class ActivityStreamFetcher {
  private readonly logger = new Logger(ActivityStreamFetcher.name);

  constructor(
    @Inject(GRAPHQL_CLIENT) private readonly client: GraphqlClient,
    @Inject(ACTIVITY_CONFIG) private readonly config: ActivityConfig,
  ) {}

  async fetchItems(repo: RepositoryRef, horizon: Date, options: FetchOptions = {}): Promise<FetchResult> {
    const sources = new Map(CATEGORY_SOURCES.map((s): [ItemKind, CategorySource] => [s.category, s]));
    const collected = new Map(CATEGORY_SOURCES.map((s): [ItemKind, Item[]] => [s.category, []]));
    let cursors = CATEGORY_SOURCES.map((s) => initialCursor(s.category));
    let rounds = 0;

    while (cursors.some((c) => c.active)) {
      options.signal?.throwIfAborted();
      rounds++;

      const next: CategoryCursor[] = [];
      for (const cursor of cursors) {
        const src = sources.get(cursor.category);
        if (!cursor.active || !src) {
          next.push(cursor);
          continue;
        }
        const { cursor: advanced, items } = await this.fetchRound(src, cursor, repo, horizon, options);
        collected.get(cursor.category)?.push(...items);
        next.push(advanced);
        this.logger.debug(`Round ${rounds}: ${items.length} ${cursor.category} items`);
      }
      cursors = next;
    }

    const seen = new Set<string>();
    const merged: Item[] = [];
    for (const { category } of CATEGORY_SOURCES) {
      for (const item of collected.get(category) ?? []) {
        const key = itemKey(item);
        if (seen.has(key)) continue;
        seen.add(key);
        merged.push(item);
      }
    }

    // stable: equal timestamps keep per-category order
    merged.sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
    return { items: merged, rounds, cursors };
  }

  private async fetchRound(
    src: CategorySource,
    cursor: CategoryCursor,
    repo: RepositoryRef,
    horizon: Date,
    options: FetchOptions,
  ): Promise<{ cursor: CategoryCursor; items: Item[] }> {
    const variables: QueryVariables = {
      owner: repo.owner,
      name: repo.name,
      first: this.config.github.pageSize,
      after: cursor.after,
    };
    const onSkip: SkipHandler = (error, where) =>
      this.logger.warn(`Skipping a nested record of ${where}: ${error.message}`);

    let page: CategoryPage | null;
    try {
      page = await src.fetchPage(this.client, variables, onSkip, { cacheScope: options.cacheScope });
    } catch (error: unknown) {
      if (!(error instanceof QueryError)) throw error;
      this.logger.warn(`⚠️ ${src.category} pagination stopped after ${cursor.pages} pages: ${error.message}`);
      return { cursor: { ...cursor, active: false, failed: true }, items: [] };
    }
    if (!page) {
      this.logger.warn(`⚠️ ${src.category}: repository ${repo.owner}/${repo.name} missing from response`);
      return { cursor: { ...cursor, active: false, failed: true }, items: [] };
    }

    const items: Item[] = [];
    let reachedHorizon = false;
    for (const node of page.nodes) {
      if ('error' in node) {
        this.logger.warn(`Skipping a ${src.category}: ${node.error.message}`);
        continue;
      }
      // releases mirror createdAt into updatedAt
      if (before(node.item.updatedAt, horizon)) {
        reachedHorizon = true;
        break;
      }
      if (!node.ownSummary) items.push(node.item);
    }

    return {
      cursor: {
        ...cursor,
        after: page.pageInfo.endCursor,
        pages: cursor.pages + 1,
        active: !reachedHorizon && page.pageInfo.hasNextPage,
      },
      items,
    };
  }
}
