import { loadActivityConfig } from '../../config/activity.config.js';
import { CachedGraphqlClient } from '../../github/cache/cached-graphql.client.js';
import { MemoryQueryCacheStore } from '../../github/cache/query-cache.memory.store.js';
import { QueryError } from '../../github/graphql-client.interface.js';
import {
  FakeGraphqlClient,
  connection,
  discussionNode,
  issueNode,
  prNode,
  releaseNode,
  serveRepositoryPages,
} from '../../github/__tests__/fake-graphql.client.js';
import { appendSummaryFooter } from '../summary-footer.js';
import { ActivityStreamFetcher } from '../stream-fetcher.js';
import type { Item } from '../types.js';
import { day } from './items.js';

const repo = { owner: 'octo-org', name: 'octo-repo' };
const config = loadActivityConfig({ GITHUB_TOKEN: 'test-token', PAGE_SIZE: '2' });

const keys = (items: Item[]) =>
  items.map((i) => (i.kind === 'release' ? `release:${i.tagName}` : `${i.kind}:${i.number}`));

describe('ActivityStreamFetcher', () => {
  it('requests one page per active category per round', async () => {
    const fake = serveRepositoryPages(new FakeGraphqlClient(), {
      issues: [issueNode({ number: 20, updatedAt: '2024-01-05T10:00:00Z' })],
    }).on('PullRequestPage', ({ after }) =>
      after === null
        ? {
            repository: {
              pullRequests: connection(
                [prNode({ number: 11, updatedAt: '2024-01-06T10:00:00Z' })],
                'pr-cursor-1',
                true,
              ),
            },
          }
        : {
            repository: {
              pullRequests: connection([prNode({ number: 10, updatedAt: '2024-01-04T10:00:00Z' })]),
            },
          },
    );

    const result = await new ActivityStreamFetcher(fake, config).fetchItems(repo, day('2024-01-01'));

    expect(fake.calls.map((c) => c.name)).toEqual([
      'PullRequestPage',
      'IssuePage',
      'ReleasePage',
      'DiscussionPage',
      'PullRequestPage',
    ]);
    expect(fake.callsTo('PullRequestPage')[1]).toEqual({
      owner: 'octo-org',
      name: 'octo-repo',
      first: 2,
      after: 'pr-cursor-1',
    });
    expect(result.rounds).toBe(2);
    expect(keys(result.items)).toEqual(['pull_request:11', 'issue:20', 'pull_request:10']);
  });

  it('stops a category at the first item older than the horizon', async () => {
    const fake = serveRepositoryPages(new FakeGraphqlClient(), {}).on('PullRequestPage', () => ({
      repository: {
        pullRequests: connection(
          [
            prNode({ number: 3, updatedAt: '2024-01-03T10:00:00Z' }),
            prNode({ number: 2, updatedAt: '2023-12-31T23:59:59Z' }),
            prNode({ number: 1, updatedAt: '2024-01-02T10:00:00Z' }),
          ],
          'more',
          true,
        ),
      },
    }));

    const result = await new ActivityStreamFetcher(fake, config).fetchItems(repo, day('2024-01-01'));

    expect(keys(result.items)).toEqual(['pull_request:3']);
    expect(fake.callsTo('PullRequestPage')).toHaveLength(1);
    expect(result.cursors[0]).toEqual({
      category: 'pull_request',
      after: 'more',
      active: false,
      pages: 1,
      failed: false,
    });
  });

  it('uses the creation time of releases against the horizon', async () => {
    const fake = serveRepositoryPages(new FakeGraphqlClient(), {
      releases: [
        releaseNode({ tagName: 'v2.0.0', createdAt: '2024-01-03T10:00:00Z' }),
        releaseNode({ tagName: 'v1.0.0', createdAt: '2023-06-01T10:00:00Z' }),
      ],
    });

    const result = await new ActivityStreamFetcher(fake, config).fetchItems(repo, day('2024-01-01'));
    expect(keys(result.items)).toEqual(['release:v2.0.0']);
  });

  it('keeps the other categories when one category fails', async () => {
    const fake = serveRepositoryPages(new FakeGraphqlClient(), {
      pullRequests: [prNode({ number: 5, updatedAt: '2024-01-05T10:00:00Z' })],
      discussions: [discussionNode({ number: 7, updatedAt: '2024-01-04T10:00:00Z' })],
    }).on('IssuePage', () => {
      throw new QueryError('IssuePage', 'Bad gateway', 'transport', 502);
    });

    const result = await new ActivityStreamFetcher(fake, config).fetchItems(repo, day('2024-01-01'));

    expect(keys(result.items)).toEqual(['pull_request:5', 'discussion:7']);
    expect(result.cursors.find((c) => c.category === 'issue')).toEqual({
      category: 'issue',
      after: null,
      active: false,
      pages: 0,
      failed: true,
    });
  });

  it('does not swallow errors that are not query errors', async () => {
    const fake = serveRepositoryPages(new FakeGraphqlClient(), {}).on('ReleasePage', () => {
      throw new TypeError('boom');
    });

    await expect(
      new ActivityStreamFetcher(fake, config).fetchItems(repo, day('2024-01-01')),
    ).rejects.toThrow('boom');
  });

  it('returns each item once when it shows up on two pages', async () => {
    const fake = serveRepositoryPages(new FakeGraphqlClient(), {}).on('PullRequestPage', ({ after }) => ({
      repository: {
        pullRequests:
          after === null
            ? connection([prNode({ number: 8, title: 'first copy', updatedAt: '2024-01-06T10:00:00Z' })], 'c1', true)
            : connection([prNode({ number: 8, title: 'second copy', updatedAt: '2024-01-06T09:00:00Z' })]),
      },
    }));

    const result = await new ActivityStreamFetcher(fake, config).fetchItems(repo, day('2024-01-01'));

    expect(result.items).toHaveLength(1);
    expect(result.items[0]?.title).toBe('first copy');
  });

  it('leaves out its own published summaries', async () => {
    const summary = appendSummaryFooter('Busy week.', {
      end_date: '2024-01-07',
      powered_by: 'repo-activity-digest v1.0.0',
    });
    const fake = serveRepositoryPages(new FakeGraphqlClient(), {
      discussions: [
        discussionNode({ number: 40, updatedAt: '2024-01-08T09:00:00Z', body: summary }),
        discussionNode({ number: 41, updatedAt: '2024-01-08T08:00:00Z', body: 'Should we ship a CLI?' }),
      ],
    });

    const result = await new ActivityStreamFetcher(fake, config).fetchItems(repo, day('2024-01-01'));
    expect(keys(result.items)).toEqual(['discussion:41']);
  });

  it('sorts by update time, keeping category order on ties', async () => {
    const fake = serveRepositoryPages(new FakeGraphqlClient(), {
      pullRequests: [prNode({ number: 1, updatedAt: '2024-01-03T10:00:00Z' })],
      issues: [
        issueNode({ number: 2, updatedAt: '2024-01-05T10:00:00Z' }),
        issueNode({ number: 4, updatedAt: '2024-01-03T10:00:00Z' }),
      ],
      discussions: [discussionNode({ number: 3, updatedAt: '2024-01-03T10:00:00Z' })],
    });

    const result = await new ActivityStreamFetcher(fake, config).fetchItems(repo, day('2024-01-01'));
    expect(keys(result.items)).toEqual(['issue:2', 'pull_request:1', 'issue:4', 'discussion:3']);
  });

  it('skips items with an unreadable timestamp', async () => {
    const fake = serveRepositoryPages(new FakeGraphqlClient(), {
      issues: [
        issueNode({ number: 9, updatedAt: 'yesterday' }),
        issueNode({ number: 10, updatedAt: '2024-01-04T10:00:00Z' }),
      ],
    });

    const result = await new ActivityStreamFetcher(fake, config).fetchItems(repo, day('2024-01-01'));
    expect(keys(result.items)).toEqual(['issue:10']);
  });

  it('stops between rounds once aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fake = serveRepositoryPages(new FakeGraphqlClient(), {});

    await expect(
      new ActivityStreamFetcher(fake, config).fetchItems(repo, day('2024-01-01'), { signal: controller.signal }),
    ).rejects.toThrow();
    expect(fake.calls).toHaveLength(0);
  });

  describe('behind the query cache', () => {
    function cachedFetcher() {
      const pullRequests = [prNode({ number: 1, updatedAt: '2024-01-03T10:00:00Z' })];
      const fake = serveRepositoryPages(new FakeGraphqlClient(), { pullRequests });
      const fetcher = new ActivityStreamFetcher(new CachedGraphqlClient(fake, new MemoryQueryCacheStore()), config);
      return { fetcher, fake, pullRequests };
    }

    it('reuses pages within one scope', async () => {
      const { fetcher, fake } = cachedFetcher();

      await fetcher.fetchItems(repo, day('2024-01-01'), { cacheScope: 'run-1' });
      await fetcher.fetchItems(repo, day('2024-01-01'), { cacheScope: 'run-1' });

      expect(fake.callsTo('PullRequestPage')).toHaveLength(1);
    });

    it('sees items created since an earlier scope', async () => {
      const { fetcher, pullRequests } = cachedFetcher();

      const first = await fetcher.fetchItems(repo, day('2024-01-01'), { cacheScope: 'run-1' });
      pullRequests.unshift(prNode({ number: 2, updatedAt: '2024-01-07T10:00:00Z' }));
      const second = await fetcher.fetchItems(repo, day('2024-01-01'), { cacheScope: 'run-2' });

      expect(keys(first.items)).toEqual(['pull_request:1']);
      expect(keys(second.items)).toEqual(['pull_request:2', 'pull_request:1']);
    });
  });
});
