import { CachedGraphqlClient, queryCacheKey } from '../cache/cached-graphql.client.js';
import { MemoryQueryCacheStore } from '../cache/query-cache.memory.store.js';
import type { QueryCacheStore } from '../cache/query-cache.store.js';
import { CATEGORY_DISCUSSIONS, CREATE_DISCUSSION, REPOSITORY_INFO } from '../queries.js';
import { FakeGraphqlClient } from './fake-graphql.client.js';

const repositoryInfo = {
  repository: { id: 'R_1', name: 'octo-repo', nameWithOwner: 'octo-org/octo-repo', createdAt: '2023-05-05T12:00:00Z' },
};

const run = { cacheScope: 'run-1' };

describe('queryCacheKey', () => {
  it('does not depend on variable order', () => {
    expect(queryCacheKey('run-1', REPOSITORY_INFO, { owner: 'octo-org', name: 'octo-repo' })).toBe(
      queryCacheKey('run-1', REPOSITORY_INFO, { name: 'octo-repo', owner: 'octo-org' }),
    );
  });

  it('differs for different variables', () => {
    expect(queryCacheKey('run-1', REPOSITORY_INFO, { owner: 'octo-org', name: 'a' })).not.toBe(
      queryCacheKey('run-1', REPOSITORY_INFO, { owner: 'octo-org', name: 'b' }),
    );
  });

  it('differs for different scopes', () => {
    expect(queryCacheKey('run-1', REPOSITORY_INFO, { owner: 'octo-org', name: 'a' })).not.toBe(
      queryCacheKey('run-2', REPOSITORY_INFO, { owner: 'octo-org', name: 'a' }),
    );
  });
});

describe('CachedGraphqlClient', () => {
  it('answers a repeated query in the same scope from the cache', async () => {
    const inner = new FakeGraphqlClient().on('RepositoryInfo', () => repositoryInfo);
    const client = new CachedGraphqlClient(inner, new MemoryQueryCacheStore());

    const first = await client.execute(REPOSITORY_INFO, { owner: 'octo-org', name: 'octo-repo' }, run);
    const second = await client.execute(REPOSITORY_INFO, { name: 'octo-repo', owner: 'octo-org' }, run);

    expect(second).toEqual(first);
    expect(inner.calls).toHaveLength(1);
    expect(client.stats()).toEqual({ hits: 1, misses: 1 });
  });

  it('asks the API again in a new scope', async () => {
    let name = 'octo-repo';
    const inner = new FakeGraphqlClient().on('RepositoryInfo', () => ({
      repository: { ...repositoryInfo.repository, name },
    }));
    const client = new CachedGraphqlClient(inner, new MemoryQueryCacheStore());
    const variables = { owner: 'octo-org', name: 'octo-repo' };

    await client.execute(REPOSITORY_INFO, variables, { cacheScope: 'run-1' });
    name = 'octo-renamed';
    const later = await client.execute(REPOSITORY_INFO, variables, { cacheScope: 'run-2' });

    expect(later).toEqual({ repository: { ...repositoryInfo.repository, name: 'octo-renamed' } });
    expect(inner.calls).toHaveLength(2);
  });

  it('does not cache calls made without a scope', async () => {
    const inner = new FakeGraphqlClient().on('RepositoryInfo', () => repositoryInfo);
    const store = new MemoryQueryCacheStore();
    const client = new CachedGraphqlClient(inner, store);

    await client.execute(REPOSITORY_INFO, { owner: 'octo-org', name: 'octo-repo' });
    await client.execute(REPOSITORY_INFO, { owner: 'octo-org', name: 'octo-repo' });

    expect(inner.calls).toHaveLength(2);
    expect(store.size).toBe(0);
  });

  it('never caches volatile queries', async () => {
    const inner = new FakeGraphqlClient().on('CategoryDiscussions', () => ({ repository: { discussions: { nodes: [] } } }));
    const store = new MemoryQueryCacheStore();
    const client = new CachedGraphqlClient(inner, store);
    const variables = { owner: 'octo-org', name: 'octo-repo', categoryId: 'DIC_news', count: 3 };

    await client.execute(CATEGORY_DISCUSSIONS, variables, run);
    await client.execute(CATEGORY_DISCUSSIONS, variables, run);

    expect(inner.calls).toHaveLength(2);
    expect(store.size).toBe(0);
  });

  it('never caches mutations', async () => {
    const inner = new FakeGraphqlClient().on('CreateDiscussion', () => ({
      createDiscussion: { discussion: { id: 'D_1', url: 'https://github.com/octo-org/octo-repo/discussions/9' } },
    }));
    const store = new MemoryQueryCacheStore();
    const client = new CachedGraphqlClient(inner, store);
    const variables = { input: { repositoryId: 'R_1', categoryId: 'DIC_1', title: 't', body: 'b' } };

    await client.execute(CREATE_DISCUSSION, variables, run);
    await client.execute(CREATE_DISCUSSION, variables, run);

    expect(inner.calls).toHaveLength(2);
    expect(store.size).toBe(0);
  });

  it('falls through to the API when the store fails', async () => {
    const failing: QueryCacheStore = {
      get: () => Promise.reject(new Error('connection refused')),
      set: () => Promise.reject(new Error('connection refused')),
    };
    const inner = new FakeGraphqlClient().on('RepositoryInfo', () => repositoryInfo);
    const client = new CachedGraphqlClient(inner, failing);

    await expect(client.execute(REPOSITORY_INFO, { owner: 'octo-org', name: 'octo-repo' }, run)).resolves.toEqual(
      repositoryInfo,
    );
    expect(inner.calls).toHaveLength(1);
  });
});

describe('MemoryQueryCacheStore', () => {
  it('evicts the least recently used entry', async () => {
    const store = new MemoryQueryCacheStore(2);
    await store.set('a', 'Op', 1);
    await store.set('b', 'Op', 2);
    await store.get('a');
    await store.set('c', 'Op', 3);

    expect(await store.get('b')).toBeUndefined();
    expect(await store.get('a')).toBe(1);
    expect(await store.get('c')).toBe(3);
    expect(store.size).toBe(2);
  });
});
