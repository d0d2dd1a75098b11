import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { ACTIVITY_CONFIG } from '../config/activity.config.js';
import type { ActivityConfig } from '../config/activity.config.js';
import { GRAPHQL_CLIENT } from './graphql-client.interface.js';
import type { GraphqlClient } from './graphql-client.interface.js';
import { OctokitGraphqlClient } from './octokit-graphql.client.js';
import { CachedGraphqlClient } from './cache/cached-graphql.client.js';
import { MemoryQueryCacheStore } from './cache/query-cache.memory.store.js';
import { QueryCacheEntry } from './cache/query-cache.entity.js';
import { QUERY_CACHE_STORE, type QueryCacheStore } from './cache/query-cache.store.js';
import { TypeOrmQueryCacheStore } from './cache/query-cache.typeorm.store.js';

function cacheStoreFactory(config: ActivityConfig, persisted: TypeOrmQueryCacheStore): QueryCacheStore | null {
  switch (config.cache.mode) {
    case 'off':
      return null;
    case 'memory':
      return new MemoryQueryCacheStore();
    case 'database':
      return persisted;
  }
}

function graphqlClientFactory(octokit: OctokitGraphqlClient, store: QueryCacheStore | null): GraphqlClient {
  return store ? new CachedGraphqlClient(octokit, store) : octokit;
}

@Module({
  imports: [TypeOrmModule.forFeature([QueryCacheEntry])],
  providers: [
    OctokitGraphqlClient,
    TypeOrmQueryCacheStore,
    {
      provide: QUERY_CACHE_STORE,
      useFactory: cacheStoreFactory,
      inject: [ACTIVITY_CONFIG, TypeOrmQueryCacheStore],
    },
    {
      provide: GRAPHQL_CLIENT,
      useFactory: graphqlClientFactory,
      inject: [OctokitGraphqlClient, QUERY_CACHE_STORE],
    },
  ],
  exports: [GRAPHQL_CLIENT, TypeOrmQueryCacheStore],
})
export class GithubModule {}
