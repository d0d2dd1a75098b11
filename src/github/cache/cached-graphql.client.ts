import { createHash } from 'crypto';
import { Logger } from '@nestjs/common';

import type {
  ExecuteOptions,
  GraphqlClient,
  QueryDescriptor,
  QueryVariables,
} from '../graphql-client.interface.js';
import type { QueryCacheStore } from './query-cache.store.js';

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`;
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/** Scope, exact query text, and variables serialized with sorted keys. */
export function queryCacheKey(scope: string, query: QueryDescriptor, variables: QueryVariables): string {
  return createHash('sha256')
    .update(scope)
    .update('\n')
    .update(query.document)
    .update('\n')
    .update(stableStringify(variables))
    .digest('hex');
}

/**
 * Memoizes read-only queries within one cache scope, normally one collection
 * run, so the window controller's repeated passes reuse pages. Calls without
 * a scope, volatile queries and mutations always go through. A failing store
 * never fails the query: the inner client is used instead.
 */
export class CachedGraphqlClient implements GraphqlClient {
  private readonly logger = new Logger(CachedGraphqlClient.name);
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly inner: GraphqlClient,
    private readonly store: QueryCacheStore,
  ) {}

  async execute<T>(query: QueryDescriptor, variables: QueryVariables, options: ExecuteOptions = {}): Promise<T> {
    const scope = options.cacheScope;
    if (query.kind !== 'query' || query.volatile || !scope) {
      return this.inner.execute<T>(query, variables, options);
    }

    const key = queryCacheKey(scope, query, variables);
    const cached = await this.read(key);
    if (cached !== undefined) {
      this.hits++;
      this.logger.debug(`Cache hit for ${query.name} (${key.slice(0, 12)})`);
      // Stored payloads come from a previous execute<T> of the same query text
      return cached as T;
    }

    this.misses++;
    const result = await this.inner.execute<T>(query, variables, options);
    try {
      await this.store.set(key, query.name, result);
    } catch (error: unknown) {
      this.logger.warn(`Cache write failed for ${query.name}: ${errorMessage(error)}`);
    }
    return result;
  }

  stats(): { hits: number; misses: number } {
    return { hits: this.hits, misses: this.misses };
  }

  private async read(key: string): Promise<unknown | undefined> {
    try {
      return await this.store.get(key);
    } catch (error: unknown) {
      this.logger.warn(`Cache read failed: ${errorMessage(error)}`);
      return undefined;
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
