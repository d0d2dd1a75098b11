export const QUERY_CACHE_STORE = 'QUERY_CACHE_STORE';

export interface QueryCacheStore {
  get(key: string): Promise<unknown | undefined>;
  set(key: string, operation: string, payload: unknown): Promise<void>;
}
