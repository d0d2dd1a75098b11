// src/github/cache/query-cache.memory.store.ts
import type { QueryCacheStore } from './query-cache.store.js';

/** LRU keyed store; a Map keeps insertion order, so the first key is the oldest. */
export class MemoryQueryCacheStore implements QueryCacheStore {
  private readonly entries = new Map<string, unknown>();

  constructor(private readonly maxEntries = 100) {}

  async get(key: string): Promise<unknown | undefined> {
    if (!this.entries.has(key)) return undefined;
    const value = this.entries.get(key);
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  async set(key: string, _operation: string, payload: unknown): Promise<void> {
    this.entries.delete(key);
    this.entries.set(key, payload);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear() {
    this.entries.clear();
  }
}
