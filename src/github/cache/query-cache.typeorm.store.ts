import { Inject, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { LessThan, Repository } from 'typeorm';

import { ACTIVITY_CONFIG } from '../../config/activity.config.js';
import type { ActivityConfig } from '../../config/activity.config.js';
import { QueryCacheEntry } from './query-cache.entity.js';
import type { QueryCacheStore } from './query-cache.store.js';

@Injectable()
export class TypeOrmQueryCacheStore implements QueryCacheStore {
  private readonly ttlMs: number;

  constructor(
    @InjectRepository(QueryCacheEntry)
    private readonly repo: Repository<QueryCacheEntry>,
    @Inject(ACTIVITY_CONFIG) config: ActivityConfig,
  ) {
    this.ttlMs = config.cache.ttlSeconds * 1000;
  }

  async get(key: string): Promise<unknown | undefined> {
    const row = await this.repo.findOne({ where: { key } });
    if (!row) return undefined;
    if (row.expiresAt.getTime() <= Date.now()) {
      await this.repo.delete({ key });
      return undefined;
    }
    return row.payload;
  }

  async set(key: string, operation: string, payload: unknown): Promise<void> {
    await this.repo.save(
      this.repo.create({
        key,
        operation,
        payload,
        expiresAt: new Date(Date.now() + this.ttlMs),
      }),
    );
  }

  async purgeExpired(): Promise<number> {
    const result = await this.repo.delete({ expiresAt: LessThan(new Date()) });
    return result.affected ?? 0;
  }
}
