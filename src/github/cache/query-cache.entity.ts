import { Entity, PrimaryColumn, Column, CreateDateColumn, Index } from 'typeorm';

@Entity('query_cache')
export class QueryCacheEntry {
  @PrimaryColumn({ type: 'varchar', length: 64 })
  key!: string;

  @Column({ type: 'varchar', length: 100 })
  operation!: string;

  @Column({ type: 'jsonb' })
  payload!: unknown;

  @Index('IDX_QUERY_CACHE_EXPIRES_AT')
  @Column({ type: 'timestamp' })
  expiresAt!: Date;

  @CreateDateColumn({ type: 'timestamp' })
  createdAt!: Date;
}
