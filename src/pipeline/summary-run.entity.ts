import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';

export type SummaryRunStatus = 'running' | 'published' | 'dry-run' | 'skipped' | 'failed';

@Entity('summary_run')
export class SummaryRun {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('IDX_SUMMARY_RUN_REPOSITORY')
  @Column({ type: 'varchar', length: 200 })
  repository!: string;

  @Column({ type: 'varchar', length: 20, default: 'running' })
  status!: SummaryRunStatus;

  @Column({ type: 'varchar', length: 20, default: 'api' })
  trigger!: 'api' | 'cron' | 'script';

  @Column({ type: 'date', nullable: true })
  windowStart!: string | null;

  @Column({ type: 'date', nullable: true })
  windowEnd!: string | null;

  @Column({ type: 'text', nullable: true })
  title!: string | null;

  @Column({ type: 'text', nullable: true })
  discussionUrl!: string | null;

  @Column({ type: 'text', nullable: true })
  errorMessage!: string | null;

  @CreateDateColumn({ type: 'timestamp' })
  startedAt!: Date;

  @UpdateDateColumn({ type: 'timestamp' })
  updatedAt!: Date;
}
