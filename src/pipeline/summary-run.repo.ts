import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';

import { SummaryRun } from './summary-run.entity.js';

export type RunCompletion = Partial<
  Pick<SummaryRun, 'status' | 'windowStart' | 'windowEnd' | 'title' | 'discussionUrl' | 'errorMessage'>
>;

@Injectable()
export class SummaryRunRepo {
  constructor(
    @InjectRepository(SummaryRun)
    private readonly repo: Repository<SummaryRun>,
  ) {}

  async start(repository: string, trigger: SummaryRun['trigger']): Promise<SummaryRun> {
    return this.repo.save(this.repo.create({ repository, trigger, status: 'running' }));
  }

  async finish(id: string, data: RunCompletion): Promise<void> {
    await this.repo.update({ id }, data);
  }

  async markFailed(id: string, error: string): Promise<void> {
    await this.finish(id, { status: 'failed', errorMessage: error });
  }

  async list(repository?: string, limit = 50): Promise<SummaryRun[]> {
    return this.repo.find({
      where: repository ? { repository } : {},
      order: { startedAt: 'DESC' },
      take: limit,
    });
  }
}
