import { Module } from '@nestjs/common';

import { GithubModule } from '../github/github.module.js';
import { ActivityAggregator } from './activity-aggregator.js';
import { ActivityService } from './activity.service.js';
import { ContinuationResolver } from './continuation-resolver.js';
import { RepositoryService } from './repository.service.js';
import { ActivityStreamFetcher } from './stream-fetcher.js';
import { AdaptiveWindowController } from './window-controller.js';

@Module({
  imports: [GithubModule],
  providers: [
    ActivityStreamFetcher,
    ActivityAggregator,
    AdaptiveWindowController,
    ContinuationResolver,
    RepositoryService,
    ActivityService,
  ],
  exports: [ActivityService, ContinuationResolver, RepositoryService],
})
export class ActivityModule {}
