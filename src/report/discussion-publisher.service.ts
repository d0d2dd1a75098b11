import { Inject, Injectable, Logger } from '@nestjs/common';

import { ContinuationResolver } from '../activity/continuation-resolver.js';
import type { RepositoryInfo } from '../activity/types.js';
import { GRAPHQL_CLIENT, type GraphqlClient } from '../github/graphql-client.interface.js';
import type {
  CreateDiscussionCategoryResponse,
  CreateDiscussionResponse,
} from '../github/graphql.types.js';
import { CREATE_DISCUSSION, CREATE_DISCUSSION_CATEGORY } from '../github/queries.js';

export interface PublishedDiscussion {
  id: string;
  url: string;
  categoryId: string;
}

@Injectable()
export class DiscussionPublisher {
  private readonly logger = new Logger(DiscussionPublisher.name);

  constructor(
    @Inject(GRAPHQL_CLIENT) private readonly client: GraphqlClient,
    private readonly categories: ContinuationResolver,
  ) {}

  async publish(
    repo: RepositoryInfo,
    title: string,
    body: string,
    category: string,
  ): Promise<PublishedDiscussion> {
    const categoryId = await this.getOrCreateCategoryId(repo, category);

    const result = await this.client.execute<CreateDiscussionResponse>(CREATE_DISCUSSION, {
      input: { repositoryId: repo.id, categoryId, title, body },
    });
    const { id, url } = result.createDiscussion.discussion;
    this.logger.log(`📣 Published "${title}" to ${url}`);
    return { id, url, categoryId };
  }

  private async getOrCreateCategoryId(repo: RepositoryInfo, category: string): Promise<string> {
    const existing = await this.categories.findCategoryId(repo, category);
    if (existing) return existing;

    this.logger.warn(`Discussion category "${category}" missing in ${repo.nameWithOwner}; creating it`);
    const created = await this.client.execute<CreateDiscussionCategoryResponse>(
      CREATE_DISCUSSION_CATEGORY,
      {
        input: {
          repositoryId: repo.id,
          name: category,
          description: 'Periodic summaries of repository activity',
        },
      },
    );
    return created.createDiscussionCategory.category.id;
  }
}
