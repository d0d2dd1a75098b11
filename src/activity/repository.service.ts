import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  GRAPHQL_CLIENT,
  QueryError,
  type GraphqlClient,
} from '../github/graphql-client.interface.js';
import type { RepositoryInfoResponse } from '../github/graphql.types.js';
import { REPOSITORY_INFO } from '../github/queries.js';
import { formatRepositoryRef, type RepositoryRef } from '../github/repository-ref.js';
import { RepositoryNotFoundError } from './activity.errors.js';
import { parseTimestamp } from './dates.js';
import type { RepositoryInfo } from './types.js';

@Injectable()
export class RepositoryService {
  private readonly logger = new Logger(RepositoryService.name);

  constructor(@Inject(GRAPHQL_CLIENT) private readonly client: GraphqlClient) {}

  /** Fatal when the repository cannot be resolved: nothing else can run without it. */
  async resolve(ref: RepositoryRef): Promise<RepositoryInfo> {
    const fullName = formatRepositoryRef(ref);
    let result: RepositoryInfoResponse;
    try {
      result = await this.client.execute<RepositoryInfoResponse>(REPOSITORY_INFO, {
        owner: ref.owner,
        name: ref.name,
      });
    } catch (error: unknown) {
      if (error instanceof QueryError) throw new RepositoryNotFoundError(fullName, error);
      throw error;
    }

    const repo = result.repository;
    if (!repo) throw new RepositoryNotFoundError(fullName);

    this.logger.log(`Resolved ${repo.nameWithOwner} (created ${repo.createdAt})`);
    return {
      owner: ref.owner,
      name: repo.name,
      id: repo.id,
      nameWithOwner: repo.nameWithOwner,
      createdAt: parseTimestamp('repository.createdAt', repo.createdAt),
    };
  }
}
