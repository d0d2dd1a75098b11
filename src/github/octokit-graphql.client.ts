import { Inject, Injectable, Logger } from '@nestjs/common';
import { Octokit } from '@octokit/rest';
import { GraphqlResponseError } from '@octokit/graphql';
import { RequestError } from '@octokit/request-error';

import { ACTIVITY_CONFIG, APP_VERSION, SUMMARY_MARKER } from '../config/activity.config.js';
import type { ActivityConfig } from '../config/activity.config.js';
import {
  QueryError,
  type GraphqlClient,
  type QueryDescriptor,
  type QueryVariables,
} from './graphql-client.interface.js';

@Injectable()
export class OctokitGraphqlClient implements GraphqlClient {
  private readonly logger = new Logger(OctokitGraphqlClient.name);
  private readonly octokit: Octokit;

  constructor(@Inject(ACTIVITY_CONFIG) config: ActivityConfig) {
    this.octokit = new Octokit({
      auth:
        config.github.token ??
        (() => {
          throw new Error('GITHUB_TOKEN environment variable is required');
        })(),
      baseUrl: config.github.baseUrl,
      userAgent: `${SUMMARY_MARKER}/${APP_VERSION}`,
    });
  }

  async execute<T>(query: QueryDescriptor, variables: QueryVariables): Promise<T> {
    this.logger.verbose(`${query.kind} ${query.name} ${JSON.stringify(variables)}`);
    try {
      return await this.octokit.graphql<T>(query.document, variables);
    } catch (error: unknown) {
      throw this.toQueryError(query.name, error);
    }
  }

  private toQueryError(operation: string, error: unknown): QueryError {
    if (error instanceof GraphqlResponseError) {
      const types = (error.errors ?? [])
        .map((e) => e.type)
        .filter((t): t is string => typeof t === 'string');
      return new QueryError(operation, error.message, 'graphql', undefined, types);
    }
    if (error instanceof RequestError) {
      return new QueryError(operation, error.message, 'transport', error.status);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new QueryError(operation, message, 'transport');
  }
}
