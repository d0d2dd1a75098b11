// Abstraction over the GitHub GraphQL API used by the activity engine

export const GRAPHQL_CLIENT = 'GRAPHQL_CLIENT';

export type QueryKind = 'query' | 'mutation';

export interface QueryDescriptor {
  name: string; // operation name, also used for logging and test dispatch
  kind: QueryKind;
  document: string;
  /** answers that must be read fresh on every call, even inside one run */
  volatile?: boolean;
}

export interface ExecuteOptions {
  /** read queries are memoized only among calls that share a scope */
  cacheScope?: string;
}

export type QueryVariables = Record<string, string | number | boolean | null | Record<string, unknown>>;

export type QueryErrorKind = 'transport' | 'graphql';

export class QueryError extends Error {
  readonly name = 'QueryError';

  constructor(
    readonly operation: string,
    message: string,
    readonly kind: QueryErrorKind,
    readonly status?: number,
    readonly graphqlErrorTypes: string[] = [],
  ) {
    super(`${operation}: ${message}`);
  }

  /** GitHub answers unknown owners/names with a NOT_FOUND graphql error */
  get isNotFound(): boolean {
    return this.status === 404 || this.graphqlErrorTypes.includes('NOT_FOUND');
  }
}

export interface GraphqlClient {
  execute<T>(query: QueryDescriptor, variables: QueryVariables, options?: ExecuteOptions): Promise<T>;
}
