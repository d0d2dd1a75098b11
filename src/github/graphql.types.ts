// Response shapes of the queries in queries.ts, as GitHub returns them.

export type ISO8601 = string; // e.g. "2024-01-05T12:34:56Z"

export interface PageInfo {
  hasNextPage: boolean;
  endCursor: string | null;
}

export interface Connection<T> {
  pageInfo: PageInfo;
  nodes: T[];
}

export interface CommentNode {
  createdAt: ISO8601;
  body: string;
  author: { login: string } | null; // null for deleted accounts
}

export interface CommitNode {
  commit: {
    message: string;
    committedDate: ISO8601;
    author: { name: string | null } | null;
  };
}

export interface PullRequestNode {
  number: number;
  title: string;
  url: string;
  createdAt: ISO8601;
  updatedAt: ISO8601;
  state: 'OPEN' | 'CLOSED' | 'MERGED';
  merged: boolean;
  mergedAt: ISO8601 | null;
  closedAt: ISO8601 | null;
  body: string | null;
  comments: { nodes: CommentNode[] };
  commits: { nodes: CommitNode[] };
}

export interface IssueNode {
  number: number;
  title: string;
  url: string;
  createdAt: ISO8601;
  updatedAt: ISO8601;
  state: 'OPEN' | 'CLOSED';
  closedAt: ISO8601 | null;
  body: string | null;
  comments: { nodes: CommentNode[] };
}

export interface ReleaseNode {
  name: string | null;
  tagName: string;
  url: string;
  createdAt: ISO8601;
  description: string | null;
}

export interface DiscussionNode {
  number: number;
  title: string;
  url: string;
  createdAt: ISO8601;
  updatedAt: ISO8601;
  closedAt: ISO8601 | null;
  body: string | null;
  category: { name: string } | null;
  comments: { nodes: CommentNode[] };
}

export interface RepositoryInfoResponse {
  repository: {
    id: string;
    name: string;
    nameWithOwner: string;
    createdAt: ISO8601;
  } | null;
}

export interface PullRequestPageResponse {
  repository: { pullRequests: Connection<PullRequestNode> } | null;
}

export interface IssuePageResponse {
  repository: { issues: Connection<IssueNode> } | null;
}

export interface ReleasePageResponse {
  repository: { releases: Connection<ReleaseNode> } | null;
}

export interface DiscussionPageResponse {
  repository: { discussions: Connection<DiscussionNode> } | null;
}

export interface DiscussionCategoriesResponse {
  repository: {
    discussionCategories: { nodes: Array<{ id: string; name: string }> };
  } | null;
}

export interface SummaryDiscussionNode {
  title: string;
  body: string;
  createdAt: ISO8601;
  updatedAt: ISO8601;
}

export interface CategoryDiscussionsResponse {
  repository: { discussions: { nodes: SummaryDiscussionNode[] } } | null;
}

export interface CreateDiscussionResponse {
  createDiscussion: { discussion: { id: string; url: string } };
}

export interface CreateDiscussionCategoryResponse {
  createDiscussionCategory: { category: { id: string } };
}
