import type {
  CommentNode,
  CommitNode,
  DiscussionNode,
  IssueNode,
  PullRequestNode,
  ReleaseNode,
} from '../github/graphql.types.js';
import { ParseError } from './activity.errors.js';
import { parseOptionalTimestamp, parseTimestamp } from './dates.js';
import type {
  Comment,
  Commit,
  DiscussionItem,
  IssueItem,
  PullRequestItem,
  ReleaseItem,
} from './types.js';

/** Receives nested records (comments, commits) dropped for a bad timestamp. */
export type SkipHandler = (error: ParseError, where: string) => void;

const ignoreSkip: SkipHandler = () => undefined;

function text(value: string | null | undefined): string {
  return (value ?? '').replace(/\r\n/g, '\n');
}

/* ---------- Nested records ---------- */
function mapComments(nodes: CommentNode[] | undefined, where: string, onSkip: SkipHandler): Comment[] {
  const out: Comment[] = [];
  for (const c of nodes ?? []) {
    try {
      out.push({
        createdAt: parseTimestamp('comment.createdAt', c.createdAt),
        body: text(c.body),
        author: c.author?.login ?? null,
      });
    } catch (error: unknown) {
      if (!(error instanceof ParseError)) throw error;
      onSkip(error, where);
    }
  }
  return out;
}

function mapCommits(nodes: CommitNode[] | undefined, where: string, onSkip: SkipHandler): Commit[] {
  const out: Commit[] = [];
  for (const c of nodes ?? []) {
    try {
      out.push({
        committedDate: parseTimestamp('commit.committedDate', c.commit.committedDate),
        message: text(c.commit.message),
        author: c.commit.author?.name ?? null,
      });
    } catch (error: unknown) {
      if (!(error instanceof ParseError)) throw error;
      onSkip(error, where);
    }
  }
  return out;
}

/* ---------- Items ---------- */
// A bad top-level timestamp throws ParseError: the caller drops the whole item.

export function mapPullRequest(node: PullRequestNode, onSkip: SkipHandler = ignoreSkip): PullRequestItem {
  const where = `PR #${node.number}`;
  const state = node.merged ? 'merged' : node.state === 'OPEN' ? 'open' : 'closed';
  return {
    kind: 'pull_request',
    number: node.number,
    title: node.title,
    url: node.url,
    createdAt: parseTimestamp('pullRequest.createdAt', node.createdAt),
    updatedAt: parseTimestamp('pullRequest.updatedAt', node.updatedAt),
    body: text(node.body),
    state,
    merged: node.merged,
    mergedAt: parseOptionalTimestamp('pullRequest.mergedAt', node.mergedAt),
    closedAt: parseOptionalTimestamp('pullRequest.closedAt', node.closedAt),
    comments: mapComments(node.comments?.nodes, where, onSkip),
    commits: mapCommits(node.commits?.nodes, where, onSkip),
  };
}

export function mapIssue(node: IssueNode, onSkip: SkipHandler = ignoreSkip): IssueItem {
  return {
    kind: 'issue',
    number: node.number,
    title: node.title,
    url: node.url,
    createdAt: parseTimestamp('issue.createdAt', node.createdAt),
    updatedAt: parseTimestamp('issue.updatedAt', node.updatedAt),
    body: text(node.body),
    state: node.state === 'OPEN' ? 'open' : 'closed',
    closedAt: parseOptionalTimestamp('issue.closedAt', node.closedAt),
    comments: mapComments(node.comments?.nodes, `issue #${node.number}`, onSkip),
  };
}

export function mapRelease(node: ReleaseNode): ReleaseItem {
  const createdAt = parseTimestamp('release.createdAt', node.createdAt);
  const description = text(node.description);
  return {
    kind: 'release',
    title: node.name?.trim() || node.tagName,
    url: node.url,
    createdAt,
    updatedAt: createdAt,
    body: description,
    tagName: node.tagName,
    description,
  };
}

export function mapDiscussion(node: DiscussionNode, onSkip: SkipHandler = ignoreSkip): DiscussionItem {
  return {
    kind: 'discussion',
    number: node.number,
    title: node.title,
    url: node.url,
    createdAt: parseTimestamp('discussion.createdAt', node.createdAt),
    updatedAt: parseTimestamp('discussion.updatedAt', node.updatedAt),
    body: text(node.body),
    category: node.category?.name ?? '',
    closedAt: parseOptionalTimestamp('discussion.closedAt', node.closedAt),
    comments: mapComments(node.comments?.nodes, `discussion #${node.number}`, onSkip),
  };
}
