import type { RepositoryRef } from '../github/repository-ref.js';

export type ItemKind = 'pull_request' | 'issue' | 'release' | 'discussion';

export interface Comment {
  createdAt: Date;
  body: string;
  author: string | null; // login; null when the account was deleted
}

export interface Commit {
  committedDate: Date;
  message: string;
  author: string | null; // git author name
}

interface ItemHeader {
  title: string;
  url: string;
  createdAt: Date;
  updatedAt: Date;
  body: string;
}

export interface PullRequestItem extends ItemHeader {
  kind: 'pull_request';
  number: number;
  state: 'open' | 'closed' | 'merged';
  merged: boolean;
  mergedAt: Date | null;
  closedAt: Date | null;
  comments: Comment[];
  commits: Commit[];
}

export interface IssueItem extends ItemHeader {
  kind: 'issue';
  number: number;
  state: 'open' | 'closed';
  closedAt: Date | null;
  comments: Comment[];
}

/** Releases carry no number; `updatedAt` mirrors `createdAt`. */
export interface ReleaseItem extends ItemHeader {
  kind: 'release';
  tagName: string;
  description: string;
}

export interface DiscussionItem extends ItemHeader {
  kind: 'discussion';
  number: number;
  category: string;
  closedAt: Date | null;
  comments: Comment[];
}

export type Item = PullRequestItem | IssueItem | ReleaseItem | DiscussionItem;

export type Activity =
  | { type: 'comment'; date: Date; message: string; author: string | null }
  | { type: 'commit'; date: Date; message: string; author: string | null }
  | { type: 'merge'; date: Date }
  | { type: 'close'; date: Date };

/** Half-open `[start, end)`; both bounds are UTC midnights. */
export interface Window {
  start: Date;
  end: Date;
}

export interface ClassifiedItem {
  item: Item;
  activities: Activity[];
}

export interface ContinuationRecord {
  endDate: string; // YYYY-MM-DD, last day covered by the published report
  startDate: string | null;
  title: string;
  summaryText: string;
  llm: string | null;
}

export interface ActivityStats {
  items: number;
  comments: number;
  commits: number;
}

export interface RepositoryInfo extends RepositoryRef {
  id: string;
  nameWithOwner: string;
  createdAt: Date;
}

export interface ActivityReport {
  repository: RepositoryInfo;
  window: {
    startDate: string;
    endDate: string; // exclusive
    lastDay: string; // endDate - 1 day, what readers see
  };
  items: ClassifiedItem[];
  previousSummaries: ContinuationRecord[];
  stats: ActivityStats;
}
