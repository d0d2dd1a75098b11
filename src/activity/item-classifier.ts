import { atOrAfter, before, inWindow } from './dates.js';
import type { Item, Window } from './types.js';

/**
 * Decides whether an item belongs to the report window. Rules are ordered;
 * the first one that matches decides. An item can be alive in a window
 * through its creation, a state change, or any nested comment or commit,
 * because `updatedAt` does not always move when comments are added.
 */
export function shouldInclude(item: Item, window: Window): boolean {
  if (item.kind === 'release') return inWindow(item.createdAt, window);

  // created only after the period
  if (atOrAfter(item.createdAt, window.end)) return false;

  if (inWindow(item.updatedAt, window)) return true;
  if (inWindow(item.createdAt, window)) return true;

  if (item.closedAt) {
    if (before(item.closedAt, window.start)) return false;
    if (before(item.closedAt, window.end)) return true;
  }

  if (item.kind === 'pull_request' && item.mergedAt) {
    if (before(item.mergedAt, window.start)) return false;
    if (before(item.mergedAt, window.end)) return true;
  }

  if (item.comments.some((c) => inWindow(c.createdAt, window))) return true;

  if (item.kind === 'pull_request') {
    return item.commits.some((c) => inWindow(c.committedDate, window));
  }

  return false;
}
