import { inWindow } from './dates.js';
import type { Activity, ClassifiedItem, Item, Window } from './types.js';

/**
 * Flattens an item's nested events into activities inside the window,
 * oldest first. An included item may legitimately have none.
 */
export function decompose(item: Item, window: Window): Activity[] {
  if (item.kind === 'release') return [];

  const activities: Activity[] = [];

  for (const comment of item.comments) {
    if (inWindow(comment.createdAt, window)) {
      activities.push({
        type: 'comment',
        date: comment.createdAt,
        message: comment.body.trim(),
        author: comment.author,
      });
    }
  }

  if (item.kind === 'pull_request') {
    for (const commit of item.commits) {
      if (inWindow(commit.committedDate, window)) {
        activities.push({
          type: 'commit',
          date: commit.committedDate,
          message: commit.message.trim(),
          author: commit.author,
        });
      }
    }
  }

  // a merged PR reports its merge, never a separate close
  if (item.kind === 'pull_request' && item.mergedAt) {
    if (inWindow(item.mergedAt, window)) activities.push({ type: 'merge', date: item.mergedAt });
  } else if (item.closedAt && inWindow(item.closedAt, window)) {
    activities.push({ type: 'close', date: item.closedAt });
  }

  // Array.prototype.sort is stable, so same-instant events keep comment/commit order
  return activities.sort((a, b) => a.date.getTime() - b.date.getTime());
}

export function countActivities(items: ClassifiedItem[], type: Activity['type']): number {
  return items.reduce(
    (sum, { activities }) => sum + activities.filter((a) => a.type === type).length,
    0,
  );
}
