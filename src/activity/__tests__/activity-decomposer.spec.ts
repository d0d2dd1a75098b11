import { countActivities, decompose } from '../activity-decomposer.js';
import { JANUARY_WEEK, at, issue, pullRequest, release } from './items.js';

describe('decompose', () => {
  it('orders comments, commits and the merge by date', () => {
    const pr = pullRequest({
      merged: true,
      state: 'merged',
      mergedAt: at('2024-01-06T10:00:00Z'),
      closedAt: at('2024-01-06T10:00:00Z'),
      comments: [{ createdAt: at('2024-01-05T10:00:00Z'), body: '  Ship it\n', author: 'alice' }],
      commits: [{ committedDate: at('2024-01-03T10:00:00Z'), message: 'Add tokenizer', author: 'Bob' }],
    });

    expect(decompose(pr, JANUARY_WEEK)).toEqual([
      { type: 'commit', date: at('2024-01-03T10:00:00Z'), message: 'Add tokenizer', author: 'Bob' },
      { type: 'comment', date: at('2024-01-05T10:00:00Z'), message: 'Ship it', author: 'alice' },
      { type: 'merge', date: at('2024-01-06T10:00:00Z') },
    ]);
  });

  it('emits a close for closed items that were not merged', () => {
    const closed = issue({ state: 'closed', closedAt: at('2024-01-02T10:00:00Z') });
    expect(decompose(closed, JANUARY_WEEK)).toEqual([{ type: 'close', date: at('2024-01-02T10:00:00Z') }]);
  });

  it('never emits a close for a merged pull request, even when the merge lies outside the window', () => {
    const pr = pullRequest({
      merged: true,
      state: 'merged',
      mergedAt: at('2023-12-31T23:00:00Z'),
      closedAt: at('2024-01-01T01:00:00Z'),
    });
    expect(decompose(pr, JANUARY_WEEK)).toEqual([]);
  });

  it('drops events outside the half-open window', () => {
    const pr = pullRequest({
      comments: [
        { createdAt: at('2023-12-31T23:59:59Z'), body: 'before', author: 'alice' },
        { createdAt: at('2024-01-01T00:00:00Z'), body: 'first', author: 'alice' },
        { createdAt: at('2024-01-08T00:00:00Z'), body: 'after', author: 'alice' },
      ],
    });

    const activities = decompose(pr, JANUARY_WEEK);
    expect(activities).toEqual([
      { type: 'comment', date: at('2024-01-01T00:00:00Z'), message: 'first', author: 'alice' },
    ]);
    for (const activity of activities) {
      expect(activity.date.getTime()).toBeGreaterThanOrEqual(JANUARY_WEEK.start.getTime());
      expect(activity.date.getTime()).toBeLessThan(JANUARY_WEEK.end.getTime());
    }
  });

  it('returns nothing for releases', () => {
    expect(decompose(release(), JANUARY_WEEK)).toEqual([]);
  });
});

describe('countActivities', () => {
  it('counts one activity type across items', () => {
    const items = [
      {
        item: issue(),
        activities: decompose(
          issue({ comments: [{ createdAt: at('2024-01-02T10:00:00Z'), body: 'a', author: null }] }),
          JANUARY_WEEK,
        ),
      },
      {
        item: pullRequest(),
        activities: decompose(
          pullRequest({
            comments: [{ createdAt: at('2024-01-03T10:00:00Z'), body: 'b', author: 'alice' }],
            commits: [{ committedDate: at('2024-01-03T11:00:00Z'), message: 'c', author: null }],
          }),
          JANUARY_WEEK,
        ),
      },
    ];

    expect(countActivities(items, 'comment')).toBe(2);
    expect(countActivities(items, 'commit')).toBe(1);
    expect(countActivities(items, 'merge')).toBe(0);
  });
});
