import { toIsoDate } from '../activity/dates.js';
import type { Activity, ActivityReport, ClassifiedItem, Item } from '../activity/types.js';

const MAX_BODY_CHARS = 2000;

function indent(text: string, prefix: string): string {
  return text
    .split('\n')
    .map((line) => (line.trim() ? `${prefix}${line}` : prefix.trimEnd()))
    .join('\n');
}

function clip(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > MAX_BODY_CHARS ? `${trimmed.slice(0, MAX_BODY_CHARS)}…` : trimmed;
}

export function itemHeading(item: Item): string {
  switch (item.kind) {
    case 'pull_request':
      return `Pull request #${item.number}: ${item.title} (${item.state})`;
    case 'issue':
      return `Issue #${item.number}: ${item.title} (${item.state})`;
    case 'release':
      return `Release ${item.tagName}: ${item.title}`;
    case 'discussion':
      return `Discussion #${item.number} in ${item.category || 'General'}: ${item.title}`;
  }
}

export function renderActivity(activity: Activity): string {
  const day = toIsoDate(activity.date);
  switch (activity.type) {
    case 'comment':
      return `- ${day} comment by ${activity.author ?? 'ghost'}:\n${indent(activity.message, '  ')}`;
    case 'commit':
      return `- ${day} commit by ${activity.author ?? 'unknown'}: ${activity.message.split('\n')[0]}`;
    case 'merge':
      return `- ${day} merged`;
    case 'close':
      return `- ${day} closed`;
  }
}

function renderItem({ item, activities }: ClassifiedItem): string {
  const lines = [
    `## ${itemHeading(item)}`,
    '',
    item.url,
    item.kind === 'release'
      ? `Created: ${toIsoDate(item.createdAt)}`
      : `Created: ${toIsoDate(item.createdAt)}, updated: ${toIsoDate(item.updatedAt)}`,
  ];

  const body = clip(item.body);
  if (body) lines.push('', indent(body, '> '));

  if (activities.length > 0) {
    lines.push('', 'Recent activity:', '', ...activities.map(renderActivity));
  }
  return lines.join('\n');
}

/** Markdown rendition of the activity report, used as LLM input. */
export function renderActivityReport(report: ActivityReport, projectName: string): string {
  const { startDate, lastDay } = report.window;
  const header = [
    `# Activity in ${projectName} from ${startDate} to ${lastDay}`,
    '',
    `${report.stats.items} pull requests, issues, releases and discussions; ` +
      `${report.stats.comments} comments; ${report.stats.commits} commits.`,
  ].join('\n');

  return [header, ...report.items.map(renderItem)].join('\n\n') + '\n';
}
