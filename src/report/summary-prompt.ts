export interface SummaryPromptInput {
  activityReport: string;
  previousSummaries: string[];
  projectName: string;
  startDate: string;
  endDate: string; // last day covered
}

export function buildSummaryPrompt(input: SummaryPromptInput): string {
  const previous = input.previousSummaries.length
    ? [
        'Earlier summaries, newest first. Do not repeat what they already covered:',
        '',
        ...input.previousSummaries.map((s, i) => `<previous-summary index="${i + 1}">\n${s}\n</previous-summary>`),
        '',
      ]
    : [];

  return [
    `You write the periodic activity summary of the ${input.projectName} project for its community of contributors.`,
    `Cover the period from ${input.startDate} to ${input.endDate}.`,
    '',
    'Guidelines:',
    '- Give an overview of the key changes, features and bug fixes.',
    '- Highlight important discussions and decisions made in comments.',
    '- Mention pull request and issue numbers in parentheses, e.g. (#123).',
    '- Group related changes together.',
    '- Mention significant merges, closed issues and new releases.',
    '- Note ongoing problems or open questions.',
    '- Keep the tone friendly and informal, around 200-300 words in 2-3 paragraphs of Markdown.',
    '',
    'OUTPUT FORMAT (STRICT):',
    'The first line is the title of the summary, nothing else. The summary text follows on the next lines.',
    '',
    ...previous,
    'Activity report:',
    '',
    input.activityReport,
  ].join('\n');
}
