import { extractSummaryFooter } from '../../activity/summary-footer.js';
import type { ChatModel } from '../chat-model.js';
import { SummarizerService, splitTitle } from '../summarizer.service.js';

function fakeChat(answer: string): ChatModel & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    model: 'test-model',
    prompts,
    complete: async (prompt: string) => {
      prompts.push(prompt);
      return answer;
    },
  };
}

describe('splitTitle', () => {
  it('takes the first line as the title', () => {
    expect(splitTitle('## Busy week in Octo\r\n\r\nLots of merges.\n')).toEqual({
      title: 'Busy week in Octo',
      text: 'Lots of merges.',
    });
  });

  it('returns empty text for a one-line answer', () => {
    expect(splitTitle('Only a title')).toEqual({ title: 'Only a title', text: '' });
  });
});

describe('SummarizerService', () => {
  it('appends a footer covering the period', async () => {
    const chat = fakeChat('# Busy week in Octo\n\nLots of merges (#12).');
    const summary = await new SummarizerService(chat).summarize('the prompt', {
      startDate: '2024-01-01',
      endDate: '2024-01-07',
    });

    expect(chat.prompts).toEqual(['the prompt']);
    expect(summary.title).toBe('Busy week in Octo');
    expect(summary.body.startsWith('Lots of merges (#12).\n\n---\n')).toBe(true);
    expect(extractSummaryFooter(summary.body)).toEqual({
      start_date: '2024-01-01',
      end_date: '2024-01-07',
      powered_by: 'repo-activity-digest v1.0.0',
      llm: 'test-model',
    });
  });

  it('rejects an answer without a body', async () => {
    await expect(
      new SummarizerService(fakeChat('Just a title')).summarize('p', { startDate: '2024-01-01', endDate: '2024-01-07' }),
    ).rejects.toThrow('test-model returned a summary without a title line and text');
  });
});
