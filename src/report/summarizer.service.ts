import { Inject, Injectable, Logger } from '@nestjs/common';

import { APP_VERSION, SUMMARY_MARKER } from '../config/activity.config.js';
import { appendSummaryFooter, type SummaryFooter } from '../activity/summary-footer.js';
import { CHAT_MODEL, type ChatModel } from './chat-model.js';

export interface GeneratedSummary {
  title: string;
  /** summary text with the metadata footer appended */
  body: string;
  footer: SummaryFooter;
}

/** First line is the title (Markdown heading marks dropped), the rest is the text. */
export function splitTitle(completion: string): { title: string; text: string } {
  const normalized = completion.replace(/\r\n/g, '\n').trim();
  const newline = normalized.indexOf('\n');
  const first = newline === -1 ? normalized : normalized.slice(0, newline);
  const rest = newline === -1 ? '' : normalized.slice(newline + 1);
  return { title: first.replace(/^#+\s*/, '').trim(), text: rest.trim() };
}

@Injectable()
export class SummarizerService {
  private readonly logger = new Logger(SummarizerService.name);

  constructor(@Inject(CHAT_MODEL) private readonly chat: ChatModel) {}

  async summarize(prompt: string, period: { startDate: string; endDate: string }): Promise<GeneratedSummary> {
    const completion = await this.chat.complete(prompt);
    const { title, text } = splitTitle(completion);
    if (!title || !text) {
      throw new Error(`${this.chat.model} returned a summary without a title line and text`);
    }

    const footer: SummaryFooter = {
      start_date: period.startDate,
      end_date: period.endDate,
      powered_by: `${SUMMARY_MARKER} v${APP_VERSION}`,
      llm: this.chat.model,
    };
    this.logger.log(`Generated "${title}"`);
    return { title, body: appendSummaryFooter(text, footer), footer };
  }
}
