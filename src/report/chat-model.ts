import { Inject, Injectable, Logger } from '@nestjs/common';
import OpenAI from 'openai';

import { ACTIVITY_CONFIG } from '../config/activity.config.js';
import type { ActivityConfig } from '../config/activity.config.js';

export const CHAT_MODEL = 'CHAT_MODEL';

export interface ChatModel {
  readonly model: string;
  complete(prompt: string): Promise<string>;
}

/** Any OpenAI-compatible chat completions endpoint; OpenRouter by default. */
@Injectable()
export class OpenAiChatModel implements ChatModel {
  private readonly logger = new Logger(OpenAiChatModel.name);
  private client: OpenAI | null = null;
  readonly model: string;

  constructor(@Inject(ACTIVITY_CONFIG) private readonly config: ActivityConfig) {
    this.model = config.llm.model;
  }

  async complete(prompt: string): Promise<string> {
    const started = Date.now();
    const response = await this.openai().chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: 0.7,
    });
    const content = response.choices[0]?.message?.content?.trim() ?? '';
    if (!content) throw new Error(`${this.model} returned an empty completion`);

    const usage = response.usage;
    this.logger.log(
      `${this.model} answered in ${Date.now() - started}ms` +
        (usage ? ` (${usage.prompt_tokens} prompt / ${usage.completion_tokens} completion tokens)` : ''),
    );
    return content;
  }

  // created on first use so that runs without a summary need no key
  private openai(): OpenAI {
    if (!this.client) {
      const apiKey =
        this.config.llm.apiKey ??
        (() => {
          throw new Error('LLM_API_KEY or OPENROUTER_API_KEY environment variable is required');
        })();
      this.client = new OpenAI({
        apiKey,
        baseURL: this.config.llm.baseUrl,
        defaultHeaders: { 'X-Title': 'repo-activity-digest' },
      });
    }
    return this.client;
  }
}
