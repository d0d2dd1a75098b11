import { Module } from '@nestjs/common';

import { ActivityModule } from '../activity/activity.module.js';
import { GithubModule } from '../github/github.module.js';
import { CHAT_MODEL, OpenAiChatModel } from './chat-model.js';
import { DiscussionPublisher } from './discussion-publisher.service.js';
import { SummarizerService } from './summarizer.service.js';

@Module({
  imports: [GithubModule, ActivityModule],
  providers: [
    { provide: CHAT_MODEL, useClass: OpenAiChatModel },
    SummarizerService,
    DiscussionPublisher,
  ],
  exports: [SummarizerService, DiscussionPublisher],
})
export class ReportModule {}
