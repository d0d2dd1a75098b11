import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';

import { AppModule } from '../app.module.js';
import { logLevelsFrom } from '../config/activity.config.js';
import { PipelineService } from '../pipeline/pipeline.service.js';

// Usage: summarize <owner/name> [YYYY-MM-DD] [--dry-run] [--prompt]
async function main() {
  const args = process.argv.slice(2);
  const dryRun = args.includes('--dry-run');
  const showPrompt = args.includes('--prompt');
  const [repository, startDate] = args.filter((a) => !a.startsWith('--'));
  if (!repository) {
    console.error('Usage: summarize <owner/name> [YYYY-MM-DD] [--dry-run] [--prompt]');
    process.exitCode = 2;
    return;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevelsFrom(process.env.LOG_LEVEL),
  });
  try {
    const pipeline = app.get(PipelineService);
    const outcome = await pipeline.runAndRecord({ repository, startDate, ...(dryRun ? { dryRun } : {}) }, 'script');

    if (outcome.status === 'skipped') {
      console.log(`⏭️  Skipped: ${outcome.detail}`);
      return;
    }
    console.log(outcome.activityReport);
    console.log('='.repeat(80));
    if (showPrompt) {
      console.log(outcome.prompt);
      console.log('='.repeat(80));
    }
    console.log(`# ${outcome.title}\n\n${outcome.summary}`);
    if (outcome.discussionUrl) console.log(`\n✅ Published: ${outcome.discussionUrl}`);
  } finally {
    await app.close();
  }
}

main().catch((err: unknown) => {
  new Logger('summarize').error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exit(1);
});
