import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';

import { ACTIVITY_CONFIG } from '../config/activity.config.js';
import type { ActivityConfig } from '../config/activity.config.js';
import { ParseError } from '../activity/activity.errors.js';
import { ActivityService, type CollectOptions } from '../activity/activity.service.js';
import { previousSummaryTexts } from '../activity/continuation-resolver.js';
import { parseIsoDate } from '../activity/dates.js';
import type { ActivityReport, ActivityStats } from '../activity/types.js';
import { formatRepositoryRef, parseRepositoryRef, type RepositoryRef } from '../github/repository-ref.js';
import { DiscussionPublisher } from '../report/discussion-publisher.service.js';
import { renderActivityReport } from '../report/report-renderer.js';
import { SummarizerService } from '../report/summarizer.service.js';
import { buildSummaryPrompt } from '../report/summary-prompt.js';
import { SummaryRunRepo } from './summary-run.repo.js';
import type { SummaryRun } from './summary-run.entity.js';

export interface RunOptions {
  repository: string;
  startDate?: string;
  dryRun?: boolean;
  projectName?: string;
  /** overrides the configured category; null runs without continuation and never publishes */
  category?: string | null;
  signal?: AbortSignal;
}

export interface SkippedOutcome {
  status: 'skipped';
  repository: string;
  reason: 'insufficient-content';
  detail: string;
  window: { startDate: string; endDate: string };
  stats: ActivityStats;
}

export interface SummaryOutcome {
  status: 'published' | 'dry-run';
  repository: string;
  title: string;
  summary: string;
  discussionUrl: string | null;
  window: ActivityReport['window'];
  stats: ActivityStats;
  activityReport: string;
  /** the text sent to the LLM */
  prompt: string;
}

export type RunOutcome = SkippedOutcome | SummaryOutcome;

export type PreviewOutcome =
  | SkippedOutcome
  | { status: 'ready'; report: ActivityReport; markdown: string; projectName: string };

@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    private readonly activity: ActivityService,
    private readonly summarizer: SummarizerService,
    private readonly publisher: DiscussionPublisher,
    private readonly runs: SummaryRunRepo,
    @Inject(ACTIVITY_CONFIG) private readonly config: ActivityConfig,
  ) {}

  /**
   * Collect → render → summarize → publish for one repository.
   * Insufficient content is a `skipped` outcome, not an error.
   */
  async run(options: RunOptions): Promise<RunOutcome> {
    const ref = this.throwOnInvalidRepository(options.repository);
    const category = options.category === undefined ? this.config.summaries.category : options.category;
    const collected = await this.collect(ref, options.startDate, category, options.projectName, options.signal);
    if (collected.status === 'skipped') return collected;

    const { report, markdown, projectName } = collected;
    const prompt = buildSummaryPrompt({
      activityReport: markdown,
      previousSummaries: previousSummaryTexts(report.previousSummaries),
      projectName,
      startDate: report.window.startDate,
      endDate: report.window.lastDay,
    });
    const summary = await this.summarizer.summarize(prompt, {
      startDate: report.window.startDate,
      endDate: report.window.lastDay,
    });

    let dryRun = options.dryRun ?? this.config.summaries.dryRun;
    if (!dryRun && !category) {
      this.logger.warn(`No discussion category configured for ${report.repository.nameWithOwner}; not publishing`);
      dryRun = true;
    }

    const base = {
      repository: report.repository.nameWithOwner,
      title: summary.title,
      summary: summary.body,
      window: report.window,
      stats: report.stats,
      activityReport: markdown,
      prompt,
    };
    if (dryRun || !category) {
      this.logger.log(`Dry run for ${base.repository}: "${summary.title}" not published`);
      return { status: 'dry-run', discussionUrl: null, ...base };
    }

    const discussion = await this.publisher.publish(report.repository, summary.title, summary.body, category);
    return { status: 'published', discussionUrl: discussion.url, ...base };
  }

  /** Activity report only: no LLM call, nothing published. */
  async preview(repository: string, startDate?: string): Promise<PreviewOutcome> {
    const ref = this.throwOnInvalidRepository(repository);
    return this.collect(ref, startDate, this.config.summaries.category);
  }

  /** `run` with its outcome written to the summary_run history. */
  async runAndRecord(options: RunOptions, trigger: SummaryRun['trigger']): Promise<RunOutcome> {
    const repository = formatRepositoryRef(this.throwOnInvalidRepository(options.repository));
    const record = await this.runs.start(repository, trigger);
    try {
      const outcome = await this.run(options);
      await this.runs.finish(record.id, {
        status: outcome.status,
        windowStart: outcome.window.startDate,
        windowEnd: outcome.window.endDate,
        ...(outcome.status === 'skipped'
          ? { errorMessage: outcome.detail }
          : { title: outcome.title, discussionUrl: outcome.discussionUrl }),
      });
      return outcome;
    } catch (error: unknown) {
      await this.runs.markFailed(record.id, error instanceof Error ? error.message : String(error));
      throw error;
    }
  }

  async listRuns(repository?: string): Promise<SummaryRun[]> {
    const ref = repository ? this.throwOnInvalidRepository(repository) : null;
    return this.runs.list(ref ? formatRepositoryRef(ref) : undefined);
  }

  private async collect(
    ref: RepositoryRef,
    startDate: string | undefined,
    category: string | null,
    projectName?: string,
    signal?: AbortSignal,
  ): Promise<PreviewOutcome> {
    const collectOptions: CollectOptions = { category, signal };
    if (startDate !== undefined) collectOptions.startDate = this.throwOnInvalidDate(startDate);

    const result = await this.activity.collect(ref, collectOptions);
    if (result.status === 'insufficient-content') {
      return {
        status: 'skipped',
        repository: result.repository.nameWithOwner,
        reason: 'insufficient-content',
        detail: result.reason,
        window: result.window,
        stats: result.stats,
      };
    }

    const name = projectName ?? this.config.summaries.projectName ?? result.report.repository.name;
    return {
      status: 'ready',
      report: result.report,
      markdown: renderActivityReport(result.report, name),
      projectName: name,
    };
  }

  private throwOnInvalidRepository(input: string): RepositoryRef {
    const ref = parseRepositoryRef(input);
    if (!ref) {
      throw new BadRequestException(`Repository must be given as owner/name, got "${input}"`);
    }
    return ref;
  }

  private throwOnInvalidDate(input: string): Date {
    try {
      return parseIsoDate('startDate', input);
    } catch (error: unknown) {
      if (error instanceof ParseError) throw new BadRequestException(error.message);
      throw error;
    }
  }
}
