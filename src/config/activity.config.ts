import type { LogLevel } from '@nestjs/common';

export const ACTIVITY_CONFIG = 'ACTIVITY_CONFIG';
export const CLOCK = 'CLOCK';

/** Marker embedded in the `powered_by` footer field of every published report. */
export const SUMMARY_MARKER = 'repo-activity-digest';
export const APP_VERSION = '1.0.0';

export type QueryCacheMode = 'off' | 'memory' | 'database';

export interface WindowPolicy {
  stepDays: number;
  minItems: number;
  minActivities: number;
}

export interface ActivityConfig {
  server: {
    port: number;
    apiKey: string | null;
    /** the API key is only enforced in production */
    requireApiKey: boolean;
  };
  github: {
    token: string | null;
    baseUrl: string;
    pageSize: number;
  };
  window: WindowPolicy;
  summaries: {
    category: string | null;
    previousCount: number;
    projectName: string | null;
    repositories: string[];
    dryRun: boolean;
  };
  cache: {
    mode: QueryCacheMode;
    ttlSeconds: number;
  };
  llm: {
    model: string;
    apiKey: string | null;
    baseUrl: string;
  };
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function flag(env: Env, name: string): boolean {
  return ['1', 'true', 'yes'].includes((env[name] ?? '').trim().toLowerCase());
}

function optional(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function cacheMode(env: Env): QueryCacheMode {
  const raw = (env.QUERY_CACHE ?? 'memory').trim().toLowerCase();
  if (raw === 'off' || raw === 'memory' || raw === 'database') return raw;
  throw new Error(`QUERY_CACHE must be one of off, memory, database; got "${raw}"`);
}

export function loadActivityConfig(env: Env = process.env): ActivityConfig {
  // 100 is the GraphQL connection maximum
  const pageSize = Math.min(positiveInt(env, 'PAGE_SIZE', 100), 100);

  return Object.freeze({
    server: {
      port: positiveInt(env, 'PORT', 3000),
      apiKey: optional(env, 'API_KEY'),
      requireApiKey: env.NODE_ENV === 'production',
    },
    github: {
      token: optional(env, 'GITHUB_TOKEN'),
      baseUrl: optional(env, 'GITHUB_GRAPHQL_URL') ?? 'https://api.github.com',
      pageSize,
    },
    window: {
      stepDays: positiveInt(env, 'WINDOW_STEP_DAYS', 7),
      minItems: positiveInt(env, 'MIN_ITEMS', 2),
      minActivities: positiveInt(env, 'MIN_ACTIVITIES', 2),
    },
    summaries: {
      category: env.SUMMARY_CATEGORY === undefined ? 'Announcements' : optional(env, 'SUMMARY_CATEGORY'),
      previousCount: positiveInt(env, 'PREVIOUS_SUMMARY_COUNT', 3),
      projectName: optional(env, 'SUMMARY_PROJECT_NAME'),
      repositories: (env.SUMMARY_REPOSITORIES ?? '')
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean),
      dryRun: flag(env, 'DRY_RUN'),
    },
    cache: {
      mode: cacheMode(env),
      ttlSeconds: positiveInt(env, 'QUERY_CACHE_TTL_SECONDS', 3600),
    },
    llm: {
      model: optional(env, 'LLM_MODEL') ?? 'anthropic/claude-3.5-sonnet',
      apiKey: optional(env, 'LLM_API_KEY') ?? optional(env, 'OPENROUTER_API_KEY'),
      baseUrl: optional(env, 'LLM_BASE_URL') ?? 'https://openrouter.ai/api/v1',
    },
  });
}

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

/** `LOG_LEVEL=debug` enables error, warn, log and debug. */
export function logLevelsFrom(raw: string | undefined): LogLevel[] {
  const wanted = (raw ?? 'log').trim().toLowerCase();
  const idx = LOG_LEVELS.findIndex((l) => l === wanted);
  return LOG_LEVELS.slice(0, idx === -1 ? 3 : idx + 1);
}
