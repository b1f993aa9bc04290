import { z } from 'zod';

// Whole, positive number given as a string
const count = (fallback: string) =>
  z
    .string()
    .regex(/^[1-9]\d*$/, 'Expected a positive whole number')
    .default(fallback)
    .transform((value) => parseInt(value, 10));

const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).optional(),

  // Shared store (read by the server, written by the watcher)
  POSTGRES_URL: z.string(),

  // Jira (issue tracker, primary source)
  JIRA_ENABLED: z.string().default('false'),
  JIRA_BASE_URL: z.string().default(''),
  JIRA_EMAIL: z.string().default(''),
  JIRA_API_TOKEN: z.string().optional(),
  JIRA_PRIMARY: z.string().default('true'),

  // Fireflies (meeting transcripts)
  FIREFLIES_ENABLED: z.string().default('false'),
  FIREFLIES_API_KEY: z.string().optional(),
  FIREFLIES_URL: z.string().default('https://api.fireflies.ai/graphql'),

  // Local documentation
  DOCS_ENABLED: z.string().default('true'),
  DOCS_PATHS: z.string().default('./docs'),
  DOCS_STANDARDS_PATH: z.string().optional(),

  // Slack
  SLACK_ENABLED: z.string().default('false'),
  SLACK_BOT_TOKEN: z.string().optional(),
  SLACK_CHANNELS: z.string().default(''),
  SLACK_LOOKBACK_DAYS: count('30'),

  // GitHub
  GITHUB_ENABLED: z.string().default('false'),
  GITHUB_TOKEN: z.string().optional(),
  GITHUB_REPOS: z.string().default(''),
  GITHUB_RECENT_PR_DAYS: count('14'),

  // Gmail (email threads; OAuth access token obtained out of band)
  GMAIL_ENABLED: z.string().default('false'),
  GMAIL_ACCESS_TOKEN: z.string().optional(),
  GMAIL_USER: z.string().default('me'),
  GMAIL_SEARCH_SCOPE: z.string().default('newer_than:30d'),
  GMAIL_LABELS: z.string().default('INBOX'),
  GMAIL_MAX_RESULTS: count('10'),

  // Synthesis
  SYNTHESIS_PLUGIN: z.enum(['llm', 'template', 'passthrough']).default('llm'),
  SYNTHESIS_PROVIDER: z.enum(['anthropic', 'openai', 'ollama']).default('anthropic'),
  SYNTHESIS_MODEL: z.string().default('claude-3-5-haiku-latest'),
  SYNTHESIS_MAX_OUTPUT_TOKENS: count('3000'),
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_URL: z.string().default('https://api.openai.com/v1'),
  SYNTHESIS_TEMPLATE_PATH: z.string().optional(),
  OLLAMA_URL: z.string().default('http://localhost:11434'),

  // On-demand path
  CACHE_TTL_MINUTES: count('15'),
  CACHE_MAX_SIZE: count('100'),
  SOURCE_TIMEOUT_MS: count('10000'),
  FETCH_TIMEOUT_MS: count('30000'),

  // Preprocessing pipeline + watcher
  PREPROCESSOR_JIRA_STATUS: z.string().default('Ready for Development'),
  PREPROCESSOR_JIRA_PROJECTS: z.string().default(''),
  CONTEXT_TTL_HOURS: count('24'),
  POLL_INTERVAL_MINUTES: count('5'),
  DEEP_FETCH_TIMEOUT_MULTIPLIER: count('3'),
  EXPIRED_RETENTION_HOURS: count('168'),
});

export type Config = z.infer<typeof configSchema>;

function loadConfig(): Config {
  const result = configSchema.safeParse(process.env);

  if (!result.success) {
    console.error('Invalid configuration:');
    console.error(result.error.format());
    throw new Error('Configuration validation failed');
  }

  return result.data;
}

export const config = loadConfig();

function list(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const flag = (value: string): boolean => value === 'true';

export const numericConfig = {
  cacheTtlSeconds: config.CACHE_TTL_MINUTES * 60,
  cacheMaxSize: config.CACHE_MAX_SIZE,
  sourceTimeoutMs: config.SOURCE_TIMEOUT_MS,
  fetchTimeoutMs: config.FETCH_TIMEOUT_MS,
  contextTtlHours: config.CONTEXT_TTL_HOURS,
  pollIntervalMinutes: config.POLL_INTERVAL_MINUTES,
  deepFetchTimeoutMultiplier: config.DEEP_FETCH_TIMEOUT_MULTIPLIER,
  synthesisMaxOutputTokens: config.SYNTHESIS_MAX_OUTPUT_TOKENS,
  expiredRetentionHours: config.EXPIRED_RETENTION_HOURS,
};

// Per-source settings, consumed by the adapter registry
export const sourcesConfig = {
  jira: {
    enabled: flag(config.JIRA_ENABLED),
    baseUrl: config.JIRA_BASE_URL,
    email: config.JIRA_EMAIL,
    apiToken: config.JIRA_API_TOKEN ?? '',
    primary: flag(config.JIRA_PRIMARY),
  },
  fireflies: {
    enabled: flag(config.FIREFLIES_ENABLED),
    apiKey: config.FIREFLIES_API_KEY ?? '',
    url: config.FIREFLIES_URL,
  },
  docs: {
    enabled: flag(config.DOCS_ENABLED),
    paths: list(config.DOCS_PATHS),
    standardsPath: config.DOCS_STANDARDS_PATH,
  },
  slack: {
    enabled: flag(config.SLACK_ENABLED),
    botToken: config.SLACK_BOT_TOKEN ?? '',
    channels: list(config.SLACK_CHANNELS),
    lookbackDays: config.SLACK_LOOKBACK_DAYS,
  },
  github: {
    enabled: flag(config.GITHUB_ENABLED),
    token: config.GITHUB_TOKEN ?? '',
    repos: list(config.GITHUB_REPOS),
    recentPrDays: config.GITHUB_RECENT_PR_DAYS,
  },
  gmail: {
    enabled: flag(config.GMAIL_ENABLED),
    accessToken: config.GMAIL_ACCESS_TOKEN ?? '',
    user: config.GMAIL_USER,
    searchScope: config.GMAIL_SEARCH_SCOPE,
    labels: list(config.GMAIL_LABELS),
    maxResults: config.GMAIL_MAX_RESULTS,
  },
};

export type SourcesConfig = typeof sourcesConfig;

export const synthesisConfig = {
  plugin: config.SYNTHESIS_PLUGIN,
  provider: config.SYNTHESIS_PROVIDER,
  model: config.SYNTHESIS_MODEL,
  maxOutputTokens: numericConfig.synthesisMaxOutputTokens,
  anthropicApiKey: config.ANTHROPIC_API_KEY ?? '',
  openaiApiKey: config.OPENAI_API_KEY ?? '',
  openaiUrl: config.OPENAI_URL,
  ollamaUrl: config.OLLAMA_URL,
  templatePath: config.SYNTHESIS_TEMPLATE_PATH,
};

export type SynthesisConfig = typeof synthesisConfig;

export const watcherConfig = {
  triggerStatus: config.PREPROCESSOR_JIRA_STATUS,
  projects: list(config.PREPROCESSOR_JIRA_PROJECTS),
  pollIntervalMinutes: numericConfig.pollIntervalMinutes,
  contextTtlHours: numericConfig.contextTtlHours,
  expiredRetentionHours: numericConfig.expiredRetentionHours,
};
