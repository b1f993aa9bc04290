/**
 * Slack Adapter
 *
 * Messages mentioning a task, found with search.messages and expanded to
 * their full threads with conversations.replies.
 */

import { z } from 'zod';
import type { SourcesConfig } from '../lib/config.js';
import { createLogger } from '../lib/logger.js';
import { AdapterError } from '../lib/errors.js';
import { extractKeywords } from '../context/doc-matcher.js';
import { createSourceContext, findTicket } from '../context/source-context.js';
import type { Message, MessageThread, SearchResult, SourceContext } from '../context/types.js';
import { SourceHttpClient } from './http.js';
import type { Adapter, AdapterFetchOptions } from './types.js';

const logger = createLogger('adapters:slack');

const API_BASE = 'https://slack.com/api';
const THREAD_LIMIT = { standard: 5, deep: 10 } as const;
const MATCHES_PER_QUERY = 20;
const REPLY_LIMIT = 20;
const TITLE_KEYWORDS = 3;
const DAY_MS = 24 * 60 * 60 * 1000;

export type SlackConfig = SourcesConfig['slack'];

const envelope = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
});

const searchMatchSchema = z.object({
  ts: z.string(),
  text: z.string().default(''),
  user: z.string().optional(),
  username: z.string().optional(),
  channel: z.object({ id: z.string(), name: z.string().optional() }),
  permalink: z.string().optional(),
});

const searchResponse = envelope.extend({
  messages: z.object({ matches: z.array(searchMatchSchema).default([]) }).optional(),
});

const repliesResponse = envelope.extend({
  messages: z
    .array(
      z.object({
        ts: z.string(),
        text: z.string().default(''),
        user: z.string().optional(),
      })
    )
    .default([]),
});

const userInfoResponse = envelope.extend({
  user: z
    .object({
      name: z.string(),
      real_name: z.string().optional(),
      profile: z.object({ display_name: z.string().optional() }).optional(),
    })
    .optional(),
});

type SearchMatch = z.infer<typeof searchMatchSchema>;

export function slackTimestamp(ts: string): Date {
  return new Date(Math.round(parseFloat(ts) * 1000));
}

/**
 * Search hits carry their thread only in the permalink
 */
export function threadTsOf(match: Pick<SearchMatch, 'ts' | 'permalink'>): string {
  if (match.permalink) {
    try {
      const threadTs = new URL(match.permalink).searchParams.get('thread_ts');
      if (threadTs) return threadTs;
    } catch (error) {
      logger.debug({ permalink: match.permalink, error }, 'Unparseable permalink');
    }
  }
  return match.ts;
}

export function formatThreads(threads: readonly MessageThread[]): string {
  return threads
    .map((thread) => {
      const { parent } = thread;
      const lines = [
        `**#${parent.channel}** (${parent.timestamp.toISOString().slice(0, 10)})`,
        `**${parent.author}:** ${parent.text}`,
        ...thread.replies.map((reply) => `**${reply.author}:** ${reply.text}`),
      ];
      return lines.join('\n');
    })
    .join('\n\n---\n\n');
}

export interface SlackAdapterOptions {
  now?: () => Date;
}

export class SlackAdapter implements Adapter {
  readonly name = 'slack';
  readonly sourceType = 'communication' as const;
  readonly isPrimary = false;
  readonly needsPrimaryContext = true;
  private readonly http = new SourceHttpClient('slack');
  private readonly userNames = new Map<string, string>();
  private readonly now: () => Date;

  constructor(
    private readonly config: SlackConfig,
    options: SlackAdapterOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async fetchTaskContext(taskId: string, options: AdapterFetchOptions): Promise<SourceContext> {
    const { primaryHint, depth, signal } = options;
    const ticket = primaryHint ? findTicket([primaryHint]) : null;

    const queries = [taskId];
    const titleKeywords = ticket ? extractKeywords(ticket.title).slice(0, TITLE_KEYWORDS) : [];
    if (titleKeywords.length > 0) {
      queries.push(titleKeywords.join(' '));
    }

    // One entry per thread, first hit wins
    const hits = new Map<string, SearchMatch>();
    for (const query of queries) {
      for (const match of await this.searchMessages(this.scoped(query), MATCHES_PER_QUERY, 'timestamp', signal)) {
        const key = `${match.channel.id}:${threadTsOf(match)}`;
        if (!hits.has(key)) {
          hits.set(key, match);
        }
      }
    }

    const threads: MessageThread[] = [];
    for (const match of [...hits.values()].slice(0, THREAD_LIMIT[depth])) {
      threads.push(await this.expandThread(match, signal));
    }

    logger.debug({ taskId, hits: hits.size, threads: threads.length }, 'Fetched Slack threads');

    return createSourceContext({
      sourceName: this.name,
      sourceType: this.sourceType,
      data: { kind: 'messages', threads },
      rawText: formatThreads(threads),
      metadata: { threadCount: threads.length, queries },
    });
  }

  async search(query: string, maxResults: number, signal?: AbortSignal): Promise<SearchResult[]> {
    const matches = await this.searchMessages(this.scoped(query), maxResults, 'score', signal);
    const results = matches.slice(0, maxResults);

    return results.map((match, index) => ({
      sourceName: this.name,
      sourceType: this.sourceType,
      title: match.channel.name ? `Slack: #${match.channel.name}` : 'Slack message',
      excerpt: match.text.slice(0, 300),
      url: match.permalink ?? null,
      relevanceScore: Math.max(0.1, 1 - index / Math.max(1, results.length)),
    }));
  }

  async healthCheck(): Promise<boolean> {
    if (!this.config.botToken) {
      return false;
    }
    try {
      await this.call('auth.test', {}, envelope);
      return true;
    } catch (error) {
      logger.warn({ error }, 'Slack health check failed');
      return false;
    }
  }

  async close(): Promise<void> {
    this.userNames.clear();
    this.http.close();
  }

  /**
   * Query with the lookback window applied
   */
  private scoped(query: string): string {
    const after = new Date(this.now().getTime() - this.config.lookbackDays * DAY_MS);
    return `${query} after:${after.toISOString().slice(0, 10)}`;
  }

  private async searchMessages(
    query: string,
    count: number,
    sort: 'timestamp' | 'score',
    signal?: AbortSignal
  ): Promise<SearchMatch[]> {
    const data = await this.call(
      'search.messages',
      { query, count, sort, sort_dir: 'desc' },
      searchResponse,
      signal
    );
    const matches = data.messages?.matches ?? [];
    if (this.config.channels.length === 0) {
      return matches;
    }
    const allowed = new Set(this.config.channels.map((channel) => channel.replace(/^#/, '')));
    return matches.filter((match) => match.channel.name !== undefined && allowed.has(match.channel.name));
  }

  private async expandThread(match: SearchMatch, signal?: AbortSignal): Promise<MessageThread> {
    const channel = match.channel.name ?? match.channel.id;
    const threadTs = threadTsOf(match);

    const data = await this.call(
      'conversations.replies',
      { channel: match.channel.id, ts: threadTs, limit: REPLY_LIMIT },
      repliesResponse,
      signal
    );

    if (data.messages.length === 0) {
      return {
        parent: await this.toMessage(match.ts, match.text, match.user, match.username, channel, match.permalink, signal),
        replies: [],
      };
    }

    const [first, ...rest] = data.messages;
    const parent = await this.toMessage(
      first.ts,
      first.text,
      first.user,
      undefined,
      channel,
      first.ts === match.ts ? match.permalink : undefined,
      signal
    );
    const replies: Message[] = [];
    for (const reply of rest) {
      replies.push(await this.toMessage(reply.ts, reply.text, reply.user, undefined, channel, undefined, signal));
    }
    return { parent, replies };
  }

  private async toMessage(
    ts: string,
    text: string,
    userId: string | undefined,
    username: string | undefined,
    channel: string,
    permalink: string | undefined,
    signal?: AbortSignal
  ): Promise<Message> {
    return {
      id: ts,
      channel,
      author: username ?? (userId ? await this.userName(userId, signal) : 'unknown'),
      text,
      timestamp: slackTimestamp(ts),
      permalink: permalink ?? null,
    };
  }

  private async userName(userId: string, signal?: AbortSignal): Promise<string> {
    const cached = this.userNames.get(userId);
    if (cached) {
      return cached;
    }

    let name = userId;
    try {
      const data = await this.call('users.info', { user: userId }, userInfoResponse, signal);
      name = data.user?.profile?.display_name || data.user?.real_name || data.user?.name || userId;
    } catch (error) {
      logger.debug({ userId, error }, 'User lookup failed, using id');
    }
    this.userNames.set(userId, name);
    return name;
  }

  private async call<T extends { ok: boolean; error?: string }>(
    method: string,
    params: Record<string, string | number>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal
  ): Promise<T> {
    const url = new URL(`${API_BASE}/${method}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }

    const data = await this.http.json(
      { url: url.toString(), headers: { Authorization: `Bearer ${this.config.botToken}` }, signal },
      schema
    );
    if (!data.ok) {
      throw new AdapterError(this.name, `${method} failed: ${data.error ?? 'unknown error'}`);
    }
    return data;
  }
}
