/**
 * Gmail Adapter
 *
 * Email threads mentioning a task, from the Gmail REST API. Authenticates
 * with an OAuth access token issued outside this process (gmail.readonly).
 */

import { z } from 'zod';
import type { SourcesConfig } from '../lib/config.js';
import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { extractKeywords } from '../context/doc-matcher.js';
import { createSourceContext, findTicket } from '../context/source-context.js';
import type { EmailMessage, EmailThread, SearchResult, SourceContext } from '../context/types.js';
import { SourceHttpClient } from './http.js';
import type { Adapter, AdapterFetchOptions } from './types.js';

const logger = createLogger('adapters:gmail');

const API_BASE = 'https://gmail.googleapis.com/gmail/v1/users';
const THREAD_LIMIT = { standard: 5, deep: 10 } as const;
const MESSAGES_PER_THREAD = 5;
const PARTICIPANTS_SHOWN = 5;
const TITLE_KEYWORDS = 3;
const BODY_MAX_CHARS = 2000;

export type GmailConfig = SourcesConfig['gmail'];

interface GmailPart {
  mimeType?: string;
  headers?: { name: string; value: string }[];
  body?: { data?: string };
  parts?: GmailPart[];
}

const partSchema: z.ZodType<GmailPart> = z.lazy(() =>
  z.object({
    mimeType: z.string().optional(),
    headers: z.array(z.object({ name: z.string(), value: z.string() })).optional(),
    body: z.object({ data: z.string().optional() }).optional(),
    parts: z.array(partSchema).optional(),
  })
);

const messageSchema = z.object({
  id: z.string(),
  threadId: z.string(),
  snippet: z.string().default(''),
  internalDate: z.string().optional(),
  payload: partSchema.optional(),
});

const listResponse = z.object({
  messages: z.array(z.object({ id: z.string(), threadId: z.string() })).default([]),
});

const threadResponse = z.object({
  id: z.string(),
  messages: z.array(messageSchema).default([]),
});

const profileResponse = z.object({
  emailAddress: z.string().optional(),
});

type GmailApiMessage = z.infer<typeof messageSchema>;

export function parseAddress(raw: string): { name: string | null; email: string } {
  const match = raw.match(/^\s*"?([^"<]*?)"?\s*<([^>]+)>\s*$/);
  if (match) {
    return { name: match[1].trim() || null, email: match[2].trim() };
  }
  return { name: null, email: raw.trim() };
}

function decode(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf8');
}

/**
 * First text/plain part, depth first; stripped HTML when there is none
 */
export function extractBody(part: GmailPart): string {
  const plain = findPart(part, 'text/plain');
  if (plain) return plain;

  const html = findPart(part, 'text/html');
  return html ? html.replace(/<[^>]+>/g, ' ').replace(/\s+/g, ' ').trim() : '';
}

function findPart(part: GmailPart, mimeType: string): string {
  if (part.mimeType === mimeType && part.body?.data) {
    return decode(part.body.data);
  }
  for (const child of part.parts ?? []) {
    const found = findPart(child, mimeType);
    if (found) return found;
  }
  return '';
}

function splitAddresses(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((address) => address.trim())
    .filter((address) => address.length > 0);
}

export function toEmailMessage(message: GmailApiMessage, fallbackDate: Date): EmailMessage {
  const headers = new Map<string, string>();
  for (const header of message.payload?.headers ?? []) {
    headers.set(header.name.toLowerCase(), header.value);
  }

  const from = parseAddress(headers.get('from') ?? '');
  const dateHeader = headers.get('date');
  let date = dateHeader ? new Date(dateHeader) : new Date(NaN);
  if (Number.isNaN(date.getTime()) && message.internalDate) {
    date = new Date(Number(message.internalDate));
  }
  if (Number.isNaN(date.getTime())) {
    date = fallbackDate;
  }

  const body = message.payload ? extractBody(message.payload) : '';

  return {
    id: message.id,
    threadId: message.threadId,
    subject: headers.get('subject') ?? '(no subject)',
    sender: from.email,
    senderName: from.name,
    recipients: [...splitAddresses(headers.get('to')), ...splitAddresses(headers.get('cc'))],
    date,
    snippet: message.snippet,
    body: body.length > BODY_MAX_CHARS ? `${body.slice(0, BODY_MAX_CHARS)}...` : body,
  };
}

export function formatEmailThreads(threads: readonly EmailThread[]): string {
  return threads
    .map((thread) => {
      const lines = [
        `**Email: ${thread.subject}**`,
        `Participants: ${thread.participants.slice(0, PARTICIPANTS_SHOWN).join(', ')}`,
        `Latest: ${thread.latestDate.toISOString().slice(0, 10)}`,
      ];
      for (const message of thread.messages.slice(0, MESSAGES_PER_THREAD)) {
        const stamp = message.date.toISOString().slice(0, 16).replace('T', ' ');
        lines.push('', `**${message.senderName ?? message.sender}** (${stamp}):`, message.body || message.snippet);
      }
      return lines.join('\n');
    })
    .join('\n\n---\n\n');
}

export interface GmailAdapterOptions {
  now?: () => Date;
}

export class GmailAdapter implements Adapter {
  readonly name = 'gmail';
  readonly sourceType = 'email' as const;
  readonly isPrimary = false;
  readonly needsPrimaryContext = true;
  private readonly http = new SourceHttpClient('gmail');
  private readonly now: () => Date;

  constructor(
    private readonly config: GmailConfig,
    options: GmailAdapterOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async fetchTaskContext(taskId: string, options: AdapterFetchOptions): Promise<SourceContext> {
    const { primaryHint, depth, signal } = options;
    const ticket = primaryHint ? findTicket([primaryHint]) : null;

    const terms = [taskId, ...(ticket ? extractKeywords(ticket.title).slice(0, TITLE_KEYWORDS) : [])];
    const query = terms.map((term) => `"${term}"`).join(' OR ');

    const refs = await this.listMessages(this.scoped(query), this.config.maxResults, signal);
    const threadIds = [...new Set(refs.map((ref) => ref.threadId))].slice(0, THREAD_LIMIT[depth]);

    const threads: EmailThread[] = [];
    for (const threadId of threadIds) {
      try {
        const thread = await this.getThread(threadId, signal);
        if (thread) threads.push(thread);
      } catch (error) {
        if (signal.aborted) throw error;
        logger.warn({ taskId, threadId, error: errorMessage(error) }, 'Email thread fetch failed, skipping');
      }
    }
    threads.sort((a, b) => b.latestDate.getTime() - a.latestDate.getTime());

    const messageCount = threads.reduce((sum, thread) => sum + thread.messages.length, 0);
    logger.debug({ taskId, threads: threads.length, messages: messageCount }, 'Fetched email threads');

    return createSourceContext({
      sourceName: this.name,
      sourceType: this.sourceType,
      data: { kind: 'emails', threads },
      rawText: formatEmailThreads(threads),
      metadata: { threadCount: threads.length, messageCount, query },
    });
  }

  async search(query: string, maxResults: number, signal?: AbortSignal): Promise<SearchResult[]> {
    const refs = (await this.listMessages(this.scoped(query), maxResults, signal)).slice(0, maxResults);

    const results: SearchResult[] = [];
    for (const [index, ref] of refs.entries()) {
      const raw = await this.http.json(
        { url: this.url(`messages/${ref.id}`, { format: 'full' }), headers: this.headers(), signal },
        messageSchema
      );
      const message = toEmailMessage(raw, this.now());
      results.push({
        sourceName: this.name,
        sourceType: this.sourceType,
        title: message.subject,
        excerpt: message.snippet,
        url: `https://mail.google.com/mail/u/0/#all/${message.threadId}`,
        relevanceScore: Math.max(0.1, 1 - index / Math.max(1, refs.length)),
      });
    }
    return results;
  }

  async healthCheck(): Promise<boolean> {
    if (!this.config.accessToken) {
      return false;
    }
    try {
      const profile = await this.http.json({ url: this.url('profile'), headers: this.headers() }, profileResponse);
      return Boolean(profile.emailAddress);
    } catch (error) {
      logger.warn({ error }, 'Gmail health check failed');
      return false;
    }
  }

  async close(): Promise<void> {
    this.http.close();
  }

  /**
   * Query with the configured scope and label filter applied
   */
  private scoped(query: string): string {
    const scoped = `${query} ${this.config.searchScope}`.trim();
    if (this.config.labels.length === 0) {
      return scoped;
    }
    const labels = this.config.labels.map((label) => `label:${label}`).join(' OR ');
    return `(${scoped}) (${labels})`;
  }

  private async listMessages(
    q: string,
    maxResults: number,
    signal?: AbortSignal
  ): Promise<{ id: string; threadId: string }[]> {
    const data = await this.http.json(
      { url: this.url('messages', { q, maxResults }), headers: this.headers(), signal },
      listResponse
    );
    return data.messages;
  }

  private async getThread(threadId: string, signal: AbortSignal): Promise<EmailThread | null> {
    const data = await this.http.json(
      { url: this.url(`threads/${threadId}`, { format: 'full' }), headers: this.headers(), signal },
      threadResponse
    );
    if (data.messages.length === 0) {
      return null;
    }

    const fallback = this.now();
    const messages = data.messages.map((message) => toEmailMessage(message, fallback));
    const participants = new Set<string>();
    for (const message of messages) {
      participants.add(message.sender);
      for (const recipient of message.recipients) participants.add(recipient);
    }

    return {
      threadId,
      subject: messages[0].subject,
      messages,
      participants: [...participants],
      latestDate: new Date(Math.max(...messages.map((message) => message.date.getTime()))),
    };
  }

  private url(path: string, params: Record<string, string | number> = {}): string {
    const url = new URL(`${API_BASE}/${encodeURIComponent(this.config.user)}/${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.config.accessToken}` };
  }
}
