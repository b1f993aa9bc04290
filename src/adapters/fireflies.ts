/**
 * Fireflies Adapter
 *
 * Meeting transcripts via the Fireflies GraphQL API. Transcripts are found by
 * keyword (the task id, then the ticket title from the primary context) and
 * cut down to the sentences around each mention.
 */

import { z } from 'zod';
import type { SourcesConfig } from '../lib/config.js';
import { createLogger } from '../lib/logger.js';
import { AdapterError } from '../lib/errors.js';
import { extractKeywords } from '../context/doc-matcher.js';
import { createSourceContext, findTicket } from '../context/source-context.js';
import type { MeetingExcerpt, SearchResult, SourceContext } from '../context/types.js';
import { SourceHttpClient } from './http.js';
import type { Adapter, AdapterFetchOptions } from './types.js';

const logger = createLogger('adapters:fireflies');

const TRANSCRIPT_LIMIT = { standard: 5, deep: 10 } as const;
const SEARCH_LIMIT = 5;
const MIN_KEYWORD_HITS = 2;
const MAX_EXCERPT_SENTENCES = 12;
const DECISION_PATTERN = /\b(decided|agreed|decision|going with)\b/i;

const TRANSCRIPTS_QUERY = `
  query Transcripts($keyword: String, $limit: Int) {
    transcripts(keyword: $keyword, limit: $limit) {
      id
      title
      date
      participants
      sentences { speaker_name text }
      summary { action_items overview }
    }
  }
`;

const USER_QUERY = 'query { user { user_id } }';

export type FirefliesConfig = SourcesConfig['fireflies'];

const transcriptSchema = z.object({
  id: z.string(),
  title: z.string().nullish(),
  date: z.number().nullish(),
  participants: z.array(z.string()).nullish(),
  sentences: z
    .array(z.object({ speaker_name: z.string().nullish(), text: z.string() }))
    .nullish(),
  summary: z
    .object({
      action_items: z.string().nullish(),
      overview: z.string().nullish(),
    })
    .nullish(),
});

type Transcript = z.infer<typeof transcriptSchema>;

const graphqlErrors = z.array(z.object({ message: z.string() })).optional();

const transcriptsResponse = z.object({
  data: z.object({ transcripts: z.array(transcriptSchema).nullish() }).nullish(),
  errors: graphqlErrors,
});

const userResponse = z.object({
  data: z.object({ user: z.object({ user_id: z.string() }).nullish() }).nullish(),
  errors: graphqlErrors,
});

interface GraphqlEnvelope {
  errors?: { message: string }[];
}

export interface MentionMatcher {
  taskId: string;
  keywords: string[];
}

export function mentions(text: string, matcher: MentionMatcher): boolean {
  const lower = text.toLowerCase();
  if (lower.includes(matcher.taskId.toLowerCase())) {
    return true;
  }
  const hits = matcher.keywords.filter((keyword) => lower.includes(keyword)).length;
  return hits >= MIN_KEYWORD_HITS;
}

/**
 * The sentences mentioning the task, each with one neighbour on either side
 */
export function toMeetingExcerpt(transcript: Transcript, matcher: MentionMatcher): MeetingExcerpt | null {
  const sentences = transcript.sentences ?? [];
  const keep = new Set<number>();

  sentences.forEach((sentence, index) => {
    if (mentions(sentence.text, matcher)) {
      for (let i = Math.max(0, index - 1); i <= Math.min(sentences.length - 1, index + 1); i++) {
        keep.add(i);
      }
    }
  });

  if (keep.size === 0) {
    return null;
  }

  const selected = [...keep]
    .sort((a, b) => a - b)
    .slice(0, MAX_EXCERPT_SENTENCES)
    .map((index) => sentences[index]);

  const actionItems = (transcript.summary?.action_items ?? '')
    .split('\n')
    .map((line) => line.replace(/^[\s*•-]+/, '').trim())
    .filter((line) => line.length > 0 && mentions(line, matcher));

  return {
    meetingTitle: transcript.title ?? 'Untitled meeting',
    meetingDate: new Date(transcript.date ?? 0),
    participants: transcript.participants ?? [],
    excerpt: selected.map((sentence) => `${sentence.speaker_name ?? 'Unknown'}: ${sentence.text}`).join('\n'),
    actionItems,
    decisions: selected.map((sentence) => sentence.text).filter((text) => DECISION_PATTERN.test(text)),
  };
}

export function formatMeetings(meetings: readonly MeetingExcerpt[]): string {
  return meetings
    .map((meeting) => {
      const lines = [`**${meeting.meetingTitle}** (${meeting.meetingDate.toISOString().slice(0, 10)})`];
      if (meeting.participants.length > 0) {
        lines.push(`Participants: ${meeting.participants.join(', ')}`);
      }
      lines.push(meeting.excerpt);
      if (meeting.decisions.length > 0) {
        lines.push('Decisions:', ...meeting.decisions.map((decision) => `- ${decision}`));
      }
      if (meeting.actionItems.length > 0) {
        lines.push('Action items:', ...meeting.actionItems.map((item) => `- ${item}`));
      }
      return lines.join('\n');
    })
    .join('\n\n');
}

export class FirefliesAdapter implements Adapter {
  readonly name = 'fireflies';
  readonly sourceType = 'meeting' as const;
  readonly isPrimary = false;
  readonly needsPrimaryContext = true;
  private readonly http = new SourceHttpClient('fireflies');

  constructor(private readonly config: FirefliesConfig) {}

  async fetchTaskContext(taskId: string, options: AdapterFetchOptions): Promise<SourceContext> {
    const { primaryHint, depth, signal } = options;
    const limit = TRANSCRIPT_LIMIT[depth];
    const ticket = primaryHint ? findTicket([primaryHint]) : null;

    const terms = [taskId];
    if (ticket?.title) {
      terms.push(ticket.title);
    }

    const found = new Map<string, Transcript>();
    for (const term of terms) {
      for (const transcript of await this.transcripts(term, limit, signal)) {
        if (!found.has(transcript.id)) {
          found.set(transcript.id, transcript);
        }
      }
    }

    const matcher: MentionMatcher = {
      taskId,
      keywords: ticket ? extractKeywords(`${ticket.title} ${ticket.description ?? ''}`) : [],
    };
    const meetings = [...found.values()]
      .map((transcript) => toMeetingExcerpt(transcript, matcher))
      .filter((meeting): meeting is MeetingExcerpt => meeting !== null)
      .sort((a, b) => b.meetingDate.getTime() - a.meetingDate.getTime())
      .slice(0, limit);

    logger.debug({ taskId, transcripts: found.size, meetings: meetings.length }, 'Fetched Fireflies transcripts');

    return createSourceContext({
      sourceName: this.name,
      sourceType: this.sourceType,
      data: { kind: 'meetings', meetings },
      rawText: formatMeetings(meetings),
      metadata: { transcriptCount: found.size, usedTicketHint: ticket !== null },
    });
  }

  async search(query: string, maxResults: number, signal?: AbortSignal): Promise<SearchResult[]> {
    const transcripts = await this.transcripts(query, Math.min(maxResults, SEARCH_LIMIT), signal);
    const matcher: MentionMatcher = { taskId: query, keywords: extractKeywords(query) };

    return transcripts.map((transcript) => {
      const hits = (transcript.sentences ?? []).filter((sentence) => mentions(sentence.text, matcher));
      const excerpt = hits.length > 0
        ? hits.slice(0, 3).map((sentence) => sentence.text).join(' ')
        : transcript.summary?.overview ?? '';

      return {
        sourceName: this.name,
        sourceType: this.sourceType,
        title: transcript.title ?? 'Untitled meeting',
        excerpt: excerpt.slice(0, 300),
        url: `https://app.fireflies.ai/view/${transcript.id}`,
        relevanceScore: Math.min(1, 0.5 + hits.length * 0.1),
      };
    });
  }

  async healthCheck(): Promise<boolean> {
    if (!this.config.apiKey) {
      return false;
    }
    try {
      const response = await this.graphql(USER_QUERY, {}, userResponse);
      return Boolean(response.data?.user);
    } catch (error) {
      logger.warn({ error }, 'Fireflies health check failed');
      return false;
    }
  }

  async close(): Promise<void> {
    this.http.close();
  }

  private async transcripts(keyword: string, limit: number, signal?: AbortSignal): Promise<Transcript[]> {
    const response = await this.graphql(TRANSCRIPTS_QUERY, { keyword, limit }, transcriptsResponse, signal);
    return response.data?.transcripts ?? [];
  }

  private async graphql<R extends GraphqlEnvelope>(
    query: string,
    variables: Record<string, unknown>,
    schema: z.ZodType<R, z.ZodTypeDef, unknown>,
    signal?: AbortSignal
  ): Promise<R> {
    const response = await this.http.json(
      {
        url: this.config.url,
        method: 'POST',
        headers: { Authorization: `Bearer ${this.config.apiKey}` },
        body: { query, variables },
        signal,
      },
      schema
    );

    if (response.errors && response.errors.length > 0) {
      throw new AdapterError(this.name, `GraphQL error: ${response.errors[0].message}`);
    }
    return response;
  }
}
