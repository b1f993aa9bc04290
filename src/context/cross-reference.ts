/**
 * Cross-source matching
 *
 * Correlates meeting excerpts, message threads and email threads with a ticket by its id
 * and title/description keywords. The strongest mentions are gathered into
 * one extra context so synthesis sees where the task was discussed.
 */

import { extractKeywords } from './doc-matcher.js';
import { createSourceContext, hasText } from './source-context.js';
import type { SourceContext, SourceType, Ticket } from './types.js';

const ID_WEIGHT = 3;
const MIN_KEYWORD_HITS = 2;
const MAX_MENTIONS = 10;
const EXCERPT_CHARS = 400;

export interface Mention {
  sourceName: string;
  label: string;
  text: string;
  score: number;
}

interface Candidate {
  sourceName: string;
  label: string;
  text: string;
}

function candidatesFrom(context: SourceContext): Candidate[] {
  const data = context.data;
  if (!data || context.error) return [];

  if (data.kind === 'meetings') {
    return data.meetings.map((meeting) => ({
      sourceName: context.sourceName,
      label: `${meeting.meetingTitle} (${meeting.meetingDate.toISOString().slice(0, 10)})`,
      text: [meeting.excerpt, ...meeting.decisions, ...meeting.actionItems].join('\n'),
    }));
  }

  if (data.kind === 'messages') {
    return data.threads.map((thread) => ({
      sourceName: context.sourceName,
      label: `#${thread.parent.channel} (${thread.parent.author})`,
      text: [thread.parent.text, ...thread.replies.map((reply) => reply.text)].join('\n'),
    }));
  }

  if (data.kind === 'emails') {
    return data.threads.map((thread) => ({
      sourceName: context.sourceName,
      label: `${thread.subject} (${thread.latestDate.toISOString().slice(0, 10)})`,
      text: [thread.subject, ...thread.messages.map((message) => message.body || message.snippet)].join('\n'),
    }));
  }

  return [];
}

const DISCUSSION_SOURCES: ReadonlySet<SourceType> = new Set(['meeting', 'communication', 'email']);

/**
 * Ranked mentions of the ticket. A mention needs the ticket id or at least
 * two keywords.
 */
export function findMentions(ticket: Pick<Ticket, 'taskId' | 'title' | 'description'>, contexts: readonly SourceContext[]): Mention[] {
  const keywords = extractKeywords(`${ticket.title} ${ticket.description ?? ''}`);
  const taskId = ticket.taskId.toLowerCase();
  const mentions: Mention[] = [];

  for (const context of contexts) {
    if (!DISCUSSION_SOURCES.has(context.sourceType)) continue;

    for (const candidate of candidatesFrom(context)) {
      const text = candidate.text.toLowerCase();
      const mentionsId = text.includes(taskId);
      const keywordHits = keywords.filter((keyword) => text.includes(keyword)).length;

      if (!mentionsId && keywordHits < MIN_KEYWORD_HITS) continue;

      mentions.push({
        ...candidate,
        score: (mentionsId ? ID_WEIGHT : 0) + keywordHits,
      });
    }
  }

  return mentions.sort((a, b) => b.score - a.score).slice(0, MAX_MENTIONS);
}

function clip(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > EXCERPT_CHARS ? `${flat.slice(0, EXCERPT_CHARS)}...` : flat;
}

/**
 * Context listing the mentions, or null when nothing matched
 */
export function buildCrossReference(ticket: Ticket, contexts: readonly SourceContext[]): SourceContext | null {
  const usable = contexts.filter(hasText);
  const mentions = findMentions(ticket, usable);
  if (mentions.length === 0) return null;

  const lines = mentions.map((mention) => `- [${mention.sourceName}] ${mention.label}: ${clip(mention.text)}`);

  return createSourceContext({
    sourceName: 'cross-reference',
    sourceType: 'cross_reference',
    rawText: `Mentions of ${ticket.taskId} across sources:\n${lines.join('\n')}`,
    metadata: { matchCount: mentions.length },
  });
}
