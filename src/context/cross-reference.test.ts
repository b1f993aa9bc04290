import { describe, it, expect } from 'vitest';
import { buildCrossReference, findMentions } from './cross-reference.js';
import { createSourceContext } from './source-context.js';
import { makeTicket } from './__tests__/fakes.js';
import type { SourceContext } from './types.js';

const meetings: SourceContext = createSourceContext({
  sourceName: 'fireflies',
  sourceType: 'meeting',
  rawText: 'meeting notes',
  data: {
    kind: 'meetings',
    meetings: [
      {
        meetingTitle: 'Payments sync',
        meetingDate: new Date('2026-01-04T15:00:00Z'),
        participants: ['dev-one'],
        excerpt: 'We agreed PAY-101 needs   backoff.',
        actionItems: [],
        decisions: [],
      },
      {
        meetingTitle: 'Design review',
        meetingDate: new Date('2026-01-03T15:00:00Z'),
        participants: [],
        excerpt: 'Payment provider webhooks time out under load.',
        actionItems: [],
        decisions: [],
      },
      {
        meetingTitle: 'Retro',
        meetingDate: new Date('2026-01-02T15:00:00Z'),
        participants: [],
        excerpt: 'Lunch menu was fine.',
        actionItems: [],
        decisions: [],
      },
    ],
  },
});

const messages: SourceContext = createSourceContext({
  sourceName: 'slack',
  sourceType: 'communication',
  rawText: 'threads',
  data: {
    kind: 'messages',
    threads: [
      {
        parent: {
          id: '1',
          channel: 'payments',
          author: 'dev-two',
          text: 'Are failed deliveries retried?',
          timestamp: new Date('2026-01-05T08:00:00Z'),
          permalink: null,
        },
        replies: [],
      },
    ],
  },
});

describe('findMentions', () => {
  it('should score id mentions and keyword hits', () => {
    const mentions = findMentions(makeTicket(), [meetings, messages]);

    expect(mentions.map((mention) => [mention.label, mention.score])).toEqual([
      ['Design review (2026-01-03)', 4],
      ['Payments sync (2026-01-04)', 3],
      ['#payments (dev-two)', 2],
    ]);
  });
});

describe('buildCrossReference', () => {
  it('should list mentions in a cross_reference context', () => {
    const result = buildCrossReference(makeTicket(), [meetings]);

    expect(result?.sourceType).toBe('cross_reference');
    expect(result?.metadata.matchCount).toBe(2);
    expect(result?.rawText).toBe(
      'Mentions of PAY-101 across sources:\n' +
        '- [fireflies] Design review (2026-01-03): Payment provider webhooks time out under load.\n' +
        '- [fireflies] Payments sync (2026-01-04): We agreed PAY-101 needs backoff.'
    );
  });

  it('should return null when nothing mentions the ticket', () => {
    expect(buildCrossReference(makeTicket({ taskId: 'OPS-9', title: 'Rotate keys', description: null }), [meetings])).toBeNull();
  });
});
