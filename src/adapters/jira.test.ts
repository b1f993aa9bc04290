import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { JiraAdapter as JiraAdapterType } from './jira.js';

// Track fetch calls for assertions
let fetchCalls: { url: string; options?: RequestInit }[] = [];
let fetchResponses: Map<string, { status: number; body: unknown }> = new Map();

function defaultFetchImpl(url: string, options?: RequestInit): Promise<Response> {
  fetchCalls.push({ url, options });

  // Longest matching pattern wins
  const patterns = [...fetchResponses.keys()].sort((a, b) => b.length - a.length);
  for (const pattern of patterns) {
    const response = fetchResponses.get(pattern);
    if (response && url.includes(pattern)) {
      return Promise.resolve(
        new Response(JSON.stringify(response.body), {
          status: response.status,
          statusText: response.status === 404 ? 'Not Found' : '',
        })
      );
    }
  }

  return Promise.resolve(new Response('{}', { status: 200 }));
}

const mockFetch = vi.fn(defaultFetchImpl);

vi.stubGlobal('fetch', mockFetch);

vi.mock('../lib/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  }),
}));

const jiraConfig = {
  enabled: true,
  baseUrl: 'https://jira.example.test/',
  email: 'bot@example.test',
  apiToken: 'test-secret',
  primary: true,
};

function paragraph(text: string) {
  return { type: 'paragraph', content: [{ type: 'text', text }] };
}

const issueBody = {
  key: 'PAY-101',
  fields: {
    summary: 'Retry failed payment webhooks',
    description: {
      type: 'doc',
      version: 1,
      content: [
        paragraph('Webhook deliveries are dropped on timeout.'),
        { type: 'heading', attrs: { level: 2 }, content: [{ type: 'text', text: 'Acceptance Criteria' }] },
        { type: 'bulletList', content: [{ type: 'listItem', content: [paragraph('Retried three times')] }] },
      ],
    },
    status: { name: 'Ready for Development' },
    assignee: { displayName: 'Dana' },
    labels: ['webhook'],
    components: [{ name: 'payments' }],
    issuelinks: [
      {
        type: { name: 'Blocks', outward: 'blocks', inward: 'is blocked by' },
        outwardIssue: { key: 'PAY-90', fields: { summary: 'Webhook signing', status: { name: 'Done' } } },
      },
      {
        type: { name: 'Relates', outward: 'relates to', inward: 'relates to' },
        inwardIssue: { key: 'OPS-7', fields: { summary: 'Queue alerts' } },
      },
    ],
    created: '2026-01-02T09:00:00.000+0000',
    updated: '2026-01-06T10:00:00.000+0000',
    customfield_10016: 3,
    customfield_10020: [{ name: 'Sprint 1' }, { name: 'Sprint 2' }],
  },
};

const commentsBody = {
  comments: [
    {
      author: { displayName: 'Sam' },
      body: { type: 'doc', version: 1, content: [paragraph('Provider retries after 30s.')] },
      created: '2026-01-05T08:30:00.000+0000',
    },
  ],
};

describe('Jira adapter', () => {
  let adapter: JiraAdapterType;

  beforeEach(async () => {
    vi.clearAllMocks();
    fetchCalls = [];
    fetchResponses = new Map();
    const { JiraAdapter } = await import('./jira.js');
    adapter = new JiraAdapter(jiraConfig);
  });

  afterEach(async () => {
    await adapter.close();
  });

  describe('adfToText', () => {
    it('should flatten nested nodes with a newline after each block', async () => {
      const { adfToText } = await import('./jira.js');

      expect(adfToText(issueBody.fields.description)).toBe(
        'Webhook deliveries are dropped on timeout.\nAcceptance Criteria\nRetried three times'
      );
    });

    it('should pass plain strings through and ignore other values', async () => {
      const { adfToText } = await import('./jira.js');

      expect(adfToText('plain')).toBe('plain');
      expect(adfToText(null)).toBe('');
      expect(adfToText(42)).toBe('');
    });
  });

  describe('extractAcceptanceCriteria', () => {
    it('should take the lines under the heading up to the next section', async () => {
      const { extractAcceptanceCriteria } = await import('./jira.js');

      const description = [
        'Context first.',
        '## Acceptance Criteria',
        '- retries three times',
        '- alerts on final failure',
        '## Notes',
        'unrelated',
      ].join('\n');

      expect(extractAcceptanceCriteria(description)).toBe('- retries three times\n- alerts on final failure');
    });

    it('should return null without a criteria section', async () => {
      const { extractAcceptanceCriteria } = await import('./jira.js');

      expect(extractAcceptanceCriteria('Just a description')).toBeNull();
      expect(extractAcceptanceCriteria(null)).toBeNull();
    });
  });

  describe('parseJiraDate', () => {
    it('should accept offsets without a colon', async () => {
      const { parseJiraDate } = await import('./jira.js');

      expect(parseJiraDate('2026-01-06T12:00:00.000+0200').toISOString()).toBe('2026-01-06T10:00:00.000Z');
      expect(parseJiraDate('2026-01-06T10:00:00.000Z').toISOString()).toBe('2026-01-06T10:00:00.000Z');
    });
  });

  describe('buildStatusJql', () => {
    it('should scope to several projects and escape the status', async () => {
      const { buildStatusJql } = await import('./jira.js');

      expect(buildStatusJql('Say "go"', ['PAY', 'OPS'])).toBe(
        'project IN (PAY, OPS) AND status = "Say \\"go\\"" AND updated >= -1h ORDER BY updated DESC'
      );
    });

    it('should handle one project and none', async () => {
      const { buildStatusJql } = await import('./jira.js');

      expect(buildStatusJql('Ready', ['PAY'])).toBe(
        'project = "PAY" AND status = "Ready" AND updated >= -1h ORDER BY updated DESC'
      );
      expect(buildStatusJql('Ready', [])).toBe('status = "Ready" AND updated >= -1h ORDER BY updated DESC');
    });
  });

  describe('fetchTaskContext', () => {
    it('should build a ticket context with comments and links', async () => {
      fetchResponses.set('/issue/PAY-101?', { status: 200, body: issueBody });
      fetchResponses.set('/issue/PAY-101/comment', { status: 200, body: commentsBody });

      const context = await adapter.fetchTaskContext('PAY-101', {
        primaryHint: null,
        depth: 'standard',
        signal: new AbortController().signal,
      });

      expect(context.sourceName).toBe('jira');
      expect(context.sourceType).toBe('issue_tracker');
      expect(context.metadata).toEqual({
        version: '2026-01-06T10:00:00.000Z',
        url: 'https://jira.example.test/browse/PAY-101',
      });

      if (context.data?.kind !== 'ticket') {
        throw new Error('expected a ticket payload');
      }
      expect(context.data.ticket).toMatchObject({
        taskId: 'PAY-101',
        status: 'Ready for Development',
        assignee: 'Dana',
        components: ['payments'],
        acceptanceCriteria: 'Retried three times',
        storyPoints: 3,
        sprint: 'Sprint 2',
      });
      expect(context.data.linkedIssues).toEqual([
        { taskId: 'PAY-90', title: 'Webhook signing', status: 'Done', linkType: 'blocks' },
        { taskId: 'OPS-7', title: 'Queue alerts', status: 'Unknown', linkType: 'relates to' },
      ]);

      const lines = context.rawText.split('\n');
      expect(lines[0]).toBe('**PAY-101: Retry failed payment webhooks**');
      expect(lines).toContain('Sprint: Sprint 2');
      expect(lines).toContain('- blocks PAY-90: Webhook signing (Done)');
      expect(lines).toContain('- Sam (2026-01-05): Provider retries after 30s.');
    });

    it('should send basic auth and ask for more comments on deep fetches', async () => {
      fetchResponses.set('/issue/PAY-101?', { status: 200, body: issueBody });
      fetchResponses.set('/issue/PAY-101/comment', { status: 200, body: commentsBody });

      await adapter.fetchTaskContext('PAY-101', {
        primaryHint: null,
        depth: 'deep',
        signal: new AbortController().signal,
      });

      expect(fetchCalls[1].url).toBe(
        'https://jira.example.test/rest/api/3/issue/PAY-101/comment?maxResults=50&orderBy=-created'
      );
      const expectedAuth = `Basic ${Buffer.from('bot@example.test:test-secret').toString('base64')}`;
      expect(fetchCalls[0].options?.headers).toMatchObject({ Authorization: expectedAuth });
    });

    it('should report a missing task as a 404 adapter error', async () => {
      fetchResponses.set('/issue/PAY-404', { status: 404, body: { errorMessages: ['Issue does not exist'] } });

      await expect(
        adapter.fetchTaskContext('PAY-404', {
          primaryHint: null,
          depth: 'standard',
          signal: new AbortController().signal,
        })
      ).rejects.toMatchObject({ name: 'AdapterError', status: 404, message: 'jira: task PAY-404 not found' });
    });
  });

  describe('search', () => {
    it('should rank issues by response position', async () => {
      fetchResponses.set('/search', {
        status: 200,
        body: {
          issues: [
            { key: 'PAY-1', fields: { summary: 'Webhook retries', description: 'Retry policy' } },
            { key: 'PAY-2', fields: { summary: 'Webhook signing' } },
          ],
        },
      });

      const results = await adapter.search('webhook', 5);

      expect(results).toEqual([
        {
          sourceName: 'jira',
          sourceType: 'issue_tracker',
          title: 'PAY-1: Webhook retries',
          excerpt: 'Retry policy',
          url: 'https://jira.example.test/browse/PAY-1',
          relevanceScore: 1,
        },
        {
          sourceName: 'jira',
          sourceType: 'issue_tracker',
          title: 'PAY-2: Webhook signing',
          excerpt: '',
          url: 'https://jira.example.test/browse/PAY-2',
          relevanceScore: 0.5,
        },
      ]);
      expect(new URL(fetchCalls[0].url).searchParams.get('jql')).toBe('text ~ "webhook"');
    });
  });

  describe('probeVersion', () => {
    it('should return the normalized updated timestamp', async () => {
      fetchResponses.set('/issue/PAY-101', { status: 200, body: { fields: { updated: '2026-01-06T10:00:00.000+0000' } } });

      expect(await adapter.probeVersion('PAY-101')).toBe('2026-01-06T10:00:00.000Z');
      expect(new URL(fetchCalls[0].url).searchParams.get('fields')).toBe('updated');
    });
  });

  describe('findTasksByStatus', () => {
    it('should return the keys found by the status query', async () => {
      fetchResponses.set('/search', { status: 200, body: { issues: [{ key: 'PAY-1' }, { key: 'PAY-2' }] } });

      const keys = await adapter.findTasksByStatus('Ready for Development', ['PAY']);

      expect(keys).toEqual(['PAY-1', 'PAY-2']);
      const params = new URL(fetchCalls[0].url).searchParams;
      expect(params.get('maxResults')).toBe('50');
      expect(params.get('fields')).toBe('key');
    });
  });

  describe('healthCheck', () => {
    it('should be unhealthy without credentials and not call the API', async () => {
      const { JiraAdapter } = await import('./jira.js');
      const unconfigured = new JiraAdapter({ ...jiraConfig, apiToken: '' });

      expect(await unconfigured.healthCheck()).toBe(false);
      expect(mockFetch).not.toHaveBeenCalled();
      await unconfigured.close();
    });

    it('should check the current user endpoint', async () => {
      fetchResponses.set('/myself', { status: 200, body: { accountId: 'abc' } });

      expect(await adapter.healthCheck()).toBe(true);
      expect(fetchCalls[0].url).toBe('https://jira.example.test/rest/api/3/myself');
    });

    it('should be unhealthy when the API rejects the credentials', async () => {
      fetchResponses.set('/myself', { status: 401, body: {} });

      expect(await adapter.healthCheck()).toBe(false);
    });
  });
});
