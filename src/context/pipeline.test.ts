import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PreprocessingPipeline, computeSourceHash, sourceVersionOf } from './pipeline.js';
import { FetchCoordinator } from './fetch-coordinator.js';
import { createAdapterRegistry } from '../adapters/registry.js';
import { createSourceContext } from './source-context.js';
import { TaskNotFoundError } from '../lib/errors.js';
import { FakeAdapter, FakeDocsAdapter, FakeEngine, makeTicket } from './__tests__/fakes.js';
import type { Adapter } from '../adapters/types.js';
import type { PrebuiltRecord } from './types.js';

vi.mock('../lib/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

vi.mock('uuid', () => ({
  v4: vi.fn(() => 'test-uuid'),
}));

const NOW = Date.parse('2026-02-01T08:00:00Z');

function jiraAdapter(): FakeAdapter {
  const ticket = makeTicket();
  return new FakeAdapter({
    name: 'jira',
    sourceType: 'issue_tracker',
    isPrimary: true,
    data: { kind: 'ticket', ticket, comments: [], linkedIssues: [] },
    rawText: 'PAY-101: Retry failed payment webhooks',
    metadata: { version: '2026-01-06T10:00:00.000Z' },
  });
}

function setup(adapters: Adapter[], engine = new FakeEngine()) {
  const registry = createAdapterRegistry(adapters);
  const coordinator = new FetchCoordinator();
  const put = vi.fn(async (_record: PrebuiltRecord) => undefined);
  const pipeline = new PreprocessingPipeline(
    { registry, coordinator, engine, storage: { put } },
    { perSourceTimeoutMs: 100, overallTimeoutMs: 1000, deepTimeoutMultiplier: 3, ttlHours: 24, now: () => NOW }
  );
  return { pipeline, put, coordinator, engine };
}

describe('PreprocessingPipeline', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should score 0.70 for a ticket with docs but no meetings or linked issues', async () => {
    const docs = new FakeDocsAdapter({ rawText: 'default docs' });
    const meetings = new FakeAdapter({ name: 'fireflies', sourceType: 'meeting', rawText: '' });
    const { pipeline, put } = setup([jiraAdapter(), docs, meetings]);

    const record = await pipeline.build('PAY-101');

    expect(record.qualityScore).toBe(0.7);
    expect(record.gaps.map((gap) => gap.description)).toEqual(['No related meetings found', 'No linked issues']);
    expect(docs.broadSearchCalls.map((ticket) => ticket.taskId)).toEqual(['PAY-101']);
    expect(put).toHaveBeenCalledWith(record);
  });

  it('should persist the record fields', async () => {
    const { pipeline } = setup([jiraAdapter(), new FakeDocsAdapter({}), new FakeAdapter({ name: 'fireflies', sourceType: 'meeting', rawText: '' })]);

    const record = await pipeline.build('PAY-101');

    expect(record).toMatchObject({
      taskId: 'PAY-101',
      body: 'refined:draft:PAY-101:3',
      sourcesUsed: ['jira', 'local_docs'],
      sourceVersion: '2026-01-06T10:00:00.000Z',
      status: 'active',
      createdAt: new Date(NOW),
      expiresAt: new Date(NOW + 24 * 3_600_000),
    });
    expect(record.sourceDataHash).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should run a draft pass then a refine pass with the draft', async () => {
    const { pipeline, engine } = setup([jiraAdapter()]);

    await pipeline.build('PAY-101');

    expect(engine.calls.map((call) => call.options)).toEqual([
      { pass: 'draft' },
      { pass: 'refine', draft: 'draft:PAY-101:1' },
    ]);
  });

  it('should fall back to concatenation when the draft pass throws', async () => {
    const { pipeline } = setup([jiraAdapter()], new FakeEngine({ draftError: new Error('provider down') }));

    const record = await pipeline.build('PAY-101');

    expect(record.body).toBe('## Context: PAY-101\n\n### Task (jira)\n\nPAY-101: Retry failed payment webhooks');
  });

  it('should keep the draft when the refine pass throws', async () => {
    const { pipeline } = setup([jiraAdapter()], new FakeEngine({ refineError: new Error('provider down') }));

    const record = await pipeline.build('PAY-101');

    expect(record.body).toBe('draft:PAY-101:1');
  });

  it('should keep the docs adapter result when broad search fails', async () => {
    const docs = new FakeDocsAdapter(
      { rawText: 'fetched docs', metadata: { matchCount: 2 } },
      { broadSearch: async () => Promise.reject(new Error('EACCES')) }
    );
    const { pipeline } = setup([jiraAdapter(), docs]);

    const record = await pipeline.build('PAY-101');

    expect(record.sourcesUsed).toEqual(['jira', 'local_docs']);
    expect(record.gaps.map((gap) => gap.kind)).not.toContain('missing_docs');
  });

  it('should add cross-references from meeting mentions', async () => {
    const meetings = new FakeAdapter({
      name: 'fireflies',
      sourceType: 'meeting',
      rawText: 'Payments sync',
      data: {
        kind: 'meetings',
        meetings: [
          {
            meetingTitle: 'Payments sync',
            meetingDate: new Date('2026-01-04T15:00:00Z'),
            participants: [],
            excerpt: 'PAY-101 needs backoff',
            actionItems: [],
            decisions: [],
          },
        ],
      },
    });
    const { pipeline, engine } = setup([jiraAdapter(), meetings]);

    const record = await pipeline.build('PAY-101');

    expect(record.body).toBe('refined:draft:PAY-101:3');
    expect(record.sourcesUsed).toEqual(['jira', 'fireflies']);
    expect(engine.calls).toHaveLength(2);
  });

  it('should use deep fetch with multiplied timeouts', async () => {
    const { pipeline, coordinator } = setup([jiraAdapter()]);
    const fetchSpy = vi.spyOn(coordinator, 'fetch');

    await pipeline.build('PAY-101');

    expect(fetchSpy).toHaveBeenCalledWith('PAY-101', expect.any(Array), {
      perSourceTimeoutMs: 300,
      overallTimeoutMs: 3000,
      depth: 'deep',
    });
  });

  it('should throw TaskNotFoundError and store nothing when no source has text', async () => {
    const { pipeline, put } = setup([
      new FakeAdapter({ name: 'jira', sourceType: 'issue_tracker', isPrimary: true, rawText: '' }),
    ]);

    await expect(pipeline.build('PAY-404')).rejects.toBeInstanceOf(TaskNotFoundError);
    expect(put).not.toHaveBeenCalled();
  });
});

describe('computeSourceHash', () => {
  const context = (rawText: string, sourceName = 'jira') =>
    createSourceContext({ sourceName, sourceType: 'issue_tracker', rawText });

  it('should ignore whitespace differences', () => {
    expect(computeSourceHash([context('  a   b\n\tc ')])).toBe(computeSourceHash([context('a b c')]));
  });

  it('should change when source text changes', () => {
    expect(computeSourceHash([context('a b c')])).not.toBe(computeSourceHash([context('a b d')]));
  });

  it('should ignore failed and cross-reference contexts', () => {
    const crossReference = createSourceContext({
      sourceName: 'cross-reference',
      sourceType: 'cross_reference',
      rawText: 'mentions',
    });

    expect(computeSourceHash([context('a'), crossReference, context('', 'slack')])).toBe(
      computeSourceHash([context('a')])
    );
  });
});

describe('sourceVersionOf', () => {
  it('should read the issue tracker version token', () => {
    const ticket = createSourceContext({
      sourceName: 'jira',
      sourceType: 'issue_tracker',
      rawText: 'x',
      metadata: { version: 'v7' },
    });

    expect(sourceVersionOf([ticket])).toBe('v7');
    expect(sourceVersionOf([])).toBeNull();
  });
});
