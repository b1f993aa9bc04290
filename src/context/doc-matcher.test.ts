import { describe, it, expect } from 'vitest';
import {
  extractKeywords,
  classifyDocument,
  splitSections,
  matchDocuments,
  formatSections,
} from './doc-matcher.js';
import type { DocSection } from './types.js';

describe('extractKeywords', () => {
  it('should drop stop words, action verbs and short words', () => {
    expect(extractKeywords('Add retry logic to payment webhook handler')).toEqual([
      'handler',
      'payment',
      'webhook',
      'logic',
      'retry',
    ]);
  });

  it('should deduplicate and cap at ten keywords', () => {
    const text =
      'alpha bravo charlie delta echoes foxtrot golfer hotel indigo juliet kilos limas alpha bravo';

    const keywords = extractKeywords(text);

    expect(keywords).toHaveLength(10);
    expect(new Set(keywords).size).toBe(10);
    expect(keywords.slice(0, 2)).toEqual(['charlie', 'foxtrot']);
  });

  it('should return nothing for empty text', () => {
    expect(extractKeywords('')).toEqual([]);
  });
});

describe('classifyDocument', () => {
  it('should recognise standards by name and directory', () => {
    expect(classifyDocument('CLAUDE.md')).toBe('standards');
    expect(classifyDocument('.cursorrules')).toBe('standards');
    expect(classifyDocument('team/guidelines/style.md')).toBe('standards');
    expect(classifyDocument('handbook/naming.md', 'handbook')).toBe('standards');
  });

  it('should classify ADRs, architecture and everything else', () => {
    expect(classifyDocument('docs/adr/0001-queues.md')).toBe('adr');
    expect(classifyDocument('docs/architecture/payments.md')).toBe('architecture');
    expect(classifyDocument('README.md')).toBe('other');
  });
});

describe('splitSections', () => {
  it('should split on headings and drop empty sections', () => {
    const content = 'Intro line\n# Title A\nBody a\n\n## Title B ##\nBody b\n# Empty\n';

    expect(splitSections('doc.md', content, 'other')).toEqual([
      { filePath: 'doc.md', sectionTitle: null, content: 'Intro line', docType: 'other' },
      { filePath: 'doc.md', sectionTitle: 'Title A', content: 'Body a', docType: 'other' },
      { filePath: 'doc.md', sectionTitle: 'Title B', content: 'Body b', docType: 'other' },
    ]);
  });
});

describe('matchDocuments', () => {
  const architecture: DocSection = {
    filePath: 'docs/architecture/payments-service.md',
    sectionTitle: 'Webhook Processing',
    content: 'Incoming webhook events are queued for retry.',
    docType: 'architecture',
  };
  const standards: DocSection = {
    filePath: 'docs/standards/typescript.md',
    sectionTitle: 'Errors',
    content: 'Use typed errors.',
    docType: 'standards',
  };
  const onboarding: DocSection = {
    filePath: 'docs/onboarding.md',
    sectionTitle: 'Setup',
    content: 'Install dependencies.',
    docType: 'other',
  };
  const ticket = {
    title: 'Retry failed payment webhooks',
    description: 'Deliveries are dropped.',
    components: ['payments'],
    labels: ['webhook'],
  };

  it('should score path and heading matches above body keywords', () => {
    const result = matchDocuments([architecture, standards, onboarding], ticket, { maxSections: 5 });

    expect(result.keywords).toEqual(['deliveries', 'webhooks', 'dropped', 'payment', 'failed', 'retry']);
    expect(result.matches).toEqual([
      { section: architecture, score: 5, matchedTerms: ['payments', 'webhook', 'retry'] },
    ]);
  });

  it('should always include standards sections', () => {
    const result = matchDocuments([standards, onboarding], { ...ticket, components: [], labels: [] }, {
      maxSections: 5,
    });

    expect(result.matches).toEqual([]);
    expect(result.standards).toEqual([standards]);
  });

  it('should format sections under their paths', () => {
    expect(formatSections([architecture, { ...onboarding, sectionTitle: null }])).toBe(
      '#### docs/architecture/payments-service.md > Webhook Processing\n\n' +
        'Incoming webhook events are queued for retry.\n\n' +
        '#### docs/onboarding.md\n\nInstall dependencies.'
    );
  });
});
