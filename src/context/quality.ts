/**
 * Quality Scorer
 *
 * Weighted presence model over six fixed factors. Each factor scores its full
 * weight when its signal is present, zero otherwise. Pure: no clock, no I/O.
 */

import { hasText } from './source-context.js';
import type { Gap, GapKind, QualityResult, SourceContext, TicketFields } from './types.js';

interface Factor {
  kind: GapKind;
  weight: number;
  description: string;
  present: (fields: TicketFields, contexts: readonly SourceContext[]) => boolean;
}

// Weights sum to 1.0
const FACTORS: readonly Factor[] = [
  {
    kind: 'missing_acceptance_criteria',
    weight: 0.25,
    description: 'No acceptance criteria defined',
    present: (fields) => (fields.acceptanceCriteria ?? '').trim().length > 0,
  },
  {
    kind: 'missing_components',
    weight: 0.15,
    description: 'No components assigned',
    present: (fields) => fields.components.length > 0,
  },
  {
    kind: 'missing_labels',
    weight: 0.1,
    description: 'No labels assigned',
    present: (fields) => fields.labels.length > 0,
  },
  {
    kind: 'missing_meetings',
    weight: 0.2,
    description: 'No related meetings found',
    present: (_, contexts) => contexts.some((context) => context.sourceType === 'meeting' && hasText(context)),
  },
  {
    kind: 'missing_docs',
    weight: 0.2,
    description: 'No matching documentation found',
    present: (_, contexts) => contexts.some(hasDocumentationMatch),
  },
  {
    kind: 'missing_linked_issues',
    weight: 0.1,
    description: 'No linked issues',
    present: (fields) => fields.linkedIssues.length > 0,
  },
];

/**
 * A documentation context counts when it matched something for the task.
 * Standards documents included unconditionally do not.
 */
function hasDocumentationMatch(context: SourceContext): boolean {
  if (context.sourceType !== 'documentation' || context.error) {
    return false;
  }
  const matchCount = context.metadata.matchCount;
  if (typeof matchCount === 'number') {
    return matchCount > 0;
  }
  return hasText(context);
}

export function score(fields: TicketFields, contexts: readonly SourceContext[]): QualityResult {
  let total = 0;
  const gaps: Gap[] = [];

  for (const factor of FACTORS) {
    if (factor.present(fields, contexts)) {
      total += factor.weight;
    } else {
      gaps.push({ kind: factor.kind, description: factor.description });
    }
  }

  return {
    qualityScore: Math.round(total * 100) / 100,
    gaps,
  };
}

/**
 * Ticket fields from the issue-tracker payload; empty when no tracker answered
 */
export function extractTicketFields(contexts: readonly SourceContext[]): TicketFields {
  for (const context of contexts) {
    if (context.error || context.data?.kind !== 'ticket') continue;
    const { ticket, linkedIssues } = context.data;
    return {
      acceptanceCriteria: ticket.acceptanceCriteria,
      components: [...ticket.components],
      labels: [...ticket.labels],
      linkedIssues: linkedIssues.map((issue) => issue.taskId),
    };
  }
  return { acceptanceCriteria: null, components: [], labels: [], linkedIssues: [] };
}
