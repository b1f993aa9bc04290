import type { SourceContext, SourceType } from '../context/types.js';
import { hasText } from '../context/source-context.js';

const SECTION_TITLES: Record<SourceType, string> = {
  issue_tracker: 'Task',
  meeting: 'Meetings',
  documentation: 'Documentation',
  communication: 'Discussions',
  email: 'Email',
  code: 'Code Activity',
  cross_reference: 'Related Mentions',
};

/**
 * Plain markdown body: one section per source that produced text
 */
export function concatenateContexts(taskId: string, contexts: readonly SourceContext[]): string {
  const parts = [`## Context: ${taskId}`];

  for (const context of contexts) {
    if (!hasText(context)) continue;
    const title = SECTION_TITLES[context.sourceType];
    parts.push('', `### ${title} (${context.sourceName})`, '', context.rawText.trim());
  }

  if (parts.length === 1) {
    parts.push('', '_No context available from any source._');
  }

  return parts.join('\n');
}
