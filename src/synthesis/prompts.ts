/**
 * Prompt templates for the LLM synthesis engine
 */

import { findTicket, hasText } from '../context/source-context.js';
import type { SourceContext } from '../context/types.js';

export const SYSTEM_PROMPT =
  'You are a senior engineer preparing context for a colleague about to start work on a task ' +
  'with an AI coding assistant. Only use facts present in the raw data. Never invent file paths, ' +
  'people or decisions.';

const DRAFT_TEMPLATE = `Combine the raw data below into a concise, structured context block
that gives a coding agent everything it needs to write correct, well-integrated code.

Rules:
- Target 2000-3000 tokens.
- Use these sections, skipping any with no relevant data:
  ## Task: {taskId}{title}
  ### Requirements
  ### Key Decisions
  ### Team Discussions
  ### Architecture Context
  ### Coding Standards
  ### Recent Changes
  ### Related Work
- End each fact with its source in [brackets], e.g. [Jira], [Meeting 2026-01-05], [GitHub PR #12].
- If sources conflict, say so explicitly.
- Present acceptance criteria as a checklist.
- For meeting decisions, include who decided and when.
- Architecture: exact file paths, data flow, tables, queues and endpoints only.
- Coding standards: only the specific rules that apply to this task.
- No generic advice.

Raw data:
---
{rawData}
---`;

const REFINE_TEMPLATE = `Below is a draft context block for task {taskId}, followed by the raw data it was built from.

Revise the draft:
- Remove any statement the raw data does not support.
- Add requirements, decisions or file paths from the raw data that the draft missed.
- Keep every [source] attribution and the section layout.
- Cut repetition; stay under 3000 tokens.

Return only the revised context block.

Draft:
---
{draft}
---

Raw data:
---
{rawData}
---`;

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

/**
 * Raw text of every source that produced any, labelled by source
 */
export function formatRawData(contexts: readonly SourceContext[]): string {
  return contexts
    .filter(hasText)
    .map((context) => `[${context.sourceName}]\n${context.rawText.trim()}`)
    .join('\n\n');
}

export function buildDraftPrompt(taskId: string, contexts: readonly SourceContext[]): string {
  const ticket = findTicket(contexts);
  return fill(DRAFT_TEMPLATE, {
    taskId,
    title: ticket ? ` - ${ticket.title}` : '',
    rawData: formatRawData(contexts),
  });
}

export function buildRefinePrompt(taskId: string, contexts: readonly SourceContext[], draft: string): string {
  return fill(REFINE_TEMPLATE, { taskId, draft, rawData: formatRawData(contexts) });
}
