/**
 * Template synthesis engine
 *
 * No LLM: fills the {{PLACEHOLDER}} tokens of a markdown template with the
 * text of each source type. Tokens without a value are dropped. A refine
 * pass keeps the draft.
 */

import { readFile } from 'fs/promises';
import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { hasText } from '../context/source-context.js';
import type { SourceContext, SourceType } from '../context/types.js';
import { concatenateContexts } from './concatenate.js';
import type { SynthesisEngine, SynthesisOptions } from './types.js';

const logger = createLogger('synthesis:template');

const DEFAULT_TEMPLATE = new URL('../../data/context-template.md', import.meta.url);

const SECTION_TOKENS: Record<SourceType, string> = {
  issue_tracker: 'TASK',
  meeting: 'MEETINGS',
  documentation: 'DOCUMENTATION',
  communication: 'DISCUSSIONS',
  email: 'EMAIL',
  code: 'CODE',
  cross_reference: 'RELATED',
};

const EMPTY_SECTION = '_Nothing found._';

export function renderTemplate(template: string, taskId: string, contexts: readonly SourceContext[]): string {
  const usable = contexts.filter(hasText);
  const values: Record<string, string> = {
    TASK_ID: taskId,
    SOURCES: usable.map((context) => context.sourceName).join(', ') || 'none',
  };

  for (const [sourceType, token] of Object.entries(SECTION_TOKENS)) {
    const texts = usable.filter((context) => context.sourceType === sourceType).map((context) => context.rawText.trim());
    values[token] = texts.length > 0 ? texts.join('\n\n') : EMPTY_SECTION;
  }

  return template.replace(/\{\{([A-Z_]+)\}\}/g, (_, token: string) => values[token] ?? '').trim();
}

export class TemplateSynthesisEngine implements SynthesisEngine {
  readonly name = 'template';
  private template: string | null = null;

  /** Falls back to data/context-template.md */
  constructor(private readonly templatePath?: string) {}

  async synthesize(taskId: string, contexts: readonly SourceContext[], options: SynthesisOptions): Promise<string> {
    if (options.pass === 'refine' && options.draft !== undefined) {
      return options.draft;
    }

    try {
      return renderTemplate(await this.load(), taskId, contexts);
    } catch (error) {
      logger.warn(
        { taskId, templatePath: this.templatePath, error: errorMessage(error) },
        'Template synthesis failed, using concatenation'
      );
      return concatenateContexts(taskId, contexts);
    }
  }

  async close(): Promise<void> {
    this.template = null;
  }

  private async load(): Promise<string> {
    if (this.template === null) {
      this.template = await readFile(this.templatePath ?? DEFAULT_TEMPLATE, 'utf8');
    }
    return this.template;
  }
}
