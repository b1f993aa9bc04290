/**
 * LLM synthesis engine
 *
 * Draft pass writes the structured context block from raw source text;
 * refine pass revises a draft against the same data. Provider failures
 * fall back to concatenation (draft) or the unchanged draft (refine).
 */

import { createLogger } from '../lib/logger.js';
import { CancelledError, SynthesisError, errorMessage } from '../lib/errors.js';
import { hasText } from '../context/source-context.js';
import type { SourceContext } from '../context/types.js';
import { concatenateContexts } from './concatenate.js';
import { SYSTEM_PROMPT, buildDraftPrompt, buildRefinePrompt } from './prompts.js';
import type { CompletionProvider, SynthesisEngine, SynthesisOptions } from './types.js';

const logger = createLogger('synthesis:llm');

export interface LlmEngineOptions {
  maxOutputTokens: number;
}

export class LlmSynthesisEngine implements SynthesisEngine {
  readonly name = 'llm';

  constructor(
    private readonly provider: CompletionProvider,
    private readonly options: LlmEngineOptions
  ) {}

  async synthesize(taskId: string, contexts: readonly SourceContext[], options: SynthesisOptions): Promise<string> {
    if (!contexts.some(hasText)) {
      return `## Task: ${taskId}\n\nNo context found for this task.`;
    }

    if (options.pass === 'refine') {
      if (options.draft === undefined) {
        throw new SynthesisError('Refine pass needs a draft');
      }
      return this.refine(taskId, contexts, options.draft, options.signal);
    }

    try {
      const body = await this.provider.complete({
        system: SYSTEM_PROMPT,
        prompt: buildDraftPrompt(taskId, contexts),
        maxTokens: this.options.maxOutputTokens,
        signal: options.signal,
      });
      logger.info({ taskId, provider: this.provider.name, pass: 'draft' }, 'Synthesis completed');
      return body;
    } catch (error) {
      if (options.signal?.aborted) {
        throw new CancelledError(`Synthesis of ${taskId} cancelled`);
      }
      logger.warn(
        { taskId, provider: this.provider.name, error: errorMessage(error) },
        'LLM synthesis failed, using concatenation'
      );
      return concatenateContexts(taskId, contexts);
    }
  }

  async close(): Promise<void> {
    this.provider.close();
  }

  private async refine(
    taskId: string,
    contexts: readonly SourceContext[],
    draft: string,
    signal?: AbortSignal
  ): Promise<string> {
    try {
      const body = await this.provider.complete({
        system: SYSTEM_PROMPT,
        prompt: buildRefinePrompt(taskId, contexts, draft),
        maxTokens: this.options.maxOutputTokens,
        signal,
      });
      logger.info({ taskId, provider: this.provider.name, pass: 'refine' }, 'Synthesis completed');
      return body;
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError(`Synthesis of ${taskId} cancelled`);
      }
      logger.warn({ taskId, provider: this.provider.name, error: errorMessage(error) }, 'Refine failed, keeping draft');
      return draft;
    }
  }
}
