import type { SourceContext } from '../context/types.js';
import { concatenateContexts } from './concatenate.js';
import type { SynthesisEngine, SynthesisOptions } from './types.js';

/**
 * No LLM: every pass returns the concatenated source text.
 * A refine pass keeps the draft as is.
 */
export class PassthroughSynthesisEngine implements SynthesisEngine {
  readonly name = 'passthrough';

  async synthesize(taskId: string, contexts: readonly SourceContext[], options: SynthesisOptions): Promise<string> {
    if (options.pass === 'refine' && options.draft !== undefined) {
      return options.draft;
    }
    return concatenateContexts(taskId, contexts);
  }

  async close(): Promise<void> {}
}
