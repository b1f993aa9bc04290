import type { SourceContext } from '../context/types.js';

export type SynthesisPass = 'draft' | 'refine';

export interface SynthesisOptions {
  pass: SynthesisPass;
  /** Body from the draft pass, required for 'refine' */
  draft?: string;
  signal?: AbortSignal;
}

/**
 * Combines source contexts into one markdown body.
 * Implementations fail soft: on provider failure they return a
 * concatenation of the available text instead of throwing.
 */
export interface SynthesisEngine {
  readonly name: string;
  synthesize(taskId: string, contexts: readonly SourceContext[], options: SynthesisOptions): Promise<string>;
  close(): Promise<void>;
}

/**
 * Text completion backend used by the LLM engine
 */
export interface CompletionProvider {
  readonly name: string;
  complete(request: CompletionRequest): Promise<string>;
  close(): void;
}

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  signal?: AbortSignal;
}
