import type { SourceContext, SourcePayload, SourceType, Ticket } from './types.js';

interface SourceContextInit {
  sourceName: string;
  sourceType: SourceType;
  data?: SourcePayload;
  rawText?: string;
  metadata?: Record<string, unknown>;
  fetchedAt?: Date;
  error?: string;
}

/**
 * Build an immutable SourceContext
 */
export function createSourceContext(init: SourceContextInit): SourceContext {
  const context: SourceContext = {
    sourceName: init.sourceName,
    sourceType: init.sourceType,
    data: init.data,
    rawText: init.rawText ?? '',
    metadata: Object.freeze({ ...init.metadata }),
    fetchedAt: init.fetchedAt ?? new Date(),
    error: init.error,
  };
  return Object.freeze(context);
}

/**
 * Failure entry: error set, no text
 */
export function failedSourceContext(
  sourceName: string,
  sourceType: SourceType,
  error: string
): SourceContext {
  return createSourceContext({ sourceName, sourceType, rawText: '', error });
}

export function hasText(context: SourceContext): boolean {
  return !context.error && context.rawText.trim().length > 0;
}

/**
 * Ticket from the first issue-tracker context that carries one
 */
export function findTicket(contexts: readonly SourceContext[]): Ticket | null {
  for (const context of contexts) {
    if (context.data?.kind === 'ticket') {
      return context.data.ticket;
    }
  }
  return null;
}
