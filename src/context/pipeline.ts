/**
 * Preprocessing Pipeline
 *
 * Builds context ahead of request time and persists it:
 *   1. deep fetch across every adapter
 *   2. broad local-document search for the ticket
 *   3. cross-source matching of meetings and messages
 *   4. draft + refine synthesis
 *   5. quality scoring
 *   6. content hash and upsert into PrebuiltStorage
 *
 * A failed stage degrades: failed sources are empty entries, a failed
 * synthesis pass falls back to concatenation, a failed doc search keeps
 * the docs adapter's own result.
 */

import crypto from 'crypto';
import { v4 as uuid } from 'uuid';
import type { AdapterRegistry } from '../adapters/registry.js';
import type { SynthesisEngine } from '../synthesis/types.js';
import { concatenateContexts } from '../synthesis/concatenate.js';
import { createLogger } from '../lib/logger.js';
import { withTraceAsync } from '../lib/tracing.js';
import { TaskNotFoundError, errorMessage } from '../lib/errors.js';
import type { FetchCoordinator } from './fetch-coordinator.js';
import type { PrebuiltStorage } from './prebuilt-storage.js';
import { buildCrossReference } from './cross-reference.js';
import { extractTicketFields, score } from './quality.js';
import { findTicket, hasText } from './source-context.js';
import type { PrebuiltRecord, SourceContext } from './types.js';

const logger = createLogger('pipeline');

export interface PipelineOptions {
  perSourceTimeoutMs: number;
  overallTimeoutMs: number;
  /** Deep fetch timeouts are the on-demand ones times this */
  deepTimeoutMultiplier: number;
  ttlHours: number;
  /** Clock in ms, injectable for tests */
  now?: () => number;
}

export interface PipelineDeps {
  registry: AdapterRegistry;
  coordinator: FetchCoordinator;
  engine: SynthesisEngine;
  storage: Pick<PrebuiltStorage, 'put'>;
}

/**
 * sha256 over the normalized text of every source that produced some:
 * each text trimmed with whitespace runs collapsed, joined by newlines.
 * Derived cross-reference text is left out.
 */
export function computeSourceHash(contexts: readonly SourceContext[]): string {
  const normalized = contexts
    .filter((context) => context.sourceType !== 'cross_reference' && hasText(context))
    .map((context) => context.rawText.trim().replace(/\s+/g, ' '))
    .join('\n');
  return crypto.createHash('sha256').update(normalized).digest('hex');
}

/**
 * Version token the primary adapter reported for the task, if any
 */
export function sourceVersionOf(contexts: readonly SourceContext[]): string | null {
  for (const context of contexts) {
    const version = context.metadata.version;
    if (context.sourceType === 'issue_tracker' && !context.error && typeof version === 'string') {
      return version;
    }
  }
  return null;
}

export class PreprocessingPipeline {
  private readonly now: () => number;

  constructor(
    private readonly deps: PipelineDeps,
    private readonly options: PipelineOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async build(taskId: string): Promise<PrebuiltRecord> {
    const buildId = uuid();
    return withTraceAsync(() => this.runStages(taskId, buildId), { metadata: { buildId, taskId } });
  }

  private async runStages(taskId: string, buildId: string): Promise<PrebuiltRecord> {
    const { registry, coordinator, engine, storage } = this.deps;
    const { perSourceTimeoutMs, overallTimeoutMs, deepTimeoutMultiplier, ttlHours } = this.options;
    const started = this.now();

    logger.info({ taskId, buildId }, 'Pipeline build started');

    // 1. Deep fetch
    const fetched = await coordinator.fetch(taskId, registry.getActive(), {
      perSourceTimeoutMs: perSourceTimeoutMs * deepTimeoutMultiplier,
      overallTimeoutMs: overallTimeoutMs * deepTimeoutMultiplier,
      depth: 'deep',
    });

    if (!fetched.some(hasText)) {
      throw new TaskNotFoundError(taskId);
    }

    // 2. Broad document search
    const ticket = findTicket(fetched);
    let contexts: SourceContext[] = fetched;
    const docs = registry.getDocumentSearcher();
    if (ticket && docs) {
      try {
        const docsContext = await docs.broadSearch(ticket);
        const index = contexts.findIndex((context) => context.sourceName === docs.name);
        contexts = index >= 0 ? contexts.map((context, i) => (i === index ? docsContext : context)) : [...contexts, docsContext];
      } catch (error) {
        logger.warn({ taskId, error: errorMessage(error) }, 'Broad document search failed');
      }
    }

    // 3. Cross-source matching
    if (ticket) {
      const crossReference = buildCrossReference(ticket, contexts);
      if (crossReference) {
        contexts = [...contexts, crossReference];
      }
    }

    // 4. Draft + refine
    const body = await this.synthesize(taskId, contexts, engine);

    // 5. Quality
    const quality = score(extractTicketFields(contexts), contexts);

    // 6. Persist
    const createdAt = new Date(this.now());
    const record: PrebuiltRecord = {
      taskId,
      body,
      sourcesUsed: contexts
        .filter((context) => context.sourceType !== 'cross_reference' && hasText(context))
        .map((context) => context.sourceName),
      qualityScore: quality.qualityScore,
      gaps: quality.gaps,
      sourceDataHash: computeSourceHash(contexts),
      sourceVersion: sourceVersionOf(contexts),
      createdAt,
      expiresAt: new Date(createdAt.getTime() + ttlHours * 3_600_000),
      status: 'active',
    };

    await storage.put(record);

    logger.info(
      {
        taskId,
        buildId,
        qualityScore: record.qualityScore,
        gaps: record.gaps.length,
        sources: record.sourcesUsed,
        durationMs: this.now() - started,
      },
      'Pipeline build stored'
    );

    return record;
  }

  private async synthesize(taskId: string, contexts: readonly SourceContext[], engine: SynthesisEngine): Promise<string> {
    let draft: string;
    try {
      draft = await engine.synthesize(taskId, contexts, { pass: 'draft' });
    } catch (error) {
      logger.warn({ taskId, engine: engine.name, error: errorMessage(error) }, 'Draft pass failed, concatenating');
      return concatenateContexts(taskId, contexts);
    }

    if (!draft.trim()) {
      return concatenateContexts(taskId, contexts);
    }

    try {
      const refined = await engine.synthesize(taskId, contexts, { pass: 'refine', draft });
      return refined.trim() ? refined : draft;
    } catch (error) {
      logger.warn({ taskId, engine: engine.name, error: errorMessage(error) }, 'Refine pass failed, keeping draft');
      return draft;
    }
  }
}
