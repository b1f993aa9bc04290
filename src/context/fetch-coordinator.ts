/**
 * Fetch Coordinator
 *
 * Fans a task request out to the configured adapters and joins the results.
 * Primary adapters run first; the rest run concurrently and may receive the
 * primary's context as a hint. Every adapter call is isolated: a throw, a
 * per-source timeout or the overall ceiling becomes an error entry.
 */

import type { Adapter, FetchDepth } from '../adapters/types.js';
import { createLogger } from '../lib/logger.js';
import { CancelledError, TimeoutError, errorMessage } from '../lib/errors.js';
import { failedSourceContext } from './source-context.js';
import type { FetchResult, SearchResult, SourceContext } from './types.js';

const logger = createLogger('fetch-coordinator');

export interface FetchOptions {
  perSourceTimeoutMs: number;
  /** Ceiling for the whole fan-out, primaries included */
  overallTimeoutMs: number;
  depth?: FetchDepth;
  /** Caller cancellation; aborts every pending adapter */
  signal?: AbortSignal;
}

export interface SearchOptions {
  maxResults: number;
  perSourceTimeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Run `work` with its own AbortSignal, rejecting when the timeout elapses or
 * the parent signal aborts. The work's signal is aborted in both cases.
 */
export async function runIsolated<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent: AbortSignal,
  what: string
): Promise<T> {
  const controller = new AbortController();
  const deadline = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
      once: true,
    });
  });

  const timer = setTimeout(() => controller.abort(new TimeoutError(timeoutMs, what)), timeoutMs);
  const onParentAbort = (): void => controller.abort(parent.reason);
  if (parent.aborted) {
    onParentAbort();
  } else {
    parent.addEventListener('abort', onParentAbort, { once: true });
  }

  try {
    return await Promise.race([Promise.resolve().then(() => work(controller.signal)), deadline]);
  } finally {
    clearTimeout(timer);
    parent.removeEventListener('abort', onParentAbort);
  }
}

export class FetchCoordinator {
  /**
   * Fetch context for one task from every adapter.
   * Resolves with exactly one entry per adapter, in the order given. Never rejects.
   */
  async fetch(taskId: string, adapters: readonly Adapter[], options: FetchOptions): Promise<FetchResult> {
    const { perSourceTimeoutMs, overallTimeoutMs, depth = 'standard', signal } = options;
    const started = Date.now();

    const overall = new AbortController();
    const ceiling = setTimeout(
      () => overall.abort(new TimeoutError(overallTimeoutMs, `Fetch for ${taskId}`)),
      overallTimeoutMs
    );
    const onCallerAbort = (): void => overall.abort(new CancelledError(`Fetch for ${taskId} cancelled`));
    if (signal?.aborted) {
      onCallerAbort();
    } else {
      signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const results: (SourceContext | undefined)[] = new Array(adapters.length);

    const run = async (index: number, primaryHint: SourceContext | null): Promise<SourceContext> => {
      const adapter = adapters[index];
      let context: SourceContext;
      try {
        context = await runIsolated(
          (adapterSignal) => adapter.fetchTaskContext(taskId, { primaryHint, depth, signal: adapterSignal }),
          perSourceTimeoutMs,
          overall.signal,
          adapter.name
        );
      } catch (error) {
        logger.warn({ taskId, source: adapter.name, error: errorMessage(error) }, 'Source fetch failed');
        context = failedSourceContext(adapter.name, adapter.sourceType, errorMessage(error));
      }
      results[index] = context;
      return context;
    };

    try {
      const indices = adapters.map((_, index) => index);
      const primaryIndices = indices.filter((index) => adapters[index].isPrimary);
      const secondaryIndices = indices.filter((index) => !adapters[index].isPrimary);

      const primaryResults = await Promise.all(primaryIndices.map((index) => run(index, null)));
      const primaryHint = primaryResults.find((context) => !context.error) ?? null;

      if (primaryIndices.length > 0 && !primaryHint) {
        logger.info({ taskId }, 'Primary source unavailable, secondaries run without hint');
      }

      await Promise.all(
        secondaryIndices.map((index) =>
          run(index, adapters[index].needsPrimaryContext ? primaryHint : null)
        )
      );
    } finally {
      clearTimeout(ceiling);
      signal?.removeEventListener('abort', onCallerAbort);
    }

    const fetched = results.map(
      (context, index) =>
        context ?? failedSourceContext(adapters[index].name, adapters[index].sourceType, 'No result')
    );

    logger.info(
      {
        taskId,
        depth,
        sources: fetched.length,
        failed: fetched.filter((context) => context.error).length,
        durationMs: Date.now() - started,
      },
      'Fetch completed'
    );

    return fetched;
  }

  /**
   * Keyword search across adapters, ranked by relevance then adapter order.
   * Failing adapters contribute nothing.
   */
  async search(query: string, adapters: readonly Adapter[], options: SearchOptions): Promise<SearchResult[]> {
    const { maxResults, perSourceTimeoutMs } = options;
    const parent = options.signal ?? new AbortController().signal;

    const perAdapter = await Promise.all(
      adapters.map(async (adapter) => {
        try {
          return await runIsolated(
            (adapterSignal) => adapter.search(query, maxResults, adapterSignal),
            perSourceTimeoutMs,
            parent,
            `${adapter.name} search`
          );
        } catch (error) {
          logger.warn({ source: adapter.name, error: errorMessage(error) }, 'Source search failed');
          return [];
        }
      })
    );

    // Array.prototype.sort is stable, so equal scores keep adapter order
    return perAdapter
      .flat()
      .sort((a, b) => b.relevanceScore - a.relevanceScore)
      .slice(0, maxResults);
  }
}
