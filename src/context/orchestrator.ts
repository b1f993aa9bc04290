/**
 * Context Orchestrator
 *
 * Request-facing entry: serves a task's context from the prebuilt store when
 * it is fresh, otherwise builds it on demand (fetch + one synthesis pass)
 * through the dedup cache. Search and standards lookups bypass both.
 */

import type { AdapterRegistry } from '../adapters/registry.js';
import type { SynthesisEngine } from '../synthesis/types.js';
import { concatenateContexts } from '../synthesis/concatenate.js';
import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { getCircuitBreakerStats, type BreakerState } from '../lib/circuit-breaker.js';
import type { FetchCoordinator } from './fetch-coordinator.js';
import type { FreshnessProbe, PrebuiltStorage } from './prebuilt-storage.js';
import type { SynthesisDedupCache } from './synthesis-cache.js';
import { extractTicketFields, score } from './quality.js';
import { hasText } from './source-context.js';
import type {
  PrebuiltRecord,
  PrebuiltStats,
  SearchResult,
  SourceContext,
  SynthesizedContext,
} from './types.js';

const logger = createLogger('orchestrator');

const PROBE_TIMEOUT_MS = 2000;

export interface OrchestratorOptions {
  perSourceTimeoutMs: number;
  overallTimeoutMs: number;
  defaultSearchResults?: number;
}

export interface OrchestratorDeps {
  registry: AdapterRegistry;
  coordinator: FetchCoordinator;
  cache: SynthesisDedupCache;
  engine: SynthesisEngine;
  storage: Pick<PrebuiltStorage, 'get' | 'isStale' | 'stats'>;
  /** Reports database reachability for health checks */
  checkStorage?: () => Promise<boolean>;
}

export interface GetTaskContextOptions {
  signal?: AbortSignal;
  /** Skip the prebuilt store, the cache and any in-flight build, forcing a fresh build */
  refresh?: boolean;
}

export interface HealthReport {
  healthy: boolean;
  storage: boolean;
  adapters: Record<string, boolean>;
  cacheSize: number;
  breakers: Record<string, BreakerState>;
}

function fromPrebuilt(record: PrebuiltRecord): SynthesizedContext {
  return {
    taskId: record.taskId,
    body: record.body,
    sourcesUsed: record.sourcesUsed,
    qualityScore: record.qualityScore,
    gaps: record.gaps,
    builtAt: record.createdAt,
    origin: 'prebuilt',
  };
}

export class ContextOrchestrator {
  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions
  ) {}

  async getTaskContext(taskId: string, options: GetTaskContextOptions = {}): Promise<SynthesizedContext> {
    const { signal, refresh = false } = options;
    const { cache } = this.deps;

    if (refresh) {
      cache.invalidate(taskId);
    } else {
      const prebuilt = await this.readPrebuilt(taskId);
      if (prebuilt) {
        return prebuilt;
      }
    }

    const cachedBefore = cache.get(taskId);
    if (cachedBefore) {
      return { ...cachedBefore, origin: 'cache' };
    }

    return cache.getOrBuild(taskId, (buildSignal) => this.buildOnDemand(taskId, buildSignal), {
      signal,
      fresh: refresh,
    });
  }

  /**
   * Ranked raw excerpts from every adapter. No synthesis, no cache.
   */
  async searchContext(query: string, maxResults?: number): Promise<SearchResult[]> {
    const limit = maxResults ?? this.options.defaultSearchResults ?? 10;
    return this.deps.coordinator.search(query, this.deps.registry.getActive(), {
      maxResults: limit,
      perSourceTimeoutMs: this.options.perSourceTimeoutMs,
    });
  }

  /**
   * Standards and conventions documents, optionally narrowed to an area
   */
  async getStandards(area?: string): Promise<SourceContext | null> {
    const docs = this.deps.registry.getDocumentSearcher();
    if (!docs) {
      return null;
    }
    try {
      return await docs.getStandards(area);
    } catch (error) {
      logger.warn({ area, error: errorMessage(error) }, 'Standards lookup failed');
      return null;
    }
  }

  async prebuiltStats(): Promise<PrebuiltStats> {
    return this.deps.storage.stats();
  }

  invalidate(taskId?: string): void {
    this.deps.cache.invalidate(taskId);
  }

  async healthCheck(): Promise<HealthReport> {
    const [storage, adapters] = await Promise.all([
      this.deps.checkStorage ? this.deps.checkStorage() : Promise.resolve(true),
      this.deps.registry.healthCheckAll(),
    ]);

    return {
      healthy: storage && Object.values(adapters).some(Boolean),
      storage,
      adapters,
      cacheSize: this.deps.cache.size,
      breakers: getCircuitBreakerStats(),
    };
  }

  /**
   * Fresh prebuilt record as a result, or null. Storage failures count as a miss.
   */
  private async readPrebuilt(taskId: string): Promise<SynthesizedContext | null> {
    const { storage } = this.deps;

    let record: PrebuiltRecord | null;
    try {
      record = await storage.get(taskId);
    } catch (error) {
      logger.warn({ taskId, error: errorMessage(error) }, 'Prebuilt read failed, building on demand');
      return null;
    }
    if (!record) {
      return null;
    }

    const probe = await this.probe(taskId);
    if (storage.isStale(record, probe)) {
      logger.debug({ taskId, expiresAt: record.expiresAt, status: record.status }, 'Prebuilt context stale');
      return null;
    }

    logger.debug({ taskId }, 'Serving prebuilt context');
    return fromPrebuilt(record);
  }

  /**
   * Cheap version probe of the primary source, when it offers one
   */
  private async probe(taskId: string): Promise<FreshnessProbe | undefined> {
    const primary = this.deps.registry.getPrimary();
    if (!primary?.probeVersion) {
      return undefined;
    }
    try {
      const sourceVersion = await primary.probeVersion(taskId, AbortSignal.timeout(PROBE_TIMEOUT_MS));
      return { sourceVersion };
    } catch (error) {
      logger.debug({ taskId, error: errorMessage(error) }, 'Freshness probe failed, using TTL only');
      return undefined;
    }
  }

  private async buildOnDemand(taskId: string, signal: AbortSignal): Promise<SynthesizedContext> {
    const { registry, coordinator, engine } = this.deps;

    const contexts = await coordinator.fetch(taskId, registry.getActive(), {
      perSourceTimeoutMs: this.options.perSourceTimeoutMs,
      overallTimeoutMs: this.options.overallTimeoutMs,
      signal,
    });

    let body: string;
    try {
      body = await engine.synthesize(taskId, contexts, { pass: 'draft', signal });
    } catch (error) {
      logger.warn({ taskId, error: errorMessage(error) }, 'Synthesis failed, concatenating');
      body = concatenateContexts(taskId, contexts);
    }

    const quality = score(extractTicketFields(contexts), contexts);

    return {
      taskId,
      body,
      sourcesUsed: contexts.filter(hasText).map((context) => context.sourceName),
      qualityScore: quality.qualityScore,
      gaps: quality.gaps,
      builtAt: new Date(),
      origin: 'fresh',
    };
  }
}
