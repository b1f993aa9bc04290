/**
 * Synthesis Dedup Cache
 *
 * In-memory TTL + LRU cache of synthesized context keyed by task id, with
 * single-flight builds: concurrent callers for a key share one builder call.
 *
 * Lookup and PendingBuild registration happen without an intervening await,
 * so on the single event loop no two builds for one key can start.
 */

import { createLogger } from '../lib/logger.js';
import { CancelledError, errorMessage } from '../lib/errors.js';
import type { SynthesizedContext } from './types.js';

const logger = createLogger('synthesis-cache');

// Synchronous throws become rejections; cleanup must run after the build is registered
function invokeBuilder(builder: Builder, signal: AbortSignal): Promise<SynthesizedContext> {
  try {
    return builder(signal);
  } catch (error) {
    return Promise.reject(error);
  }
}

/**
 * Builds the value for a key. The signal aborts once every waiter of the
 * build has detached.
 */
export type Builder = (signal: AbortSignal) => Promise<SynthesizedContext>;

export interface CacheEntry {
  key: string;
  value: SynthesizedContext;
  /** ms since epoch */
  createdAt: number;
  ttlMs: number;
}

interface PendingBuild {
  promise: Promise<SynthesizedContext>;
  controller: AbortController;
  waiters: number;
  /** Replaced by a fresh build; its result is not cached */
  superseded: boolean;
}

export interface GetOrBuildOptions {
  signal?: AbortSignal;
  /** Ignore the cached value and any in-flight build, and start a new one */
  fresh?: boolean;
}

export interface SynthesisCacheOptions {
  ttlSeconds: number;
  maxSize: number;
  /** Clock in ms, injectable for tests */
  now?: () => number;
}

export class SynthesisDedupCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly pending = new Map<string, PendingBuild>();
  private readonly ttlMs: number;
  private readonly maxSize: number;
  private readonly now: () => number;

  constructor(options: SynthesisCacheOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.maxSize = Math.max(1, options.maxSize);
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Valid cached value for a key, refreshing its recency
   */
  get(key: string): SynthesizedContext | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (!this.isValid(entry)) {
      this.entries.delete(key);
      return null;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  async getOrBuild(key: string, builder: Builder, options: GetOrBuildOptions = {}): Promise<SynthesizedContext> {
    const { signal, fresh = false } = options;
    if (signal?.aborted) {
      throw new CancelledError(`Context request for ${key} cancelled`);
    }

    const cached = fresh ? null : this.get(key);
    if (cached) {
      logger.debug({ key }, 'Cache hit');
      return cached;
    }

    const inFlight = this.pending.get(key);
    let build: PendingBuild;
    if (inFlight && !fresh) {
      logger.debug({ key, waiters: inFlight.waiters + 1 }, 'Joining in-flight build');
      build = inFlight;
    } else {
      if (inFlight) {
        // Its waiters keep their result; later callers join the fresh build
        inFlight.superseded = true;
        logger.debug({ key }, 'Superseding in-flight build');
      }
      build = this.startBuild(key, builder);
    }

    return this.wait(key, build, signal);
  }

  /**
   * Drop one key, or every entry when no key is given. In-flight builds are untouched.
   */
  invalidate(key?: string): void {
    if (key === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(key);
    }
  }

  isValid(entry: CacheEntry): boolean {
    return this.now() < entry.createdAt + entry.ttlMs;
  }

  private startBuild(key: string, builder: Builder): PendingBuild {
    const controller = new AbortController();
    const build: PendingBuild = {
      promise: this.runBuild(key, builder, controller),
      controller,
      waiters: 0,
      superseded: false,
    };
    this.pending.set(key, build);
    logger.debug({ key }, 'Cache miss, starting build');

    // Waiters see the rejection; this only records builds nobody waits for any more
    build.promise.catch((error: unknown) => {
      logger.warn({ key, error: errorMessage(error) }, 'Synthesis build failed');
    });

    return build;
  }

  private async runBuild(key: string, builder: Builder, controller: AbortController): Promise<SynthesizedContext> {
    try {
      const value = await invokeBuilder(builder, controller.signal);
      // Cancelled and superseded builds no longer own the key
      if (this.pending.get(key)?.controller === controller) {
        this.store(key, value);
      }
      return value;
    } finally {
      if (this.pending.get(key)?.controller === controller) {
        this.pending.delete(key);
      }
    }
  }

  private async wait(key: string, build: PendingBuild, signal?: AbortSignal): Promise<SynthesizedContext> {
    build.waiters += 1;

    if (!signal) {
      try {
        return await build.promise;
      } finally {
        build.waiters -= 1;
      }
    }

    let onAbort: () => void = () => undefined;
    const cancelled = new Promise<never>((_, reject) => {
      onAbort = () => reject(new CancelledError(`Context request for ${key} cancelled`));
      signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      return await Promise.race([build.promise, cancelled]);
    } finally {
      signal.removeEventListener('abort', onAbort);
      build.waiters -= 1;
      const owned = this.pending.get(key) === build;
      if (signal.aborted && build.waiters === 0 && (owned || build.superseded)) {
        // Last waiter left: cancel the build and let the next caller start afresh
        if (owned) this.pending.delete(key);
        build.controller.abort(new CancelledError(`Build for ${key} cancelled`));
        logger.debug({ key }, 'Build cancelled, no waiters left');
      }
    }
  }

  private store(key: string, value: SynthesizedContext): void {
    this.entries.delete(key);

    if (this.entries.size >= this.maxSize) {
      this.purgeExpired();
    }
    if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
        logger.debug({ evicted: oldest.value }, 'Evicted least recently used entry');
      }
    }

    this.entries.set(key, { key, value, createdAt: this.now(), ttlMs: this.ttlMs });
  }

  private purgeExpired(): void {
    for (const [key, entry] of this.entries) {
      if (!this.isValid(entry)) {
        this.entries.delete(key);
      }
    }
  }
}
