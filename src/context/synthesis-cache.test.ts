import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SynthesisDedupCache } from './synthesis-cache.js';
import { CancelledError } from '../lib/errors.js';
import type { SynthesizedContext } from './types.js';

vi.mock('../lib/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

function context(taskId: string, body = `body for ${taskId}`): SynthesizedContext {
  return {
    taskId,
    body,
    sourcesUsed: ['jira'],
    qualityScore: 0.5,
    gaps: [],
    builtAt: new Date('2026-01-01T00:00:00Z'),
    origin: 'fresh',
  };
}

/** Builder whose completion the test controls */
function deferredBuilder() {
  let resolve: (value: SynthesizedContext) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const signals: AbortSignal[] = [];
  const builder = vi.fn((signal: AbortSignal) => {
    signals.push(signal);
    return new Promise<SynthesizedContext>((res, rej) => {
      resolve = res;
      reject = rej;
    });
  });
  return {
    builder,
    signals,
    resolve: (value: SynthesizedContext) => resolve(value),
    reject: (error: Error) => reject(error),
  };
}

describe('SynthesisDedupCache', () => {
  let clock: number;
  let cache: SynthesisDedupCache;

  beforeEach(() => {
    vi.clearAllMocks();
    clock = 1_000_000;
    cache = new SynthesisDedupCache({ ttlSeconds: 900, maxSize: 3, now: () => clock });
  });

  it('should run one build for concurrent callers of the same key', async () => {
    const { builder, resolve } = deferredBuilder();

    const first = cache.getOrBuild('PAY-1', builder);
    const second = cache.getOrBuild('PAY-1', builder);
    resolve(context('PAY-1'));

    const [a, b] = await Promise.all([first, second]);

    expect(builder).toHaveBeenCalledTimes(1);
    expect(a).toBe(b);
    expect(cache.pendingCount).toBe(0);
  });

  it('should serve a cached value without calling the builder', async () => {
    const builder = vi.fn(async () => context('PAY-1'));

    await cache.getOrBuild('PAY-1', builder);
    const again = await cache.getOrBuild('PAY-1', builder);

    expect(builder).toHaveBeenCalledTimes(1);
    expect(again.body).toBe('body for PAY-1');
  });

  it('should keep an entry valid at T+899s and expire it at T+901s', async () => {
    const builder = vi.fn(async () => context('PAY-1'));
    await cache.getOrBuild('PAY-1', builder);

    clock += 899_000;
    expect(cache.get('PAY-1')).not.toBeNull();

    clock += 2_000;
    expect(cache.get('PAY-1')).toBeNull();

    await cache.getOrBuild('PAY-1', builder);
    expect(builder).toHaveBeenCalledTimes(2);
  });

  it('should share a failure with every waiter and clear the pending build', async () => {
    const { builder, reject } = deferredBuilder();

    const first = cache.getOrBuild('PAY-1', builder);
    const second = cache.getOrBuild('PAY-1', builder);
    reject(new Error('engine down'));

    const results = await Promise.allSettled([first, second]);

    expect(results.map((result) => result.status)).toEqual(['rejected', 'rejected']);
    expect(builder).toHaveBeenCalledTimes(1);
    expect(cache.pendingCount).toBe(0);
    expect(cache.size).toBe(0);

    const retry = vi.fn(async () => context('PAY-1'));
    await cache.getOrBuild('PAY-1', retry);
    expect(retry).toHaveBeenCalledTimes(1);
  });

  it('should start a new build for a fresh request while one is in flight', async () => {
    const stale = deferredBuilder();
    const fresh = deferredBuilder();

    const joined = cache.getOrBuild('PAY-1', stale.builder);
    const refreshed = cache.getOrBuild('PAY-1', fresh.builder, { fresh: true });
    const later = cache.getOrBuild('PAY-1', stale.builder);

    expect(stale.builder).toHaveBeenCalledTimes(1);
    expect(fresh.builder).toHaveBeenCalledTimes(1);
    expect(cache.pendingCount).toBe(1);

    fresh.resolve(context('PAY-1', 'edited ticket'));
    stale.resolve(context('PAY-1', 'old ticket'));

    expect((await joined).body).toBe('old ticket');
    expect((await refreshed).body).toBe('edited ticket');
    expect((await later).body).toBe('edited ticket');
    expect(cache.get('PAY-1')?.body).toBe('edited ticket');
    expect(cache.pendingCount).toBe(0);
  });

  it('should rebuild a cached key on a fresh request', async () => {
    const builder = vi.fn(async () => context('PAY-1'));

    await cache.getOrBuild('PAY-1', builder);
    await cache.getOrBuild('PAY-1', builder, { fresh: true });

    expect(builder).toHaveBeenCalledTimes(2);
  });

  it('should cancel a superseded build once its last waiter aborts', async () => {
    const stale = deferredBuilder();
    const fresh = deferredBuilder();
    const controller = new AbortController();

    const joined = cache.getOrBuild('PAY-1', stale.builder, { signal: controller.signal });
    const refreshed = cache.getOrBuild('PAY-1', fresh.builder, { fresh: true });
    controller.abort();

    await expect(joined).rejects.toBeInstanceOf(CancelledError);
    expect(stale.signals[0].aborted).toBe(true);
    expect(fresh.signals[0].aborted).toBe(false);

    fresh.resolve(context('PAY-1'));
    expect((await refreshed).body).toBe('body for PAY-1');
  });

  it('should free the build slot when the builder throws synchronously', async () => {
    const throwing = vi.fn((): Promise<SynthesizedContext> => {
      throw new Error('boom');
    });

    await expect(cache.getOrBuild('PAY-1', throwing)).rejects.toThrow('boom');
    expect(cache.pendingCount).toBe(0);

    const working = vi.fn(async () => context('PAY-1'));
    const value = await cache.getOrBuild('PAY-1', working);

    expect(working).toHaveBeenCalledTimes(1);
    expect(value.body).toBe('body for PAY-1');
  });

  it('should evict the least recently used entry at capacity', async () => {
    await cache.getOrBuild('A', async () => context('A'));
    await cache.getOrBuild('B', async () => context('B'));
    await cache.getOrBuild('C', async () => context('C'));

    cache.get('A');
    await cache.getOrBuild('D', async () => context('D'));

    expect(cache.size).toBe(3);
    expect(cache.get('B')).toBeNull();
    expect(cache.get('A')).not.toBeNull();
    expect(cache.get('D')).not.toBeNull();
  });

  it('should drop expired entries before evicting valid ones', async () => {
    await cache.getOrBuild('A', async () => context('A'));
    clock += 500_000;
    await cache.getOrBuild('B', async () => context('B'));
    await cache.getOrBuild('C', async () => context('C'));

    clock += 500_000;
    await cache.getOrBuild('D', async () => context('D'));

    expect(cache.size).toBe(3);
    expect(cache.get('A')).toBeNull();
    expect(cache.get('B')).not.toBeNull();
  });

  it('should reject a cancelled waiter while the shared build completes for others', async () => {
    const { builder, signals, resolve } = deferredBuilder();
    const controller = new AbortController();

    const leaving = cache.getOrBuild('PAY-1', builder, { signal: controller.signal });
    const staying = cache.getOrBuild('PAY-1', builder);
    controller.abort();

    await expect(leaving).rejects.toBeInstanceOf(CancelledError);
    expect(signals[0].aborted).toBe(false);

    resolve(context('PAY-1'));
    await expect(staying).resolves.toMatchObject({ taskId: 'PAY-1' });
    expect(cache.get('PAY-1')).not.toBeNull();
  });

  it('should abort the build when its only waiter cancels', async () => {
    const { builder, signals } = deferredBuilder();
    const controller = new AbortController();

    const request = cache.getOrBuild('PAY-1', builder, { signal: controller.signal });
    controller.abort();

    await expect(request).rejects.toBeInstanceOf(CancelledError);
    expect(signals[0].aborted).toBe(true);
    expect(cache.pendingCount).toBe(0);
  });

  it('should reject immediately for an already aborted signal', async () => {
    const builder = vi.fn(async () => context('PAY-1'));
    const controller = new AbortController();
    controller.abort();

    await expect(cache.getOrBuild('PAY-1', builder, { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError
    );
    expect(builder).not.toHaveBeenCalled();
  });

  it('should invalidate one key or everything', async () => {
    await cache.getOrBuild('A', async () => context('A'));
    await cache.getOrBuild('B', async () => context('B'));

    cache.invalidate('A');
    expect(cache.get('A')).toBeNull();
    expect(cache.size).toBe(1);

    cache.invalidate();
    expect(cache.size).toBe(0);
  });
});
