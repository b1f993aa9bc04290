import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FakeTracker } from './__tests__/fakes.js';
import { StorageError } from '../lib/errors.js';
import type { PrebuiltRecord } from './types.js';

// Capture cron callbacks for testing
let lastCronCallback: (() => Promise<void>) | null = null;

const mockTask = {
  start: vi.fn(),
  stop: vi.fn(),
};
const mockSchedule = vi.fn((_expression: string, callback: () => Promise<void>) => {
  lastCronCallback = callback;
  return mockTask;
});
vi.mock('node-cron', () => ({
  default: {
    schedule: (expression: string, callback: () => Promise<void>) => mockSchedule(expression, callback),
  },
}));

vi.mock('../lib/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  }),
}));

function record(taskId: string): PrebuiltRecord {
  return {
    taskId,
    body: 'body',
    sourcesUsed: [],
    qualityScore: 0.5,
    gaps: [],
    sourceDataHash: 'hash',
    sourceVersion: null,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    expiresAt: new Date('2026-01-02T00:00:00Z'),
    status: 'active',
  };
}

async function setup(taskIds: () => Promise<string[]>, pollIntervalMinutes = 5, now?: () => number) {
  const { SourceWatcher } = await import('./watcher.js');
  const tracker = new FakeTracker({ name: 'jira' }, taskIds);
  const stored = new Map<string, PrebuiltRecord>();
  const stale = new Set<string>();
  const storage = {
    get: vi.fn(async (taskId: string) => stored.get(taskId) ?? null),
    isStale: vi.fn((value: PrebuiltRecord) => stale.has(value.taskId)),
  };
  const pipeline = {
    build: vi.fn(async (taskId: string) => record(taskId)),
  };
  const watcher = new SourceWatcher(
    { tracker, storage, pipeline },
    { triggerStatus: 'Ready for Development', projects: ['PAY'], pollIntervalMinutes, now }
  );
  return { watcher, tracker, storage, pipeline, stored, stale };
}

describe('SourceWatcher', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    lastCronCallback = null;
  });

  describe('pollOnce', () => {
    it('should build missing and stale tasks and skip fresh ones', async () => {
      const { watcher, tracker, pipeline, stored, stale } = await setup(async () => ['PAY-1', 'PAY-2', 'PAY-3']);
      stored.set('PAY-2', record('PAY-2'));
      stored.set('PAY-3', record('PAY-3'));
      stale.add('PAY-3');

      const built = await watcher.pollOnce();

      expect(built).toEqual(['PAY-1', 'PAY-3']);
      expect(pipeline.build).toHaveBeenCalledTimes(2);
      expect(tracker.queries).toEqual([{ status: 'Ready for Development', projects: ['PAY'] }]);
      expect(watcher.lastCycle).toEqual({
        candidates: 3,
        built: ['PAY-1', 'PAY-3'],
        skipped: ['PAY-2'],
        failed: [],
      });
    });

    it('should skip an item whose record cannot be read', async () => {
      const { watcher, storage, pipeline } = await setup(async () => ['PAY-1', 'PAY-2']);
      storage.get.mockRejectedValueOnce(new StorageError('connection reset'));

      const built = await watcher.pollOnce();

      expect(built).toEqual(['PAY-2']);
      expect(pipeline.build).toHaveBeenCalledWith('PAY-2');
      expect(pipeline.build).not.toHaveBeenCalledWith('PAY-1');
      expect(watcher.lastCycle?.failed).toEqual(['PAY-1']);
    });

    it('should isolate a failing build', async () => {
      const { watcher, pipeline } = await setup(async () => ['PAY-1', 'PAY-2']);
      pipeline.build.mockRejectedValueOnce(new Error('synthesis exploded'));

      const built = await watcher.pollOnce();

      expect(built).toEqual(['PAY-2']);
      expect(watcher.lastCycle?.failed).toEqual(['PAY-1']);
    });

    it('should return nothing when the candidate query fails', async () => {
      const { watcher, pipeline } = await setup(async () => Promise.reject(new Error('401')));

      expect(await watcher.pollOnce()).toEqual([]);
      expect(pipeline.build).not.toHaveBeenCalled();
    });

    it('should skip a cycle while another is running', async () => {
      let release: (ids: string[]) => void = () => undefined;
      const { watcher, tracker } = await setup(
        () =>
          new Promise<string[]>((resolve) => {
            release = resolve;
          })
      );

      const first = watcher.pollOnce();
      const second = await watcher.pollOnce();
      release(['PAY-1']);

      expect(second).toEqual([]);
      expect(await first).toEqual(['PAY-1']);
      expect(tracker.queries).toHaveLength(1);
      expect(watcher.isRunning).toBe(false);
    });
  });

  describe('start/stop', () => {
    it('should schedule cycles at the poll interval', async () => {
      const { watcher, pipeline } = await setup(async () => ['PAY-1']);

      watcher.start();
      watcher.start();

      expect(mockSchedule).toHaveBeenCalledTimes(1);
      expect(mockSchedule).toHaveBeenCalledWith('* * * * *', expect.any(Function));

      await lastCronCallback?.();
      expect(pipeline.build).toHaveBeenCalledWith('PAY-1');

      watcher.stop();
      expect(mockTask.stop).toHaveBeenCalled();
    });
  });

  describe('tick', () => {
    const MINUTE = 60_000;

    async function startedAt(pollIntervalMinutes: number, minutes: number[]): Promise<number[]> {
      let clock = 0;
      const { watcher } = await setup(async () => ['PAY-1'], pollIntervalMinutes, () => clock);
      const started: number[] = [];
      for (const minute of minutes) {
        clock = minute * MINUTE;
        const built = await watcher.tick();
        if (built.length > 0) started.push(minute);
      }
      return started;
    }

    it('should run a cycle every 90 minutes', async () => {
      const minutes = Array.from({ length: 271 }, (_, i) => i);

      expect(await startedAt(90, minutes)).toEqual([0, 90, 180, 270]);
    });

    it('should run a cycle every 7 minutes across the hour boundary', async () => {
      const minutes = Array.from({ length: 64 }, (_, i) => i);

      expect(await startedAt(7, minutes)).toEqual([0, 7, 14, 21, 28, 35, 42, 49, 56, 63]);
    });

    it('should run a cycle every two days', async () => {
      expect(await startedAt(2880, [0, 1440, 2879, 2880, 4320, 5760])).toEqual([0, 2880, 5760]);
    });

    it('should tolerate tick jitter below half a minute', async () => {
      let clock = 0;
      const { watcher, pipeline } = await setup(async () => ['PAY-1'], 5, () => clock);

      await watcher.tick();
      clock = 5 * MINUTE - 200;
      await watcher.tick();

      expect(pipeline.build).toHaveBeenCalledTimes(2);
    });
  });
});
