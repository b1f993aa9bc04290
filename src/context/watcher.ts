/**
 * Source Watcher
 *
 * Polls the issue tracker for tasks in the trigger status and builds
 * context for those without a fresh stored record. One cycle at a time:
 * a tick that arrives while a cycle runs is skipped.
 */

import cron, { type ScheduledTask } from 'node-cron';
import type { Adapter, TaskTracker } from '../adapters/types.js';
import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import type { PreprocessingPipeline } from './pipeline.js';
import type { PrebuiltStorage } from './prebuilt-storage.js';

const logger = createLogger('watcher');

export interface WatcherOptions {
  triggerStatus: string;
  projects: string[];
  pollIntervalMinutes: number;
  now?: () => number;
}

export interface WatcherDeps {
  tracker: Adapter & TaskTracker;
  storage: Pick<PrebuiltStorage, 'get' | 'isStale'>;
  pipeline: Pick<PreprocessingPipeline, 'build'>;
}

export interface CycleSummary {
  candidates: number;
  built: string[];
  skipped: string[];
  failed: string[];
}

// Ticks every minute; a cycle starts once the poll interval has elapsed
const TICK_CRON = '* * * * *';
const MINUTE_MS = 60_000;

export class SourceWatcher {
  private running = false;
  private task: ScheduledTask | null = null;
  private lastSummary: CycleSummary | null = null;
  private lastStartedAt: number | null = null;

  constructor(
    private readonly deps: WatcherDeps,
    private readonly options: WatcherOptions
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  get lastCycle(): CycleSummary | null {
    return this.lastSummary;
  }

  /**
   * Run one cycle. Returns the ids built in it; empty when skipped.
   */
  async pollOnce(): Promise<string[]> {
    if (this.running) {
      logger.info('Previous poll cycle still running, skipping');
      return [];
    }

    this.running = true;
    try {
      const summary = await this.runCycle();
      this.lastSummary = summary;
      return summary.built;
    } finally {
      this.running = false;
    }
  }

  /**
   * Scheduler tick. Starts a cycle when none has started yet or the poll
   * interval has elapsed since the last start; elapsed time is rounded to
   * whole minutes so tick jitter does not push a cycle to the next tick.
   */
  async tick(): Promise<string[]> {
    const now = (this.options.now ?? Date.now)();
    const interval = Math.max(1, this.options.pollIntervalMinutes);
    if (this.lastStartedAt !== null && Math.round((now - this.lastStartedAt) / MINUTE_MS) < interval) {
      return [];
    }

    this.lastStartedAt = now;
    return this.pollOnce();
  }

  start(): void {
    if (this.task) return;

    logger.info(
      {
        pollIntervalMinutes: this.options.pollIntervalMinutes,
        status: this.options.triggerStatus,
        projects: this.options.projects,
      },
      'Scheduling source watcher'
    );

    this.task = cron.schedule(TICK_CRON, async () => {
      try {
        await this.tick();
      } catch (err) {
        logger.error({ err }, 'Poll cycle failed');
      }
    });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('Source watcher stopped');
    }
  }

  private async runCycle(): Promise<CycleSummary> {
    const { tracker, storage, pipeline } = this.deps;
    const { triggerStatus, projects } = this.options;
    const summary: CycleSummary = { candidates: 0, built: [], skipped: [], failed: [] };

    let taskIds: string[];
    try {
      taskIds = await tracker.findTasksByStatus(triggerStatus, projects);
    } catch (error) {
      logger.warn({ tracker: tracker.name, error: errorMessage(error) }, 'Candidate query failed, retrying next cycle');
      return summary;
    }

    summary.candidates = taskIds.length;
    logger.info({ candidates: taskIds.length, status: triggerStatus }, 'Poll cycle started');

    // Sequential to bound load on the sources
    for (const taskId of taskIds) {
      try {
        const existing = await storage.get(taskId);
        if (existing && !storage.isStale(existing)) {
          summary.skipped.push(taskId);
          continue;
        }
      } catch (error) {
        logger.warn({ taskId, error: errorMessage(error) }, 'Stored record unreadable, retrying next cycle');
        summary.failed.push(taskId);
        continue;
      }

      try {
        await pipeline.build(taskId);
        summary.built.push(taskId);
      } catch (error) {
        logger.error({ taskId, error: errorMessage(error) }, 'Pipeline build failed');
        summary.failed.push(taskId);
      }
    }

    logger.info(
      {
        candidates: summary.candidates,
        built: summary.built.length,
        skipped: summary.skipped.length,
        failed: summary.failed.length,
      },
      'Poll cycle finished'
    );

    return summary;
  }
}
