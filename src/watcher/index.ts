#!/usr/bin/env node
/**
 * Source Watcher process
 *
 * Polls the issue tracker for tasks in the trigger status and preprocesses
 * them into the prebuilt store. The only writer of that store.
 *
 *   --once             run one poll cycle and exit
 *   --task <id>        build one task and exit
 *   --list [--status]  log stored records and exit
 */

import { parseArgs } from 'util';
import cron, { type ScheduledTask } from 'node-cron';
import { z } from 'zod';
import { numericConfig, sourcesConfig, synthesisConfig, watcherConfig } from '../lib/config.js';
import { closePool } from '../lib/db.js';
import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { buildAdapterRegistry } from '../adapters/index.js';
import { createSynthesisEngine } from '../synthesis/index.js';
import { FetchCoordinator } from '../context/fetch-coordinator.js';
import { PrebuiltStorage } from '../context/prebuilt-storage.js';
import { PreprocessingPipeline } from '../context/pipeline.js';
import { SourceWatcher } from '../context/watcher.js';

const logger = createLogger('watcher');

// Hourly: flag records past their TTL, drop those past the retention window
const MAINTENANCE_CRON = '7 * * * *';
const LIST_LIMIT = 50;

const { values: flags } = parseArgs({
  options: {
    once: { type: 'boolean', default: false },
    task: { type: 'string' },
    list: { type: 'boolean', default: false },
    status: { type: 'string' },
  },
});

const statusFlag = z.enum(['active', 'expired', 'stale']).optional();

const registry = buildAdapterRegistry(sourcesConfig);
const engine = createSynthesisEngine(synthesisConfig);
const storage = new PrebuiltStorage();

const pipeline = new PreprocessingPipeline(
  { registry, coordinator: new FetchCoordinator(), engine, storage },
  {
    perSourceTimeoutMs: numericConfig.sourceTimeoutMs,
    overallTimeoutMs: numericConfig.fetchTimeoutMs,
    deepTimeoutMultiplier: numericConfig.deepFetchTimeoutMultiplier,
    ttlHours: watcherConfig.contextTtlHours,
  }
);

let watcher: SourceWatcher | null = null;
let maintenance: ScheduledTask | null = null;

async function runMaintenance(): Promise<void> {
  try {
    await storage.maintain(watcherConfig.expiredRetentionHours);
  } catch (error) {
    logger.warn({ error: errorMessage(error) }, 'Maintenance failed, retrying next run');
  }
}

async function cleanup(): Promise<void> {
  watcher?.stop();
  maintenance?.stop();
  await registry.closeAll();
  await engine.close();
  await closePool();
}

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal');
  try {
    await cleanup();
    logger.info('Watcher shut down');
    process.exit(0);
  } catch (err) {
    logger.error({ err }, 'Error during shutdown');
    process.exit(1);
  }
}

async function main(): Promise<void> {
  await storage.initialize();

  if (flags.list) {
    const records = await storage.list({ status: statusFlag.parse(flags.status), limit: LIST_LIMIT });
    for (const record of records) {
      logger.info(
        {
          taskId: record.taskId,
          status: record.status,
          qualityScore: record.qualityScore,
          sources: record.sourcesUsed,
          expiresAt: record.expiresAt.toISOString(),
        },
        'Prebuilt context'
      );
    }
    logger.info({ count: records.length }, 'Listed prebuilt contexts');
    await cleanup();
    return;
  }

  if (flags.task) {
    const record = await pipeline.build(flags.task);
    logger.info(
      { taskId: record.taskId, qualityScore: record.qualityScore, sources: record.sourcesUsed },
      'Task preprocessed'
    );
    await cleanup();
    return;
  }

  const tracker = registry.getTaskTracker();
  if (!tracker) {
    throw new Error('No issue tracker adapter enabled; nothing to watch');
  }

  watcher = new SourceWatcher(
    { tracker, storage, pipeline },
    {
      triggerStatus: watcherConfig.triggerStatus,
      projects: watcherConfig.projects,
      pollIntervalMinutes: watcherConfig.pollIntervalMinutes,
    }
  );

  if (flags.once) {
    await runMaintenance();
    const built = await watcher.pollOnce();
    logger.info({ built }, 'Single poll cycle complete');
    await cleanup();
    return;
  }

  logger.info({ adapters: registry.names(), tracker: tracker.name }, 'Source watcher starting');
  await runMaintenance();
  await watcher.tick();
  watcher.start();
  maintenance = cron.schedule(MAINTENANCE_CRON, runMaintenance);

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
}

main().catch(async (error) => {
  logger.error({ error: errorMessage(error) }, 'Fatal error');
  await cleanup().catch((cleanupError) => {
    logger.error({ error: errorMessage(cleanupError) }, 'Cleanup after fatal error failed');
  });
  process.exit(1);
});
