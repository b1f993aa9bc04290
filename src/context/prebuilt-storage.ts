/**
 * Prebuilt Context Storage
 *
 * Durable store of pipeline-built context, one row per task, in the
 * `prebuilt_context` table. Two processes open it: the watcher writes,
 * the MCP server reads.
 *
 * Single-writer convention: only the watcher process (PreprocessingPipeline)
 * calls put/markExpired/deleteExpired. There is no cross-process lock; every
 * write is a single upsert statement, so a reader sees either the previous
 * row or the new one, never a partial one.
 */

import { z } from 'zod';
import { query, queryOne } from '../lib/db.js';
import { createLogger } from '../lib/logger.js';
import { StorageError, errorMessage } from '../lib/errors.js';
import type { PrebuiltRecord, PrebuiltStats, PrebuiltStatus } from './types.js';

const logger = createLogger('prebuilt-storage');

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS prebuilt_context (
    task_id TEXT PRIMARY KEY,
    body TEXT NOT NULL,
    sources_used JSONB NOT NULL DEFAULT '[]',
    quality_score REAL NOT NULL,
    gaps JSONB NOT NULL DEFAULT '[]',
    source_data_hash TEXT NOT NULL,
    source_version TEXT,
    created_at TIMESTAMPTZ NOT NULL,
    expires_at TIMESTAMPTZ NOT NULL,
    status TEXT NOT NULL DEFAULT 'active'
  );
  CREATE INDEX IF NOT EXISTS idx_prebuilt_context_expires_at ON prebuilt_context (expires_at);
  CREATE INDEX IF NOT EXISTS idx_prebuilt_context_status ON prebuilt_context (status);
`;

interface PrebuiltRow {
  task_id: string;
  body: string;
  sources_used: unknown;
  quality_score: number;
  gaps: unknown;
  source_data_hash: string;
  source_version: string | null;
  created_at: Date;
  expires_at: Date;
  status: string;
}

interface StatsRow {
  total: number;
  active: number;
  expired: number;
  avg_quality: number | null;
  last_build: Date | null;
}

const gapsSchema = z.array(
  z.object({
    kind: z.enum([
      'missing_acceptance_criteria',
      'missing_components',
      'missing_labels',
      'missing_meetings',
      'missing_docs',
      'missing_linked_issues',
    ]),
    description: z.string(),
  })
);

const sourcesUsedSchema = z.array(z.string());

const statusSchema = z.enum(['active', 'expired', 'stale']);

/**
 * Cheap current-state probe taken by the request path
 */
export interface FreshnessProbe {
  sourceDataHash?: string;
  sourceVersion?: string | null;
}

export interface PrebuiltStorageOptions {
  /** Clock in ms, injectable for tests */
  now?: () => number;
}

function toRecord(row: PrebuiltRow): PrebuiltRecord {
  const gaps = gapsSchema.safeParse(row.gaps);
  const sourcesUsed = sourcesUsedSchema.safeParse(row.sources_used);
  const status = statusSchema.safeParse(row.status);

  if (!gaps.success || !sourcesUsed.success) {
    logger.warn({ taskId: row.task_id }, 'Malformed JSON columns in prebuilt row');
  }

  return {
    taskId: row.task_id,
    body: row.body,
    sourcesUsed: sourcesUsed.success ? sourcesUsed.data : [],
    qualityScore: Number(row.quality_score),
    gaps: gaps.success ? gaps.data : [],
    sourceDataHash: row.source_data_hash,
    sourceVersion: row.source_version,
    createdAt: new Date(row.created_at),
    expiresAt: new Date(row.expires_at),
    // Unknown status values are treated as stale so they get rebuilt
    status: status.success ? status.data : 'stale',
  };
}

export class PrebuiltStorage {
  private readonly now: () => number;

  constructor(options: PrebuiltStorageOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async initialize(): Promise<void> {
    await this.run('initialize', () => query(SCHEMA_SQL));
    logger.info('Prebuilt context table ready');
  }

  async get(taskId: string): Promise<PrebuiltRecord | null> {
    const row = await this.run('get', () =>
      queryOne<PrebuiltRow>('SELECT * FROM prebuilt_context WHERE task_id = $1', [taskId])
    );
    return row ? toRecord(row) : null;
  }

  /**
   * Insert or replace the record for its task, in one statement
   */
  async put(record: PrebuiltRecord): Promise<void> {
    await this.run('put', () =>
      query(
        `INSERT INTO prebuilt_context (
           task_id, body, sources_used, quality_score, gaps,
           source_data_hash, source_version, created_at, expires_at, status
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         ON CONFLICT (task_id) DO UPDATE SET
           body = EXCLUDED.body,
           sources_used = EXCLUDED.sources_used,
           quality_score = EXCLUDED.quality_score,
           gaps = EXCLUDED.gaps,
           source_data_hash = EXCLUDED.source_data_hash,
           source_version = EXCLUDED.source_version,
           created_at = EXCLUDED.created_at,
           expires_at = EXCLUDED.expires_at,
           status = EXCLUDED.status`,
        [
          record.taskId,
          record.body,
          JSON.stringify(record.sourcesUsed),
          record.qualityScore,
          JSON.stringify(record.gaps),
          record.sourceDataHash,
          record.sourceVersion,
          record.createdAt,
          record.expiresAt,
          record.status,
        ]
      )
    );
    logger.debug({ taskId: record.taskId, qualityScore: record.qualityScore }, 'Stored prebuilt context');
  }

  /**
   * True when the TTL has passed, the status is no longer active, or a
   * probe shows the source data changed. Without a probe, TTL and status decide.
   */
  isStale(record: PrebuiltRecord, probe?: FreshnessProbe): boolean {
    if (this.now() > record.expiresAt.getTime()) {
      return true;
    }
    if (record.status !== 'active') {
      return true;
    }
    if (probe?.sourceDataHash !== undefined && probe.sourceDataHash !== record.sourceDataHash) {
      return true;
    }
    if (
      probe?.sourceVersion !== undefined &&
      probe.sourceVersion !== null &&
      record.sourceVersion !== null &&
      probe.sourceVersion !== record.sourceVersion
    ) {
      return true;
    }
    return false;
  }

  async stats(): Promise<PrebuiltStats> {
    const now = new Date(this.now());
    const row = await this.run('stats', () =>
      queryOne<StatsRow>(
        `SELECT
           COUNT(*)::int AS total,
           COUNT(*) FILTER (WHERE status = 'active' AND expires_at > $1)::int AS active,
           COUNT(*) FILTER (WHERE status <> 'active' OR expires_at <= $1)::int AS expired,
           AVG(quality_score)::float AS avg_quality,
           MAX(created_at) AS last_build
         FROM prebuilt_context`,
        [now]
      )
    );

    return {
      total: row?.total ?? 0,
      active: row?.active ?? 0,
      expired: row?.expired ?? 0,
      avgQuality: row?.avg_quality == null ? 0 : Math.round(row.avg_quality * 100) / 100,
      lastBuild: row?.last_build ? new Date(row.last_build) : null,
    };
  }

  async delete(taskId: string): Promise<boolean> {
    const rows = await this.run('delete', () =>
      query<{ task_id: string }>('DELETE FROM prebuilt_context WHERE task_id = $1 RETURNING task_id', [taskId])
    );
    return rows.length > 0;
  }

  /**
   * Maintenance: flag active rows whose TTL has passed
   */
  async markExpired(): Promise<number> {
    const rows = await this.run('markExpired', () =>
      query<{ task_id: string }>(
        `UPDATE prebuilt_context SET status = 'expired'
         WHERE status = 'active' AND expires_at <= $1
         RETURNING task_id`,
        [new Date(this.now())]
      )
    );
    if (rows.length > 0) {
      logger.info({ count: rows.length }, 'Marked prebuilt contexts expired');
    }
    return rows.length;
  }

  /**
   * Maintenance: drop rows that expired more than `retentionHours` ago
   */
  async deleteExpired(retentionHours: number): Promise<number> {
    const cutoff = new Date(this.now() - retentionHours * 3_600_000);
    const rows = await this.run('deleteExpired', () =>
      query<{ task_id: string }>('DELETE FROM prebuilt_context WHERE expires_at <= $1 RETURNING task_id', [cutoff])
    );
    if (rows.length > 0) {
      logger.info({ count: rows.length, retentionHours }, 'Deleted expired prebuilt contexts');
    }
    return rows.length;
  }

  /**
   * Hourly maintenance run by the watcher
   */
  async maintain(retentionHours: number): Promise<{ expired: number; deleted: number }> {
    const expired = await this.markExpired();
    const deleted = await this.deleteExpired(retentionHours);
    return { expired, deleted };
  }

  async list(options: { status?: PrebuiltStatus; limit?: number } = {}): Promise<PrebuiltRecord[]> {
    const { status, limit = 100 } = options;
    const rows = await this.run('list', () =>
      status
        ? query<PrebuiltRow>(
            'SELECT * FROM prebuilt_context WHERE status = $1 ORDER BY created_at DESC LIMIT $2',
            [status, limit]
          )
        : query<PrebuiltRow>('SELECT * FROM prebuilt_context ORDER BY created_at DESC LIMIT $1', [limit])
    );
    return rows.map(toRecord);
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      logger.error({ operation, error: errorMessage(error) }, 'Prebuilt storage operation failed');
      throw new StorageError(`prebuilt_context ${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
