/**
 * Adapter contract
 *
 * A flat capability set; adapters are plain classes selected by name from
 * configuration (see registry.ts), no base class required.
 */

import type {
  SourceContext,
  SourceType,
  SearchResult,
  Ticket,
} from '../context/types.js';

export type FetchDepth = 'standard' | 'deep';

export interface AdapterFetchOptions {
  /** Context produced by the primary source, null when it failed or is absent */
  primaryHint: SourceContext | null;
  /** Pipeline builds use 'deep' for larger result counts */
  depth: FetchDepth;
  signal: AbortSignal;
}

export interface Adapter {
  readonly name: string;
  readonly sourceType: SourceType;
  /** Fetched first; its context is handed to adapters that need it */
  readonly isPrimary: boolean;
  readonly needsPrimaryContext: boolean;

  fetchTaskContext(taskId: string, options: AdapterFetchOptions): Promise<SourceContext>;
  search(query: string, maxResults: number, signal?: AbortSignal): Promise<SearchResult[]>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;

  /** Cheap freshness token for a task, used for opportunistic staleness checks */
  probeVersion?(taskId: string, signal?: AbortSignal): Promise<string | null>;
}

/**
 * Issue tracker capability, used by the watcher
 */
export interface TaskTracker {
  findTasksByStatus(status: string, projects: string[], signal?: AbortSignal): Promise<string[]>;
}

/**
 * Local documentation capability, used by the pipeline and get_standards
 */
export interface DocumentSearcher {
  broadSearch(ticket: Ticket): Promise<SourceContext>;
  getStandards(area?: string): Promise<SourceContext>;
}

export function isTaskTracker(adapter: Adapter): adapter is Adapter & TaskTracker {
  return 'findTasksByStatus' in adapter && typeof adapter.findTasksByStatus === 'function';
}

export function isDocumentSearcher(adapter: Adapter): adapter is Adapter & DocumentSearcher {
  return (
    'broadSearch' in adapter &&
    typeof adapter.broadSearch === 'function' &&
    'getStandards' in adapter &&
    typeof adapter.getStandards === 'function'
  );
}
