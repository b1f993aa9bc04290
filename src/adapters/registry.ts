/**
 * Adapter Registry
 *
 * Explicit registry of the active source adapters, built once at process
 * start and passed to the coordinator, pipeline and watcher.
 *
 * Usage:
 * ```typescript
 * const registry = createAdapterRegistry();
 * registry.register(new JiraAdapter(sourcesConfig.jira));
 *
 * const result = await coordinator.fetch(taskId, registry.getActive(), options);
 * ```
 */

import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import {
  isDocumentSearcher,
  isTaskTracker,
  type Adapter,
  type DocumentSearcher,
  type TaskTracker,
} from './types.js';

const logger = createLogger('adapters:registry');

export interface AdapterRegistrationOptions {
  /** Replace an adapter already registered under the same name */
  override?: boolean;
}

export class AdapterRegistry {
  private readonly adapters = new Map<string, Adapter>();

  register(adapter: Adapter, options: AdapterRegistrationOptions = {}): void {
    const { name } = adapter;

    if (this.adapters.has(name) && !options.override) {
      throw new Error(`Adapter already registered: ${name}. Use { override: true } to replace.`);
    }

    this.adapters.set(name, adapter);
    logger.info({ adapter: name, primary: adapter.isPrimary, override: options.override }, 'Adapter registered');
  }

  get(name: string): Adapter | undefined {
    return this.adapters.get(name);
  }

  has(name: string): boolean {
    return this.adapters.has(name);
  }

  names(): string[] {
    return Array.from(this.adapters.keys());
  }

  /**
   * Active adapters in registration order
   */
  getActive(): Adapter[] {
    return Array.from(this.adapters.values());
  }

  getPrimary(): Adapter | null {
    return this.getActive().find((adapter) => adapter.isPrimary) ?? null;
  }

  /**
   * Adapter the watcher polls for candidate tasks; the primary wins when it can
   */
  getTaskTracker(): (Adapter & TaskTracker) | null {
    const primary = this.getPrimary();
    if (primary && isTaskTracker(primary)) {
      return primary;
    }
    return this.getActive().find(isTaskTracker) ?? null;
  }

  getDocumentSearcher(): (Adapter & DocumentSearcher) | null {
    return this.getActive().find(isDocumentSearcher) ?? null;
  }

  async healthCheckAll(): Promise<Record<string, boolean>> {
    const entries = await Promise.all(
      this.getActive().map(async (adapter): Promise<[string, boolean]> => {
        try {
          return [adapter.name, await adapter.healthCheck()];
        } catch (error) {
          logger.warn({ adapter: adapter.name, error: errorMessage(error) }, 'Health check failed');
          return [adapter.name, false];
        }
      })
    );
    return Object.fromEntries(entries);
  }

  /**
   * Release every adapter's resources. One failing close does not stop the rest.
   */
  async closeAll(): Promise<void> {
    const active = this.getActive();
    const results = await Promise.allSettled(active.map((adapter) => adapter.close()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        logger.warn(
          { adapter: active[index].name, error: errorMessage(result.reason) },
          'Adapter close failed'
        );
      }
    });
    this.adapters.clear();
  }
}

export function createAdapterRegistry(adapters: Adapter[] = []): AdapterRegistry {
  const registry = new AdapterRegistry();
  for (const adapter of adapters) {
    registry.register(adapter);
  }
  return registry;
}
