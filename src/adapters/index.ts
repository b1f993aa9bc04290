/**
 * Source adapters
 *
 * Builds the registry from per-source configuration. Registration order is
 * fetch-result order: the issue tracker first, then meetings, docs, chat, email, code.
 */

import type { SourcesConfig } from '../lib/config.js';
import { createLogger } from '../lib/logger.js';
import { FirefliesAdapter } from './fireflies.js';
import { GitHubAdapter } from './github.js';
import { GmailAdapter } from './gmail.js';
import { JiraAdapter } from './jira.js';
import { LocalDocsAdapter } from './local-docs.js';
import { createAdapterRegistry, type AdapterRegistry } from './registry.js';
import { SlackAdapter } from './slack.js';
import type { Adapter } from './types.js';

const logger = createLogger('adapters');

export function buildAdapters(sources: SourcesConfig): Adapter[] {
  const adapters: Adapter[] = [];

  if (sources.jira.enabled) adapters.push(new JiraAdapter(sources.jira));
  if (sources.fireflies.enabled) adapters.push(new FirefliesAdapter(sources.fireflies));
  if (sources.docs.enabled) adapters.push(new LocalDocsAdapter(sources.docs));
  if (sources.slack.enabled) adapters.push(new SlackAdapter(sources.slack));
  if (sources.gmail.enabled) adapters.push(new GmailAdapter(sources.gmail));
  if (sources.github.enabled) adapters.push(new GitHubAdapter(sources.github));

  if (adapters.length === 0) {
    logger.warn('No source adapters enabled');
  }
  return adapters;
}

export function buildAdapterRegistry(sources: SourcesConfig): AdapterRegistry {
  return createAdapterRegistry(buildAdapters(sources));
}

export { AdapterRegistry, createAdapterRegistry } from './registry.js';
export type { Adapter, AdapterFetchOptions, DocumentSearcher, FetchDepth, TaskTracker } from './types.js';
