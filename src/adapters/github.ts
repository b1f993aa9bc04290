/**
 * GitHub Adapter
 *
 * Pull requests and issues that mention a task, plus recent merges touching
 * the ticket's service area. Octokit calls run behind circuit breakers.
 */

import { Octokit } from '@octokit/rest';
import type CircuitBreaker from 'opossum';
import type { SourcesConfig } from '../lib/config.js';
import { createCircuitBreaker, shutdownCircuit } from '../lib/circuit-breaker.js';
import { createLogger } from '../lib/logger.js';
import { AdapterError, errorMessage } from '../lib/errors.js';
import { createSourceContext, findTicket } from '../context/source-context.js';
import type { CodeIssue, PullRequest, SearchResult, SourceContext, Ticket } from '../context/types.js';
import type { Adapter, AdapterFetchOptions } from './types.js';

const logger = createLogger('adapters:github');

const MENTION_LIMIT = { standard: 10, deep: 20 } as const;
const RECENT_PR_LIMIT = 5;
const RECENT_CANDIDATES = 10;
const FILES_PER_PR = 30;
const FILES_SHOWN = 5;
const DAY_MS = 24 * 60 * 60 * 1000;
const NON_AREA_LABEL = /^(p\d|bug|feature|enhancement)/i;

export type GitHubConfig = SourcesConfig['github'];

/** The fields of a search hit this adapter reads */
interface SearchItem {
  number: number;
  title: string;
  state: string;
  html_url: string;
  body?: string | null;
  user: { login: string } | null;
  labels: { name?: string }[];
  pull_request?: { merged_at?: string | null };
}

interface SearchRequest {
  q: string;
  perPage: number;
  signal?: AbortSignal;
}

interface FilesRequest {
  owner: string;
  repo: string;
  pullNumber: number;
  signal?: AbortSignal;
}

/**
 * Path fragments for a ticket's components and labels,
 * e.g. "payments-service" gives "payments" and "payment"
 */
export function serviceAreas(ticket: Pick<Ticket, 'components' | 'labels'>): string[] {
  const areas: string[] = [];

  for (const component of ticket.components) {
    const clean = component.toLowerCase().replace(/[-_]service$/, '');
    areas.push(clean, clean.endsWith('s') ? clean.slice(0, -1) : `${clean}s`);
  }
  for (const label of ticket.labels) {
    if (!NON_AREA_LABEL.test(label)) {
      areas.push(label.toLowerCase().replace(/-/g, '/'));
    }
  }

  return [...new Set(areas)].filter((area) => area.length > 0);
}

function toPullRequest(repo: string, item: SearchItem, relation: PullRequest['relation']): PullRequest {
  const mergedAt = item.pull_request?.merged_at;
  return {
    repo,
    number: item.number,
    title: item.title,
    author: item.user?.login ?? 'unknown',
    state: item.state,
    url: item.html_url,
    mergedAt: mergedAt ? new Date(mergedAt) : null,
    body: item.body ?? null,
    changedFiles: [],
    relation,
  };
}

function toIssue(repo: string, item: SearchItem): CodeIssue {
  return {
    repo,
    number: item.number,
    title: item.title,
    state: item.state,
    url: item.html_url,
    labels: item.labels.map((label) => label.name).filter((name): name is string => Boolean(name)),
  };
}

export function formatCodeActivity(pullRequests: readonly PullRequest[], issues: readonly CodeIssue[], now: Date): string {
  const related = pullRequests.filter((pr) => pr.relation === 'mentions');
  const recent = pullRequests.filter((pr) => pr.relation === 'recent');
  const parts: string[] = [];

  if (related.length > 0) {
    parts.push('Related PRs:');
    for (const pr of related) {
      parts.push(`**PR #${pr.number}** (${pr.repo}): ${pr.title} (${pr.mergedAt ? 'merged' : pr.state})`);
      parts.push(`Author: @${pr.author}`);
      if (pr.changedFiles.length > 0) {
        const more = pr.changedFiles.length > FILES_SHOWN ? ` (+${pr.changedFiles.length - FILES_SHOWN} more)` : '';
        parts.push(`Changed: ${pr.changedFiles.slice(0, FILES_SHOWN).join(', ')}${more}`);
      }
    }
  }

  if (recent.length > 0) {
    if (parts.length > 0) parts.push('');
    parts.push('Recent PRs in the same area:');
    for (const pr of recent) {
      const daysAgo = pr.mergedAt ? Math.floor((now.getTime() - pr.mergedAt.getTime()) / DAY_MS) : null;
      parts.push(`- PR #${pr.number} (${pr.repo}): ${pr.title}${daysAgo !== null ? ` (${daysAgo}d ago)` : ''}`);
    }
  }

  if (issues.length > 0) {
    if (parts.length > 0) parts.push('');
    parts.push('Related issues:');
    for (const issue of issues) {
      const labels = issue.labels.length > 0 ? ` [${issue.labels.join(', ')}]` : '';
      parts.push(`- #${issue.number} (${issue.repo}): ${issue.title} (${issue.state})${labels}`);
    }
  }

  return parts.join('\n');
}

export interface GitHubAdapterOptions {
  now?: () => Date;
}

export class GitHubAdapter implements Adapter {
  readonly name = 'github';
  readonly sourceType = 'code' as const;
  readonly isPrimary = false;
  readonly needsPrimaryContext = true;
  private readonly octokit: Octokit;
  private readonly searchBreaker: CircuitBreaker<[SearchRequest], SearchItem[]>;
  private readonly filesBreaker: CircuitBreaker<[FilesRequest], string[]>;
  private readonly now: () => Date;

  constructor(
    private readonly config: GitHubConfig,
    options: GitHubAdapterOptions = {}
  ) {
    this.octokit = new Octokit({ auth: config.token });
    this.now = options.now ?? (() => new Date());

    this.searchBreaker = createCircuitBreaker('adapter:github:search', async (request: SearchRequest) => {
      const result = await this.octokit.search.issuesAndPullRequests({
        q: request.q,
        per_page: request.perPage,
        sort: 'updated',
        request: { signal: request.signal },
      });
      const items: SearchItem[] = result.data.items;
      return items;
    });

    this.filesBreaker = createCircuitBreaker('adapter:github:files', async (request: FilesRequest) => {
      const result = await this.octokit.pulls.listFiles({
        owner: request.owner,
        repo: request.repo,
        pull_number: request.pullNumber,
        per_page: FILES_PER_PR,
        request: { signal: request.signal },
      });
      return result.data.map((file) => file.filename);
    });
  }

  async fetchTaskContext(taskId: string, options: AdapterFetchOptions): Promise<SourceContext> {
    const { primaryHint, depth, signal } = options;
    const ticket = primaryHint ? findTicket([primaryHint]) : null;
    const areas = ticket ? serviceAreas(ticket) : [];
    const mentionLimit = MENTION_LIMIT[depth];

    const pullRequests: PullRequest[] = [];
    const issues: CodeIssue[] = [];

    for (const repo of this.config.repos) {
      const mentions = await this.runSearch(`"${taskId}" repo:${repo}`, mentionLimit, signal);
      for (const item of mentions) {
        if (item.pull_request) {
          const pr = toPullRequest(repo, item, 'mentions');
          pr.changedFiles = await this.changedFiles(repo, pr.number, signal);
          pullRequests.push(pr);
        } else {
          issues.push(toIssue(repo, item));
        }
      }
    }

    const recent = await this.recentInArea(areas, signal);
    const seen = new Set(pullRequests.map((pr) => `${pr.repo}#${pr.number}`));
    for (const pr of recent) {
      if (!seen.has(`${pr.repo}#${pr.number}`)) {
        pullRequests.push(pr);
      }
    }

    logger.debug(
      { taskId, pullRequests: pullRequests.length, issues: issues.length, areas },
      'Fetched GitHub activity'
    );

    return createSourceContext({
      sourceName: this.name,
      sourceType: this.sourceType,
      data: { kind: 'code', pullRequests, issues },
      rawText: formatCodeActivity(pullRequests, issues, this.now()),
      metadata: {
        relatedPrCount: pullRequests.filter((pr) => pr.relation === 'mentions').length,
        recentPrCount: pullRequests.filter((pr) => pr.relation === 'recent').length,
        issueCount: issues.length,
      },
    });
  }

  async search(query: string, maxResults: number, signal?: AbortSignal): Promise<SearchResult[]> {
    const items: SearchItem[] = [];
    for (const configured of this.config.repos) {
      items.push(...(await this.runSearch(`${query} repo:${configured}`, maxResults, signal)));
    }
    const ranked = items.slice(0, maxResults);

    return ranked.map((item, index) => ({
      sourceName: this.name,
      sourceType: this.sourceType,
      title: `${item.pull_request ? 'PR' : 'Issue'} #${item.number}: ${item.title}`,
      excerpt: (item.body ?? '').slice(0, 300),
      url: item.html_url,
      relevanceScore: Math.max(0.1, 1 - index / Math.max(1, ranked.length)),
    }));
  }

  async healthCheck(): Promise<boolean> {
    if (!this.config.token || this.config.repos.length === 0) {
      return false;
    }
    try {
      await this.octokit.rateLimit.get();
      return true;
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'GitHub health check failed');
      return false;
    }
  }

  async close(): Promise<void> {
    shutdownCircuit('adapter:github:search');
    shutdownCircuit('adapter:github:files');
  }

  private async runSearch(q: string, perPage: number, signal?: AbortSignal): Promise<SearchItem[]> {
    try {
      return await this.searchBreaker.fire({ q, perPage, signal });
    } catch (error) {
      throw new AdapterError(this.name, `search failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async changedFiles(repo: string, pullNumber: number, signal?: AbortSignal): Promise<string[]> {
    const [owner, name] = repo.split('/');
    try {
      return await this.filesBreaker.fire({ owner, repo: name, pullNumber, signal });
    } catch (error) {
      logger.debug({ repo, pullNumber, error: errorMessage(error) }, 'Could not list changed files');
      return [];
    }
  }

  /**
   * Recently merged PRs, narrowed to the ticket's area when it has one
   */
  private async recentInArea(areas: string[], signal?: AbortSignal): Promise<PullRequest[]> {
    const since = new Date(this.now().getTime() - this.config.recentPrDays * DAY_MS).toISOString().slice(0, 10);
    const recent: PullRequest[] = [];

    for (const repo of this.config.repos) {
      const items = await this.runSearch(
        `repo:${repo} is:pr is:merged merged:>=${since}`,
        RECENT_CANDIDATES,
        signal
      );
      for (const item of items) {
        const pr = toPullRequest(repo, item, 'recent');
        if (areas.length > 0) {
          pr.changedFiles = await this.changedFiles(repo, pr.number, signal);
          const touchesArea = pr.changedFiles.some((file) => areas.some((area) => file.toLowerCase().includes(area)));
          if (!touchesArea) continue;
        }
        recent.push(pr);
        if (recent.length >= RECENT_PR_LIMIT) {
          return recent;
        }
      }
    }

    return recent;
  }
}
