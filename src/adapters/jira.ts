/**
 * Jira Adapter
 *
 * Issue tracker and usual primary source. Reads a ticket with its comments
 * and links through the REST v3 API, offers a cheap `updated` probe and the
 * status query the watcher polls.
 */

import { z } from 'zod';
import type { SourcesConfig } from '../lib/config.js';
import { createLogger } from '../lib/logger.js';
import { AdapterError } from '../lib/errors.js';
import { createSourceContext } from '../context/source-context.js';
import type { LinkedIssue, SearchResult, SourceContext, Ticket, TicketComment } from '../context/types.js';
import { SourceHttpClient } from './http.js';
import type { Adapter, AdapterFetchOptions, TaskTracker } from './types.js';

const logger = createLogger('adapters:jira');

const API_PATH = '/rest/api/3';
const TICKET_FIELDS =
  'summary,description,status,assignee,labels,components,issuelinks,created,updated,customfield_10016,customfield_10020';
const COMMENT_LIMIT = { standard: 10, deep: 50 } as const;
const WATCH_LIMIT = 50;

export type JiraConfig = SourcesConfig['jira'];

const linkedIssueRefSchema = z.object({
  key: z.string(),
  fields: z
    .object({
      summary: z.string().default(''),
      status: z.object({ name: z.string() }).nullish(),
    })
    .default({}),
});

const issueLinkSchema = z.object({
  type: z.object({ name: z.string(), inward: z.string().optional(), outward: z.string().optional() }),
  inwardIssue: linkedIssueRefSchema.optional(),
  outwardIssue: linkedIssueRefSchema.optional(),
});

const issueSchema = z.object({
  key: z.string(),
  fields: z.object({
    summary: z.string().default(''),
    description: z.unknown().optional(),
    status: z.object({ name: z.string() }).nullish(),
    assignee: z.object({ displayName: z.string() }).nullish(),
    labels: z.array(z.string()).default([]),
    components: z.array(z.object({ name: z.string() })).default([]),
    issuelinks: z.array(issueLinkSchema).default([]),
    created: z.string(),
    updated: z.string(),
    customfield_10016: z.number().nullish(),
    customfield_10020: z.array(z.object({ name: z.string() })).nullish(),
  }),
});

const versionSchema = z.object({
  fields: z.object({ updated: z.string() }),
});

const commentsSchema = z.object({
  comments: z
    .array(
      z.object({
        author: z.object({ displayName: z.string() }).nullish(),
        body: z.unknown(),
        created: z.string(),
      })
    )
    .default([]),
});

const searchSchema = z.object({
  issues: z
    .array(
      z.object({
        key: z.string(),
        fields: z
          .object({
            summary: z.string().default(''),
            description: z.unknown().optional(),
            status: z.object({ name: z.string() }).nullish(),
          })
          .default({}),
      })
    )
    .default([]),
});

type JiraIssue = z.infer<typeof issueSchema>;

/**
 * Jira writes offsets as +0000; Date only takes +00:00
 */
export function parseJiraDate(value: string): Date {
  return new Date(value.replace(/([+-]\d{2})(\d{2})$/, '$1:$2'));
}

/**
 * Plain text from an Atlassian Document Format node (or a plain string)
 */
export function adfToText(node: unknown): string {
  if (typeof node === 'string') return node;
  if (!node || typeof node !== 'object') return '';

  const type = 'type' in node ? node.type : undefined;
  if (type === 'text') {
    return 'text' in node && typeof node.text === 'string' ? node.text : '';
  }

  const children = 'content' in node && Array.isArray(node.content) ? node.content : [];
  const text = children.map(adfToText).join('');

  if (type === 'paragraph' || type === 'heading' || type === 'listItem') {
    return `${text}\n`;
  }
  if (type === 'doc') {
    return text.trim();
  }
  return text;
}

/**
 * Text under an "Acceptance Criteria" heading or label in a description
 */
export function extractAcceptanceCriteria(description: string | null): string | null {
  if (!description) return null;

  const lines = description.split(/\r?\n/);
  const start = lines.findIndex((line) => /^\s*(#+\s*)?acceptance criteria\s*:?\s*$/i.test(line));
  if (start < 0) return null;

  const collected: string[] = [];
  for (const line of lines.slice(start + 1)) {
    if (/^\s*#+\s/.test(line) || /^\s*[A-Z][A-Za-z ]{2,40}:\s*$/.test(line)) break;
    collected.push(line);
  }

  const criteria = collected.join('\n').trim();
  return criteria || null;
}

function toLinkedIssue(link: z.infer<typeof issueLinkSchema>): LinkedIssue | null {
  const outward = link.outwardIssue;
  const inward = link.inwardIssue;
  const issue = outward ?? inward;
  if (!issue) return null;

  return {
    taskId: issue.key,
    title: issue.fields.summary,
    status: issue.fields.status?.name ?? 'Unknown',
    linkType: (outward ? link.type.outward : link.type.inward) ?? link.type.name,
  };
}

function toTicket(issue: JiraIssue): Ticket {
  const { fields } = issue;
  const description = fields.description === undefined || fields.description === null ? null : adfToText(fields.description);
  const sprints = fields.customfield_10020 ?? [];

  return {
    taskId: issue.key,
    title: fields.summary,
    description,
    status: fields.status?.name ?? 'Unknown',
    assignee: fields.assignee?.displayName ?? null,
    labels: fields.labels,
    components: fields.components.map((component) => component.name),
    acceptanceCriteria: extractAcceptanceCriteria(description),
    storyPoints: fields.customfield_10016 ?? null,
    sprint: sprints.length > 0 ? sprints[sprints.length - 1].name : null,
    created: parseJiraDate(fields.created),
    updated: parseJiraDate(fields.updated),
  };
}

export function formatTicket(ticket: Ticket, comments: TicketComment[], linkedIssues: LinkedIssue[]): string {
  const parts = [`**${ticket.taskId}: ${ticket.title}**`, `Status: ${ticket.status}`];

  if (ticket.assignee) parts.push(`Assignee: ${ticket.assignee}`);
  if (ticket.components.length > 0) parts.push(`Components: ${ticket.components.join(', ')}`);
  if (ticket.labels.length > 0) parts.push(`Labels: ${ticket.labels.join(', ')}`);
  if (ticket.storyPoints !== null) parts.push(`Story points: ${ticket.storyPoints}`);
  if (ticket.sprint) parts.push(`Sprint: ${ticket.sprint}`);

  if (ticket.description) {
    parts.push('', 'Description:', ticket.description);
  }

  if (linkedIssues.length > 0) {
    parts.push('', 'Linked issues:');
    for (const issue of linkedIssues) {
      parts.push(`- ${issue.linkType} ${issue.taskId}: ${issue.title} (${issue.status})`);
    }
  }

  if (comments.length > 0) {
    parts.push('', 'Comments:');
    for (const comment of comments) {
      parts.push(`- ${comment.author} (${comment.created.toISOString().slice(0, 10)}): ${comment.body}`);
    }
  }

  return parts.join('\n');
}

export function buildStatusJql(status: string, projects: string[]): string {
  const escapedStatus = status.replace(/"/g, '\\"');
  const statusClause = `status = "${escapedStatus}" AND updated >= -1h ORDER BY updated DESC`;
  if (projects.length === 0) {
    return statusClause;
  }
  const projectClause = projects.length === 1 ? `project = "${projects[0]}"` : `project IN (${projects.join(', ')})`;
  return `${projectClause} AND ${statusClause}`;
}

export class JiraAdapter implements Adapter, TaskTracker {
  readonly name = 'jira';
  readonly sourceType = 'issue_tracker' as const;
  readonly isPrimary: boolean;
  readonly needsPrimaryContext = false;
  private readonly http = new SourceHttpClient('jira');

  constructor(private readonly config: JiraConfig) {
    this.isPrimary = config.primary;
  }

  private get headers(): Record<string, string> {
    const credentials = Buffer.from(`${this.config.email}:${this.config.apiToken}`).toString('base64');
    return { Authorization: `Basic ${credentials}` };
  }

  private url(path: string, params: Record<string, string | number> = {}): string {
    const url = new URL(`${this.config.baseUrl.replace(/\/+$/, '')}${API_PATH}${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  async fetchTaskContext(taskId: string, options: AdapterFetchOptions): Promise<SourceContext> {
    const { signal, depth } = options;
    const issue = await this.getIssue(taskId, signal);
    const ticket = toTicket(issue);

    const commentData = await this.http.json(
      {
        url: this.url(`/issue/${encodeURIComponent(taskId)}/comment`, {
          maxResults: COMMENT_LIMIT[depth],
          orderBy: '-created',
        }),
        headers: this.headers,
        signal,
      },
      commentsSchema
    );

    const comments: TicketComment[] = commentData.comments.map((comment) => ({
      author: comment.author?.displayName ?? 'Unknown',
      body: adfToText(comment.body).trim(),
      created: parseJiraDate(comment.created),
    }));
    const linkedIssues = issue.fields.issuelinks
      .map(toLinkedIssue)
      .filter((link): link is LinkedIssue => link !== null);

    logger.debug({ taskId, comments: comments.length, links: linkedIssues.length }, 'Fetched Jira ticket');

    return createSourceContext({
      sourceName: this.name,
      sourceType: this.sourceType,
      data: { kind: 'ticket', ticket, comments, linkedIssues },
      rawText: formatTicket(ticket, comments, linkedIssues),
      metadata: {
        version: ticket.updated.toISOString(),
        url: `${this.config.baseUrl.replace(/\/+$/, '')}/browse/${ticket.taskId}`,
      },
    });
  }

  async search(query: string, maxResults: number, signal?: AbortSignal): Promise<SearchResult[]> {
    const escaped = query.replace(/"/g, '\\"');
    const data = await this.http.json(
      {
        url: this.url('/search', {
          jql: `text ~ "${escaped}"`,
          maxResults,
          fields: 'summary,description,status',
        }),
        headers: this.headers,
        signal,
      },
      searchSchema
    );

    return data.issues.map((issue, index) => ({
      sourceName: this.name,
      sourceType: this.sourceType,
      title: `${issue.key}: ${issue.fields.summary}`,
      excerpt: adfToText(issue.fields.description).slice(0, 300),
      url: `${this.config.baseUrl.replace(/\/+$/, '')}/browse/${issue.key}`,
      // no score in the response; rank by position
      relevanceScore: Math.max(0.1, 1 - index / Math.max(1, data.issues.length)),
    }));
  }

  async probeVersion(taskId: string, signal?: AbortSignal): Promise<string | null> {
    const data = await this.http.json(
      {
        url: this.url(`/issue/${encodeURIComponent(taskId)}`, { fields: 'updated' }),
        headers: this.headers,
        signal,
      },
      versionSchema
    );
    return parseJiraDate(data.fields.updated).toISOString();
  }

  async findTasksByStatus(status: string, projects: string[], signal?: AbortSignal): Promise<string[]> {
    const jql = buildStatusJql(status, projects);
    const data = await this.http.json(
      {
        url: this.url('/search', { jql, maxResults: WATCH_LIMIT, fields: 'key' }),
        headers: this.headers,
        signal,
      },
      searchSchema
    );
    logger.debug({ jql, found: data.issues.length }, 'Queried Jira for ready tasks');
    return data.issues.map((issue) => issue.key);
  }

  async healthCheck(): Promise<boolean> {
    if (!this.config.baseUrl || !this.config.email || !this.config.apiToken) {
      return false;
    }
    try {
      await this.http.json({ url: this.url('/myself'), headers: this.headers }, z.object({}).passthrough());
      return true;
    } catch (error) {
      logger.warn({ error }, 'Jira health check failed');
      return false;
    }
  }

  async close(): Promise<void> {
    this.http.close();
  }

  private async getIssue(taskId: string, signal: AbortSignal): Promise<JiraIssue> {
    try {
      return await this.http.json(
        {
          url: this.url(`/issue/${encodeURIComponent(taskId)}`, { fields: TICKET_FIELDS }),
          headers: this.headers,
          signal,
        },
        issueSchema
      );
    } catch (error) {
      if (error instanceof AdapterError && error.status === 404) {
        throw new AdapterError(this.name, `task ${taskId} not found`, { status: 404, cause: error });
      }
      throw error;
    }
  }
}
