/**
 * MCP tool definitions and handlers
 *
 * Handlers validate their arguments with zod, run inside a trace and turn
 * every failure into an isError result; nothing here throws to the transport.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { createLogger } from '../lib/logger.js';
import { getSpanDuration, withTraceAsync } from '../lib/tracing.js';
import { errorMessage } from '../lib/errors.js';
import type { ContextOrchestrator } from '../context/orchestrator.js';
import type { SearchResult, SynthesizedContext } from '../context/types.js';

const logger = createLogger('server:tools');

export type ContextService = Pick<
  ContextOrchestrator,
  'getTaskContext' | 'searchContext' | 'getStandards' | 'healthCheck' | 'prebuiltStats'
>;

export type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

const taskContextArgs = z.object({
  task_id: z.string().trim().min(1, 'task_id is required'),
  refresh: z.boolean().default(false),
});

const searchArgs = z.object({
  query: z.string().trim().min(1, 'query is required'),
  max_results: z.number().int().min(1).max(50).optional(),
});

const standardsArgs = z.object({
  area: z.string().trim().min(1).optional(),
});

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: 'get_task_context',
    description:
      'Get synthesized context for a task: ticket details, comments, linked issues, related meeting ' +
      'decisions, team discussions, recent code changes and applicable documentation in one block.',
    inputSchema: {
      type: 'object',
      properties: {
        task_id: { type: 'string', description: "The task ID (e.g. 'PROJ-123')" },
        refresh: { type: 'boolean', description: 'Skip prebuilt and cached context and rebuild', default: false },
      },
      required: ['task_id'],
    },
  },
  {
    name: 'search_context',
    description: 'Keyword search across every configured source. Returns ranked raw excerpts.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Keyword or phrase' },
        max_results: { type: 'number', description: 'Maximum results (default 10, max 50)' },
      },
      required: ['query'],
    },
  },
  {
    name: 'get_standards',
    description: "Coding standards and conventions from local documentation, optionally for one area (e.g. 'testing').",
    inputSchema: {
      type: 'object',
      properties: {
        area: { type: 'string', description: 'Optional area to filter by' },
      },
    },
  },
  {
    name: 'health_check',
    description: 'Reachability of the store and of every configured source.',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'prebuilt_stats',
    description: 'Counts and average quality of preprocessed task contexts.',
    inputSchema: { type: 'object', properties: {} },
  },
];

function text(value: string): ToolResult {
  return { content: [{ type: 'text', text: value }] };
}

function failure(value: string): ToolResult {
  return { content: [{ type: 'text', text: value }], isError: true };
}

export function formatTaskContext(context: SynthesizedContext): string {
  const lines = [
    `# Context for ${context.taskId}`,
    '',
    `**Sources:** ${context.sourcesUsed.length > 0 ? context.sourcesUsed.join(', ') : 'none'}`,
    `**Quality:** ${context.qualityScore.toFixed(2)} (${context.origin}, built ${context.builtAt.toISOString()})`,
  ];
  if (context.gaps.length > 0) {
    lines.push('**Gaps:**', ...context.gaps.map((gap) => `- ${gap.description}`));
  }
  lines.push('', '---', '', context.body);
  return lines.join('\n');
}

export function formatSearchResults(query: string, results: readonly SearchResult[]): string {
  const lines = [`# Search Results for "${query}"`, '', `**Results found:** ${results.length}`];
  if (results.length === 0) {
    return [...lines, '', 'No results found.'].join('\n');
  }

  lines.push('', '---');
  results.forEach((result, index) => {
    lines.push('', `### ${index + 1}. ${result.title} [${result.sourceName}]`);
    if (result.excerpt) lines.push(result.excerpt);
    if (result.url) lines.push(result.url);
  });
  return lines.join('\n');
}

async function dispatch(service: ContextService, name: string, args: unknown, signal?: AbortSignal): Promise<ToolResult> {
  switch (name) {
    case 'get_task_context': {
      const parsed = taskContextArgs.safeParse(args ?? {});
      if (!parsed.success) {
        return failure(`Error: ${parsed.error.issues[0]?.message ?? 'invalid arguments'}`);
      }
      const context = await service.getTaskContext(parsed.data.task_id, { refresh: parsed.data.refresh, signal });
      logger.info(
        { taskId: context.taskId, origin: context.origin, qualityScore: context.qualityScore },
        'get_task_context completed'
      );
      return text(formatTaskContext(context));
    }

    case 'search_context': {
      const parsed = searchArgs.safeParse(args ?? {});
      if (!parsed.success) {
        return failure(`Error: ${parsed.error.issues[0]?.message ?? 'invalid arguments'}`);
      }
      const results = await service.searchContext(parsed.data.query, parsed.data.max_results);
      logger.info({ query: parsed.data.query, resultCount: results.length }, 'search_context completed');
      return text(formatSearchResults(parsed.data.query, results));
    }

    case 'get_standards': {
      const parsed = standardsArgs.safeParse(args ?? {});
      if (!parsed.success) {
        return failure(`Error: ${parsed.error.issues[0]?.message ?? 'invalid arguments'}`);
      }
      const { area } = parsed.data;
      const standards = await service.getStandards(area);
      const heading = `# Coding Standards${area ? ` (${area})` : ''}`;
      const body = standards && standards.rawText.trim() ? standards.rawText.trim() : 'No standards documents found.';
      return text(`${heading}\n\n${body}`);
    }

    case 'health_check': {
      const report = await service.healthCheck();
      return text(JSON.stringify(report, null, 2));
    }

    case 'prebuilt_stats': {
      const stats = await service.prebuiltStats();
      return text(
        JSON.stringify(
          { ...stats, avgQuality: Math.round(stats.avgQuality * 100) / 100, lastBuild: stats.lastBuild?.toISOString() ?? null },
          null,
          2
        )
      );
    }

    default:
      logger.warn({ tool: name }, 'Unknown tool called');
      return failure(`Error: Unknown tool '${name}'`);
  }
}

/**
 * Run one tool call in its own trace
 */
export async function handleToolCall(
  service: ContextService,
  name: string,
  args: unknown,
  signal?: AbortSignal
): Promise<ToolResult> {
  return withTraceAsync(
    async () => {
      try {
        return await dispatch(service, name, args, signal);
      } catch (error) {
        logger.error({ tool: name, error: errorMessage(error), durationMs: getSpanDuration() }, 'Tool failed');
        return failure(`Tool call failed: ${errorMessage(error)}`);
      }
    },
    { metadata: { tool: name } }
  );
}
