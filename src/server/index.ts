#!/usr/bin/env node
/**
 * Context MCP Server
 *
 * Serves task context over stdio. Reads the prebuilt store written by the
 * watcher and falls back to on-demand builds. Logs go to stderr.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { numericConfig, sourcesConfig, synthesisConfig } from '../lib/config.js';
import { checkConnection, closePool } from '../lib/db.js';
import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { buildAdapterRegistry } from '../adapters/index.js';
import { createSynthesisEngine } from '../synthesis/index.js';
import { FetchCoordinator } from '../context/fetch-coordinator.js';
import { SynthesisDedupCache } from '../context/synthesis-cache.js';
import { PrebuiltStorage } from '../context/prebuilt-storage.js';
import { ContextOrchestrator } from '../context/orchestrator.js';
import { TOOL_DEFINITIONS, handleToolCall } from './tools.js';

const logger = createLogger('server');

const SERVER_NAME = 'taskctx';
const SERVER_VERSION = '0.1.0';

const registry = buildAdapterRegistry(sourcesConfig);
const engine = createSynthesisEngine(synthesisConfig);
const storage = new PrebuiltStorage();

const orchestrator = new ContextOrchestrator(
  {
    registry,
    coordinator: new FetchCoordinator(),
    cache: new SynthesisDedupCache({
      ttlSeconds: numericConfig.cacheTtlSeconds,
      maxSize: numericConfig.cacheMaxSize,
    }),
    engine,
    storage,
    checkStorage: checkConnection,
  },
  {
    perSourceTimeoutMs: numericConfig.sourceTimeoutMs,
    overallTimeoutMs: numericConfig.fetchTimeoutMs,
  }
);

const server = new Server(
  {
    name: SERVER_NAME,
    version: SERVER_VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  logger.debug('Returning tools list');
  return { tools: TOOL_DEFINITIONS };
});

server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
  const { name, arguments: args } = request.params;
  logger.info({ tool: name }, 'Tool called');
  return handleToolCall(orchestrator, name, args, extra.signal);
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, 'Received shutdown signal');

  try {
    await server.close();
    await registry.closeAll();
    await engine.close();
    await closePool();
    logger.info('Shutdown complete');
    process.exit(0);
  } catch (err) {
    logger.error({ err }, 'Error during shutdown');
    process.exit(1);
  }
}

async function main(): Promise<void> {
  logger.info(
    { version: SERVER_VERSION, adapters: registry.names(), synthesis: engine.name },
    'Context MCP server starting'
  );

  // The server can run without the store; every lookup is then a miss
  try {
    await storage.initialize();
  } catch (error) {
    logger.warn({ error: errorMessage(error) }, 'Prebuilt store unavailable, serving on demand only');
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Server connected via stdio');
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

main().catch((error) => {
  logger.error({ error: errorMessage(error) }, 'Fatal error');
  process.exit(1);
});
