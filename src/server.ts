// src/server.ts

/**
 * MCP server exposing the Ralph Loop over stdio.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { AutoloopConfig } from './config.js';
import { createRuntime } from './runtime.js';
import type { RuntimeOptions } from './runtime.js';
import { createLoopToolContext, registerRalphLoopTools } from './tools/index.js';
import { logger } from './utils/logger.js';

export const SERVER_NAME = 'autoloop';
export const SERVER_VERSION = '0.1.0';

export function createServer(config: AutoloopConfig, options: RuntimeOptions = {}): McpServer {
  const runtime = createRuntime(config, options);
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  registerRalphLoopTools(server, createLoopToolContext(
    ceiling => runtime.loopDependencies(ceiling),
    { stateFilePath: config.stateFilePath, cacheSize: config.resultCacheSize }
  ));

  return server;
}

export async function startServer(config: AutoloopConfig, options: RuntimeOptions = {}): Promise<void> {
  const server = createServer(config, options);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ name: SERVER_NAME, version: SERVER_VERSION }, 'MCP server listening on stdio');
}
