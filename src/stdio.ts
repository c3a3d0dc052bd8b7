#!/usr/bin/env node
/**
 * Stdio transport entry point for local MCP clients
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { getConfig } from './auth/middleware.js';
import { ToolRegistry } from './tools/index.js';
import { closeRedis } from './utils/redis.js';

async function main() {
  const config = getConfig();

  const toolRegistry = new ToolRegistry({
    intervals: config.intervals,
    webhookSecret: config.webhookSecret,
    redisUrl: config.redisUrl,
    downloadDir: config.downloadDir,
  });

  const server = new McpServer({
    name: 'pacekeeper',
    version: '1.0.0',
  });

  toolRegistry.registerTools(server);

  // stdout carries the protocol, so logs go to stderr
  console.log = console.error;

  const transport = new StdioServerTransport();

  transport.onclose = () => {
    toolRegistry
      .shutdown()
      .then(() => closeRedis())
      .catch((error) => console.error('Error during shutdown:', error));
  };

  await server.connect(transport);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
