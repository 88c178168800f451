#!/usr/bin/env node
/**
 * MCP stdio transport entry point.
 *
 * Runs the tool server over stdin/stdout (no HTTP server needed).
 * Usage: file-nexus-mcp [basePath]
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { initializeApp } from './server.js';
import { createMcpServer } from './mcp/index.js';

async function main() {
  const basePath = process.argv[2] || process.env['APP_BASE_PATH'] || process.cwd();

  // The logger writes to stderr, stdout carries only JSON-RPC
  const ctx = await initializeApp(basePath);
  const mcpServer = createMcpServer(ctx);

  const transport = new StdioServerTransport();
  await mcpServer.connect(transport);

  ctx.logger.info({ basePath }, 'MCP server connected via stdio');

  const shutdown = () => {
    mcpServer.close().then(
      () => process.exit(0),
      (err: unknown) => {
        ctx.logger.error({ err }, 'Error closing MCP server');
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  process.stderr.write(`Fatal: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
  process.exit(1);
});
