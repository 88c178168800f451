/**
 * Aggregator that registers all MCP tools on the server.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { registerTagTools } from './tagTools.js';
import { registerQueryTools } from './queryTools.js';
import { registerCommentTools } from './commentTools.js';
import { registerRelationTools } from './relationTools.js';

export function registerAllTools(server: McpServer, ctx: AppContext): void {
  registerTagTools(server, ctx);
  registerQueryTools(server, ctx);
  registerCommentTools(server, ctx);
  registerRelationTools(server, ctx);
}
