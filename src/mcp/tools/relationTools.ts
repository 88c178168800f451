/**
 * MCP tools for relations between files.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { runTool } from '../helpers.js';
import { filePathArg, projectPathArg } from './args.js';

export function registerRelationTools(server: McpServer, ctx: AppContext): void {
  // add_file_relation: Directed edge source → target
  server.tool(
    'add_file_relation',
    'Record that one file relates to another, e.g. "imports", "tests", "documents". One relation per ordered pair.',
    {
      projectPath: projectPathArg,
      fromFile: filePathArg.describe('Source file'),
      toFile: filePathArg.describe('Target file'),
      description: z.string().describe('How the source relates to the target'),
    },
    async (args) =>
      runTool(async () => ({
        success: true,
        ...(await ctx.service.addRelation(args.projectPath, args.fromFile, args.toFile, args.description)),
      })),
  );

  server.tool(
    'remove_file_relation',
    'Remove the relation from one file to another.',
    {
      projectPath: projectPathArg,
      fromFile: filePathArg.describe('Source file'),
      toFile: filePathArg.describe('Target file'),
    },
    async (args) =>
      runTool(async () => ({
        success: true,
        ...(await ctx.service.removeRelation(args.projectPath, args.fromFile, args.toFile)),
      })),
  );

  server.tool(
    'query_file_relations',
    'List the relations going out of a file.',
    { projectPath: projectPathArg, filePath: filePathArg },
    async (args) => runTool(() => ctx.service.getOutgoingRelations(args.projectPath, args.filePath)),
  );

  server.tool(
    'query_incoming_relations',
    'List the relations pointing at a file.',
    { projectPath: projectPathArg, filePath: filePathArg },
    async (args) => runTool(() => ctx.service.getIncomingRelations(args.projectPath, args.filePath)),
  );

  server.tool(
    'query_relations_by_description',
    'Find relations whose description contains a keyword (case-insensitive).',
    { projectPath: projectPathArg, keyword: z.string().describe('Text to look for in descriptions') },
    async (args) =>
      runTool(async () => {
        const relations = await ctx.service.queryRelationsByDescription(args.projectPath, args.keyword);
        return { relations, total: relations.length };
      }),
  );

  server.tool(
    'get_relation_graph',
    'Follow outgoing relations from a file up to a depth limit. Cycles are followed once.',
    {
      projectPath: projectPathArg,
      filePath: filePathArg,
      maxDepth: z.number().int().optional().describe(`Depth limit (default ${ctx.config.query.defaultGraphDepth})`),
    },
    async (args) => runTool(() => ctx.service.getRelationGraph(args.projectPath, args.filePath, args.maxDepth)),
  );

  server.tool(
    'cleanup_invalid_relations',
    'Remove relations whose source or target file no longer exists.',
    { projectPath: projectPathArg },
    async (args) => runTool(async () => ({ removed: await ctx.service.cleanupInvalidRelations(args.projectPath) })),
  );
}
