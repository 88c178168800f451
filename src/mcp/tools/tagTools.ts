/**
 * MCP tools for tagging files.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { runTool } from '../helpers.js';
import { filePathArg, projectPathArg } from './args.js';

export function registerTagTools(server: McpServer, ctx: AppContext): void {
  // add_file_tags: Attach type:value tags to a file
  server.tool(
    'add_file_tags',
    'Add tags to a file. Tags use type:value format (e.g. "category:api", "status:draft"). Tags already on the file are skipped.',
    {
      projectPath: projectPathArg,
      filePath: filePathArg,
      tags: z.array(z.string()).describe('Tags to add, each in type:value format'),
    },
    async (args) =>
      runTool(async () => {
        const { file, tags } = await ctx.service.addTags(args.projectPath, args.filePath, args.tags);
        return { success: true, file, added: tags };
      }),
  );

  // remove_file_tags: Detach tags from a file
  server.tool(
    'remove_file_tags',
    'Remove tags from a file. Fails without changing anything if any of the tags is not on the file.',
    {
      projectPath: projectPathArg,
      filePath: filePathArg,
      tags: z.array(z.string()).describe('Tags to remove'),
    },
    async (args) =>
      runTool(async () => {
        const { file, tags } = await ctx.service.removeTags(args.projectPath, args.filePath, args.tags);
        return { success: true, file, removed: tags };
      }),
  );

  // get_all_tags: Every tag in use, grouped by type
  server.tool(
    'get_all_tags',
    'List every tag in use in the project, grouped by tag type.',
    { projectPath: projectPathArg },
    async (args) => runTool(async () => ({ tags: await ctx.service.getAllTags(args.projectPath) })),
  );

  // get_untagged_files: Project files without tags
  server.tool(
    'get_untagged_files',
    'List project files that have no tags yet. The data directory, .git and node_modules are skipped.',
    { projectPath: projectPathArg },
    async (args) =>
      runTool(async () => {
        const files = await ctx.service.getUntaggedFiles(args.projectPath);
        return { files, total: files.length };
      }),
  );
}
