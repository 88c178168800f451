/**
 * MCP tools for file comments.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { runTool } from '../helpers.js';
import { filePathArg, projectPathArg } from './args.js';

export function registerCommentTools(server: McpServer, ctx: AppContext): void {
  server.tool(
    'add_file_comment',
    'Add a comment describing a file. A file holds one comment; use update_file_comment to change it.',
    {
      projectPath: projectPathArg,
      filePath: filePathArg,
      comment: z.string().describe('Comment text'),
    },
    async (args) =>
      runTool(async () => {
        const file = await ctx.service.addComment(args.projectPath, args.filePath, args.comment);
        return { success: true, file, comment: args.comment };
      }),
  );

  server.tool(
    'update_file_comment',
    'Set or replace the comment on a file.',
    {
      projectPath: projectPathArg,
      filePath: filePathArg,
      comment: z.string().describe('New comment text'),
    },
    async (args) =>
      runTool(async () => {
        const file = await ctx.service.updateComment(args.projectPath, args.filePath, args.comment);
        return { success: true, file, comment: args.comment };
      }),
  );

  server.tool(
    'delete_file_comment',
    'Delete the comment on a file.',
    { projectPath: projectPathArg, filePath: filePathArg },
    async (args) =>
      runTool(async () => {
        const file = await ctx.service.deleteComment(args.projectPath, args.filePath);
        return { success: true, file };
      }),
  );

  server.tool(
    'cleanup_invalid_comments',
    'Remove comments attached to files that no longer exist.',
    { projectPath: projectPathArg },
    async (args) => runTool(async () => ({ removed: await ctx.service.cleanupInvalidComments(args.projectPath) })),
  );
}
