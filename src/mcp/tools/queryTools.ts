/**
 * MCP tools for tag queries and combined file lookups.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { runTool } from '../helpers.js';
import { filePathArg, projectPathArg } from './args.js';

const QUERY_HELP =
  'Operators: AND, OR, NOT and parentheses; * matches any characters. Example: "category:api AND (lang:ts OR lang:js) AND NOT status:deprecated"';

export function registerQueryTools(server: McpServer, ctx: AppContext): void {
  // query_files_by_tags: Boolean/wildcard tag query
  server.tool(
    'query_files_by_tags',
    `Find files by tag query. ${QUERY_HELP}`,
    {
      projectPath: projectPathArg,
      query: z.string().describe('Tag query expression'),
      relationKeyword: z
        .string()
        .optional()
        .describe('Only keep files with an outgoing relation whose description contains this text'),
    },
    async (args) =>
      runTool(() =>
        args.relationKeyword === undefined
          ? ctx.service.queryFilesByTags(args.projectPath, args.query)
          : ctx.service.executeComplexQuery(args.projectPath, {
              tagQuery: args.query,
              relationKeyword: args.relationKeyword,
            }),
      ),
  );

  // validate_tag_query: Check a query without running it
  server.tool(
    'validate_tag_query',
    `Check whether a tag query is well formed. ${QUERY_HELP}`,
    { query: z.string().describe('Tag query expression') },
    async (args) => runTool(() => ctx.service.validateTagQuery(args.query)),
  );

  // get_query_suggestions: Tag completions for a partial query
  server.tool(
    'get_query_suggestions',
    'Suggest tags for a partially typed query: all values of matching tag types plus tags containing the text.',
    {
      projectPath: projectPathArg,
      partial: z.string().describe('Text typed so far'),
    },
    async (args) =>
      runTool(async () => ({ suggestions: await ctx.service.getQuerySuggestions(args.projectPath, args.partial) })),
  );

  // get_file_info: Tags, comment and relations of one file
  server.tool(
    'get_file_info',
    'Get everything recorded about a file: tags, comment, outgoing and incoming relations.',
    { projectPath: projectPathArg, filePath: filePathArg },
    async (args) => runTool(() => ctx.service.getFileInfo(args.projectPath, args.filePath)),
  );

  // get_related_files: Files sharing tags or relations
  server.tool(
    'get_related_files',
    'Find files related to a file through shared tags or relations in either direction.',
    {
      projectPath: projectPathArg,
      filePath: filePathArg,
      maxResults: z.number().int().optional().describe('Maximum number of files to return'),
    },
    async (args) =>
      runTool(async () => {
        const files = await ctx.service.getRelatedFiles(args.projectPath, args.filePath, args.maxResults);
        return { files, total: files.length };
      }),
  );

  // get_system_status: Counts across all datasets
  server.tool(
    'get_system_status',
    'Summarize the project metadata: known files, tagged and commented files, relations and tag types.',
    { projectPath: projectPathArg },
    async (args) => runTool(() => ctx.service.getSystemStatus(args.projectPath)),
  );

  // search_files: Keyword search over comments and relation descriptions
  server.tool(
    'search_files',
    'Search file comments and relation descriptions for a keyword (case-insensitive). Optionally narrow by a tag query.',
    {
      projectPath: projectPathArg,
      keyword: z.string().describe('Text to search for'),
      tagQuery: z.string().optional().describe('Only return files that also match this tag query'),
    },
    async (args) =>
      runTool(async () => {
        const results = await ctx.service.searchFiles(args.projectPath, args.keyword);
        if (args.tagQuery === undefined || args.tagQuery.trim() === '') {
          return { files: results, total: results.length };
        }
        const matching = new Set((await ctx.service.queryFilesByTags(args.projectPath, args.tagQuery)).files);
        const files = results.filter((info) => matching.has(info.path));
        return { files, total: files.length };
      }),
  );
}
