/**
 * file-nexus: tags, comments and relations for project files, served over
 * MCP and HTTP.
 *
 * This is the main entry point for the library.
 */

// Errors
export * from './errors/NexusError.js';

// Configuration
export * from './config/types.js';
export { loadConfig, applyEnvOverrides, resolveConfig, ConfigValidationError } from './config/loader.js';

// Query language
export { parseQuery, type QueryExpression } from './query/QueryParser.js';
export { evaluateQuery, matchesWildcard } from './query/QueryEvaluator.js';
export { validateQuerySyntax, suggestTags } from './query/validateQuerySyntax.js';

// Indices
export { TagIndex, parseTag, validateTag } from './tags/TagIndex.js';
export { TagManager } from './tags/TagManager.js';
export { CommentManager } from './comments/CommentManager.js';
export { RelationGraph } from './relations/RelationGraph.js';
export type { Relation, IncomingRelation, RelationMatch, RelationGraphView } from './relations/RelationGraph.js';
export { RelationManager } from './relations/RelationManager.js';

// Projects
export { ProjectRegistry } from './project/ProjectRegistry.js';
export type { ProjectContext } from './project/ProjectContext.js';
export type { QueryResult, FileInfo, ComplexQuery, SystemStatus } from './project/ProjectQueryService.js';
export { NexusService } from './service/NexusService.js';

// MCP
export { createMcpServer, mcpPlugin } from './mcp/index.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext, InitializeOptions } from './server.js';
