/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers over NexusService.
 */

import type { FastifyInstance } from 'fastify';
import type { CommentHandlers } from './handlers/CommentHandlers.js';
import type { FileHandlers } from './handlers/FileHandlers.js';
import type { QueryHandlers } from './handlers/QueryHandlers.js';
import type { RelationHandlers } from './handlers/RelationHandlers.js';
import type { TagHandlers } from './handlers/TagHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  tagHandlers: TagHandlers;
  queryHandlers: QueryHandlers;
  commentHandlers: CommentHandlers;
  relationHandlers: RelationHandlers;
  fileHandlers: FileHandlers;
  projectCount: () => Promise<number>;
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(fastify: FastifyInstance, options: RouteOptions): void {
  const { tagHandlers, queryHandlers, commentHandlers, relationHandlers, fileHandlers, projectCount } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      projects: await projectCount(),
    };
  });

  fastify.get('/projects', fileHandlers.listProjects);

  // ============================================================================
  // Tag Routes
  // ============================================================================

  fastify.get('/tags', tagHandlers.getAllTags);
  fastify.get('/tags/file', tagHandlers.getFileTags);
  fastify.get('/tags/untagged', tagHandlers.getUntaggedFiles);
  fastify.post('/tags', tagHandlers.addTags);
  fastify.delete('/tags', tagHandlers.removeTags);

  // ============================================================================
  // Query Routes
  // ============================================================================

  fastify.get('/query', queryHandlers.queryFiles);
  fastify.get('/query/validate', queryHandlers.validateQuery);
  fastify.get('/query/suggest', queryHandlers.suggest);

  // ============================================================================
  // Comment Routes
  // ============================================================================

  fastify.get('/comments', commentHandlers.getComment);
  fastify.get('/comments/search', commentHandlers.searchComments);
  fastify.post('/comments', commentHandlers.addComment);
  fastify.put('/comments', commentHandlers.updateComment);
  fastify.delete('/comments', commentHandlers.deleteComment);
  fastify.post('/comments/cleanup', commentHandlers.cleanup);

  // ============================================================================
  // Relation Routes
  // ============================================================================

  fastify.get('/relations', relationHandlers.getRelations);
  fastify.get('/relations/search', relationHandlers.searchRelations);
  fastify.get('/relations/graph', relationHandlers.getGraph);
  fastify.post('/relations', relationHandlers.addRelation);
  fastify.delete('/relations', relationHandlers.removeRelation);
  fastify.post('/relations/cleanup', relationHandlers.cleanup);

  // ============================================================================
  // File Routes
  // ============================================================================

  fastify.get('/files/info', fileHandlers.getFileInfo);
  fastify.post('/files/batch', fileHandlers.getBatchFileInfo);
  fastify.get('/files/related', fileHandlers.getRelatedFiles);
  fastify.get('/status', fileHandlers.getStatus);
  fastify.get('/search', fileHandlers.search);
}
