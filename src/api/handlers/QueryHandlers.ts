/**
 * QueryHandlers: tag queries, query checks and suggestions.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { QueryResult } from '../../project/ProjectQueryService.js';
import type { NexusService, QueryValidation } from '../../service/NexusService.js';
import type { ApiError, SearchQuerystring } from '../types.js';
import { requireParam, sendError } from './common.js';

interface TagQueryQuerystring extends SearchQuerystring {
  relationKeyword?: string;
}

export function createQueryHandlers(service: NexusService) {
  return {
    /**
     * GET /query?projectPath=&q=&relationKeyword=
     */
    async queryFiles(
      request: FastifyRequest<{ Querystring: TagQueryQuerystring }>,
      reply: FastifyReply,
    ): Promise<QueryResult | ApiError> {
      try {
        const projectPath = requireParam(request.query.projectPath, 'projectPath');
        const { q, relationKeyword } = request.query;
        if (relationKeyword !== undefined && relationKeyword !== '') {
          return await service.executeComplexQuery(projectPath, { tagQuery: q, relationKeyword });
        }
        return await service.queryFilesByTags(projectPath, q ?? '');
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * GET /query/validate?q=
     */
    async validateQuery(
      request: FastifyRequest<{ Querystring: { q?: string } }>,
      reply: FastifyReply,
    ): Promise<QueryValidation | ApiError> {
      try {
        return service.validateTagQuery(request.query.q ?? '');
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * GET /query/suggest?projectPath=&q=
     */
    async suggest(
      request: FastifyRequest<{ Querystring: SearchQuerystring }>,
      reply: FastifyReply,
    ): Promise<{ suggestions: string[] } | ApiError> {
      try {
        const projectPath = requireParam(request.query.projectPath, 'projectPath');
        return { suggestions: await service.getQuerySuggestions(projectPath, request.query.q ?? '') };
      } catch (err) {
        return sendError(reply, err);
      }
    },
  };
}

export type QueryHandlers = ReturnType<typeof createQueryHandlers>;
