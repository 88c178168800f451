/**
 * RelationHandlers: directed relations between files.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { invalidArgument } from '../../errors/NexusError.js';
import type { IncomingRelation, Relation, RelationMatch } from '../../relations/RelationGraph.js';
import type { NexusService, RelationGraphResult } from '../../service/NexusService.js';
import {
  AddRelationBodySchema,
  ProjectBodySchema,
  RemoveRelationBodySchema,
  type ApiError,
  type FileQuerystring,
  type SearchQuerystring,
} from '../types.js';
import { optionalInteger, parseBody, requireParam, sendError } from './common.js';

interface RelationsQuerystring extends FileQuerystring {
  direction?: string;
}

interface GraphQuerystring extends FileQuerystring {
  maxDepth?: string;
}

type RelationsResponse =
  | { file: string; direction: 'outgoing'; relations: Relation[] }
  | { file: string; direction: 'incoming'; relations: IncomingRelation[] };

export function createRelationHandlers(service: NexusService) {
  return {
    /**
     * GET /relations?projectPath=&filePath=&direction=outgoing|incoming
     */
    async getRelations(
      request: FastifyRequest<{ Querystring: RelationsQuerystring }>,
      reply: FastifyReply,
    ): Promise<RelationsResponse | ApiError> {
      try {
        const projectPath = requireParam(request.query.projectPath, 'projectPath');
        const filePath = requireParam(request.query.filePath, 'filePath');
        const direction = request.query.direction ?? 'outgoing';

        if (direction === 'outgoing') {
          const { file, relations } = await service.getOutgoingRelations(projectPath, filePath);
          return { file, direction, relations };
        }
        if (direction === 'incoming') {
          const { file, relations } = await service.getIncomingRelations(projectPath, filePath);
          return { file, direction, relations };
        }
        throw invalidArgument('direction must be one of: outgoing, incoming');
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * GET /relations/search?projectPath=&q=
     */
    async searchRelations(
      request: FastifyRequest<{ Querystring: SearchQuerystring }>,
      reply: FastifyReply,
    ): Promise<{ relations: RelationMatch[]; total: number } | ApiError> {
      try {
        const projectPath = requireParam(request.query.projectPath, 'projectPath');
        const relations = await service.queryRelationsByDescription(projectPath, request.query.q ?? '');
        return { relations, total: relations.length };
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * GET /relations/graph?projectPath=&filePath=&maxDepth=
     */
    async getGraph(
      request: FastifyRequest<{ Querystring: GraphQuerystring }>,
      reply: FastifyReply,
    ): Promise<RelationGraphResult | ApiError> {
      try {
        const projectPath = requireParam(request.query.projectPath, 'projectPath');
        const filePath = requireParam(request.query.filePath, 'filePath');
        const maxDepth = optionalInteger(request.query.maxDepth, 'maxDepth');
        return await service.getRelationGraph(projectPath, filePath, maxDepth);
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * POST /relations
     */
    async addRelation(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<{ success: true; source: string; target: string; description: string } | ApiError> {
      try {
        const body = parseBody(AddRelationBodySchema, request.body);
        const added = await service.addRelation(body.projectPath, body.fromFile, body.toFile, body.description);
        reply.status(201);
        return { success: true, ...added };
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * DELETE /relations
     */
    async removeRelation(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<{ success: true; source: string; target: string } | ApiError> {
      try {
        const body = parseBody(RemoveRelationBodySchema, request.body);
        return { success: true, ...(await service.removeRelation(body.projectPath, body.fromFile, body.toFile)) };
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * POST /relations/cleanup
     */
    async cleanup(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<{ removed: number } | ApiError> {
      try {
        const body = parseBody(ProjectBodySchema, request.body);
        return { removed: await service.cleanupInvalidRelations(body.projectPath) };
      } catch (err) {
        return sendError(reply, err);
      }
    },
  };
}

export type RelationHandlers = ReturnType<typeof createRelationHandlers>;
