/**
 * CommentHandlers: one comment per file.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { CommentMatch } from '../../comments/CommentManager.js';
import type { NexusService } from '../../service/NexusService.js';
import {
  CommentBodySchema,
  FileBodySchema,
  ProjectBodySchema,
  type ApiError,
  type FileQuerystring,
  type SearchQuerystring,
} from '../types.js';
import { parseBody, requireParam, sendError } from './common.js';

interface CommentResponse {
  success: true;
  file: string;
  comment?: string;
}

export function createCommentHandlers(service: NexusService) {
  return {
    /**
     * GET /comments?projectPath=&filePath=
     */
    async getComment(
      request: FastifyRequest<{ Querystring: FileQuerystring }>,
      reply: FastifyReply,
    ): Promise<{ file: string; comment: string | null } | ApiError> {
      try {
        const projectPath = requireParam(request.query.projectPath, 'projectPath');
        const filePath = requireParam(request.query.filePath, 'filePath');
        return await service.getComment(projectPath, filePath);
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * GET /comments/search?projectPath=&q=
     */
    async searchComments(
      request: FastifyRequest<{ Querystring: SearchQuerystring }>,
      reply: FastifyReply,
    ): Promise<{ comments: CommentMatch[]; total: number } | ApiError> {
      try {
        const projectPath = requireParam(request.query.projectPath, 'projectPath');
        const keyword = requireParam(request.query.q, 'q');
        const comments = await service.searchComments(projectPath, keyword);
        return { comments, total: comments.length };
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * POST /comments
     */
    async addComment(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<CommentResponse | ApiError> {
      try {
        const body = parseBody(CommentBodySchema, request.body);
        const file = await service.addComment(body.projectPath, body.filePath, body.comment);
        reply.status(201);
        return { success: true, file, comment: body.comment };
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * PUT /comments
     */
    async updateComment(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<CommentResponse | ApiError> {
      try {
        const body = parseBody(CommentBodySchema, request.body);
        const file = await service.updateComment(body.projectPath, body.filePath, body.comment);
        return { success: true, file, comment: body.comment };
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * DELETE /comments
     */
    async deleteComment(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<CommentResponse | ApiError> {
      try {
        const body = parseBody(FileBodySchema, request.body);
        const file = await service.deleteComment(body.projectPath, body.filePath);
        return { success: true, file };
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * POST /comments/cleanup
     */
    async cleanup(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<{ removed: number } | ApiError> {
      try {
        const body = parseBody(ProjectBodySchema, request.body);
        return { removed: await service.cleanupInvalidComments(body.projectPath) };
      } catch (err) {
        return sendError(reply, err);
      }
    },
  };
}

export type CommentHandlers = ReturnType<typeof createCommentHandlers>;
