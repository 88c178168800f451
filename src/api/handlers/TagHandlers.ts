/**
 * TagHandlers: HTTP handlers for tagging files.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { NexusService, TagChange } from '../../service/NexusService.js';
import { TagsBodySchema, type ApiError, type FileQuerystring, type ProjectQuerystring } from '../types.js';
import { parseBody, requireParam, sendError } from './common.js';

export function createTagHandlers(service: NexusService) {
  return {
    /**
     * GET /tags?projectPath=
     */
    async getAllTags(
      request: FastifyRequest<{ Querystring: ProjectQuerystring }>,
      reply: FastifyReply,
    ): Promise<{ tags: Record<string, string[]> } | ApiError> {
      try {
        const projectPath = requireParam(request.query.projectPath, 'projectPath');
        return { tags: await service.getAllTags(projectPath) };
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * GET /tags/file?projectPath=&filePath=
     */
    async getFileTags(
      request: FastifyRequest<{ Querystring: FileQuerystring }>,
      reply: FastifyReply,
    ): Promise<TagChange | ApiError> {
      try {
        const projectPath = requireParam(request.query.projectPath, 'projectPath');
        const filePath = requireParam(request.query.filePath, 'filePath');
        return await service.getFileTags(projectPath, filePath);
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * GET /tags/untagged?projectPath=
     */
    async getUntaggedFiles(
      request: FastifyRequest<{ Querystring: ProjectQuerystring }>,
      reply: FastifyReply,
    ): Promise<{ files: string[]; total: number } | ApiError> {
      try {
        const projectPath = requireParam(request.query.projectPath, 'projectPath');
        const files = await service.getUntaggedFiles(projectPath);
        return { files, total: files.length };
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * POST /tags
     */
    async addTags(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<{ success: true; file: string; added: string[] } | ApiError> {
      try {
        const body = parseBody(TagsBodySchema, request.body);
        const { file, tags } = await service.addTags(body.projectPath, body.filePath, body.tags);
        return { success: true, file, added: tags };
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * DELETE /tags
     */
    async removeTags(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<{ success: true; file: string; removed: string[] } | ApiError> {
      try {
        const body = parseBody(TagsBodySchema, request.body);
        const { file, tags } = await service.removeTags(body.projectPath, body.filePath, body.tags);
        return { success: true, file, removed: tags };
      } catch (err) {
        return sendError(reply, err);
      }
    },
  };
}

export type TagHandlers = ReturnType<typeof createTagHandlers>;
