/**
 * FileHandlers: reads that combine tags, comments and relations.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { FileInfo, SystemStatus } from '../../project/ProjectQueryService.js';
import type { NexusService } from '../../service/NexusService.js';
import {
  BatchFileInfoBodySchema,
  type ApiError,
  type FileQuerystring,
  type ProjectQuerystring,
  type SearchQuerystring,
} from '../types.js';
import { optionalInteger, parseBody, requireParam, sendError } from './common.js';

interface RelatedQuerystring extends FileQuerystring {
  maxResults?: string;
}

export function createFileHandlers(service: NexusService) {
  return {
    /**
     * GET /files/info?projectPath=&filePath=
     */
    async getFileInfo(
      request: FastifyRequest<{ Querystring: FileQuerystring }>,
      reply: FastifyReply,
    ): Promise<FileInfo | ApiError> {
      try {
        const projectPath = requireParam(request.query.projectPath, 'projectPath');
        const filePath = requireParam(request.query.filePath, 'filePath');
        return await service.getFileInfo(projectPath, filePath);
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * POST /files/batch
     */
    async getBatchFileInfo(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ): Promise<{ files: FileInfo[] } | ApiError> {
      try {
        const body = parseBody(BatchFileInfoBodySchema, request.body);
        return { files: await service.getBatchFileInfo(body.projectPath, body.filePaths) };
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * GET /files/related?projectPath=&filePath=&maxResults=
     */
    async getRelatedFiles(
      request: FastifyRequest<{ Querystring: RelatedQuerystring }>,
      reply: FastifyReply,
    ): Promise<{ files: string[]; total: number } | ApiError> {
      try {
        const projectPath = requireParam(request.query.projectPath, 'projectPath');
        const filePath = requireParam(request.query.filePath, 'filePath');
        const maxResults = optionalInteger(request.query.maxResults, 'maxResults');
        const files = await service.getRelatedFiles(projectPath, filePath, maxResults);
        return { files, total: files.length };
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * GET /status?projectPath=
     */
    async getStatus(
      request: FastifyRequest<{ Querystring: ProjectQuerystring }>,
      reply: FastifyReply,
    ): Promise<SystemStatus | ApiError> {
      try {
        const projectPath = requireParam(request.query.projectPath, 'projectPath');
        return await service.getSystemStatus(projectPath);
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * GET /search?projectPath=&q=
     */
    async search(
      request: FastifyRequest<{ Querystring: SearchQuerystring }>,
      reply: FastifyReply,
    ): Promise<{ files: FileInfo[]; total: number } | ApiError> {
      try {
        const projectPath = requireParam(request.query.projectPath, 'projectPath');
        const files = await service.searchFiles(projectPath, request.query.q ?? '');
        return { files, total: files.length };
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * GET /projects
     */
    async listProjects(
      _request: FastifyRequest,
      reply: FastifyReply,
    ): Promise<{ projects: string[] } | ApiError> {
      try {
        return { projects: await service.listProjects() };
      } catch (err) {
        return sendError(reply, err);
      }
    },
  };
}

export type FileHandlers = ReturnType<typeof createFileHandlers>;
