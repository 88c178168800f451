/**
 * NexusService: the operations both adapters expose.
 *
 * Callers pass raw project and file paths. Files named by a mutation must
 * exist inside the project; lookups and removals fall back to a lexical
 * normalization so metadata for deleted files stays reachable.
 */

import type { QueryConfig } from '../config/types.js';
import { invalidArgument, isNexusError } from '../errors/NexusError.js';
import { normalizeFilePath, normalizeLexically, validateFilePath } from '../filesystem/ProjectPaths.js';
import type { Logger } from '../logging/logger.js';
import type { ProjectContext } from '../project/ProjectContext.js';
import type { ComplexQuery, FileInfo, QueryResult, SystemStatus } from '../project/ProjectQueryService.js';
import type { ProjectRegistry } from '../project/ProjectRegistry.js';
import { parseQuery } from '../query/QueryParser.js';
import { validateQuerySyntax } from '../query/validateQuerySyntax.js';
import type { CommentMatch } from '../comments/CommentManager.js';
import type { IncomingRelation, Relation, RelationGraphView, RelationMatch } from '../relations/RelationGraph.js';

export interface TagChange {
  file: string;
  tags: string[];
}

export interface QueryValidation {
  query: string;
  valid: boolean;
  message?: string;
}

export interface RelationGraphResult {
  root: string;
  maxDepth: number;
  graph: RelationGraphView;
}

export interface NexusServiceOptions {
  registry: ProjectRegistry;
  logger: Logger;
}

export class NexusService {
  private readonly registry: ProjectRegistry;
  private readonly logger: Logger;

  constructor(options: NexusServiceOptions) {
    this.registry = options.registry;
    this.logger = options.logger;
  }

  private get limits(): QueryConfig {
    return this.registry.limits;
  }

  // ==========================================================================
  // Tags
  // ==========================================================================

  async addTags(projectPath: string, filePath: string, tags: readonly string[]): Promise<TagChange> {
    requireTags(tags);
    const ctx = await this.project(projectPath);
    const file = await this.existingFile(ctx, filePath);
    return { file, tags: await ctx.tags.addTags(file, tags) };
  }

  async removeTags(projectPath: string, filePath: string, tags: readonly string[]): Promise<TagChange> {
    requireTags(tags);
    const ctx = await this.project(projectPath);
    const file = await this.lookupFile(ctx, filePath);
    return { file, tags: await ctx.tags.removeTags(file, tags) };
  }

  async getFileTags(projectPath: string, filePath: string): Promise<TagChange> {
    const ctx = await this.project(projectPath);
    const file = await this.lookupFile(ctx, filePath);
    return { file, tags: await ctx.tags.getFileTags(file) };
  }

  async getAllTags(projectPath: string): Promise<Record<string, string[]>> {
    const ctx = await this.project(projectPath);
    return ctx.tags.getAllTags();
  }

  async getUntaggedFiles(projectPath: string): Promise<string[]> {
    const ctx = await this.project(projectPath);
    return ctx.tags.getUntaggedFiles();
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  async queryFilesByTags(projectPath: string, query: string): Promise<QueryResult> {
    const ctx = await this.project(projectPath);
    return ctx.query.executeTagQuery(query);
  }

  /**
   * Check a query without running it. Syntax problems are reported in the
   * result rather than thrown.
   */
  validateTagQuery(query: string): QueryValidation {
    try {
      validateQuerySyntax(query);
      parseQuery(query);
      return { query, valid: true };
    } catch (err) {
      if (isNexusError(err) && err.code === 'INVALID_QUERY_SYNTAX') {
        return { query, valid: false, message: err.message };
      }
      throw err;
    }
  }

  async getQuerySuggestions(projectPath: string, partial: string): Promise<string[]> {
    const ctx = await this.project(projectPath);
    return ctx.query.getQuerySuggestions(partial);
  }

  async executeComplexQuery(projectPath: string, query: ComplexQuery): Promise<QueryResult> {
    const ctx = await this.project(projectPath);
    return ctx.query.executeComplexQuery(query);
  }

  // ==========================================================================
  // Comments
  // ==========================================================================

  async addComment(projectPath: string, filePath: string, comment: string): Promise<string> {
    const ctx = await this.project(projectPath);
    const file = await this.existingFile(ctx, filePath);
    await ctx.comments.addComment(file, comment);
    return file;
  }

  async updateComment(projectPath: string, filePath: string, comment: string): Promise<string> {
    const ctx = await this.project(projectPath);
    const file = await this.existingFile(ctx, filePath);
    await ctx.comments.updateComment(file, comment);
    return file;
  }

  async deleteComment(projectPath: string, filePath: string): Promise<string> {
    const ctx = await this.project(projectPath);
    const file = await this.lookupFile(ctx, filePath);
    await ctx.comments.deleteComment(file);
    return file;
  }

  async getComment(projectPath: string, filePath: string): Promise<{ file: string; comment: string | null }> {
    const ctx = await this.project(projectPath);
    const file = await this.lookupFile(ctx, filePath);
    return { file, comment: await ctx.comments.getComment(file) };
  }

  async searchComments(projectPath: string, keyword: string): Promise<CommentMatch[]> {
    const ctx = await this.project(projectPath);
    return ctx.comments.searchComments(keyword);
  }

  async cleanupInvalidComments(projectPath: string): Promise<number> {
    const ctx = await this.project(projectPath);
    return ctx.comments.cleanupInvalidComments();
  }

  // ==========================================================================
  // Relations
  // ==========================================================================

  async addRelation(
    projectPath: string,
    sourcePath: string,
    targetPath: string,
    description: string,
  ): Promise<{ source: string; target: string; description: string }> {
    const ctx = await this.project(projectPath);
    const source = await this.existingFile(ctx, sourcePath);
    const target = await this.existingFile(ctx, targetPath);
    await ctx.relations.addRelation(source, target, description);
    return { source, target, description };
  }

  async removeRelation(
    projectPath: string,
    sourcePath: string,
    targetPath: string,
  ): Promise<{ source: string; target: string }> {
    const ctx = await this.project(projectPath);
    const source = await this.lookupFile(ctx, sourcePath);
    const target = await this.lookupFile(ctx, targetPath);
    await ctx.relations.removeRelation(source, target);
    return { source, target };
  }

  async getOutgoingRelations(projectPath: string, filePath: string): Promise<{ file: string; relations: Relation[] }> {
    const ctx = await this.project(projectPath);
    const file = await this.lookupFile(ctx, filePath);
    return { file, relations: await ctx.relations.getOutgoing(file) };
  }

  async getIncomingRelations(
    projectPath: string,
    filePath: string,
  ): Promise<{ file: string; relations: IncomingRelation[] }> {
    const ctx = await this.project(projectPath);
    const file = await this.lookupFile(ctx, filePath);
    return { file, relations: await ctx.relations.getIncoming(file) };
  }

  async queryRelationsByDescription(projectPath: string, keyword: string): Promise<RelationMatch[]> {
    if (keyword.trim().length === 0) {
      throw invalidArgument('Keyword must not be empty');
    }
    const ctx = await this.project(projectPath);
    return ctx.relations.queryByDescription(keyword);
  }

  async getRelationGraph(projectPath: string, filePath: string, maxDepth?: number): Promise<RelationGraphResult> {
    const depth = maxDepth ?? this.limits.defaultGraphDepth;
    if (!Number.isInteger(depth) || depth < 0 || depth > this.limits.maxGraphDepth) {
      throw invalidArgument(`maxDepth must be an integer between 0 and ${this.limits.maxGraphDepth}`);
    }
    const ctx = await this.project(projectPath);
    const file = await this.lookupFile(ctx, filePath);
    return { root: file, maxDepth: depth, graph: await ctx.relations.getRelationGraph(file, depth) };
  }

  async cleanupInvalidRelations(projectPath: string): Promise<number> {
    const ctx = await this.project(projectPath);
    return ctx.relations.cleanupInvalidRelations();
  }

  // ==========================================================================
  // Combined reads
  // ==========================================================================

  async getFileInfo(projectPath: string, filePath: string): Promise<FileInfo> {
    const ctx = await this.project(projectPath);
    const file = await this.lookupFile(ctx, filePath);
    return ctx.query.getFileInfo(file);
  }

  async getBatchFileInfo(projectPath: string, filePaths: readonly string[]): Promise<FileInfo[]> {
    const ctx = await this.project(projectPath);
    const files: string[] = [];
    for (const filePath of filePaths) {
      files.push(await this.lookupFile(ctx, filePath));
    }
    return ctx.query.getBatchFileInfo(files);
  }

  async getRelatedFiles(projectPath: string, filePath: string, maxResults?: number): Promise<string[]> {
    if (maxResults !== undefined && (!Number.isInteger(maxResults) || maxResults < 1)) {
      throw invalidArgument('maxResults must be a positive integer');
    }
    const ctx = await this.project(projectPath);
    const file = await this.lookupFile(ctx, filePath);
    return ctx.query.getRelatedFiles(file, maxResults);
  }

  async getSystemStatus(projectPath: string): Promise<SystemStatus> {
    const ctx = await this.project(projectPath);
    return ctx.query.getSystemStatus();
  }

  async searchFiles(projectPath: string, keyword: string): Promise<FileInfo[]> {
    const ctx = await this.project(projectPath);
    return ctx.query.searchFiles(keyword);
  }

  async listProjects(): Promise<string[]> {
    return this.registry.list();
  }

  // ==========================================================================
  // Paths
  // ==========================================================================

  private async project(projectPath: string): Promise<ProjectContext> {
    return this.registry.getOrCreate(projectPath);
  }

  private async existingFile(ctx: ProjectContext, filePath: string): Promise<string> {
    const absolute = await validateFilePath(this.registry.fs, ctx.root, filePath);
    return normalizeFilePath(ctx.root, absolute);
  }

  private async lookupFile(ctx: ProjectContext, filePath: string): Promise<string> {
    try {
      return await this.existingFile(ctx, filePath);
    } catch (err) {
      if (isNexusError(err) && err.code === 'FILE_NOT_FOUND') {
        this.logger.debug({ filePath }, 'File not on disk, using lexical path');
        return normalizeLexically(ctx.root, filePath);
      }
      throw err;
    }
  }
}

function requireTags(tags: readonly string[]): void {
  if (tags.length === 0) {
    throw invalidArgument('At least one tag is required');
  }
}
