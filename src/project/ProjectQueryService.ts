/**
 * ProjectQueryService: reads that combine tags, comments and relations.
 *
 * Each manager is locked separately, so a combined answer may mix state
 * from slightly different moments when writers interleave.
 */

import type { CommentManager } from '../comments/CommentManager.js';
import type { QueryConfig } from '../config/types.js';
import { invalidArgument } from '../errors/NexusError.js';
import { suggestTags, validateQuerySyntax } from '../query/validateQuerySyntax.js';
import type { IncomingRelation, Relation } from '../relations/RelationGraph.js';
import type { RelationManager } from '../relations/RelationManager.js';
import type { TagManager } from '../tags/TagManager.js';

export interface QueryResult {
  files: string[];
  total: number;
}

export interface FileInfo {
  path: string;
  tags: string[];
  comment: string | null;
  relations: Relation[];
  incomingRelations: IncomingRelation[];
}

export interface ComplexQuery {
  tagQuery?: string | undefined;
  relationKeyword?: string | undefined;
}

export interface TagStats {
  tagTypes: Record<string, string[]>;
  totalFiles: number;
  totalTags: number;
}

export interface SystemStatus {
  totalFiles: number;
  taggedFiles: number;
  commentedFiles: number;
  totalRelations: number;
  tagStats: TagStats;
}

export interface ProjectQueryServiceOptions {
  tags: TagManager;
  comments: CommentManager;
  relations: RelationManager;
  limits: QueryConfig;
}

export class ProjectQueryService {
  private readonly tags: TagManager;
  private readonly comments: CommentManager;
  private readonly relations: RelationManager;
  private readonly limits: QueryConfig;

  constructor(options: ProjectQueryServiceOptions) {
    this.tags = options.tags;
    this.comments = options.comments;
    this.relations = options.relations;
    this.limits = options.limits;
  }

  async executeTagQuery(query: string): Promise<QueryResult> {
    const files = await this.tags.queryFilesByTags(query);
    return { files, total: files.length };
  }

  async getFileInfo(file: string): Promise<FileInfo> {
    const tags = await this.tags.getFileTags(file);
    const comment = await this.comments.getComment(file);
    const relations = await this.relations.getOutgoing(file);
    const incomingRelations = await this.relations.getIncoming(file);
    return { path: file, tags, comment, relations, incomingRelations };
  }

  async getBatchFileInfo(files: readonly string[]): Promise<FileInfo[]> {
    const results: FileInfo[] = [];
    for (const file of files) {
      results.push(await this.getFileInfo(file));
    }
    return results;
  }

  /**
   * Tag query, relation keyword, or both. With both, only files matching
   * the query that are also sources of a matching relation are returned.
   */
  async executeComplexQuery(query: ComplexQuery): Promise<QueryResult> {
    const tagQuery = query.tagQuery?.trim() ? query.tagQuery : undefined;
    const keyword = query.relationKeyword?.trim() ? query.relationKeyword : undefined;
    if (tagQuery === undefined && keyword === undefined) {
      throw invalidArgument('Provide a tag query, a relation keyword, or both');
    }

    let files: string[] | null = null;
    if (tagQuery !== undefined) {
      files = await this.tags.queryFilesByTags(tagQuery);
    }

    if (keyword !== undefined) {
      const sources = new Set((await this.relations.queryByDescription(keyword)).map((m) => m.source));
      files = files === null ? [...sources] : files.filter((file) => sources.has(file));
    }

    const unique = [...new Set(files)].sort();
    return { files: unique, total: unique.length };
  }

  async getSystemStatus(): Promise<SystemStatus> {
    const tagStats = await this.tags.getStats();
    const allTags = await this.tags.getAllTags();
    const commentStats = await this.comments.getStats();
    const relationStats = await this.relations.getStats();

    const known = new Set<string>([
      ...(await this.tags.getTaggedFiles()),
      ...(await this.comments.getCommentedFiles()),
      ...(await this.relations.getReferencedFiles()),
    ]);

    return {
      totalFiles: known.size,
      taggedFiles: tagStats.taggedFiles,
      commentedFiles: commentStats.commentedFiles,
      totalRelations: relationStats.totalRelations,
      tagStats: {
        tagTypes: allTags,
        totalFiles: tagStats.taggedFiles,
        totalTags: tagStats.distinctTags,
      },
    };
  }

  /**
   * Files whose comment or outgoing relation description mentions the
   * keyword, case-insensitively.
   */
  async searchFiles(keyword: string): Promise<FileInfo[]> {
    if (keyword.trim().length === 0) {
      throw invalidArgument('Search keyword must not be empty');
    }

    const matched = new Set<string>();
    for (const match of await this.comments.searchComments(keyword)) {
      matched.add(match.file);
    }
    for (const match of await this.relations.queryByDescription(keyword)) {
      matched.add(match.source);
    }

    return this.getBatchFileInfo([...matched].sort());
  }

  /**
   * Files sharing a tag with `file` or linked to it by a relation in either
   * direction.
   */
  async getRelatedFiles(file: string, maxResults = this.limits.relatedFilesLimit): Promise<string[]> {
    const related = new Set<string>();

    const tags = await this.tags.getFileTags(file);
    for (const other of await this.tags.getFilesWithAnyTag(tags)) {
      related.add(other);
    }
    for (const relation of await this.relations.getOutgoing(file)) {
      related.add(relation.target);
    }
    for (const relation of await this.relations.getIncoming(file)) {
      related.add(relation.source);
    }
    related.delete(file);

    return [...related].sort().slice(0, Math.max(0, maxResults));
  }

  async getQuerySuggestions(partial: string): Promise<string[]> {
    return suggestTags(await this.tags.getAllTags(), partial, this.limits.suggestionLimit);
  }

  validateQuerySyntax(query: string): void {
    validateQuerySyntax(query);
  }
}
