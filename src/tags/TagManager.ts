/**
 * TagManager: the locked, persisted face of one project's TagIndex.
 *
 * Every operation, reads included, runs under the manager's mutex so a
 * query never observes a half-applied mutation. Saves happen inside the
 * critical section; a failed save restores the previous in-memory state.
 */

import { Mutex } from 'async-mutex';
import { fileNotFound } from '../errors/NexusError.js';
import type { ProjectFiles } from '../filesystem/ProjectFiles.js';
import type { Logger } from '../logging/logger.js';
import { evaluateQuery } from '../query/QueryEvaluator.js';
import { parseQuery } from '../query/QueryParser.js';
import type { SnapshotStore, TagsSnapshot } from '../storage/types.js';
import { TagIndex, type TagIndexStats } from './TagIndex.js';

export interface TagManagerOptions {
  store: SnapshotStore<TagsSnapshot>;
  files: ProjectFiles;
  logger: Logger;
}

export class TagManager {
  private readonly index = new TagIndex();
  private readonly mutex = new Mutex();
  private readonly store: SnapshotStore<TagsSnapshot>;
  private readonly files: ProjectFiles;
  private readonly logger: Logger;

  constructor(options: TagManagerOptions) {
    this.store = options.store;
    this.files = options.files;
    this.logger = options.logger;
  }

  async initialize(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const snapshot = await this.store.load();
      this.index.load(snapshot);
      this.logger.debug({ files: this.index.getStats().taggedFiles }, 'Tags loaded');
    });
  }

  async addTags(file: string, tags: readonly string[]): Promise<string[]> {
    return this.mutex.runExclusive(async () => {
      if (!(await this.files.exists(file))) {
        throw fileNotFound(file);
      }

      const before = this.index.toSnapshot();
      const added = this.index.addTags(file, tags);
      if (added.length === 0) {
        this.logger.debug({ file }, 'No new tags to add');
        return added;
      }

      await this.persist(before);
      this.logger.info({ file, added }, 'Tags added');
      return added;
    });
  }

  async removeTags(file: string, tags: readonly string[]): Promise<string[]> {
    return this.mutex.runExclusive(async () => {
      if (!this.index.hasFile(file)) {
        throw fileNotFound(file);
      }

      const before = this.index.toSnapshot();
      const removed = this.index.removeTags(file, tags);
      if (removed.length === 0) {
        return removed;
      }

      await this.persist(before);
      this.logger.info({ file, removed }, 'Tags removed');
      return removed;
    });
  }

  async getFileTags(file: string): Promise<string[]> {
    return this.mutex.runExclusive(() => this.index.getFileTags(file));
  }

  async getAllTags(): Promise<Record<string, string[]>> {
    return this.mutex.runExclusive(() => this.index.getAllTags());
  }

  /**
   * Evaluate a tag query. Blank queries match nothing; malformed ones throw
   * InvalidQuerySyntax.
   */
  async queryFilesByTags(query: string): Promise<string[]> {
    const expression = parseQuery(query);
    if (expression === null) {
      return [];
    }
    return this.mutex.runExclusive(() =>
      evaluateQuery(expression, this.index.tagFiles(), this.index.universe()),
    );
  }

  /**
   * Files carrying any of the given tags, matched exactly.
   */
  async getFilesWithAnyTag(tags: readonly string[]): Promise<string[]> {
    return this.mutex.runExclusive(() => {
      const index = this.index.tagFiles();
      const files = new Set<string>();
      for (const tag of tags) {
        for (const file of index.get(tag) ?? []) files.add(file);
      }
      return [...files].sort();
    });
  }

  async getTaggedFiles(): Promise<string[]> {
    return this.mutex.runExclusive(() => this.index.files());
  }

  /**
   * Project files that carry no tag.
   */
  async getUntaggedFiles(): Promise<string[]> {
    const all = await this.files.listFiles();
    return this.mutex.runExclusive(() => all.filter((file) => !this.index.hasFile(file)));
  }

  async getStats(): Promise<TagIndexStats> {
    return this.mutex.runExclusive(() => this.index.getStats());
  }

  private async persist(before: TagsSnapshot): Promise<void> {
    try {
      await this.store.save(this.index.toSnapshot());
    } catch (err) {
      this.index.load(before);
      throw err;
    }
  }
}
