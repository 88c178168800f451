/**
 * CommentManager: one free-text comment per file.
 */

import { Mutex } from 'async-mutex';
import { commentAlreadyExists, commentNotFound, fileNotFound, invalidArgument } from '../errors/NexusError.js';
import type { ProjectFiles } from '../filesystem/ProjectFiles.js';
import type { Logger } from '../logging/logger.js';
import type { CommentsSnapshot, SnapshotStore } from '../storage/types.js';

export interface CommentMatch {
  file: string;
  comment: string;
}

export interface CommentStats {
  commentedFiles: number;
  totalChars: number;
}

export interface CommentManagerOptions {
  store: SnapshotStore<CommentsSnapshot>;
  files: ProjectFiles;
  logger: Logger;
}

export class CommentManager {
  private comments = new Map<string, string>();
  private readonly mutex = new Mutex();
  private readonly store: SnapshotStore<CommentsSnapshot>;
  private readonly files: ProjectFiles;
  private readonly logger: Logger;

  constructor(options: CommentManagerOptions) {
    this.store = options.store;
    this.files = options.files;
    this.logger = options.logger;
  }

  async initialize(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const snapshot = await this.store.load();
      this.comments = new Map(Object.entries(snapshot.fileComments));
      this.logger.debug({ files: this.comments.size }, 'Comments loaded');
    });
  }

  async addComment(file: string, text: string): Promise<void> {
    assertText(text);
    await this.mutex.runExclusive(async () => {
      if (!(await this.files.exists(file))) {
        throw fileNotFound(file);
      }
      if (this.comments.has(file)) {
        throw commentAlreadyExists(file);
      }
      await this.commit(() => this.comments.set(file, text));
      this.logger.info({ file }, 'Comment added');
    });
  }

  /** Set or replace the comment on a file. */
  async updateComment(file: string, text: string): Promise<void> {
    assertText(text);
    await this.mutex.runExclusive(async () => {
      if (!(await this.files.exists(file))) {
        throw fileNotFound(file);
      }
      await this.commit(() => this.comments.set(file, text));
      this.logger.info({ file }, 'Comment updated');
    });
  }

  async deleteComment(file: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (!this.comments.has(file)) {
        throw commentNotFound(file);
      }
      await this.commit(() => this.comments.delete(file));
      this.logger.info({ file }, 'Comment deleted');
    });
  }

  async getComment(file: string): Promise<string | null> {
    return this.mutex.runExclusive(() => this.comments.get(file) ?? null);
  }

  async getComments(files: readonly string[]): Promise<Record<string, string>> {
    return this.mutex.runExclusive(() => {
      const result: Record<string, string> = {};
      for (const file of files) {
        const comment = this.comments.get(file);
        if (comment !== undefined) {
          result[file] = comment;
        }
      }
      return result;
    });
  }

  async hasComment(file: string): Promise<boolean> {
    return this.mutex.runExclusive(() => this.comments.has(file));
  }

  async getCommentedFiles(): Promise<string[]> {
    return this.mutex.runExclusive(() => [...this.comments.keys()].sort());
  }

  async searchComments(keyword: string): Promise<CommentMatch[]> {
    const needle = keyword.toLowerCase();
    return this.mutex.runExclusive(() =>
      [...this.comments.entries()]
        .filter(([, comment]) => comment.toLowerCase().includes(needle))
        .map(([file, comment]) => ({ file, comment }))
        .sort((a, b) => (a.file < b.file ? -1 : a.file > b.file ? 1 : 0)),
    );
  }

  /**
   * Drop comments on files that no longer exist.
   */
  async cleanupInvalidComments(): Promise<number> {
    return this.mutex.runExclusive(async () => {
      const stale: string[] = [];
      for (const file of this.comments.keys()) {
        if (!(await this.files.exists(file))) {
          stale.push(file);
        }
      }
      if (stale.length === 0) {
        return 0;
      }

      await this.commit(() => {
        for (const file of stale) this.comments.delete(file);
      });
      this.logger.info({ removed: stale.length }, 'Invalid comments cleaned up');
      return stale.length;
    });
  }

  async getStats(): Promise<CommentStats> {
    return this.mutex.runExclusive(() => {
      let totalChars = 0;
      for (const comment of this.comments.values()) {
        totalChars += comment.length;
      }
      return { commentedFiles: this.comments.size, totalChars };
    });
  }

  private async commit(mutate: () => void): Promise<void> {
    const before = new Map(this.comments);
    mutate();
    try {
      await this.store.save({ fileComments: Object.fromEntries(this.comments) });
    } catch (err) {
      this.comments = before;
      throw err;
    }
  }
}

function assertText(text: string): void {
  if (text.trim().length === 0) {
    throw invalidArgument('Comment must not be empty');
  }
}
