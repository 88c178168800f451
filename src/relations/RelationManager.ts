/**
 * RelationManager: locked, persisted access to one project's RelationGraph.
 */

import { Mutex } from 'async-mutex';
import { fileNotFound, invalidArgument } from '../errors/NexusError.js';
import type { ProjectFiles } from '../filesystem/ProjectFiles.js';
import type { Logger } from '../logging/logger.js';
import type { RelationsSnapshot, SnapshotStore } from '../storage/types.js';
import {
  RelationGraph,
  type IncomingRelation,
  type Relation,
  type RelationGraphStats,
  type RelationGraphView,
  type RelationMatch,
} from './RelationGraph.js';

export interface RelationManagerOptions {
  store: SnapshotStore<RelationsSnapshot>;
  files: ProjectFiles;
  logger: Logger;
}

export class RelationManager {
  private readonly graph = new RelationGraph();
  private readonly mutex = new Mutex();
  private readonly store: SnapshotStore<RelationsSnapshot>;
  private readonly files: ProjectFiles;
  private readonly logger: Logger;

  constructor(options: RelationManagerOptions) {
    this.store = options.store;
    this.files = options.files;
    this.logger = options.logger;
  }

  async initialize(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.graph.load(await this.store.load());
      this.logger.debug({ relations: this.graph.getStats().totalRelations }, 'Relations loaded');
    });
  }

  async addRelation(source: string, target: string, description: string): Promise<void> {
    if (description.trim().length === 0) {
      throw invalidArgument('Relation description must not be empty');
    }

    await this.mutex.runExclusive(async () => {
      for (const file of [source, target]) {
        if (!(await this.files.exists(file))) {
          throw fileNotFound(file);
        }
      }

      const before = this.graph.toSnapshot();
      this.graph.add(source, target, description);
      await this.persist(before);
      this.logger.info({ source, target, description }, 'Relation added');
    });
  }

  async removeRelation(source: string, target: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const before = this.graph.toSnapshot();
      this.graph.remove(source, target);
      await this.persist(before);
      this.logger.info({ source, target }, 'Relation removed');
    });
  }

  async getOutgoing(file: string): Promise<Relation[]> {
    return this.mutex.runExclusive(() => this.graph.getOutgoing(file));
  }

  async getIncoming(file: string): Promise<IncomingRelation[]> {
    return this.mutex.runExclusive(() => this.graph.getIncoming(file));
  }

  async hasRelation(source: string, target: string): Promise<boolean> {
    return this.mutex.runExclusive(() => this.graph.hasRelation(source, target));
  }

  async queryByDescription(keyword: string): Promise<RelationMatch[]> {
    return this.mutex.runExclusive(() => this.graph.queryByDescription(keyword));
  }

  async getRelationGraph(file: string, maxDepth: number): Promise<RelationGraphView> {
    return this.mutex.runExclusive(() => this.graph.getRelationGraph(file, maxDepth));
  }

  /** Files that have outgoing relations. */
  async getRelatedFiles(): Promise<string[]> {
    return this.mutex.runExclusive(() => this.graph.sources());
  }

  /** Files appearing on either end of a relation. */
  async getReferencedFiles(): Promise<string[]> {
    return this.mutex.runExclusive(() => this.graph.referencedFiles());
  }

  /**
   * Remove relations whose source or target file is gone from disk.
   */
  async cleanupInvalidRelations(): Promise<number> {
    return this.mutex.runExclusive(async () => {
      const existing = new Set<string>();
      for (const file of this.graph.referencedFiles()) {
        if (await this.files.exists(file)) {
          existing.add(file);
        }
      }

      const before = this.graph.toSnapshot();
      const removed = this.graph.prune(existing);
      if (removed === 0) {
        this.logger.debug('No invalid relations found');
        return 0;
      }

      await this.persist(before);
      this.logger.info({ removed }, 'Invalid relations cleaned up');
      return removed;
    });
  }

  async getStats(): Promise<RelationGraphStats> {
    return this.mutex.runExclusive(() => this.graph.getStats());
  }

  private async persist(before: RelationsSnapshot): Promise<void> {
    try {
      await this.store.save(this.graph.toSnapshot());
    } catch (err) {
      this.graph.load(before);
      throw err;
    }
  }
}
