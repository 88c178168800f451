/**
 * JsonSnapshotStore: whole-document JSON persistence for one dataset.
 *
 * - load(): missing or blank file → default snapshot; malformed content is
 *   a SerializationError and never silently replaced.
 * - save(): copies the current file to `<file>.bak` (best effort), then
 *   writes through a temp file and renames it over the target.
 */

import { copyFile, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { z } from 'zod';
import { serializationError, storageError } from '../errors/NexusError.js';
import type { Logger } from '../logging/logger.js';
import {
  CommentsSnapshotSchema,
  DATASET_FILES,
  RelationsSnapshotSchema,
  TagsSnapshotSchema,
  type CommentsSnapshot,
  type RelationsSnapshot,
  type SnapshotStore,
  type TagsSnapshot,
} from './types.js';

export interface JsonSnapshotStoreConfig<T> {
  /** Absolute path of the JSON file */
  path: string;
  /** Shape the stored document must satisfy */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Factory for the empty snapshot */
  createDefault: () => T;
  /** Keep a `.bak` copy of the previous document (default: true) */
  backups?: boolean;
  logger: Logger;
}

function isMissing(err: unknown): boolean {
  return (err as NodeJS.ErrnoException).code === 'ENOENT';
}

export class JsonSnapshotStore<T> implements SnapshotStore<T> {
  readonly path: string;
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly createDefault: () => T;
  private readonly backups: boolean;
  private readonly logger: Logger;

  constructor(config: JsonSnapshotStoreConfig<T>) {
    this.path = config.path;
    this.schema = config.schema;
    this.createDefault = config.createDefault;
    this.backups = config.backups ?? true;
    this.logger = config.logger;
  }

  async load(): Promise<T> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isMissing(err)) {
        return this.createDefault();
      }
      this.logger.error({ path: this.path, err }, 'Failed to read data file');
      throw storageError('load', this.path, err);
    }

    if (content.trim().length === 0) {
      return this.createDefault();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      this.logger.error({ path: this.path, err }, 'Failed to parse data file');
      throw serializationError('load', this.path, err);
    }

    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      this.logger.error({ path: this.path, issues: result.error.issues }, 'Data file has an unexpected shape');
      throw serializationError('load', this.path, result.error);
    }
    return result.data;
  }

  async save(snapshot: T): Promise<void> {
    let json: string;
    try {
      json = JSON.stringify(snapshot, null, 2);
    } catch (err) {
      throw serializationError('save', this.path, err);
    }

    try {
      await mkdir(dirname(this.path), { recursive: true });
      if (this.backups) {
        await this.backup();
      }
      const tmpPath = `${this.path}.tmp.${process.pid}`;
      await writeFile(tmpPath, json + '\n', 'utf-8');
      await rename(tmpPath, this.path);
    } catch (err) {
      this.logger.error({ path: this.path, err }, 'Failed to write data file');
      throw storageError('save', this.path, err);
    }

    this.logger.debug({ path: this.path }, 'Data saved');
  }

  /**
   * Write the default snapshot if the file does not exist yet.
   */
  async ensureExists(): Promise<void> {
    try {
      await readFile(this.path, 'utf-8');
    } catch (err) {
      if (!isMissing(err)) {
        throw storageError('initialize', this.path, err);
      }
      await this.save(this.createDefault());
      this.logger.debug({ path: this.path }, 'Created default data file');
    }
  }

  private async backup(): Promise<void> {
    const backupPath = `${this.path}.bak`;
    try {
      await copyFile(this.path, backupPath);
    } catch (err) {
      if (!isMissing(err)) {
        this.logger.warn({ path: backupPath, err }, 'Failed to create backup');
      }
    }
  }
}

// ============================================================================
// Dataset stores
// ============================================================================

export interface DataStores {
  tags: JsonSnapshotStore<TagsSnapshot>;
  relations: JsonSnapshotStore<RelationsSnapshot>;
  comments: JsonSnapshotStore<CommentsSnapshot>;
}

export interface DataStoresOptions {
  backups?: boolean;
  logger: Logger;
}

/**
 * Create the three dataset stores under a data directory.
 */
export function createDataStores(dataDir: string, options: DataStoresOptions): DataStores {
  const backups = options.backups ?? true;
  const logger = options.logger;

  return {
    tags: new JsonSnapshotStore<TagsSnapshot>({
      path: join(dataDir, DATASET_FILES.tags),
      schema: TagsSnapshotSchema,
      createDefault: () => ({ fileTags: {} }),
      backups,
      logger,
    }),
    relations: new JsonSnapshotStore<RelationsSnapshot>({
      path: join(dataDir, DATASET_FILES.relations),
      schema: RelationsSnapshotSchema,
      createDefault: () => ({ fileRelations: {} }),
      backups,
      logger,
    }),
    comments: new JsonSnapshotStore<CommentsSnapshot>({
      path: join(dataDir, DATASET_FILES.comments),
      schema: CommentsSnapshotSchema,
      createDefault: () => ({ fileComments: {} }),
      backups,
      logger,
    }),
  };
}

/**
 * Create the data directory and default files for any missing dataset.
 */
export async function initializeDataStores(dataDir: string, stores: DataStores): Promise<void> {
  try {
    await mkdir(dataDir, { recursive: true });
  } catch (err) {
    throw storageError('initialize', dataDir, err);
  }
  await stores.tags.ensureExists();
  await stores.relations.ensureExists();
  await stores.comments.ensureExists();
}
