/**
 * ProjectContext: everything file-nexus holds for one project root.
 */

import { join } from 'node:path';
import { CommentManager } from '../comments/CommentManager.js';
import type { QueryConfig, StorageConfig } from '../config/types.js';
import { ProjectFiles } from '../filesystem/ProjectFiles.js';
import type { FileSystem } from '../filesystem/types.js';
import type { Logger } from '../logging/logger.js';
import { RelationManager } from '../relations/RelationManager.js';
import { createDataStores, initializeDataStores } from '../storage/JsonSnapshotStore.js';
import { TagManager } from '../tags/TagManager.js';
import { ProjectQueryService } from './ProjectQueryService.js';

export interface ProjectContext {
  /** Canonical absolute project root */
  root: string;
  /** Absolute data directory inside the root */
  dataDir: string;
  files: ProjectFiles;
  tags: TagManager;
  comments: CommentManager;
  relations: RelationManager;
  query: ProjectQueryService;
  logger: Logger;
}

export interface OpenProjectOptions {
  fs: FileSystem;
  storage: StorageConfig;
  query: QueryConfig;
  logger: Logger;
}

/**
 * Create the data directory if needed and load the three datasets.
 * `root` must already be canonical.
 */
export async function openProject(root: string, options: OpenProjectOptions): Promise<ProjectContext> {
  const logger = options.logger.child({ project: root });
  const dataDir = join(root, options.storage.dataDirName);
  const files = new ProjectFiles(options.fs, root, options.storage.dataDirName);

  const stores = createDataStores(dataDir, { backups: options.storage.backups, logger });
  await initializeDataStores(dataDir, stores);

  const tags = new TagManager({ store: stores.tags, files, logger });
  const comments = new CommentManager({ store: stores.comments, files, logger });
  const relations = new RelationManager({ store: stores.relations, files, logger });

  await tags.initialize();
  await comments.initialize();
  await relations.initialize();

  const query = new ProjectQueryService({ tags, comments, relations, limits: options.query });

  logger.info({ dataDir }, 'Project opened');
  return { root, dataDir, files, tags, comments, relations, query, logger };
}
