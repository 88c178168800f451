/**
 * ProjectRegistry: lazily opened projects, one context per canonical root.
 *
 * The lookup and the insert for a path happen inside one hold of the
 * registry mutex, so concurrent first requests for a new project share a
 * single context.
 */

import { Mutex } from 'async-mutex';
import type { QueryConfig, StorageConfig } from '../config/types.js';
import { validateProjectPath } from '../filesystem/ProjectPaths.js';
import type { FileSystem } from '../filesystem/types.js';
import type { Logger } from '../logging/logger.js';
import { openProject, type ProjectContext } from './ProjectContext.js';

export interface ProjectRegistryOptions {
  fs: FileSystem;
  storage: StorageConfig;
  query: QueryConfig;
  logger: Logger;
}

export class ProjectRegistry {
  private readonly projects = new Map<string, ProjectContext>();
  private readonly mutex = new Mutex();

  constructor(private readonly options: ProjectRegistryOptions) {}

  get fs(): FileSystem {
    return this.options.fs;
  }

  get limits(): QueryConfig {
    return this.options.query;
  }

  /**
   * Return the context for a project, opening it on first use.
   */
  async getOrCreate(projectPath: string): Promise<ProjectContext> {
    const root = await validateProjectPath(this.options.fs, projectPath);

    return this.mutex.runExclusive(async () => {
      const existing = this.projects.get(root);
      if (existing) {
        return existing;
      }

      const context = await openProject(root, this.options);
      this.projects.set(root, context);
      return context;
    });
  }

  /** Canonical roots of every open project, sorted. */
  async list(): Promise<string[]> {
    return this.mutex.runExclusive(() => [...this.projects.keys()].sort());
  }

  async size(): Promise<number> {
    return this.mutex.runExclusive(() => this.projects.size);
  }
}
