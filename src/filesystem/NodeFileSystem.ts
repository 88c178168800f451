/**
 * NodeFileSystem: node:fs implementation of the FileSystem collaborator.
 */

import { readdir, realpath, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { fileSystemError } from '../errors/NexusError.js';
import type { EntryKind, FileSystem, ListProjectFilesOptions } from './types.js';

function isMissing(err: unknown): boolean {
  const code = (err as NodeJS.ErrnoException).code;
  return code === 'ENOENT' || code === 'ENOTDIR';
}

export class NodeFileSystem implements FileSystem {
  async exists(path: string): Promise<boolean> {
    return (await this.kind(path)) !== null;
  }

  async kind(path: string): Promise<EntryKind | null> {
    try {
      const stats = await stat(path);
      if (stats.isFile()) return 'file';
      if (stats.isDirectory()) return 'directory';
      return 'other';
    } catch (err) {
      if (isMissing(err)) {
        return null;
      }
      throw fileSystemError(path, err);
    }
  }

  async realpath(path: string): Promise<string> {
    try {
      return await realpath(path);
    } catch (err) {
      throw fileSystemError(path, err);
    }
  }

  async listFiles(root: string, options: ListProjectFilesOptions = {}): Promise<string[]> {
    const skip = new Set(options.skipDirectories ?? []);
    const results: string[] = [];
    try {
      await this.listRecursive(root, '', skip, results);
    } catch (err) {
      if (isMissing(err)) {
        return [];
      }
      throw fileSystemError(root, err);
    }
    return results.sort();
  }

  private async listRecursive(
    absDir: string,
    relDir: string,
    skip: Set<string>,
    results: string[],
  ): Promise<void> {
    const entries = await readdir(absDir, { withFileTypes: true });

    for (const entry of entries) {
      const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        if (!skip.has(entry.name)) {
          await this.listRecursive(join(absDir, entry.name), relPath, skip, results);
        }
      } else if (entry.isFile()) {
        results.push(relPath);
      }
    }
  }
}

export function createNodeFileSystem(): NodeFileSystem {
  return new NodeFileSystem();
}
