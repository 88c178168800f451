/**
 * ProjectFiles: a FileSystem bound to one project root, speaking in
 * project-relative paths.
 */

import { join } from 'node:path';
import type { FileSystem } from './types.js';

const ALWAYS_SKIPPED = ['.git', 'node_modules'];

export class ProjectFiles {
  readonly root: string;
  private readonly fs: FileSystem;
  private readonly skipDirectories: string[];

  constructor(fs: FileSystem, root: string, dataDirName: string) {
    this.fs = fs;
    this.root = root;
    this.skipDirectories = [...ALWAYS_SKIPPED, dataDirName];
  }

  async exists(relativePath: string): Promise<boolean> {
    return this.fs.exists(join(this.root, relativePath));
  }

  async listFiles(): Promise<string[]> {
    return this.fs.listFiles(this.root, { skipDirectories: this.skipDirectories });
  }
}
