/**
 * Filesystem collaborator.
 *
 * The core never reads file contents; it only asks whether paths exist,
 * what kind of entry they are, and which files a project contains.
 */

export type EntryKind = 'file' | 'directory' | 'other';

export interface ListProjectFilesOptions {
  /** Directory names skipped at any depth */
  skipDirectories?: string[];
}

export interface FileSystem {
  /** Whether anything exists at the absolute path. */
  exists(path: string): Promise<boolean>;

  /** Kind of entry at the absolute path, or null when nothing exists. */
  kind(path: string): Promise<EntryKind | null>;

  /** Canonical absolute path with symlinks resolved. */
  realpath(path: string): Promise<string>;

  /** Project-relative, forward-slash paths of every file under root. */
  listFiles(root: string, options?: ListProjectFilesOptions): Promise<string[]>;
}
