/**
 * Project path validation and normalization.
 *
 * Inside the indices files are always identified by project-relative,
 * forward-slash paths. Absolute paths only exist at this boundary.
 */

import { isAbsolute, join, posix, relative, resolve, sep } from 'node:path';
import { NexusError, fileNotFound, invalidArgument } from '../errors/NexusError.js';
import type { FileSystem } from './types.js';

/**
 * Validate a project root and return its canonical absolute path.
 */
export async function validateProjectPath(fs: FileSystem, projectPath: string): Promise<string> {
  if (projectPath.trim().length === 0) {
    throw invalidArgument('Project path must not be empty');
  }

  const absolute = resolve(projectPath);
  const kind = await fs.kind(absolute);
  if (kind === null) {
    throw fileNotFound(projectPath);
  }
  if (kind !== 'directory') {
    throw invalidArgument(`Project path must be a directory: ${projectPath}`);
  }

  return fs.realpath(absolute);
}

function isInside(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  return rel.length > 0 && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/**
 * Validate a file path (relative to the project root, or absolute inside it)
 * and return its canonical absolute path.
 */
export async function validateFilePath(fs: FileSystem, projectRoot: string, filePath: string): Promise<string> {
  if (filePath.trim().length === 0) {
    throw invalidArgument('File path must not be empty');
  }

  const full = isAbsolute(filePath) ? filePath : join(projectRoot, filePath);
  const kind = await fs.kind(full);
  if (kind === null) {
    throw fileNotFound(filePath);
  }
  if (kind !== 'file') {
    throw invalidArgument(`Path must point to a file, not a directory: ${filePath}`);
  }

  const canonical = await fs.realpath(full);
  const canonicalRoot = await fs.realpath(projectRoot);
  if (!isInside(canonicalRoot, canonical)) {
    throw new NexusError('PATH_OUTSIDE_PROJECT', `File path must be inside the project directory: ${filePath}`, {
      path: filePath,
    });
  }

  return canonical;
}

/**
 * Convert an absolute path inside the project to a project-relative,
 * forward-slash path.
 */
export function normalizeFilePath(projectRoot: string, absolutePath: string): string {
  if (!isInside(projectRoot, absolutePath)) {
    throw new NexusError('PATH_OUTSIDE_PROJECT', `File path is not inside the project: ${absolutePath}`, {
      path: absolutePath,
    });
  }
  return relative(projectRoot, absolutePath).split(sep).join('/');
}

/**
 * Normalize a path without touching the filesystem. Used for lookups of files
 * that may no longer exist on disk.
 */
export function normalizeLexically(projectRoot: string, filePath: string): string {
  const trimmed = filePath.trim();
  if (trimmed.length === 0) {
    throw invalidArgument('File path must not be empty');
  }
  if (isAbsolute(trimmed)) {
    return normalizeFilePath(projectRoot, resolve(trimmed));
  }
  const normalized = posix.normalize(trimmed.replace(/\\/g, '/'));
  if (normalized === '..' || normalized.startsWith('../')) {
    throw new NexusError('PATH_OUTSIDE_PROJECT', `File path must be inside the project directory: ${filePath}`, {
      path: filePath,
    });
  }
  return normalized.replace(/^\.\//, '');
}
