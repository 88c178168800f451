import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { NexusError } from '../errors/NexusError.js';
import { NodeFileSystem } from '../filesystem/NodeFileSystem.js';
import { ProjectFiles } from '../filesystem/ProjectFiles.js';
import { createSilentLogger } from '../logging/logger.js';
import { createDataStores } from '../storage/JsonSnapshotStore.js';
import { CommentManager } from './CommentManager.js';

async function rejection(promise: Promise<unknown>): Promise<NexusError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof NexusError) return err;
    throw err;
  }
  throw new Error('expected a NexusError');
}

describe('CommentManager', () => {
  let root: string;
  let dataDir: string;
  let manager: CommentManager;

  beforeEach(async () => {
    root = join(tmpdir(), `comment-manager-test-${randomUUID()}`);
    dataDir = join(root, '.filenexus');
    await mkdir(root, { recursive: true });
    await writeFile(join(root, 'main.ts'), '');
    await writeFile(join(root, 'util.ts'), '');

    const logger = createSilentLogger();
    const files = new ProjectFiles(new NodeFileSystem(), root, '.filenexus');
    manager = new CommentManager({ store: createDataStores(dataDir, { logger }).comments, files, logger });
    await manager.initialize();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('adds, updates and deletes a comment', async () => {
    await manager.addComment('main.ts', 'Entry point');
    expect(await manager.getComment('main.ts')).toBe('Entry point');

    await manager.updateComment('main.ts', 'CLI entry point');
    expect(await manager.getComment('main.ts')).toBe('CLI entry point');

    await manager.deleteComment('main.ts');
    expect(await manager.getComment('main.ts')).toBeNull();
    expect(await manager.hasComment('main.ts')).toBe(false);
  });

  it('refuses a second comment on the same file', async () => {
    await manager.addComment('main.ts', 'Entry point');
    const err = await rejection(manager.addComment('main.ts', 'Again'));
    expect(err.code).toBe('COMMENT_ALREADY_EXISTS');
    expect(err.suggestion).toBe('Use update_file_comment to change an existing comment');
  });

  it('validates input', async () => {
    expect((await rejection(manager.addComment('main.ts', '   '))).code).toBe('INVALID_ARGUMENT');
    expect((await rejection(manager.addComment('nope.ts', 'text'))).code).toBe('FILE_NOT_FOUND');
    expect((await rejection(manager.deleteComment('util.ts'))).code).toBe('COMMENT_NOT_FOUND');
  });

  it('searches comments case-insensitively', async () => {
    await manager.addComment('util.ts', 'String helpers');
    await manager.addComment('main.ts', 'Parses CLI strings');

    expect(await manager.searchComments('STRING')).toEqual([
      { file: 'main.ts', comment: 'Parses CLI strings' },
      { file: 'util.ts', comment: 'String helpers' },
    ]);
    expect(await manager.getComments(['util.ts', 'other.ts'])).toEqual({ 'util.ts': 'String helpers' });
    expect(await manager.getStats()).toEqual({ commentedFiles: 2, totalChars: 32 });
  });

  it('persists comments and drops those on deleted files', async () => {
    await manager.addComment('main.ts', 'Entry point');
    await manager.addComment('util.ts', 'Helpers');
    await rm(join(root, 'util.ts'));

    expect(await manager.cleanupInvalidComments()).toBe(1);
    expect(await manager.getCommentedFiles()).toEqual(['main.ts']);

    const saved: unknown = JSON.parse(await readFile(join(dataDir, 'comments.json'), 'utf-8'));
    expect(saved).toEqual({ fileComments: { 'main.ts': 'Entry point' } });
  });
});
