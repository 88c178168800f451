/**
 * Tests for the tag index and its locked, persisted manager.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { NexusError, storageError } from '../errors/NexusError.js';
import { NodeFileSystem } from '../filesystem/NodeFileSystem.js';
import { ProjectFiles } from '../filesystem/ProjectFiles.js';
import { createSilentLogger } from '../logging/logger.js';
import { JsonSnapshotStore, createDataStores } from '../storage/JsonSnapshotStore.js';
import { TagsSnapshotSchema, type SnapshotStore, type TagsSnapshot } from '../storage/types.js';
import { TagIndex, parseTag, validateTag } from './TagIndex.js';
import { TagManager } from './TagManager.js';

async function rejection(promise: Promise<unknown>): Promise<NexusError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof NexusError) return err;
    throw err;
  }
  throw new Error('expected a NexusError');
}

describe('TagIndex', () => {
  describe('validateTag', () => {
    it('accepts type:value', () => {
      expect(() => validateTag('category:api')).not.toThrow();
      expect(parseTag('category:api')).toEqual({ type: 'category', value: 'api' });
    });

    it.each(['category', 'category:', ':api', 'a:b:c', ''])('rejects %j', (tag) => {
      expect(() => validateTag(tag)).toThrow(NexusError);
    });
  });

  it('keeps the derived indices in step with file tags', () => {
    const index = new TagIndex();
    index.addTags('f1', ['category:api', 'lang:go']);
    index.addTags('f2', ['category:api']);

    expect(index.getAllTags()).toEqual({ category: ['api'], lang: ['go'] });
    expect([...(index.tagFiles().get('category:api') ?? [])].sort()).toEqual(['f1', 'f2']);

    index.removeTags('f1', ['lang:go']);
    expect(index.getAllTags()).toEqual({ category: ['api'] });
    expect(index.tagFiles().has('lang:go')).toBe(false);
  });

  it('returns only newly added tags and stays idempotent', () => {
    const index = new TagIndex();
    expect(index.addTags('f1', ['a:1', 'b:2'])).toEqual(['a:1', 'b:2']);
    expect(index.addTags('f1', ['a:1', 'b:2'])).toEqual([]);
    expect(index.getFileTags('f1')).toEqual(['a:1', 'b:2']);
  });

  it('validates every tag before adding any', () => {
    const index = new TagIndex();
    expect(() => index.addTags('f1', ['a:1', 'bad'])).toThrow('Invalid tag format: "bad", expected type:value');
    expect(index.hasFile('f1')).toBe(false);
  });

  it('drops a file entry once its last tag is removed', () => {
    const index = new TagIndex();
    index.addTags('f1', ['a:1']);
    index.removeTags('f1', ['a:1']);

    expect(index.hasFile('f1')).toBe(false);
    expect(index.getFileTags('f1')).toEqual([]);
    expect(index.getAllTags()).toEqual({});
    expect(index.getStats()).toEqual({ taggedFiles: 0, distinctTags: 0, tagTypes: 0 });
  });

  it('round-trips through a snapshot', () => {
    const index = new TagIndex();
    index.addTags('f1', ['lang:ts', 'category:api']);
    expect(index.toSnapshot()).toEqual({ fileTags: { f1: ['category:api', 'lang:ts'] } });
    expect(TagIndex.fromSnapshot(index.toSnapshot()).getFileTags('f1')).toEqual(['category:api', 'lang:ts']);
  });
});

describe('TagManager', () => {
  let root: string;
  let dataDir: string;
  let manager: TagManager;
  let files: ProjectFiles;

  beforeEach(async () => {
    root = join(tmpdir(), `tag-manager-test-${randomUUID()}`);
    dataDir = join(root, '.filenexus');
    await mkdir(join(root, 'src'), { recursive: true });
    await writeFile(join(root, 'f1'), 'one');
    await writeFile(join(root, 'f2'), 'two');
    await writeFile(join(root, 'src', 'untagged.ts'), 'three');

    const logger = createSilentLogger();
    files = new ProjectFiles(new NodeFileSystem(), root, '.filenexus');
    const stores = createDataStores(dataDir, { logger });
    manager = new TagManager({ store: stores.tags, files, logger });
    await manager.initialize();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('answers tag queries over tagged files', async () => {
    await manager.addTags('f1', ['category:api', 'lang:go']);
    await manager.addTags('f2', ['category:api']);

    expect(await manager.queryFilesByTags('category:api AND lang:go')).toEqual(['f1']);
    expect(await manager.queryFilesByTags('category:api')).toEqual(['f1', 'f2']);
    expect(await manager.queryFilesByTags('NOT lang:go')).toEqual(['f2']);
    expect(await manager.queryFilesByTags('')).toEqual([]);
  });

  it('rejects tags for files that do not exist', async () => {
    const err = await rejection(manager.addTags('missing.ts', ['a:1']));
    expect(err.code).toBe('FILE_NOT_FOUND');
  });

  it('leaves the tag set unchanged when a removed tag is absent', async () => {
    await manager.addTags('f1', ['category:api']);

    const err = await rejection(manager.removeTags('f1', ['category:api', 'lang:go']));
    expect(err.code).toBe('TAG_NOT_FOUND');
    expect(err.message).toBe('Tag lang:go not found on file f1');
    expect(await manager.getFileTags('f1')).toEqual(['category:api']);
  });

  it('reports FILE_NOT_FOUND when removing from an untagged file', async () => {
    const err = await rejection(manager.removeTags('f2', ['a:1']));
    expect(err.code).toBe('FILE_NOT_FOUND');
  });

  it('persists every change to tags.json', async () => {
    await manager.addTags('f1', ['lang:ts', 'category:api']);
    await manager.removeTags('f1', ['lang:ts']);

    const saved: unknown = JSON.parse(await readFile(join(dataDir, 'tags.json'), 'utf-8'));
    expect(saved).toEqual({ fileTags: { f1: ['category:api'] } });
  });

  it('reloads persisted tags into a fresh manager', async () => {
    await manager.addTags('f1', ['category:api']);

    const logger = createSilentLogger();
    const reloaded = new TagManager({ store: createDataStores(dataDir, { logger }).tags, files, logger });
    await reloaded.initialize();
    expect(await reloaded.getAllTags()).toEqual({ category: ['api'] });
  });

  it('lists untagged project files, skipping the data directory', async () => {
    await manager.addTags('f1', ['category:api']);
    expect(await manager.getUntaggedFiles()).toEqual(['f2', 'src/untagged.ts']);
    expect(await manager.getTaggedFiles()).toEqual(['f1']);
  });

  it('restores memory when saving fails', async () => {
    const logger = createSilentLogger();
    const inner = new JsonSnapshotStore<TagsSnapshot>({
      path: join(dataDir, 'tags.json'),
      schema: TagsSnapshotSchema,
      createDefault: () => ({ fileTags: {} }),
      logger,
    });
    let failSaves = false;
    const flaky: SnapshotStore<TagsSnapshot> = {
      path: inner.path,
      load: () => inner.load(),
      save: async (snapshot) => {
        if (failSaves) throw storageError('save', inner.path, new Error('disk full'));
        await inner.save(snapshot);
      },
    };

    const fragile = new TagManager({ store: flaky, files, logger });
    await fragile.initialize();
    await fragile.addTags('f1', ['category:api']);

    failSaves = true;
    const err = await rejection(fragile.addTags('f1', ['lang:ts']));
    expect(err.code).toBe('STORAGE_ERROR');
    expect(await fragile.getFileTags('f1')).toEqual(['category:api']);
    expect(await fragile.queryFilesByTags('lang:ts')).toEqual([]);
  });
});
