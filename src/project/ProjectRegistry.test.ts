import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, realpath, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { createDefaultConfig } from '../config/types.js';
import { NexusError } from '../errors/NexusError.js';
import { NodeFileSystem } from '../filesystem/NodeFileSystem.js';
import { createSilentLogger } from '../logging/logger.js';
import { ProjectRegistry } from './ProjectRegistry.js';

function createRegistry(): ProjectRegistry {
  const config = createDefaultConfig();
  return new ProjectRegistry({
    fs: new NodeFileSystem(),
    storage: config.storage,
    query: config.query,
    logger: createSilentLogger(),
  });
}

describe('ProjectRegistry', () => {
  let root: string;

  beforeEach(async () => {
    root = join(tmpdir(), `registry-test-${randomUUID()}`);
    await mkdir(join(root, 'sub'), { recursive: true });
    await writeFile(join(root, 'file.txt'), '');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('creates one context for concurrent first requests', async () => {
    const registry = createRegistry();
    const [a, b, c] = await Promise.all([
      registry.getOrCreate(root),
      registry.getOrCreate(root),
      registry.getOrCreate(join(root, 'sub', '..')),
    ]);

    expect(a).toBe(b);
    expect(a).toBe(c);
    expect(await registry.list()).toEqual([await realpath(root)]);
  });

  it('creates the data directory with default files', async () => {
    const registry = createRegistry();
    const ctx = await registry.getOrCreate(root);

    expect(ctx.dataDir).toBe(join(await realpath(root), '.filenexus'));
    for (const name of ['tags.json', 'relations.json', 'comments.json']) {
      expect((await stat(join(ctx.dataDir, name))).isFile()).toBe(true);
    }
  });

  it('keeps projects apart', async () => {
    const registry = createRegistry();
    const first = await registry.getOrCreate(root);
    const second = await registry.getOrCreate(join(root, 'sub'));

    expect(first).not.toBe(second);
    expect(await registry.size()).toBe(2);
  });

  it('rejects invalid project paths', async () => {
    const registry = createRegistry();

    await expect(registry.getOrCreate('')).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
    await expect(registry.getOrCreate(join(root, 'missing'))).rejects.toMatchObject({ code: 'FILE_NOT_FOUND' });
    await expect(registry.getOrCreate(join(root, 'file.txt'))).rejects.toBeInstanceOf(NexusError);
    expect(await registry.list()).toEqual([]);
  });
});
