/**
 * End-to-end tests of the operations shared by the MCP and HTTP adapters.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { createDefaultConfig } from '../config/types.js';
import { NodeFileSystem } from '../filesystem/NodeFileSystem.js';
import { createSilentLogger } from '../logging/logger.js';
import { ProjectRegistry } from '../project/ProjectRegistry.js';
import { NexusService } from './NexusService.js';

describe('NexusService', () => {
  let root: string;
  let service: NexusService;

  beforeEach(async () => {
    root = join(tmpdir(), `nexus-service-test-${randomUUID()}`);
    await mkdir(join(root, 'src'), { recursive: true });
    await mkdir(join(root, 'docs'), { recursive: true });
    for (const file of ['src/api.ts', 'src/db.ts', 'src/util.ts', 'docs/readme.md']) {
      await writeFile(join(root, file), '');
    }

    const config = createDefaultConfig();
    const logger = createSilentLogger();
    const registry = new ProjectRegistry({
      fs: new NodeFileSystem(),
      storage: config.storage,
      query: config.query,
      logger,
    });
    service = new NexusService({ registry, logger });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('paths', () => {
    it('normalizes relative and absolute file paths', async () => {
      expect(await service.addTags(root, './src/api.ts', ['layer:api'])).toEqual({
        file: 'src/api.ts',
        tags: ['layer:api'],
      });
      expect(await service.getFileTags(root, join(root, 'src', 'api.ts'))).toEqual({
        file: 'src/api.ts',
        tags: ['layer:api'],
      });
    });

    it('rejects files outside the project', async () => {
      await expect(service.addTags(root, '../elsewhere.ts', ['a:b'])).rejects.toMatchObject({
        code: expect.stringMatching(/^(FILE_NOT_FOUND|PATH_OUTSIDE_PROJECT)$/),
      });
      await expect(service.addTags(join(root, 'src'), '../docs/readme.md', ['a:b'])).rejects.toMatchObject({
        code: 'PATH_OUTSIDE_PROJECT',
      });
    });

    it('rejects directories and empty tag lists', async () => {
      await expect(service.addTags(root, 'src', ['a:b'])).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
      await expect(service.addTags(root, 'src/api.ts', [])).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
    });

    it('still reaches metadata of deleted files', async () => {
      await service.addTags(root, 'src/util.ts', ['status:legacy']);
      await rm(join(root, 'src', 'util.ts'));

      expect(await service.getFileTags(root, 'src/util.ts')).toEqual({ file: 'src/util.ts', tags: ['status:legacy'] });
      expect(await service.removeTags(root, 'src/util.ts', ['status:legacy'])).toEqual({
        file: 'src/util.ts',
        tags: ['status:legacy'],
      });
    });
  });

  describe('queries', () => {
    beforeEach(async () => {
      await service.addTags(root, 'src/api.ts', ['layer:api', 'lang:ts']);
      await service.addTags(root, 'src/db.ts', ['layer:data', 'lang:ts']);
      await service.addTags(root, 'docs/readme.md', ['lang:md']);
    });

    it('runs tag queries', async () => {
      expect(await service.queryFilesByTags(root, 'lang:ts AND NOT layer:data')).toEqual({
        files: ['src/api.ts'],
        total: 1,
      });
      expect(await service.queryFilesByTags(root, 'layer:*')).toEqual({ files: ['src/api.ts', 'src/db.ts'], total: 2 });
    });

    it('validates queries without throwing', () => {
      expect(service.validateTagQuery('lang:ts AND layer:api')).toEqual({ query: 'lang:ts AND layer:api', valid: true });
      expect(service.validateTagQuery('(lang:ts')).toEqual({
        query: '(lang:ts',
        valid: false,
        message: "Invalid query syntax: Missing closing ')'",
      });
    });

    it('suggests tags and lists untagged files', async () => {
      expect(await service.getQuerySuggestions(root, 'lay')).toEqual(['layer:api', 'layer:data']);
      expect(await service.getUntaggedFiles(root)).toEqual(['src/util.ts']);
      expect(await service.getAllTags(root)).toEqual({ lang: ['md', 'ts'], layer: ['api', 'data'] });
    });

    it('intersects tag query and relation keyword', async () => {
      await service.addRelation(root, 'src/api.ts', 'src/db.ts', 'reads from');
      await service.addRelation(root, 'docs/readme.md', 'src/api.ts', 'documents reads');

      expect(await service.executeComplexQuery(root, { relationKeyword: 'reads' })).toEqual({
        files: ['docs/readme.md', 'src/api.ts'],
        total: 2,
      });
      expect(await service.executeComplexQuery(root, { tagQuery: 'lang:ts', relationKeyword: 'reads' })).toEqual({
        files: ['src/api.ts'],
        total: 1,
      });
      await expect(service.executeComplexQuery(root, {})).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
    });
  });

  describe('relations and combined reads', () => {
    beforeEach(async () => {
      await service.addTags(root, 'src/api.ts', ['layer:api']);
      await service.addTags(root, 'src/util.ts', ['layer:api']);
      await service.addComment(root, 'src/api.ts', 'HTTP handlers');
      await service.addRelation(root, 'src/api.ts', 'src/db.ts', 'queries the database');
      await service.addRelation(root, 'docs/readme.md', 'src/api.ts', 'describes');
    });

    it('returns full file info', async () => {
      expect(await service.getFileInfo(root, 'src/api.ts')).toEqual({
        path: 'src/api.ts',
        tags: ['layer:api'],
        comment: 'HTTP handlers',
        relations: [{ target: 'src/db.ts', description: 'queries the database' }],
        incomingRelations: [{ source: 'docs/readme.md', description: 'describes' }],
      });
    });

    it('finds related files through tags and relations', async () => {
      expect(await service.getRelatedFiles(root, 'src/api.ts')).toEqual(['docs/readme.md', 'src/db.ts', 'src/util.ts']);
      expect(await service.getRelatedFiles(root, 'src/api.ts', 1)).toEqual(['docs/readme.md']);
    });

    it('reports system status over the union of known files', async () => {
      expect(await service.getSystemStatus(root)).toEqual({
        totalFiles: 4,
        taggedFiles: 2,
        commentedFiles: 1,
        totalRelations: 2,
        tagStats: { tagTypes: { layer: ['api'] }, totalFiles: 2, totalTags: 1 },
      });
    });

    it('searches comments and relation descriptions', async () => {
      const results = await service.searchFiles(root, 'HTTP');
      expect(results.map((info) => info.path)).toEqual(['src/api.ts']);

      const byRelation = await service.searchFiles(root, 'DESCRIBES');
      expect(byRelation.map((info) => info.path)).toEqual(['docs/readme.md']);
    });

    it('walks the relation graph with the default depth', async () => {
      expect(await service.getRelationGraph(root, 'docs/readme.md')).toEqual({
        root: 'docs/readme.md',
        maxDepth: 3,
        graph: {
          'docs/readme.md': [{ target: 'src/api.ts', description: 'describes' }],
          'src/api.ts': [{ target: 'src/db.ts', description: 'queries the database' }],
        },
      });
      await expect(service.getRelationGraph(root, 'src/api.ts', 11)).rejects.toMatchObject({
        code: 'INVALID_ARGUMENT',
      });
    });

    it('cleans up after deleted files', async () => {
      await rm(join(root, 'src', 'db.ts'));
      await rm(join(root, 'src', 'api.ts'));

      expect(await service.cleanupInvalidRelations(root)).toBe(2);
      expect(await service.cleanupInvalidComments(root)).toBe(1);
      expect(await service.getIncomingRelations(root, 'src/api.ts')).toEqual({ file: 'src/api.ts', relations: [] });
    });

    it('removes relations by pair', async () => {
      expect(await service.removeRelation(root, 'src/api.ts', 'src/db.ts')).toEqual({
        source: 'src/api.ts',
        target: 'src/db.ts',
      });
      await expect(service.removeRelation(root, 'src/api.ts', 'src/db.ts')).rejects.toMatchObject({
        code: 'RELATION_NOT_FOUND',
      });
      expect(await service.getOutgoingRelations(root, 'src/api.ts')).toEqual({ file: 'src/api.ts', relations: [] });
    });
  });
});
