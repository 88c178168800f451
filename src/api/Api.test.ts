/**
 * E2E tests for the HTTP API.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { mkdir, writeFile, rm } from 'node:fs/promises';
import type { FastifyInstance } from 'fastify';
import { initializeApp, createServer } from '../server.js';

describe('API E2E Tests', () => {
  let app: FastifyInstance;
  let projectDir: string;

  beforeAll(async () => {
    projectDir = join(tmpdir(), `api-test-${randomUUID()}`);
    await mkdir(join(projectDir, 'src'), { recursive: true });
    await mkdir(join(projectDir, 'docs'), { recursive: true });
    await writeFile(join(projectDir, 'src', 'server.ts'), '');
    await writeFile(join(projectDir, 'src', 'routes.ts'), '');
    await writeFile(join(projectDir, 'docs', 'guide.md'), '');

    const ctx = await initializeApp(projectDir, { logLevel: 'silent', env: {} });
    app = await createServer(ctx);
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    await rm(projectDir, { recursive: true, force: true });
  });

  describe('Health Check', () => {
    it('should return health status', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/health' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.status).toBe('ok');
      expect(typeof body.timestamp).toBe('string');
      expect(body.projects).toBe(0);
    });
  });

  describe('Tag Routes', () => {
    it('POST /api/tags adds tags', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/tags',
        payload: { projectPath: projectDir, filePath: 'src/server.ts', tags: ['layer:http', 'lang:ts'] },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ success: true, file: 'src/server.ts', added: ['layer:http', 'lang:ts'] });
    });

    it('POST /api/tags skips tags already present', async () => {
      await app.inject({
        method: 'POST',
        url: '/api/tags',
        payload: { projectPath: projectDir, filePath: 'src/routes.ts', tags: ['lang:ts'] },
      });
      const response = await app.inject({
        method: 'POST',
        url: '/api/tags',
        payload: { projectPath: projectDir, filePath: 'src/routes.ts', tags: ['lang:ts', 'layer:http'] },
      });

      expect(response.json()).toEqual({ success: true, file: 'src/routes.ts', added: ['layer:http'] });
    });

    it('GET /api/tags/file returns sorted tags', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/tags/file',
        query: { projectPath: projectDir, filePath: 'src/server.ts' },
      });

      expect(response.json()).toEqual({ file: 'src/server.ts', tags: ['lang:ts', 'layer:http'] });
    });

    it('GET /api/tags/untagged lists files without tags', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/tags/untagged',
        query: { projectPath: projectDir },
      });

      expect(response.json()).toEqual({ files: ['docs/guide.md'], total: 1 });
    });

    it('rejects a malformed body with 400', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/tags',
        payload: { projectPath: projectDir, filePath: 'src/server.ts' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('INVALID_ARGUMENT');
    });

    it('rejects tags without a type with 400', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/tags',
        payload: { projectPath: projectDir, filePath: 'src/server.ts', tags: ['http'] },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('INVALID_TAG_FORMAT');
    });

    it('returns 404 for missing files', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/tags',
        payload: { projectPath: projectDir, filePath: 'src/missing.ts', tags: ['lang:ts'] },
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        error: 'FILE_NOT_FOUND',
        message: 'File not found: src/missing.ts',
        suggestion: 'Check that the file path is correct',
      });
    });

    it('requires projectPath', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/tags' });

      expect(response.statusCode).toBe(400);
      expect(response.json().message).toBe('projectPath is required');
    });
  });

  describe('Query Routes', () => {
    it('GET /api/query evaluates a tag query', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/query',
        query: { projectPath: projectDir, q: 'layer:http AND lang:t*' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ files: ['src/routes.ts', 'src/server.ts'], total: 2 });
    });

    it('GET /api/query rejects broken syntax', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/query',
        query: { projectPath: projectDir, q: '(layer:http' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('INVALID_QUERY_SYNTAX');
    });

    it('GET /api/query/suggest completes tag types', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/query/suggest',
        query: { projectPath: projectDir, q: 'lay' },
      });

      expect(response.json()).toEqual({ suggestions: ['layer:http'] });
    });
  });

  describe('Comment Routes', () => {
    it('POST then PUT then DELETE a comment', async () => {
      const created = await app.inject({
        method: 'POST',
        url: '/api/comments',
        payload: { projectPath: projectDir, filePath: 'docs/guide.md', comment: 'User guide' },
      });
      expect(created.statusCode).toBe(201);

      const conflict = await app.inject({
        method: 'POST',
        url: '/api/comments',
        payload: { projectPath: projectDir, filePath: 'docs/guide.md', comment: 'Again' },
      });
      expect(conflict.statusCode).toBe(409);

      const updated = await app.inject({
        method: 'PUT',
        url: '/api/comments',
        payload: { projectPath: projectDir, filePath: 'docs/guide.md', comment: 'Operator guide' },
      });
      expect(updated.json()).toEqual({ success: true, file: 'docs/guide.md', comment: 'Operator guide' });

      const fetched = await app.inject({
        method: 'GET',
        url: '/api/comments',
        query: { projectPath: projectDir, filePath: 'docs/guide.md' },
      });
      expect(fetched.json()).toEqual({ file: 'docs/guide.md', comment: 'Operator guide' });

      const deleted = await app.inject({
        method: 'DELETE',
        url: '/api/comments',
        payload: { projectPath: projectDir, filePath: 'docs/guide.md' },
      });
      expect(deleted.json()).toEqual({ success: true, file: 'docs/guide.md' });

      const missing = await app.inject({
        method: 'DELETE',
        url: '/api/comments',
        payload: { projectPath: projectDir, filePath: 'docs/guide.md' },
      });
      expect(missing.statusCode).toBe(404);
      expect(missing.json().error).toBe('COMMENT_NOT_FOUND');
    });
  });

  describe('Relation Routes', () => {
    it('POST /api/relations then GET both directions', async () => {
      const created = await app.inject({
        method: 'POST',
        url: '/api/relations',
        payload: { projectPath: projectDir, fromFile: 'src/server.ts', toFile: 'src/routes.ts', description: 'mounts' },
      });
      expect(created.statusCode).toBe(201);
      expect(created.json()).toEqual({
        success: true,
        source: 'src/server.ts',
        target: 'src/routes.ts',
        description: 'mounts',
      });

      const outgoing = await app.inject({
        method: 'GET',
        url: '/api/relations',
        query: { projectPath: projectDir, filePath: 'src/server.ts' },
      });
      expect(outgoing.json()).toEqual({
        file: 'src/server.ts',
        direction: 'outgoing',
        relations: [{ target: 'src/routes.ts', description: 'mounts' }],
      });

      const incoming = await app.inject({
        method: 'GET',
        url: '/api/relations',
        query: { projectPath: projectDir, filePath: 'src/routes.ts', direction: 'incoming' },
      });
      expect(incoming.json()).toEqual({
        file: 'src/routes.ts',
        direction: 'incoming',
        relations: [{ source: 'src/server.ts', description: 'mounts' }],
      });
    });

    it('rejects duplicates with 409 and unknown directions with 400', async () => {
      const duplicate = await app.inject({
        method: 'POST',
        url: '/api/relations',
        payload: { projectPath: projectDir, fromFile: 'src/server.ts', toFile: 'src/routes.ts', description: 'x' },
      });
      expect(duplicate.statusCode).toBe(409);

      const sideways = await app.inject({
        method: 'GET',
        url: '/api/relations',
        query: { projectPath: projectDir, filePath: 'src/server.ts', direction: 'sideways' },
      });
      expect(sideways.statusCode).toBe(400);
    });

    it('GET /api/relations/graph checks maxDepth', async () => {
      const graph = await app.inject({
        method: 'GET',
        url: '/api/relations/graph',
        query: { projectPath: projectDir, filePath: 'src/server.ts', maxDepth: '1' },
      });
      expect(graph.json()).toEqual({
        root: 'src/server.ts',
        maxDepth: 1,
        graph: { 'src/server.ts': [{ target: 'src/routes.ts', description: 'mounts' }] },
      });

      const tooDeep = await app.inject({
        method: 'GET',
        url: '/api/relations/graph',
        query: { projectPath: projectDir, filePath: 'src/server.ts', maxDepth: '99' },
      });
      expect(tooDeep.statusCode).toBe(400);

      const notNumber = await app.inject({
        method: 'GET',
        url: '/api/relations/graph',
        query: { projectPath: projectDir, filePath: 'src/server.ts', maxDepth: 'deep' },
      });
      expect(notNumber.json().message).toBe('maxDepth must be an integer');
    });
  });

  describe('File Routes', () => {
    it('GET /api/files/info combines all metadata', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/files/info',
        query: { projectPath: projectDir, filePath: 'src/routes.ts' },
      });

      expect(response.json()).toEqual({
        path: 'src/routes.ts',
        tags: ['lang:ts', 'layer:http'],
        comment: null,
        relations: [],
        incomingRelations: [{ source: 'src/server.ts', description: 'mounts' }],
      });
    });

    it('GET /api/projects lists opened projects', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/projects' });

      expect(response.json().projects).toHaveLength(1);
    });
  });

  describe('MCP endpoint', () => {
    it('GET /mcp is not allowed in stateless mode', async () => {
      const response = await app.inject({ method: 'GET', url: '/mcp' });

      expect(response.statusCode).toBe(405);
    });
  });
});
