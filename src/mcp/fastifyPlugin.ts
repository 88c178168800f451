/**
 * Fastify plugin that mounts the MCP server on a route prefix.
 *
 * Registers POST / for JSON-RPC requests (stateless Streamable HTTP): each
 * request gets its own server and transport, closed with the response.
 * Returns 405 for GET / and DELETE / (no SSE or session teardown in stateless mode).
 */

import type { FastifyInstance, FastifyPluginOptions } from 'fastify';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

export interface McpPluginOptions extends FastifyPluginOptions {
  createServer: () => McpServer;
}

export async function mcpPlugin(fastify: FastifyInstance, opts: McpPluginOptions): Promise<void> {
  const { createServer } = opts;

  // The transport parses the JSON-RPC body itself
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    try {
      done(null, JSON.parse(typeof body === 'string' ? body : body.toString('utf-8')));
    } catch (err) {
      done(err instanceof Error ? err : new Error(String(err)), undefined);
    }
  });

  fastify.post('/', async (request, reply) => {
    const server = createServer();
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    reply.raw.on('close', () => {
      transport.close().catch((err: unknown) => request.log.warn({ err }, 'Failed to close MCP transport'));
      server.close().catch((err: unknown) => request.log.warn({ err }, 'Failed to close MCP server'));
    });

    await server.connect(transport);

    // Fastify must not send a second response
    reply.hijack();

    await transport.handleRequest(request.raw, reply.raw, request.body);
  });

  fastify.get('/', async (_request, reply) => {
    return reply.code(405).send({ error: 'Method Not Allowed: stateless mode, no SSE' });
  });

  fastify.delete('/', async (_request, reply) => {
    return reply.code(405).send({ error: 'Method Not Allowed: stateless mode, no session teardown' });
  });
}
