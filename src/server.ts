#!/usr/bin/env node
/**
 * Server entry point for the file-nexus HTTP API.
 *
 * This module:
 * - Loads configuration and opens the project registry
 * - Creates the Fastify server with the REST routes and the MCP endpoint
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { resolve } from 'node:path';

import { applyEnvOverrides, loadConfig } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { createNodeFileSystem } from './filesystem/NodeFileSystem.js';
import type { FileSystem } from './filesystem/types.js';
import { createLogger, type LogLevel, type Logger } from './logging/logger.js';
import { ProjectRegistry } from './project/ProjectRegistry.js';
import { NexusService } from './service/NexusService.js';
import {
  createCommentHandlers,
  createFileHandlers,
  createQueryHandlers,
  createRelationHandlers,
  createTagHandlers,
} from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';
import { createMcpServer, mcpPlugin } from './mcp/index.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  config: AppConfig;
  logger: Logger;
  fs: FileSystem;
  registry: ProjectRegistry;
  service: NexusService;
}

export interface InitializeOptions {
  /** Config file to read (default: CONFIG_PATH or <basePath>/config.yaml) */
  configPath?: string;
  /** Overrides the configured log level, e.g. 'silent' in tests */
  logLevel?: LogLevel;
  /** Environment used for PORT, HOST and LOG_LEVEL overrides */
  env?: NodeJS.ProcessEnv;
}

/**
 * Initialize all application components.
 */
export async function initializeApp(basePath: string, options: InitializeOptions = {}): Promise<AppContext> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env['CONFIG_PATH'] ?? resolve(basePath, 'config.yaml');

  const config = applyEnvOverrides(await loadConfig({ configPath }), env);
  const logger = createLogger({ level: options.logLevel ?? config.server.logLevel });

  logger.info({ basePath, configPath }, 'Initializing file-nexus');

  const fs = createNodeFileSystem();
  const registry = new ProjectRegistry({
    fs,
    storage: config.storage,
    query: config.query,
    logger,
  });
  const service = new NexusService({ registry, logger });

  return { config, logger, fs, registry, service };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(ctx: AppContext): Promise<ReturnType<typeof Fastify>> {
  const { server } = ctx.config;

  const fastify = Fastify({
    logger: {
      level: ctx.logger.level,
    },
  });

  if (server.cors.enabled) {
    await fastify.register(cors, {
      origin: server.cors.origins.includes('*') ? true : server.cors.origins,
      methods: ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'Mcp-Session-Id'],
    });
  }

  // Streamable HTTP MCP endpoint on /mcp
  await fastify.register(mcpPlugin, { prefix: '/mcp', createServer: () => createMcpServer(ctx) });

  const tagHandlers = createTagHandlers(ctx.service);
  const queryHandlers = createQueryHandlers(ctx.service);
  const commentHandlers = createCommentHandlers(ctx.service);
  const relationHandlers = createRelationHandlers(ctx.service);
  const fileHandlers = createFileHandlers(ctx.service);

  // Register API routes with /api prefix
  await fastify.register(async (instance) => {
    registerRoutes(instance, {
      tagHandlers,
      queryHandlers,
      commentHandlers,
      relationHandlers,
      fileHandlers,
      projectCount: () => ctx.registry.size(),
    });
  }, { prefix: '/api' });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(basePath: string, options: InitializeOptions = {}): Promise<void> {
  const ctx = await initializeApp(basePath, options);
  const fastify = await createServer(ctx);
  const { port, host } = ctx.config.server;

  await fastify.listen({ port, host });
  ctx.logger.info({ port, host }, 'file-nexus listening');

  const shutdown = (signal: string) => {
    ctx.logger.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        ctx.logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

/**
 * CLI entry point.
 */
async function main() {
  const basePath = process.env['APP_BASE_PATH'] || process.cwd();
  await startServer(basePath);
}

// Run if executed directly
// Note: ESM doesn't have require.main
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch((err: unknown) => {
    process.stderr.write(`Failed to start server: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exit(1);
  });
}
