/**
 * Configuration loader for the file-nexus server.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { NexusError } from '../errors/NexusError.js';
import type { Logger } from '../logging/logger.js';
import type { AppConfig, CorsConfig, QueryConfig, ServerConfig, ServerLogLevel, StorageConfig } from './types.js';
import { LOG_LEVELS, createDefaultConfig } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
  /** Whether to validate config (default: true) */
  validate?: boolean;
  /** Receives warnings about missing files and variables */
  logger?: Logger;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends NexusError {
  readonly path: string;
  readonly value: unknown;

  constructor(message: string, path: string, value: unknown) {
    super('CONFIG_ERROR', `Config validation error at '${path}': ${message}`, { path });
    this.name = 'ConfigValidationError';
    this.path = path;
    this.value = value;
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
function substituteEnvVars(value: string, logger?: Logger): string {
  return value.replace(ENV_VAR_PATTERN, (_match: string, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    logger?.warn({ variable: varName }, 'Environment variable is not set and has no default');
    return '';
  });
}

/**
 * Recursively substitute environment variables in a parsed document.
 */
export function substituteEnvVarsRecursive(obj: unknown, logger?: Logger): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, logger);
  }
  if (Array.isArray(obj)) {
    return obj.map((item: unknown) => substituteEnvVarsRecursive(item, logger));
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, logger);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is ServerLogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// ============================================================================
// Field readers
// ============================================================================

function section(value: unknown, path: string): Record<string, unknown> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigValidationError('must be an object', path, value);
  }
  return value;
}

/** Numbers may arrive as strings after ${VAR} substitution. */
function readInteger(value: unknown, path: string, min: number, max: number): number | undefined {
  if (value === undefined) return undefined;
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isInteger(n) || n < min || n > max) {
    throw new ConfigValidationError(`must be an integer between ${min} and ${max}`, path, value);
  }
  return n;
}

function readString(value: unknown, path: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigValidationError('must be a non-empty string', path, value);
  }
  return value;
}

function readBoolean(value: unknown, path: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (typeof value !== 'boolean') {
    throw new ConfigValidationError('must be a boolean', path, value);
  }
  return value;
}

function readLogLevel(value: unknown, path: string): ServerLogLevel | undefined {
  if (value === undefined) return undefined;
  if (!isLogLevel(value)) {
    throw new ConfigValidationError(`must be one of: ${LOG_LEVELS.join(', ')}`, path, value);
  }
  return value;
}

function readStringList(value: unknown, path: string): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((item: unknown) => typeof item === 'string')) {
    throw new ConfigValidationError('must be a list of strings', path, value);
  }
  return value.map((item: unknown) => String(item));
}

// ============================================================================
// Sections
// ============================================================================

function mergeServer(defaults: ServerConfig, raw: unknown): ServerConfig {
  const c = section(raw, 'server');
  const cors = section(c['cors'], 'server.cors');
  const mergedCors: CorsConfig = {
    enabled: readBoolean(cors['enabled'], 'server.cors.enabled') ?? defaults.cors.enabled,
    origins: readStringList(cors['origins'], 'server.cors.origins') ?? defaults.cors.origins,
  };
  return {
    port: readInteger(c['port'], 'server.port', 1, 65535) ?? defaults.port,
    host: readString(c['host'], 'server.host') ?? defaults.host,
    logLevel: readLogLevel(c['logLevel'], 'server.logLevel') ?? defaults.logLevel,
    cors: mergedCors,
  };
}

function mergeStorage(defaults: StorageConfig, raw: unknown): StorageConfig {
  const c = section(raw, 'storage');
  const dataDirName = readString(c['dataDirName'], 'storage.dataDirName') ?? defaults.dataDirName;
  if (dataDirName.includes('/') || dataDirName.includes('\\') || dataDirName === '.' || dataDirName === '..') {
    throw new ConfigValidationError('must be a plain directory name', 'storage.dataDirName', dataDirName);
  }
  return {
    dataDirName,
    backups: readBoolean(c['backups'], 'storage.backups') ?? defaults.backups,
  };
}

function mergeQuery(defaults: QueryConfig, raw: unknown): QueryConfig {
  const c = section(raw, 'query');
  const merged: QueryConfig = {
    maxGraphDepth: readInteger(c['maxGraphDepth'], 'query.maxGraphDepth', 1, 100) ?? defaults.maxGraphDepth,
    defaultGraphDepth: readInteger(c['defaultGraphDepth'], 'query.defaultGraphDepth', 1, 100) ?? defaults.defaultGraphDepth,
    suggestionLimit: readInteger(c['suggestionLimit'], 'query.suggestionLimit', 1, 1000) ?? defaults.suggestionLimit,
    relatedFilesLimit: readInteger(c['relatedFilesLimit'], 'query.relatedFilesLimit', 1, 1000) ?? defaults.relatedFilesLimit,
  };
  if (merged.defaultGraphDepth > merged.maxGraphDepth) {
    throw new ConfigValidationError(
      'defaultGraphDepth must not exceed maxGraphDepth',
      'query.defaultGraphDepth',
      merged.defaultGraphDepth,
    );
  }
  return merged;
}

/**
 * Validate a parsed document and merge it over the defaults.
 */
export function resolveConfig(document: unknown): AppConfig {
  const root = section(document, '');
  const defaults = createDefaultConfig();
  return {
    server: mergeServer(defaults.server, root['server']),
    storage: mergeStorage(defaults.storage, root['storage']),
    query: mergeQuery(defaults.query, root['query']),
  };
}

/**
 * Override server settings from PORT, HOST and LOG_LEVEL.
 */
export function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    ...config,
    server: {
      ...config.server,
      port: readInteger(env['PORT'], 'PORT', 1, 65535) ?? config.server.port,
      host: env['HOST'] !== undefined && env['HOST'] !== '' ? env['HOST'] : config.server.host,
      logLevel: readLogLevel(env['LOG_LEVEL'], 'LOG_LEVEL') ?? config.server.logLevel,
    },
  };
}

/**
 * Load configuration from a YAML file.
 *
 * A missing file yields the defaults.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath ?? process.env['CONFIG_PATH'] ?? './config.yaml';

  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    options.logger?.warn({ path: absolutePath }, 'Config file not found, using defaults');
    return createDefaultConfig();
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new NexusError(
      'CONFIG_ERROR',
      `Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`,
      { path: absolutePath },
      err,
    );
  }

  const substituted = substituteEnvVarsRecursive(parsed, options.logger);

  if (options.validate === false) {
    try {
      return resolveConfig(substituted);
    } catch (err) {
      options.logger?.warn({ err }, 'Ignoring invalid configuration, using defaults');
      return createDefaultConfig();
    }
  }
  return resolveConfig(substituted);
}
