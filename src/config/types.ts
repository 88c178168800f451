/**
 * Configuration types for the file-nexus server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server configuration.
 */

export type ServerLogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly ServerLogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Top-level configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  storage: StorageConfig;
  query: QueryConfig;
}

/**
 * Server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3002) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: ServerLogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * Where and how each project's metadata is stored.
 */
export interface StorageConfig {
  /** Directory created inside every project root (default: '.filenexus') */
  dataDirName: string;
  /** Keep a .bak copy of each data file before overwriting it (default: true) */
  backups: boolean;
}

/**
 * Limits applied to read operations.
 */
export interface QueryConfig {
  /** Upper bound accepted for relation graph depth (default: 10) */
  maxGraphDepth: number;
  /** Depth used when the caller gives none (default: 3) */
  defaultGraphDepth: number;
  /** Maximum number of query suggestions (default: 10) */
  suggestionLimit: number;
  /** Default cap on related files (default: 20) */
  relatedFilesLimit: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3002,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  storage: {
    dataDirName: '.filenexus',
    backups: true,
  },
  query: {
    maxGraphDepth: 10,
    defaultGraphDepth: 3,
    suggestionLimit: 10,
    relatedFilesLimit: 20,
  },
};

/**
 * Fresh copy of the defaults, safe to mutate.
 */
export function createDefaultConfig(): AppConfig {
  return {
    server: { ...DEFAULT_CONFIG.server, cors: { ...DEFAULT_CONFIG.server.cors, origins: [...DEFAULT_CONFIG.server.cors.origins] } },
    storage: { ...DEFAULT_CONFIG.storage },
    query: { ...DEFAULT_CONFIG.query },
  };
}
