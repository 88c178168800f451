/**
 * NexusError: the single error type surfaced by file-nexus operations.
 *
 * Every error carries a stable machine-readable code, an HTTP status used by
 * the REST layer, and a recovery suggestion shown to tool callers.
 */

export type NexusErrorCode =
  | 'FILE_NOT_FOUND'
  | 'INVALID_TAG_FORMAT'
  | 'INVALID_QUERY_SYNTAX'
  | 'RELATION_ALREADY_EXISTS'
  | 'RELATION_NOT_FOUND'
  | 'TAG_NOT_FOUND'
  | 'COMMENT_ALREADY_EXISTS'
  | 'COMMENT_NOT_FOUND'
  | 'INVALID_ARGUMENT'
  | 'PATH_OUTSIDE_PROJECT'
  | 'STORAGE_ERROR'
  | 'SERIALIZATION_ERROR'
  | 'FILESYSTEM_ERROR'
  | 'CONFIG_ERROR'
  | 'INTERNAL_ERROR';

interface ErrorKind {
  statusCode: number;
  suggestion: string;
}

const ERROR_KINDS: Record<NexusErrorCode, ErrorKind> = {
  FILE_NOT_FOUND: { statusCode: 404, suggestion: 'Check that the file path is correct' },
  INVALID_TAG_FORMAT: { statusCode: 400, suggestion: 'Use type:value format, e.g. category:api' },
  INVALID_QUERY_SYNTAX: {
    statusCode: 400,
    suggestion: 'Check the query syntax: AND, OR, NOT, parentheses and * wildcards are supported',
  },
  RELATION_ALREADY_EXISTS: { statusCode: 409, suggestion: 'Remove the existing relation before adding it again' },
  RELATION_NOT_FOUND: { statusCode: 404, suggestion: 'Add the relation first' },
  TAG_NOT_FOUND: { statusCode: 404, suggestion: 'Add the tag to the file first' },
  COMMENT_ALREADY_EXISTS: { statusCode: 409, suggestion: 'Use update_file_comment to change an existing comment' },
  COMMENT_NOT_FOUND: { statusCode: 404, suggestion: 'Add a comment to the file first' },
  INVALID_ARGUMENT: { statusCode: 400, suggestion: 'Provide a non-empty value of the expected shape' },
  PATH_OUTSIDE_PROJECT: { statusCode: 400, suggestion: 'Use a path inside the project directory' },
  STORAGE_ERROR: { statusCode: 500, suggestion: 'Check file permissions and free disk space' },
  SERIALIZATION_ERROR: { statusCode: 500, suggestion: 'The data file is malformed; check or restore it from the .bak copy' },
  FILESYSTEM_ERROR: { statusCode: 500, suggestion: 'Check filesystem permissions' },
  CONFIG_ERROR: { statusCode: 500, suggestion: 'Check the configuration file format' },
  INTERNAL_ERROR: { statusCode: 500, suggestion: 'Retry the operation' },
};

export class NexusError extends Error {
  readonly code: NexusErrorCode;
  readonly statusCode: number;
  readonly suggestion: string;
  readonly details: Record<string, unknown> | undefined;

  constructor(code: NexusErrorCode, message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'NexusError';
    this.code = code;
    this.statusCode = ERROR_KINDS[code].statusCode;
    this.suggestion = ERROR_KINDS[code].suggestion;
    this.details = details;
  }
}

export function isNexusError(err: unknown): err is NexusError {
  return err instanceof NexusError;
}

// ============================================================================
// Factories
// ============================================================================

export function fileNotFound(path: string): NexusError {
  return new NexusError('FILE_NOT_FOUND', `File not found: ${path}`, { path });
}

export function invalidTagFormat(tag: string): NexusError {
  return new NexusError('INVALID_TAG_FORMAT', `Invalid tag format: "${tag}", expected type:value`, { tag });
}

export function invalidQuerySyntax(message: string, query?: string): NexusError {
  return new NexusError(
    'INVALID_QUERY_SYNTAX',
    `Invalid query syntax: ${message}`,
    query !== undefined ? { query } : undefined,
  );
}

export function relationAlreadyExists(source: string, target: string): NexusError {
  return new NexusError('RELATION_ALREADY_EXISTS', `Relation already exists: ${source} -> ${target}`, { source, target });
}

export function relationNotFound(source: string, target: string): NexusError {
  return new NexusError('RELATION_NOT_FOUND', `Relation not found: ${source} -> ${target}`, { source, target });
}

export function tagNotFound(tag: string, file: string): NexusError {
  return new NexusError('TAG_NOT_FOUND', `Tag ${tag} not found on file ${file}`, { tag, file });
}

export function commentAlreadyExists(file: string): NexusError {
  return new NexusError('COMMENT_ALREADY_EXISTS', `File ${file} already has a comment`, { file });
}

export function commentNotFound(file: string): NexusError {
  return new NexusError('COMMENT_NOT_FOUND', `File ${file} has no comment`, { file });
}

export function invalidArgument(message: string): NexusError {
  return new NexusError('INVALID_ARGUMENT', message);
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function storageError(operation: string, path: string, cause: unknown): NexusError {
  return new NexusError('STORAGE_ERROR', `Storage error during ${operation} of ${path}: ${describeCause(cause)}`, { operation, path }, cause);
}

export function serializationError(operation: string, path: string, cause: unknown): NexusError {
  return new NexusError('SERIALIZATION_ERROR', `Serialization error during ${operation} of ${path}: ${describeCause(cause)}`, { operation, path }, cause);
}

export function fileSystemError(path: string, cause: unknown): NexusError {
  return new NexusError('FILESYSTEM_ERROR', `Filesystem error at ${path}: ${describeCause(cause)}`, { path }, cause);
}

/**
 * Wrap anything thrown into a NexusError, keeping existing NexusErrors as-is.
 */
export function toNexusError(err: unknown, context: string): NexusError {
  if (err instanceof NexusError) {
    return err;
  }
  return new NexusError('INTERNAL_ERROR', `${context}: ${describeCause(err)}`, undefined, err);
}

/**
 * Response body shared by the MCP and HTTP adapters.
 */
export interface ErrorBody {
  error: {
    code: NexusErrorCode;
    message: string;
    suggestion: string;
  };
}

export function formatErrorBody(err: NexusError): ErrorBody {
  return {
    error: {
      code: err.code,
      message: err.message,
      suggestion: err.suggestion,
    },
  };
}
