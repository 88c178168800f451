/**
 * Types for the HTTP API layer.
 *
 * Request bodies are described by zod schemas and checked in the handlers;
 * query strings arrive as optional strings.
 */

import { z } from 'zod';
import type { NexusErrorCode } from '../errors/NexusError.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error code */
  error: NexusErrorCode;
  /** Human-readable message */
  message: string;
  /** What the caller can do about it */
  suggestion: string;
  /** Additional details (optional) */
  details?: unknown;
}

// ============================================================================
// Health
// ============================================================================

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  projects: number;
}

// ============================================================================
// Query strings
// ============================================================================

export interface ProjectQuerystring {
  projectPath?: string;
}

export interface FileQuerystring extends ProjectQuerystring {
  filePath?: string;
}

export interface SearchQuerystring extends ProjectQuerystring {
  q?: string;
}

// ============================================================================
// Bodies
// ============================================================================

const projectPath = z.string();
const filePath = z.string();

export const TagsBodySchema = z.object({
  projectPath,
  filePath,
  tags: z.array(z.string()),
});
export type TagsBody = z.infer<typeof TagsBodySchema>;

export const CommentBodySchema = z.object({
  projectPath,
  filePath,
  comment: z.string(),
});
export type CommentBody = z.infer<typeof CommentBodySchema>;

export const FileBodySchema = z.object({ projectPath, filePath });
export type FileBody = z.infer<typeof FileBodySchema>;

export const ProjectBodySchema = z.object({ projectPath });
export type ProjectBody = z.infer<typeof ProjectBodySchema>;

export const AddRelationBodySchema = z.object({
  projectPath,
  fromFile: filePath,
  toFile: filePath,
  description: z.string(),
});
export type AddRelationBody = z.infer<typeof AddRelationBodySchema>;

export const RemoveRelationBodySchema = z.object({
  projectPath,
  fromFile: filePath,
  toFile: filePath,
});
export type RemoveRelationBody = z.infer<typeof RemoveRelationBodySchema>;

export const BatchFileInfoBodySchema = z.object({
  projectPath,
  filePaths: z.array(filePath),
});
export type BatchFileInfoBody = z.infer<typeof BatchFileInfoBodySchema>;
