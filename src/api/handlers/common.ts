/**
 * Shared handler plumbing: input checks and error responses.
 */

import type { FastifyReply } from 'fastify';
import type { z } from 'zod';
import { invalidArgument, toNexusError } from '../../errors/NexusError.js';
import type { ApiError } from '../types.js';

/**
 * Set the status for an error and build its response body.
 */
export function sendError(reply: FastifyReply, err: unknown): ApiError {
  const error = toNexusError(err, 'Request failed');
  if (error.statusCode >= 500) {
    reply.log.error({ err: error }, 'Request failed');
  }
  reply.status(error.statusCode);
  return {
    error: error.code,
    message: error.message,
    suggestion: error.suggestion,
  };
}

export function requireParam(value: string | undefined, name: string): string {
  if (value === undefined || value.trim() === '') {
    throw invalidArgument(`${name} is required`);
  }
  return value;
}

export function optionalInteger(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw invalidArgument(`${name} must be an integer`);
  }
  return n;
}

export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw invalidArgument(`Invalid request body: ${where}${issue?.message ?? 'unexpected shape'}`);
  }
  return result.data;
}
