/**
 * MCP response helpers.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { formatErrorBody, toNexusError } from '../errors/NexusError.js';

/**
 * Create a JSON content result.
 */
export function jsonResult(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

/**
 * Create an error result carrying `{ error: { code, message, suggestion } }`.
 */
export function errorResult(err: unknown): CallToolResult {
  const body = formatErrorBody(toNexusError(err, 'Tool error'));
  return { content: [{ type: 'text', text: JSON.stringify(body, null, 2) }], isError: true };
}

/**
 * Run a tool body, turning its value into a JSON result and anything thrown
 * into an error result.
 */
export async function runTool(body: () => Promise<unknown> | unknown): Promise<CallToolResult> {
  try {
    return jsonResult(await body());
  } catch (err) {
    return errorResult(err);
  }
}
