/**
 * MCP response helpers.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { SpectrumError } from '../spectrum/errors.js';

/**
 * Create a text content result.
 */
export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

/**
 * Create a JSON content result. NaN and Infinity serialize as null.
 */
export function jsonResult(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

/**
 * Create an error result.
 */
export function errorResult(message: string): CallToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

/**
 * Error result for a thrown value; core errors keep their code.
 */
export function toolError(err: unknown): CallToolResult {
  if (err instanceof SpectrumError) {
    return errorResult(`${err.code}: ${err.message}`);
  }
  return errorResult(`Tool error: ${err instanceof Error ? err.message : String(err)}`);
}
