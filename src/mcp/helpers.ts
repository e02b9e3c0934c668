/**
 * MCP response helpers.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { InvalidInputError } from '../reagent/ReagentCalculator.js';
import { PresetNotFoundError } from '../reagent/PresetCatalog.js';

/**
 * Create a JSON content result.
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
 * Error result for a thrown value. Domain errors keep their own message;
 * anything else is marked as a tool failure.
 */
export function toolErrorResult(err: unknown): CallToolResult {
  if (err instanceof InvalidInputError || err instanceof PresetNotFoundError) {
    return errorResult(err.message);
  }
  return errorResult(`Tool error: ${err instanceof Error ? err.message : String(err)}`);
}
