/**
 * Utility functions for building tool results and rendering them as MCPToolResponse objects
 */

import type { MCPToolResponse, ToolErrorKind, ToolResult } from '../types';

export function okResult(text: string): ToolResult {
  return { ok: true, text };
}

export function errorResult(kind: ToolErrorKind, text: string): ToolResult {
  return { ok: false, kind, text };
}

/**
 * Create a text response for MCP tools
 */
export function createTextResponse(text: string): MCPToolResponse {
  return {
    content: [
      {
        type: 'text',
        text
      }
    ],
    success: true
  };
}

/**
 * Create an error response for MCP tools
 */
export function createErrorResponse(text: string): MCPToolResponse {
  return {
    content: [
      {
        type: 'text',
        text
      }
    ],
    success: false,
    isError: true
  };
}

/**
 * Successes and failures share the same text shape; only the flags differ.
 */
export function renderToolResult(result: ToolResult): MCPToolResponse {
  return result.ok ? createTextResponse(result.text) : createErrorResponse(result.text);
}
