/**
 * Shared Tool Utilities
 *
 * Common types, formatters, and error handlers used across all tool modules.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import {
  MCPError,
  formatErrorResponse,
  pathAlreadyExistsError,
  pathNotDirectoryError,
  pathNotFoundError,
} from '../server/errors.js';
import { getAllowedDirs, getConfig } from '../server/state.js';
import { sanitizePath } from '../utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

/** Tool handler function signature */
type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

/** Tool definition with description, schema, and handler */
export interface ToolDefinition {
  description: string;
  inputSchema: z.ZodRawShape;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format tool result as MCP content response.
 */
export function formatResponse(result: unknown): ToolResponse {
  return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
}

/**
 * Handle errors uniformly - FAIL FAST
 *
 * Ghostscript output is attached only when expose_tool_diagnostics is on;
 * it is always in the server log.
 */
export function handleError(error: unknown): ToolResponse {
  const mcpError = MCPError.fromUnknown(error, {
    includeToolOutput: getConfig().exposeToolDiagnostics,
  });
  console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
  return {
    content: [{ type: 'text', text: JSON.stringify(formatErrorResponse(mcpError), null, 2) }],
    isError: true,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PATH CHECKS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Resolve an input path inside the allowed directories and require a regular file.
 */
export function resolveInputFile(inputPath: string): string {
  const resolved = sanitizePath(inputPath, getAllowedDirs());
  let stats: fs.Stats;
  try {
    stats = fs.statSync(resolved);
  } catch (error) {
    const fsError = error as NodeJS.ErrnoException;
    if (fsError.code === 'ENOENT') throw pathNotFoundError(resolved);
    throw error;
  }
  if (!stats.isFile()) {
    throw new MCPError('VALIDATION_ERROR', `Input is not a regular file: ${resolved}`, {
      path: resolved,
    });
  }
  return resolved;
}

/**
 * Resolve an output path inside the allowed directories. Its parent must be
 * an existing directory and the file itself must not exist unless overwrite
 * is set.
 */
export function resolveOutputFile(outputPath: string, overwrite: boolean, inputPath: string): string {
  const resolved = sanitizePath(outputPath, getAllowedDirs());
  if (resolved === inputPath) {
    throw new MCPError('VALIDATION_ERROR', 'output_path must differ from input_path', {
      path: resolved,
    });
  }

  const parent = path.dirname(resolved);
  if (!fs.existsSync(parent)) {
    throw pathNotFoundError(parent);
  }
  if (!fs.statSync(parent).isDirectory()) {
    throw pathNotDirectoryError(parent);
  }
  if (!overwrite && fs.existsSync(resolved)) {
    throw pathAlreadyExistsError(resolved);
  }
  return resolved;
}
