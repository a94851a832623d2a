/**
 * Shared Tool Registration
 *
 * Registers all MCP tools on a given McpServer instance.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/register-tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolDefinition } from '../tools/shared.js';

import { pdfTools } from '../tools/pdf.js';
import { healthTools } from '../tools/health.js';
import { configTools } from '../tools/config.js';

/** All tool modules in registration order */
export const allToolModules: Record<string, ToolDefinition>[] = [pdfTools, healthTools, configTools];

/**
 * Register all tools on the given MCP server instance.
 *
 * @param server - McpServer instance to register tools on
 * @returns Number of tools registered
 * @throws Error if duplicate tool names are detected
 */
export function registerAllTools(server: McpServer): number {
  const registeredToolNames = new Set<string>();
  let toolCount = 0;

  for (const toolModule of allToolModules) {
    for (const [name, tool] of Object.entries(toolModule)) {
      if (registeredToolNames.has(name)) {
        throw new Error(`Duplicate tool name detected: "${name}". Each tool must have a unique name.`);
      }
      registeredToolNames.add(name);
      server.tool(name, tool.description, tool.inputSchema, tool.handler);
      toolCount++;
    }
  }

  return toolCount;
}
