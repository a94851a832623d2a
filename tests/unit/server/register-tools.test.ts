/**
 * Unit tests for MCP tool registration
 *
 * @module tests/unit/server/register-tools
 */

import { describe, it, expect } from 'vitest';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { allToolModules, registerAllTools } from '../../../src/server/register-tools.js';

describe('registerAllTools', () => {
  it('registers every tool once', () => {
    const server = new McpServer({ name: 'test', version: '0.0.0' });
    expect(registerAllTools(server)).toBe(6);
  });

  it('exposes the expected tool names', () => {
    const names = allToolModules.flatMap((m) => Object.keys(m)).sort();
    expect(names).toEqual([
      'pdf_clean',
      'pdf_compress',
      'pdf_config_get',
      'pdf_config_set',
      'pdf_health_check',
      'pdf_process',
    ]);
  });
});
