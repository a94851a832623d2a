#!/usr/bin/env node
/**
 * pdf-sweep MCP Server - bin entry point
 *
 * Usage:
 *   npx pdf-sweep-mcp              # via npx
 *   pdf-sweep-mcp                  # after npm install -g
 *   node dist/src/index.js         # direct invocation
 *
 * @module bin
 */

import './index.js';
