/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results, server configuration, and state.
 *
 * @module server/types
 */

import type { QualityProfile } from '../models/compression.js';
import type { PdfCompressor } from '../services/compression/compressor.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Successful tool result
 */
interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server configuration options
 */
export interface ServerConfig {
  /** Profile used when a tool call names none (default: 'ebook') */
  defaultQuality: QualityProfile;

  /** Trimmed content streams shorter than this are blank (default: 30) */
  blankThresholdBytes: number;

  /** Explicit Ghostscript executable; null probes the search path */
  ghostscriptPath: string | null;

  /** Wall-clock limit for one Ghostscript run (default: 90000) */
  ghostscriptTimeoutMs: number;

  /** Include Ghostscript stdout/stderr in error responses (default: false) */
  exposeToolDiagnostics: boolean;

  /** Directories allowed in addition to home, tmp and cwd */
  allowedDirs: string[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Builds the compressor used by the tools from the current configuration
 */
export type CompressorFactory = (config: ServerConfig) => PdfCompressor;

/**
 * Server state tracking
 */
export interface ServerState {
  /** Server configuration */
  config: ServerConfig;

  /** Compressor construction, replaceable in tests */
  compressorFactory: CompressorFactory;
}
