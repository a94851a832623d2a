/**
 * MCP Server State Management
 *
 * Holds the runtime configuration and builds the services tool handlers
 * need from it. Nothing about documents is kept between calls.
 *
 * @module server/state
 */

import { ConservativeBlankPagePolicy, BLANK_CONTENT_THRESHOLD_BYTES } from '../services/cleaning/classifier.js';
import {
  DEFAULT_GHOSTSCRIPT_TIMEOUT_MS,
  GhostscriptCompressor,
  type GhostscriptConfig,
  type PdfCompressor,
} from '../services/compression/compressor.js';
import { DEFAULT_QUALITY_PROFILE } from '../models/compression.js';
import { getDefaultAllowedBaseDirs } from '../utils/validation.js';
import type { CompressorFactory, ServerConfig, ServerState } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Default server configuration
 */
const defaultConfig: ServerConfig = {
  defaultQuality: DEFAULT_QUALITY_PROFILE,
  blankThresholdBytes: BLANK_CONTENT_THRESHOLD_BYTES,
  ghostscriptPath: null,
  ghostscriptTimeoutMs: DEFAULT_GHOSTSCRIPT_TIMEOUT_MS,
  exposeToolDiagnostics: false,
  allowedDirs: [],
};

/**
 * Ghostscript settings derived from the server configuration
 */
export function ghostscriptOptions(config: ServerConfig): Partial<GhostscriptConfig> {
  return {
    executablePath: config.ghostscriptPath,
    timeoutMs: config.ghostscriptTimeoutMs,
  };
}

const defaultCompressorFactory: CompressorFactory = (config) =>
  new GhostscriptCompressor(ghostscriptOptions(config));

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Global server state
 */
export const state: ServerState = {
  config: { ...defaultConfig, allowedDirs: [] },
  compressorFactory: defaultCompressorFactory,
};

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Get current configuration (copy)
 */
export function getConfig(): ServerConfig {
  return { ...state.config, allowedDirs: [...state.config.allowedDirs] };
}

/**
 * Update configuration
 */
export function updateConfig(updates: Partial<ServerConfig>): void {
  state.config = { ...state.config, ...updates };
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  state.config = { ...defaultConfig, allowedDirs: [] };
}

/**
 * Every directory tool paths may resolve into
 */
export function getAllowedDirs(): string[] {
  return getDefaultAllowedBaseDirs(state.config.allowedDirs);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Compressor for the current configuration
 */
export function createCompressor(): PdfCompressor {
  return state.compressorFactory(getConfig());
}

/**
 * Blank-page policy for the current configuration
 */
export function createBlankPagePolicy(): ConservativeBlankPagePolicy {
  return new ConservativeBlankPagePolicy({ thresholdBytes: state.config.blankThresholdBytes });
}

/**
 * Replace compressor construction; pass null to restore Ghostscript
 */
export function setCompressorFactory(factory: CompressorFactory | null): void {
  state.compressorFactory = factory ?? defaultCompressorFactory;
}

/**
 * Reset all state (for testing)
 */
export function resetState(): void {
  resetConfig();
  state.compressorFactory = defaultCompressorFactory;
}
