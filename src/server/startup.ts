/**
 * Shared Startup Validation
 *
 * Validates startup dependencies and applies environment-driven config.
 * Used by both src/index.ts (stdio MCP server) and src/cli.ts.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { getConfig, ghostscriptOptions, updateConfig } from './state.js';
import { configurationError } from './errors.js';
import { EnvConfigSchema } from '../utils/validation.js';
import { GhostscriptCompressor } from '../services/compression/compressor.js';
import type { ServerConfig } from './types.js';

/**
 * Parse PDF_SWEEP_* variables into config overrides.
 *
 * @throws MCPError CONFIGURATION_ERROR when a variable is set but invalid
 */
export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): Partial<ServerConfig> {
  const result = EnvConfigSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw configurationError(`Invalid environment configuration: ${problems.join('; ')}`, {
      problems,
    });
  }

  const parsed = result.data;
  const overrides: Partial<ServerConfig> = {};
  if (parsed.PDF_SWEEP_GHOSTSCRIPT_PATH !== undefined) {
    overrides.ghostscriptPath = parsed.PDF_SWEEP_GHOSTSCRIPT_PATH;
  }
  if (parsed.PDF_SWEEP_GHOSTSCRIPT_TIMEOUT_MS !== undefined) {
    overrides.ghostscriptTimeoutMs = parsed.PDF_SWEEP_GHOSTSCRIPT_TIMEOUT_MS;
  }
  if (parsed.PDF_SWEEP_DEFAULT_QUALITY !== undefined) {
    overrides.defaultQuality = parsed.PDF_SWEEP_DEFAULT_QUALITY;
  }
  if (parsed.PDF_SWEEP_BLANK_THRESHOLD !== undefined) {
    overrides.blankThresholdBytes = parsed.PDF_SWEEP_BLANK_THRESHOLD;
  }
  if (parsed.PDF_SWEEP_EXPOSE_TOOL_DIAGNOSTICS !== undefined) {
    overrides.exposeToolDiagnostics = parsed.PDF_SWEEP_EXPOSE_TOOL_DIAGNOSTICS;
  }
  if (parsed.PDF_SWEEP_ALLOWED_DIRS !== undefined) {
    overrides.allowedDirs = parsed.PDF_SWEEP_ALLOWED_DIRS;
  }
  return overrides;
}

/**
 * Validate startup dependencies and apply environment-driven config overrides.
 * Warnings only: a missing Ghostscript disables compression, not cleaning.
 *
 * @returns The startup warnings that were logged
 */
export function validateStartupDependencies(env: NodeJS.ProcessEnv = process.env): string[] {
  const overrides = readEnvConfig(env);
  updateConfig(overrides);
  for (const key of Object.keys(overrides)) {
    console.error(`[Config] ${key} set from environment`);
  }

  const warnings: string[] = [];
  const compressor = new GhostscriptCompressor(ghostscriptOptions(getConfig()));
  if (!compressor.isAvailable()) {
    warnings.push(
      'Ghostscript was not found. pdf_compress and pdf_process will fail until it is installed ' +
        'or PDF_SWEEP_GHOSTSCRIPT_PATH points at it. pdf_clean is unaffected.'
    );
  }

  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  return warnings;
}
