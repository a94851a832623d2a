/**
 * Health Check MCP Tools
 *
 * Tools: pdf_health_check
 *
 * Reports whether Ghostscript can be found and run, and the configuration
 * the PDF tools will use.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/health
 */

import { z } from 'zod';
import { getAllowedDirs, getConfig, ghostscriptOptions } from '../server/state.js';
import { successResult } from '../server/types.js';
import { GhostscriptCompressor } from '../services/compression/compressor.js';
import { CompressionError } from '../services/compression/errors.js';
import { validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const HealthCheckInput = z.object({});

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

interface GhostscriptStatus {
  available: boolean;
  executable: string | null;
  version: string | null;
  error: { category: string; message: string } | null;
}

async function probeGhostscript(compressor: GhostscriptCompressor): Promise<GhostscriptStatus> {
  let executable: string;
  try {
    executable = compressor.resolveExecutable();
  } catch (error) {
    if (!(error instanceof CompressionError)) throw error;
    return {
      available: false,
      executable: null,
      version: null,
      error: { category: error.category, message: error.message },
    };
  }

  try {
    const version = await compressor.version();
    return { available: true, executable, version, error: null };
  } catch (error) {
    if (!(error instanceof CompressionError)) throw error;
    return {
      available: false,
      executable,
      version: null,
      error: { category: error.category, message: error.message },
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLER: pdf_health_check
// ═══════════════════════════════════════════════════════════════════════════════

async function handleHealthCheck(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(HealthCheckInput, params);
    const config = getConfig();
    const ghostscript = await probeGhostscript(new GhostscriptCompressor(ghostscriptOptions(config)));

    const nextSteps = ghostscript.available
      ? [{ tool: 'pdf_process', description: 'Clean and compress a PDF' }]
      : [
          { tool: 'pdf_clean', description: 'Blank-page removal works without Ghostscript' },
          { tool: 'pdf_config_set', description: 'Point ghostscript_path at an installed executable' },
        ];

    return formatResponse(
      successResult({
        healthy: ghostscript.available,
        ghostscript,
        config: {
          default_quality: config.defaultQuality,
          blank_threshold_bytes: config.blankThresholdBytes,
          ghostscript_timeout_ms: config.ghostscriptTimeoutMs,
          expose_tool_diagnostics: config.exposeToolDiagnostics,
          allowed_dirs: getAllowedDirs(),
        },
        next_steps: nextSteps,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const healthTools: Record<string, ToolDefinition> = {
  pdf_health_check: {
    description:
      '[STATUS] Check that Ghostscript is installed and runnable; returns its path and version plus the active configuration.',
    inputSchema: HealthCheckInput.shape,
    handler: handleHealthCheck,
  },
};
