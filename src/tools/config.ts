/**
 * Configuration Management MCP Tools
 *
 * Tools: pdf_config_get, pdf_config_set
 *
 * Changes are in memory only and last until the server exits.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/config
 */

import { z } from 'zod';
import { getAllowedDirs, getConfig, updateConfig } from '../server/state.js';
import { successResult, type ServerConfig } from '../server/types.js';
import {
  validateInput,
  ConfigGetInput,
  ConfigSetInput,
  ConfigKey,
  QualityProfileSchema,
} from '../utils/validation.js';
import { validationError } from '../server/errors.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

type ConfigKeyName = z.infer<typeof ConfigKey>;
type ConfigValue = string | number | boolean;

// ═══════════════════════════════════════════════════════════════════════════════
// VALUE MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

function readConfigValue(config: ServerConfig, key: ConfigKeyName): ConfigValue | null {
  switch (key) {
    case 'default_quality':
      return config.defaultQuality;
    case 'blank_threshold_bytes':
      return config.blankThresholdBytes;
    case 'ghostscript_path':
      return config.ghostscriptPath;
    case 'ghostscript_timeout_ms':
      return config.ghostscriptTimeoutMs;
    case 'expose_tool_diagnostics':
      return config.exposeToolDiagnostics;
  }
}

/**
 * Validate a value for its key and turn it into a config update
 */
function toConfigUpdate(key: ConfigKeyName, value: ConfigValue): Partial<ServerConfig> {
  switch (key) {
    case 'default_quality': {
      const parsed = QualityProfileSchema.safeParse(value);
      if (!parsed.success)
        throw validationError('default_quality must be "screen", "ebook", "printer", or "prepress"', {
          value,
        });
      return { defaultQuality: parsed.data };
    }
    case 'blank_threshold_bytes':
      if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > 10000)
        throw validationError('blank_threshold_bytes must be an integer between 0 and 10000', {
          value,
        });
      return { blankThresholdBytes: value };
    case 'ghostscript_path':
      if (typeof value !== 'string')
        throw validationError('ghostscript_path must be a string ("" to probe PATH)', { value });
      return { ghostscriptPath: value.trim() === '' ? null : value };
    case 'ghostscript_timeout_ms':
      if (typeof value !== 'number' || !Number.isInteger(value) || value < 1000 || value > 3_600_000)
        throw validationError('ghostscript_timeout_ms must be an integer between 1000 and 3600000', {
          value,
        });
      return { ghostscriptTimeoutMs: value };
    case 'expose_tool_diagnostics':
      if (typeof value !== 'boolean')
        throw validationError('expose_tool_diagnostics must be a boolean', { value });
      return { exposeToolDiagnostics: value };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleConfigGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigGetInput, params);
    const config = getConfig();

    const configNextSteps = [{ tool: 'pdf_config_set', description: 'Change a configuration setting' }];

    if (input.key) {
      return formatResponse(
        successResult({
          key: input.key,
          value: readConfigValue(config, input.key),
          next_steps: configNextSteps,
        })
      );
    }

    return formatResponse(
      successResult({
        default_quality: config.defaultQuality,
        blank_threshold_bytes: config.blankThresholdBytes,
        ghostscript_path: config.ghostscriptPath,
        ghostscript_timeout_ms: config.ghostscriptTimeoutMs,
        expose_tool_diagnostics: config.exposeToolDiagnostics,

        // Read-only (PDF_SWEEP_ALLOWED_DIRS)
        allowed_dirs: getAllowedDirs(),

        next_steps: configNextSteps,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleConfigSet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigSetInput, params);

    updateConfig(toConfigUpdate(input.key, input.value));
    console.error(`[Config] ${input.key} updated`);

    return formatResponse(
      successResult({
        key: input.key,
        value: readConfigValue(getConfig(), input.key),
        updated: true,
        next_steps: [
          { tool: 'pdf_config_get', description: 'Verify the updated configuration' },
          { tool: 'pdf_health_check', description: 'Check Ghostscript with the new settings' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Config tools collection for MCP server registration
 */
export const configTools: Record<string, ToolDefinition> = {
  pdf_config_get: {
    description:
      '[STATUS] View the current configuration (default quality, blank threshold, Ghostscript path and timeout). Returns all or one specific key.',
    inputSchema: {
      key: ConfigKey.optional().describe('Specific config key to retrieve'),
    },
    handler: handleConfigGet,
  },
  pdf_config_set: {
    description:
      '[SETUP] Change a configuration setting for the running server. Returns the updated value.',
    inputSchema: {
      key: ConfigKey.describe('Configuration key to update'),
      value: z.union([z.string(), z.number(), z.boolean()]).describe('New value'),
    },
    handler: handleConfigSet,
  },
};
