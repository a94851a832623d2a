/**
 * MCP Server Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * NO graceful degradation, NO fallbacks.
 *
 * @module server/errors
 */

import { CleaningError } from '../services/cleaning/errors.js';
import { CompressionError, ToolExecutionError } from '../services/compression/errors.js';
import { ValidationError } from '../utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 * Each category maps to specific failure modes for debugging
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // PDF errors
  | 'PDF_STRUCTURE_ERROR'

  // Compressor errors
  | 'TOOL_UNAVAILABLE'
  | 'TOOL_TIMEOUT'
  | 'TOOL_EXECUTION_ERROR'

  // File system errors
  | 'PATH_NOT_FOUND'
  | 'PATH_NOT_DIRECTORY'
  | 'PATH_ALREADY_EXISTS'
  | 'PERMISSION_DENIED'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

/**
 * Filesystem error codes surfaced as their own categories
 */
const ERRNO_TO_CATEGORY: Record<string, ErrorCategory> = {
  ENOENT: 'PATH_NOT_FOUND',
  ENOTDIR: 'PATH_NOT_DIRECTORY',
  EEXIST: 'PATH_ALREADY_EXISTS',
  EACCES: 'PERMISSION_DENIED',
  EPERM: 'PERMISSION_DENIED',
};

export interface FromUnknownOptions {
  /** Category when nothing more specific applies (default: INTERNAL_ERROR) */
  defaultCategory?: ErrorCategory;
  /** Attach subprocess stdout/stderr to details (default: false) */
  includeToolOutput?: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 *
 * FAIL FAST: Thrown immediately when any error condition is detected.
 * Provides category, message, and optional details for debugging.
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   *
   * Service errors carry their own category. Subprocess output only crosses
   * into the details when includeToolOutput is set.
   */
  static fromUnknown(error: unknown, options: FromUnknownOptions = {}): MCPError {
    const defaultCategory = options.defaultCategory ?? 'INTERNAL_ERROR';

    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof ValidationError) {
      return new MCPError('VALIDATION_ERROR', error.message, { originalName: error.name });
    }

    if (error instanceof CleaningError) {
      return new MCPError(error.category, error.message, {
        originalName: error.name,
        ...(error.filePath && { filePath: error.filePath }),
      });
    }

    if (error instanceof CompressionError) {
      const toolOutput =
        options.includeToolOutput && error instanceof ToolExecutionError
          ? { stdout: error.stdout, stderr: error.stderr }
          : {};
      return new MCPError(error.category, error.message, {
        originalName: error.name,
        errorDetails: error.details,
        ...toolOutput,
      });
    }

    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      const category = (code && ERRNO_TO_CATEGORY[code]) || defaultCategory;
      return new MCPError(category, error.message, {
        originalName: error.name,
        ...(code && { errorCode: code }),
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for AI agents to self-correct after errors.
 * Every ErrorCategory maps to a suggested tool and human-readable hint.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'pdf_config_get', hint: 'Check parameter types and required fields' },
  PDF_STRUCTURE_ERROR: {
    tool: 'pdf_clean',
    hint: 'The file is not a readable PDF (corrupt or encrypted); supply an unencrypted PDF',
  },
  TOOL_UNAVAILABLE: {
    tool: 'pdf_health_check',
    hint: 'Install Ghostscript or set ghostscript_path via pdf_config_set; pdf_clean still works without it',
  },
  TOOL_TIMEOUT: {
    tool: 'pdf_process',
    hint: "Retry with quality 'screen', a smaller file, or a larger ghostscript_timeout_ms",
  },
  TOOL_EXECUTION_ERROR: {
    tool: 'pdf_health_check',
    hint: 'Ghostscript rejected the file; check the server log for its output',
  },
  PATH_NOT_FOUND: { tool: 'pdf_config_get', hint: 'Verify the file path exists on the filesystem' },
  PATH_NOT_DIRECTORY: {
    tool: 'pdf_config_get',
    hint: 'The parent of output_path must be an existing directory',
  },
  PATH_ALREADY_EXISTS: {
    tool: 'pdf_process',
    hint: 'Choose another output_path or pass overwrite: true',
  },
  PERMISSION_DENIED: {
    tool: 'pdf_config_get',
    hint: 'Check filesystem permissions and allowed_dirs',
  },
  CONFIGURATION_ERROR: {
    tool: 'pdf_config_get',
    hint: 'Check PDF_SWEEP_* environment variables and current config',
  },
  INTERNAL_ERROR: { tool: 'pdf_health_check', hint: 'Run pdf_health_check for diagnostics' },
};

/**
 * Get recovery hint for an error category.
 */
export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 * ALWAYS includes category, message, recovery hint, and optional details.
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

/**
 * Create configuration error for bad environment variables or config values
 */
export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}

export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, {
    path,
  });
}

export function pathNotDirectoryError(path: string): MCPError {
  return new MCPError('PATH_NOT_DIRECTORY', `Path is not a directory: ${path}`, {
    path,
  });
}

/**
 * Create error for an output file that would be overwritten
 */
export function pathAlreadyExistsError(path: string): MCPError {
  return new MCPError(
    'PATH_ALREADY_EXISTS',
    `Output file already exists: ${path}. Pass overwrite: true to replace it.`,
    { path }
  );
}
