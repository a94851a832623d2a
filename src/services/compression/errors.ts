/**
 * Compression Error Classes
 *
 * FAIL-FAST: raised immediately, never retried at this layer.
 * Retrying a deterministic tool failure with the same input and quality
 * cannot change the outcome; retry policy belongs to the caller.
 */

type CompressionErrorCategory = 'TOOL_UNAVAILABLE' | 'TOOL_TIMEOUT' | 'TOOL_EXECUTION_ERROR';

export class CompressionError extends Error {
  constructor(
    message: string,
    public readonly category: CompressionErrorCategory,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'CompressionError';
  }
}

/**
 * No Ghostscript executable could be found. A deployment fault: every request
 * fails the same way until the environment is fixed.
 */
export class ToolUnavailableError extends CompressionError {
  constructor(
    message: string,
    public readonly candidates: readonly string[]
  ) {
    super(message, 'TOOL_UNAVAILABLE', { candidates: [...candidates] });
    this.name = 'ToolUnavailableError';
  }
}

/**
 * Ghostscript ran past the wall-clock limit and was killed.
 * Recoverable: a smaller file or a different quality profile may succeed.
 */
export class ToolTimeoutError extends CompressionError {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message, 'TOOL_TIMEOUT', { timeout_ms: timeoutMs });
    this.name = 'ToolTimeoutError';
  }
}

/**
 * Ghostscript failed: non-zero exit, killed by a signal, could not be
 * started, or exited cleanly without producing output.
 * stdout/stderr are kept verbatim for server-side diagnostics; they are not
 * part of `details` so they only reach clients when explicitly allowed.
 */
export class ToolExecutionError extends CompressionError {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null,
    public readonly stdout: string,
    public readonly stderr: string
  ) {
    super(message, 'TOOL_EXECUTION_ERROR', { exit_code: exitCode, signal });
    this.name = 'ToolExecutionError';
  }
}
