/**
 * Ghostscript Compressor
 *
 * Recompresses a PDF by running Ghostscript's pdfwrite device as a
 * subprocess with a fixed argument vector and a hard wall-clock limit.
 *
 * 1. Resolve the executable (configured path, else probe the search path)
 * 2. Spawn directly, no shell: arguments are never interpolated
 * 3. Kill on timeout: SIGTERM, then SIGKILL after a grace period
 * 4. Non-zero exit -> ToolExecutionError with stdout/stderr verbatim
 *
 * A zero exit resolves without inspecting the output file; confirming it
 * exists and is non-empty is the caller's job.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module services/compression/compressor
 */

import { spawn } from 'child_process';
import type { Readable } from 'stream';
import { GHOSTSCRIPT_CANDIDATES, findExecutable, isExecutableFile } from './locator.js';
import { ToolExecutionError, ToolTimeoutError, ToolUnavailableError } from './errors.js';
import type { CompressionOutcome, QualityProfile } from '../../models/compression.js';

/**
 * The slice of ChildProcess the compressor relies on
 */
export interface SpawnedProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'error', listener: (err: Error) => void): this;
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type SpawnFunction = (command: string, args: readonly string[]) => SpawnedProcess;

/**
 * Anything that can turn one PDF into a recompressed PDF
 */
export interface PdfCompressor {
  compress(inputPath: string, outputPath: string, quality: QualityProfile): Promise<CompressionOutcome>;
}

export interface GhostscriptConfig {
  /** Explicit executable; when set the search path is not probed */
  executablePath: string | null;
  /** Names probed on the search path, in order */
  candidates: readonly string[];
  /** Wall-clock limit for one run (default: 90000) */
  timeoutMs: number;
  /** Delay between SIGTERM and SIGKILL after a timeout (default: 5000) */
  killGraceMs: number;
  /** Value for -dCompatibilityLevel (default: '1.4') */
  compatibilityLevel: string;
  /** Search path override, mainly for tests */
  pathEnv?: string;
  /** Process launcher (default: child_process.spawn without a shell) */
  spawn: SpawnFunction;
}

/** What a finished process left behind */
type ProcessOutput = Omit<CompressionOutcome, 'quality'>;

export const DEFAULT_GHOSTSCRIPT_TIMEOUT_MS = 90_000;

const defaultSpawn: SpawnFunction = (command, args) =>
  spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true });

const DEFAULT_CONFIG: GhostscriptConfig = {
  executablePath: null,
  candidates: GHOSTSCRIPT_CANDIDATES,
  timeoutMs: DEFAULT_GHOSTSCRIPT_TIMEOUT_MS,
  killGraceMs: 5000,
  compatibilityLevel: '1.4',
  spawn: defaultSpawn,
};

/**
 * Argument vector for one pdfwrite run. Order matters to Ghostscript only in
 * that the input file comes last.
 *
 * Ghostscript reads `%` in OutputFile as a page-number template; it is
 * doubled so the path is taken literally.
 */
export function buildGhostscriptArgs(
  inputPath: string,
  outputPath: string,
  quality: QualityProfile,
  compatibilityLevel: string = DEFAULT_CONFIG.compatibilityLevel
): string[] {
  return [
    '-sDEVICE=pdfwrite',
    `-dCompatibilityLevel=${compatibilityLevel}`,
    `-dPDFSETTINGS=/${quality}`,
    '-dNOPAUSE',
    '-dQUIET',
    '-dBATCH',
    `-sOutputFile=${outputPath.replace(/%/g, '%%')}`,
    inputPath,
  ];
}

export class GhostscriptCompressor implements PdfCompressor {
  private readonly config: GhostscriptConfig;

  constructor(config: Partial<GhostscriptConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Resolve the executable without spawning anything.
   * @throws ToolUnavailableError when nothing usable is found
   */
  resolveExecutable(): string {
    const { executablePath, candidates, pathEnv } = this.config;

    if (executablePath) {
      if (!isExecutableFile(executablePath)) {
        throw new ToolUnavailableError(
          `Configured Ghostscript executable is missing or not executable: ${executablePath}`,
          [executablePath]
        );
      }
      return executablePath;
    }

    const found = findExecutable(candidates, { pathEnv });
    if (!found) {
      throw new ToolUnavailableError(
        `Ghostscript is not installed or not on PATH (looked for: ${candidates.join(', ')}). ` +
          `Install it (macOS: brew install ghostscript, Debian/Ubuntu: apt-get install ghostscript, ` +
          `Windows: the Ghostscript installer, which provides gswin64c) or set PDF_SWEEP_GHOSTSCRIPT_PATH.`,
        candidates
      );
    }
    return found;
  }

  /**
   * True when an executable can be resolved
   */
  isAvailable(): boolean {
    try {
      this.resolveExecutable();
      return true;
    } catch (error) {
      if (error instanceof ToolUnavailableError) return false;
      throw error;
    }
  }

  async compress(
    inputPath: string,
    outputPath: string,
    quality: QualityProfile
  ): Promise<CompressionOutcome> {
    const executable = this.resolveExecutable();
    const args = buildGhostscriptArgs(inputPath, outputPath, quality, this.config.compatibilityLevel);
    console.error(`[Ghostscript] ${executable} quality=${quality} input=${inputPath}`);
    const output = await this.run(executable, args);
    return { ...output, quality };
  }

  /**
   * Ask Ghostscript for its version (`gs --version`), bounded by the same timeout.
   */
  async version(): Promise<string> {
    const executable = this.resolveExecutable();
    const output = await this.run(executable, ['--version']);
    return output.stdout.trim();
  }

  private run(executable: string, args: string[]): Promise<ProcessOutput> {
    const { timeoutMs, killGraceMs } = this.config;

    return new Promise((resolve, reject) => {
      const startTime = Date.now();
      let proc: SpawnedProcess;
      try {
        proc = this.config.spawn(executable, args);
      } catch (error) {
        reject(
          new ToolExecutionError(
            `Failed to start Ghostscript: ${error instanceof Error ? error.message : String(error)}`,
            null,
            null,
            '',
            ''
          )
        );
        return;
      }

      let stdout = '';
      let stderr = '';
      let settled = false;
      let timeoutTimer: ReturnType<typeof setTimeout> | null = null;
      let sigkillTimer: ReturnType<typeof setTimeout> | null = null;

      const clearTimers = () => {
        if (timeoutTimer) {
          clearTimeout(timeoutTimer);
          timeoutTimer = null;
        }
        if (sigkillTimer) {
          clearTimeout(sigkillTimer);
          sigkillTimer = null;
        }
      };

      proc.stdout?.on('data', (data: Buffer | string) => {
        stdout += data.toString();
      });
      proc.stderr?.on('data', (data: Buffer | string) => {
        stderr += data.toString();
      });

      proc.on('error', (err: NodeJS.ErrnoException) => {
        clearTimers();
        if (settled) return;
        settled = true;
        if (err.code === 'ENOENT') {
          reject(
            new ToolUnavailableError(`Ghostscript executable disappeared: ${executable}`, [executable])
          );
          return;
        }
        reject(
          new ToolExecutionError(`Failed to start Ghostscript: ${err.message}`, null, null, stdout, stderr)
        );
      });

      proc.on('close', (code, signal) => {
        clearTimers();
        if (settled) return;
        settled = true;

        const durationMs = Date.now() - startTime;
        if (code === 0) {
          if (stderr) {
            console.error(`[Ghostscript] stderr: ${stderr}`);
          }
          resolve({ executable, durationMs, stdout, stderr });
          return;
        }

        console.error(
          `[Ghostscript] failed (exit=${code}, signal=${signal}) after ${durationMs}ms\nSTDERR:\n${stderr}\nSTDOUT:\n${stdout}`
        );
        reject(
          new ToolExecutionError(
            signal
              ? `Ghostscript was terminated by ${signal}`
              : `Ghostscript failed to compress (exit code ${code})`,
            code,
            signal,
            stdout,
            stderr
          )
        );
      });

      timeoutTimer = setTimeout(() => {
        timeoutTimer = null;
        if (settled) return;
        settled = true;

        console.error(
          `[Ghostscript] Timed out after ${timeoutMs}ms, sending SIGTERM (pid: ${proc.pid ?? 'unknown'})`
        );
        proc.kill('SIGTERM');
        sigkillTimer = setTimeout(() => {
          sigkillTimer = null;
          if (proc.exitCode === null && proc.signalCode === null) {
            console.error(
              `[Ghostscript] Process did not exit after SIGTERM, sending SIGKILL (pid: ${proc.pid ?? 'unknown'})`
            );
            proc.kill('SIGKILL');
          }
        }, killGraceMs);

        reject(
          new ToolTimeoutError(
            `Ghostscript did not finish within ${timeoutMs}ms; try a smaller file or a different quality profile`,
            timeoutMs
          )
        );
      }, timeoutMs);
    });
  }
}
