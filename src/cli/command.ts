/**
 * pdf-sweep command line
 *
 *   pdf-sweep <input> <output> [--compress] [--quality screen|ebook|printer|prepress]
 *
 * Removes blank pages and optionally recompresses, then prints a short
 * report. Exit codes: 0 success, 1 failure, 2 usage error.
 *
 * @module cli/command
 */

import fs from 'fs';
import { parseArgs } from 'util';
import { ConservativeBlankPagePolicy, BLANK_CONTENT_THRESHOLD_BYTES } from '../services/cleaning/classifier.js';
import { GhostscriptCompressor, type PdfCompressor } from '../services/compression/compressor.js';
import { CleaningError } from '../services/cleaning/errors.js';
import { CompressionError } from '../services/compression/errors.js';
import { PdfProcessor } from '../services/pipeline/processor.js';
import { DEFAULT_QUALITY_PROFILE, QUALITY_PROFILES, isQualityProfile } from '../models/compression.js';
import type { ProcessResult } from '../models/processing.js';
import { readEnvConfig } from '../server/startup.js';
import { MCPError } from '../server/errors.js';

// ─── Terminal formatting ─────────────────────────────────────────────────────

const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;
const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

export const USAGE = `Usage: pdf-sweep <input.pdf> <output.pdf> [--compress] [--quality ${QUALITY_PROFILES.join('|')}]

Removes blank pages from <input.pdf> and writes the result to <output.pdf>.

Options:
  -c, --compress         Recompress with Ghostscript after cleaning
  -q, --quality <name>   Ghostscript profile (default: PDF_SWEEP_DEFAULT_QUALITY or ${DEFAULT_QUALITY_PROFILE})
  -h, --help             Show this help`;

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  /** Wrap output in ANSI colors (default: false) */
  color?: boolean;
}

export interface CliDeps {
  /** Compressor override; default is Ghostscript configured from env */
  compressor?: PdfCompressor;
  env?: NodeJS.ProcessEnv;
}

const toKb = (bytes: number): string => `${(bytes / 1024).toFixed(1)} KB`;

/**
 * Human report printed after a successful run
 */
export function formatReport(result: ProcessResult): string[] {
  const lines = [
    `Total pages:   ${result.stats.total}`,
    `Removed pages: ${result.stats.removed}`,
  ];
  if (result.stats.failsafeApplied) {
    lines.push('               (every page looked blank; all pages kept)');
  }
  if (result.quality !== null) {
    lines.push(`Quality:       ${result.quality}`);
  }
  lines.push(`Size before:   ${toKb(result.inputBytes)}`);
  lines.push(`Size after:    ${toKb(result.outputBytes)} (-${result.reductionPct}%)`);
  lines.push(`Output:        ${result.outputPath}`);
  return lines;
}

/**
 * Run the command line. Never calls process.exit; returns the exit code.
 */
export async function runCli(argv: string[], io: CliIO, deps: CliDeps = {}): Promise<number> {
  const paint = (fn: (s: string) => string, s: string): string => (io.color ? fn(s) : s);

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.err(`${paint(red, 'Error:')} ${error instanceof Error ? error.message : String(error)}`);
    io.err(USAGE);
    return 2;
  }

  if (parsed.values.help) {
    io.out(USAGE);
    return 0;
  }

  const [inputPath, outputPath] = parsed.positionals;
  if (!inputPath || !outputPath || parsed.positionals.length > 2) {
    io.err(USAGE);
    return 2;
  }

  const requested = parsed.values.quality;
  if (requested !== undefined && !isQualityProfile(requested)) {
    io.err(`${paint(red, 'Error:')} unknown quality "${requested}" (expected ${QUALITY_PROFILES.join(', ')})`);
    return 2;
  }

  if (!fs.existsSync(inputPath)) {
    io.err(`${paint(red, 'Error:')} input file not found: ${inputPath}`);
    return 1;
  }

  try {
    const envConfig = readEnvConfig(deps.env ?? process.env);
    const quality =
      requested !== undefined && isQualityProfile(requested)
        ? requested
        : (envConfig.defaultQuality ?? DEFAULT_QUALITY_PROFILE);
    const processor = new PdfProcessor({
      policy: new ConservativeBlankPagePolicy({
        thresholdBytes: envConfig.blankThresholdBytes ?? BLANK_CONTENT_THRESHOLD_BYTES,
      }),
      compressor:
        deps.compressor ??
        new GhostscriptCompressor({
          executablePath: envConfig.ghostscriptPath ?? null,
          ...(envConfig.ghostscriptTimeoutMs !== undefined && {
            timeoutMs: envConfig.ghostscriptTimeoutMs,
          }),
        }),
    });

    const result = await processor.process(inputPath, outputPath, {
      compress: parsed.values.compress ?? false,
      quality,
    });

    io.out(paint(bold, paint(green, 'Done')));
    for (const line of formatReport(result)) {
      io.out(line);
    }
    io.out(paint(dim, `(${result.durationMs} ms)`));
    return 0;
  } catch (error) {
    io.err(describeFailure(error, paint));
    return 1;
  }
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      compress: { type: 'boolean', short: 'c' },
      quality: { type: 'string', short: 'q' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

function describeFailure(error: unknown, paint: (fn: (s: string) => string, s: string) => string): string {
  if (error instanceof CleaningError || error instanceof CompressionError || error instanceof MCPError) {
    return `${paint(red, `Error [${error.category}]:`)} ${error.message}`;
  }
  return `${paint(red, 'Error:')} ${error instanceof Error ? error.message : String(error)}`;
}
