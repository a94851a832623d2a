/**
 * PDF Processing Orchestrator
 *
 * Complete pipeline: Input -> Clean -> Compress -> Verify output -> Copy to destination
 * FAIL-FAST: no fallbacks, no retries; errors propagate to the caller.
 *
 * Every run works inside its own temp directory, removed when the run ends
 * whatever the outcome, so concurrent runs never share files.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module services/pipeline/processor
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { cleanPdf } from '../cleaning/cleaner.js';
import { ConservativeBlankPagePolicy, type BlankPagePolicy } from '../cleaning/classifier.js';
import { GhostscriptCompressor, type PdfCompressor } from '../compression/compressor.js';
import { ToolExecutionError } from '../compression/errors.js';
import { DEFAULT_QUALITY_PROFILE, type CompressionOutcome, type QualityProfile } from '../../models/compression.js';
import type { ProcessOptions, ProcessResult } from '../../models/processing.js';

export interface ProcessorConfig {
  /** Classification strategy for the cleaning stage */
  policy?: BlankPagePolicy;
  /** Compression backend (default: GhostscriptCompressor with default config) */
  compressor?: PdfCompressor;
  /** Profile used when a call does not name one (default: 'ebook') */
  defaultQuality?: QualityProfile;
  /** Parent of the per-run temp directories (default: os.tmpdir()) */
  tempRoot?: string;
}

/** Prefix of per-run temp directories */
export const TEMP_DIR_PREFIX = 'pdf-sweep-';

/**
 * Size reduction in percent, one decimal, clamped at zero
 */
export function reductionPercent(inputBytes: number, outputBytes: number): number {
  if (inputBytes === 0) return 0;
  const pct = Math.max(0, (1 - outputBytes / inputBytes) * 100);
  return Math.round(pct * 10) / 10;
}

/**
 * Confirm a compressed file exists and is non-empty.
 * A zero exit status alone does not prove Ghostscript wrote anything.
 *
 * @throws ToolExecutionError when the file is missing or empty
 */
export async function verifyCompressedOutput(
  filePath: string,
  outcome: CompressionOutcome
): Promise<number> {
  let size: number;
  try {
    size = (await fs.promises.stat(filePath)).size;
  } catch (error) {
    const fsError = error as NodeJS.ErrnoException;
    if (fsError.code !== 'ENOENT') throw error;
    throw new ToolExecutionError(
      `Ghostscript exited successfully but wrote no output file: ${filePath}`,
      0,
      null,
      outcome.stdout,
      outcome.stderr
    );
  }
  if (size === 0) {
    throw new ToolExecutionError(
      `Ghostscript exited successfully but the output file is empty: ${filePath}`,
      0,
      null,
      outcome.stdout,
      outcome.stderr
    );
  }
  return size;
}

/**
 * Compress a PDF into a private temp directory and copy the result to
 * outputPath only once it has been verified. A failed or timed-out run
 * leaves nothing at outputPath.
 *
 * @returns The compressor outcome and the size of the written file
 */
export async function compressPdf(
  compressor: PdfCompressor,
  inputPath: string,
  outputPath: string,
  quality: QualityProfile,
  tempRoot: string = os.tmpdir()
): Promise<{ outcome: CompressionOutcome; outputBytes: number }> {
  const workDir = path.join(tempRoot, `${TEMP_DIR_PREFIX}${uuidv4()}`);
  await fs.promises.mkdir(workDir, { recursive: true });

  try {
    const compressedPath = path.join(workDir, 'out.pdf');
    const outcome = await compressor.compress(inputPath, compressedPath, quality);
    const outputBytes = await verifyCompressedOutput(compressedPath, outcome);
    await fs.promises.copyFile(compressedPath, outputPath);
    return { outcome, outputBytes };
  } finally {
    await fs.promises.rm(workDir, { recursive: true, force: true });
  }
}

export class PdfProcessor {
  private readonly policy: BlankPagePolicy;
  private readonly compressor: PdfCompressor;
  private readonly defaultQuality: QualityProfile;
  private readonly tempRoot: string;

  constructor(config: ProcessorConfig = {}) {
    this.policy = config.policy ?? new ConservativeBlankPagePolicy();
    this.compressor = config.compressor ?? new GhostscriptCompressor();
    this.defaultQuality = config.defaultQuality ?? DEFAULT_QUALITY_PROFILE;
    this.tempRoot = config.tempRoot ?? os.tmpdir();
  }

  /**
   * Clean a PDF and (by default) recompress it.
   *
   * Pipeline:
   * 1. Verify the input is a regular file
   * 2. Create a private temp directory
   * 3. Remove blank pages into <tmp>/clean.pdf
   * 4. Compress into <tmp>/out.pdf and verify it is non-empty (skipped when compress=false)
   * 5. Copy the final file to outputPath
   * 6. Remove the temp directory
   */
  async process(
    inputPath: string,
    outputPath: string,
    options: ProcessOptions = {}
  ): Promise<ProcessResult> {
    const compress = options.compress ?? true;
    const quality = options.quality ?? this.defaultQuality;
    const startTime = Date.now();
    const jobId = uuidv4();

    const inputStats = await fs.promises.stat(inputPath);
    if (!inputStats.isFile()) {
      throw new Error(`Input is not a regular file: ${inputPath}`);
    }

    const workDir = path.join(this.tempRoot, `${TEMP_DIR_PREFIX}${jobId}`);
    await fs.promises.mkdir(workDir, { recursive: true });

    try {
      const cleanedPath = path.join(workDir, 'clean.pdf');
      const { stats } = await cleanPdf(inputPath, cleanedPath, { policy: this.policy });

      let finalPath = cleanedPath;
      if (compress) {
        const compressedPath = path.join(workDir, 'out.pdf');
        const outcome = await this.compressor.compress(cleanedPath, compressedPath, quality);
        await verifyCompressedOutput(compressedPath, outcome);
        finalPath = compressedPath;
      }

      await fs.promises.copyFile(finalPath, outputPath);
      const outputBytes = (await fs.promises.stat(outputPath)).size;
      const durationMs = Date.now() - startTime;

      console.error(
        `[Pipeline] job=${jobId} pages ${stats.total}->${stats.remaining}, ` +
          `bytes ${inputStats.size}->${outputBytes}${compress ? ` (quality=${quality})` : ''} in ${durationMs}ms`
      );

      return {
        outputPath,
        stats,
        compressed: compress,
        quality: compress ? quality : null,
        inputBytes: inputStats.size,
        outputBytes,
        reductionPct: reductionPercent(inputStats.size, outputBytes),
        durationMs,
      };
    } finally {
      await fs.promises.rm(workDir, { recursive: true, force: true });
    }
  }
}

/**
 * One-shot helper: run the full pipeline with a fresh PdfProcessor
 */
export async function processPdf(
  inputPath: string,
  outputPath: string,
  options: ProcessOptions = {},
  config: ProcessorConfig = {}
): Promise<ProcessResult> {
  return new PdfProcessor(config).process(inputPath, outputPath, options);
}
