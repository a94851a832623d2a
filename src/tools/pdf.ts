/**
 * PDF MCP Tools
 *
 * Tools: pdf_clean, pdf_compress, pdf_process
 *
 * Each call validates its input, resolves paths inside the allowed
 * directories and runs one synchronous job. No document state is kept.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/pdf
 */

import fs from 'fs';
import { successResult } from '../server/types.js';
import { createBlankPagePolicy, createCompressor, getConfig } from '../server/state.js';
import { cleanPdf } from '../services/cleaning/cleaner.js';
import { PdfProcessor, compressPdf, reductionPercent } from '../services/pipeline/processor.js';
import { validateInput, PdfCleanInput, PdfCompressInput, PdfProcessInput } from '../utils/validation.js';
import {
  formatResponse,
  handleError,
  resolveInputFile,
  resolveOutputFile,
  type ToolResponse,
  type ToolDefinition,
} from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle pdf_clean - remove blank pages without recompressing
 */
export async function handlePdfClean(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(PdfCleanInput, params);
    const inputPath = resolveInputFile(input.input_path);
    const outputPath = resolveOutputFile(input.output_path, input.overwrite, inputPath);

    const result = await cleanPdf(inputPath, outputPath, { policy: createBlankPagePolicy() });

    return formatResponse(
      successResult({
        output_path: result.outputPath,
        total_pages: result.stats.total,
        removed_pages: result.stats.removed,
        remaining_pages: result.stats.remaining,
        failsafe_applied: result.stats.failsafeApplied,
        removed_page_numbers: result.stats.failsafeApplied
          ? []
          : result.pages.filter((p) => !p.keep).map((p) => p.pageIndex + 1),
        pages: result.pages.map((p) => ({
          page: p.pageIndex + 1,
          keep: p.keep,
          reason: p.reason,
          ...(p.contentBytes !== undefined && { content_bytes: p.contentBytes }),
        })),
        next_steps: [
          { tool: 'pdf_compress', description: 'Recompress the cleaned file with Ghostscript' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle pdf_compress - run Ghostscript on a PDF as is
 */
export async function handlePdfCompress(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(PdfCompressInput, params);
    const inputPath = resolveInputFile(input.input_path);
    const outputPath = resolveOutputFile(input.output_path, input.overwrite, inputPath);
    const quality = input.quality ?? getConfig().defaultQuality;

    const { outcome, outputBytes } = await compressPdf(createCompressor(), inputPath, outputPath, quality);
    const inputBytes = fs.statSync(inputPath).size;

    return formatResponse(
      successResult({
        output_path: outputPath,
        quality: outcome.quality,
        executable: outcome.executable,
        duration_ms: outcome.durationMs,
        input_bytes: inputBytes,
        output_bytes: outputBytes,
        reduction_pct: reductionPercent(inputBytes, outputBytes),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle pdf_process - clean, then compress (unless compress=false)
 */
export async function handlePdfProcess(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(PdfProcessInput, params);
    const inputPath = resolveInputFile(input.input_path);
    const outputPath = resolveOutputFile(input.output_path, input.overwrite, inputPath);
    const config = getConfig();

    const processor = new PdfProcessor({
      policy: createBlankPagePolicy(),
      compressor: createCompressor(),
      defaultQuality: config.defaultQuality,
    });
    const result = await processor.process(inputPath, outputPath, {
      compress: input.compress,
      quality: input.quality,
    });

    return formatResponse(
      successResult({
        output_path: result.outputPath,
        total_pages: result.stats.total,
        removed_pages: result.stats.removed,
        remaining_pages: result.stats.remaining,
        failsafe_applied: result.stats.failsafeApplied,
        compressed: result.compressed,
        quality: result.quality,
        input_bytes: result.inputBytes,
        output_bytes: result.outputBytes,
        reduction_pct: result.reductionPct,
        duration_ms: result.durationMs,
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
 * PDF tools collection for MCP server registration
 */
export const pdfTools: Record<string, ToolDefinition> = {
  pdf_clean: {
    description:
      '[PROCESSING] Remove blank pages from a PDF. Pages with text, images or substantial drawing are always kept, and a document is never emptied. Returns page counts and the reason for every page.',
    inputSchema: PdfCleanInput.shape,
    handler: handlePdfClean,
  },
  pdf_compress: {
    description:
      '[PROCESSING] Recompress a PDF with Ghostscript at a quality profile (screen, ebook, printer). Requires Ghostscript; see pdf_health_check.',
    inputSchema: PdfCompressInput.shape,
    handler: handlePdfCompress,
  },
  pdf_process: {
    description:
      '[PROCESSING] Remove blank pages, then recompress with Ghostscript (compress=false skips compression). Returns page counts, sizes before and after, and the reduction percentage.',
    inputSchema: PdfProcessInput.shape,
    handler: handlePdfProcess,
  },
};
