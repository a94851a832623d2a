/**
 * pdf-sweep - Library entry point
 *
 * Blank-page removal, Ghostscript recompression and the combined pipeline,
 * usable without the MCP server. Unlike the MCP tools, every quality
 * profile (including prepress) is accepted here.
 *
 * @module lib
 */

export * from './models/index.js';

export {
  BLANK_CONTENT_THRESHOLD_BYTES,
  ConservativeBlankPagePolicy,
  type BlankPagePolicy,
  type ConservativePolicyOptions,
} from './services/cleaning/classifier.js';
export { cleanPdf, type CleanOptions } from './services/cleaning/cleaner.js';
export { CleaningError, StructuralReadError } from './services/cleaning/errors.js';

export {
  DEFAULT_GHOSTSCRIPT_TIMEOUT_MS,
  GhostscriptCompressor,
  type GhostscriptConfig,
  type PdfCompressor,
} from './services/compression/compressor.js';
export {
  CompressionError,
  ToolExecutionError,
  ToolTimeoutError,
  ToolUnavailableError,
} from './services/compression/errors.js';

export { PdfProcessor, compressPdf, processPdf, type ProcessorConfig } from './services/pipeline/processor.js';
