/**
 * PDF Cleaner
 *
 * Reads a PDF, classifies every page with a BlankPagePolicy and writes a new
 * PDF containing the kept pages in their original order.
 *
 * Pipeline: read bytes -> parse structure (FAIL on bad input) -> extract text
 * -> classify each page -> failsafe -> copy kept pages -> write output
 *
 * Failsafe: a non-empty document is never emptied. When every page classifies
 * as blank, all decisions are discarded and every page is written unchanged.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module services/cleaning/cleaner
 */

import fs from 'fs';
import { PDFDocument } from 'pdf-lib';
import { ConservativeBlankPagePolicy, type BlankPagePolicy } from './classifier.js';
import { readPageSignals } from './page-signals.js';
import { extractPageTexts } from './text-extractor.js';
import { StructuralReadError } from './errors.js';
import type { CleanResult, CleanStats, PageClassification } from '../../models/cleaning.js';

export interface CleanOptions {
  /** Classification strategy (default: ConservativeBlankPagePolicy with the stock threshold) */
  policy?: BlankPagePolicy;
}

/**
 * Parse PDF bytes into a pdf-lib document.
 *
 * pdf-lib accepts a bare header with no catalog behind it; the page tree is
 * walked here so such input fails as a structural error too.
 *
 * @throws StructuralReadError when the bytes are not a readable PDF
 */
export async function loadSourceDocument(bytes: Uint8Array, filePath: string): Promise<PDFDocument> {
  try {
    const doc = await PDFDocument.load(bytes, { updateMetadata: false });
    doc.getPages();
    return doc;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StructuralReadError(`Cannot read PDF structure of ${filePath}: ${reason}`, filePath, {
      cause: error,
    });
  }
}

/**
 * Classify the pages of an already loaded document.
 * Decisions come back in page order, one per page.
 */
export async function classifyPages(
  source: PDFDocument,
  bytes: Uint8Array,
  policy: BlankPagePolicy
): Promise<PageClassification[]> {
  const pages = source.getPages();
  const texts = await extractPageTexts(bytes, pages.length);
  return pages.map((page, pageIndex) =>
    policy.classify(readPageSignals(page, pageIndex, texts[pageIndex]))
  );
}

/**
 * Select the page indices to write, applying the failsafe.
 */
export function selectPages(decisions: PageClassification[]): {
  indices: number[];
  stats: CleanStats;
} {
  const total = decisions.length;
  const kept = decisions.filter((d) => d.keep).map((d) => d.pageIndex);

  if (total > 0 && kept.length === 0) {
    return {
      indices: decisions.map((d) => d.pageIndex),
      stats: { total, removed: 0, remaining: total, failsafeApplied: true },
    };
  }

  return {
    indices: kept,
    stats: { total, removed: total - kept.length, remaining: kept.length, failsafeApplied: false },
  };
}

/**
 * Remove probably-blank pages from a PDF.
 *
 * @param inputPath - Readable PDF file; never modified
 * @param outputPath - Destination of the cleaned PDF (overwritten)
 * @throws StructuralReadError if the input cannot be parsed as a PDF
 */
export async function cleanPdf(
  inputPath: string,
  outputPath: string,
  options: CleanOptions = {}
): Promise<CleanResult> {
  const policy = options.policy ?? new ConservativeBlankPagePolicy();

  const bytes = await fs.promises.readFile(inputPath);
  const source = await loadSourceDocument(bytes, inputPath);

  const decisions = await classifyPages(source, bytes, policy);
  const { indices, stats } = selectPages(decisions);

  if (stats.failsafeApplied) {
    console.error(
      `[Cleaner] All ${stats.total} page(s) of ${inputPath} classified as blank; failsafe keeps every page`
    );
  }

  const output = await PDFDocument.create({ updateMetadata: false });
  const copied = await output.copyPages(source, indices);
  for (const page of copied) {
    output.addPage(page);
  }
  const outBytes = await output.save({ addDefaultPage: false });
  await fs.promises.writeFile(outputPath, outBytes);

  console.error(
    `[Cleaner] ${inputPath}: total=${stats.total} removed=${stats.removed} remaining=${stats.remaining} (policy=${policy.name})`
  );

  return { stats, pages: decisions, outputPath };
}
