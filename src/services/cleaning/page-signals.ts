/**
 * Page Signal Readers
 *
 * Reads the structural signals the classifier needs from a pdf-lib page:
 * declared XObject resources and the decoded content-stream payload.
 *
 * Each reader has an explicit fallback (empty name list, skipped stream)
 * for the failures a single malformed page can produce. Nothing here throws
 * for a bad page; document-level failures are raised by the loader.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module services/cleaning/page-signals
 */

import {
  PDFArray,
  PDFContentStream,
  PDFDict,
  PDFName,
  PDFRawStream,
  PDFRef,
  decodePDFRawStream,
  type PDFObject,
  type PDFPage,
} from 'pdf-lib';
import type { PageSignals } from '../../models/cleaning.js';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Names of the XObjects (images, forms) in the page's resource dictionary,
 * including resources inherited from the page tree.
 * Falls back to [] when the resource dictionary is malformed.
 */
export function readXObjectNames(page: PDFPage, pageIndex: number): string[] {
  try {
    const resources = page.node.Resources();
    if (!resources) return [];
    const xObjects = resources.lookupMaybe(PDFName.of('XObject'), PDFDict);
    if (!xObjects) return [];
    return xObjects.keys().map((key) => key.decodeText());
  } catch (error) {
    console.error(
      `[PageSignals] Page ${pageIndex + 1}: unreadable resource dictionary, assuming no XObjects: ${errorMessage(error)}`
    );
    return [];
  }
}

/**
 * Decode a single content stream. Returns null when the stream cannot be
 * decoded (unsupported filter, corrupt data, not a stream at all).
 */
function decodeContentStream(object: PDFObject | undefined): Uint8Array | null {
  if (object instanceof PDFRawStream) {
    return decodePDFRawStream(object).decode();
  }
  if (object instanceof PDFContentStream) {
    return object.getUnencodedContents();
  }
  return null;
}

/**
 * Concatenated, decoded content-stream payload of a page.
 *
 * A page's /Contents is either one stream or an array of streams. A stream
 * that fails to decode is skipped and counted; the rest still contribute.
 */
export function readContentPayload(
  page: PDFPage,
  pageIndex: number
): { content: Uint8Array; skippedStreams: number } {
  let entries: Array<PDFObject | undefined>;
  try {
    const contents = page.node.Contents();
    if (!contents) return { content: new Uint8Array(0), skippedStreams: 0 };
    entries =
      contents instanceof PDFArray
        ? contents
            .asArray()
            .map((entry) => (entry instanceof PDFRef ? page.doc.context.lookup(entry) : entry))
        : [contents];
  } catch (error) {
    console.error(
      `[PageSignals] Page ${pageIndex + 1}: unreadable /Contents entry, treating as empty: ${errorMessage(error)}`
    );
    return { content: new Uint8Array(0), skippedStreams: 1 };
  }

  const parts: Uint8Array[] = [];
  let skippedStreams = 0;

  for (const [streamIndex, entry] of entries.entries()) {
    let decoded: Uint8Array | null;
    try {
      decoded = decodeContentStream(entry);
    } catch (error) {
      console.error(
        `[PageSignals] Page ${pageIndex + 1}: skipping content stream ${streamIndex}: ${errorMessage(error)}`
      );
      decoded = null;
    }
    if (decoded === null) {
      skippedStreams++;
      continue;
    }
    parts.push(decoded);
  }

  return { content: concatBytes(parts), skippedStreams };
}

function concatBytes(parts: Uint8Array[]): Uint8Array {
  if (parts.length === 1) return parts[0];
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Assemble the full signal set for one page. Text comes from the separate
 * text extractor since pdf-lib does not extract text.
 */
export function readPageSignals(page: PDFPage, pageIndex: number, text: string): PageSignals {
  const { content, skippedStreams } = readContentPayload(page, pageIndex);
  return {
    pageIndex,
    text,
    xObjectNames: readXObjectNames(page, pageIndex),
    content,
    skippedStreams,
  };
}
