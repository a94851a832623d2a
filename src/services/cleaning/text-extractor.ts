/**
 * Page Text Extraction
 *
 * Best-effort text extraction with PDF.js (legacy build, runs in Node
 * without a worker thread). Any failure yields '' for the affected page,
 * or for every page when PDF.js cannot open the document at all.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module services/cleaning/text-extractor
 */

import path from 'path';
import { createRequire } from 'module';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
// Registers the PDF.js worker handler on the main thread (no worker file lookup in Node)
import 'pdfjs-dist/legacy/build/pdf.worker.mjs';

type PdfJsDocument = Awaited<ReturnType<typeof getDocument>['promise']>;

const require = createRequire(import.meta.url);

let cachedStandardFontDir: string | null = null;

/**
 * Directory holding PDF.js' standard font metrics. Needed to map glyphs
 * of the non-embedded base-14 fonts; must end with a separator.
 */
function standardFontDataUrl(): string {
  if (!cachedStandardFontDir) {
    const packageRoot = path.dirname(require.resolve('pdfjs-dist/package.json'));
    cachedStandardFontDir = path.join(packageRoot, 'standard_fonts') + path.sep;
  }
  return cachedStandardFontDir;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function extractPageText(doc: PdfJsDocument, pageNumber: number): Promise<string> {
  try {
    const page = await doc.getPage(pageNumber);
    const content = await page.getTextContent();
    page.cleanup();
    return content.items
      .map((item) => ('str' in item ? item.str + (item.hasEOL ? '\n' : '') : ''))
      .join('');
  } catch (error) {
    console.error(
      `[TextExtractor] Page ${pageNumber}: text extraction failed, treating as empty: ${errorMessage(error)}`
    );
    return '';
  }
}

/**
 * Extract the text of every page, in page order.
 *
 * @param data - Raw PDF bytes (copied; PDF.js detaches the buffer it is given)
 * @param pageCount - Page count as seen by the structural loader; the result
 *   always has exactly this length
 */
export async function extractPageTexts(data: Uint8Array, pageCount: number): Promise<string[]> {
  const texts: string[] = new Array<string>(pageCount).fill('');
  if (pageCount === 0) return texts;

  let doc: PdfJsDocument;
  try {
    doc = await getDocument({
      data: new Uint8Array(data),
      standardFontDataUrl: standardFontDataUrl(),
      disableFontFace: true,
      isEvalSupported: false,
      useSystemFonts: false,
      verbosity: 0,
    }).promise;
  } catch (error) {
    console.error(
      `[TextExtractor] PDF.js could not open the document, no text signal available: ${errorMessage(error)}`
    );
    return texts;
  }

  try {
    if (doc.numPages !== pageCount) {
      console.error(
        `[TextExtractor] Page count mismatch (pdf.js=${doc.numPages}, structure=${pageCount}); extracting the overlap only`
      );
    }
    const limit = Math.min(doc.numPages, pageCount);
    for (let pageNumber = 1; pageNumber <= limit; pageNumber++) {
      texts[pageNumber - 1] = await extractPageText(doc, pageNumber);
    }
  } finally {
    await doc.destroy();
  }

  return texts;
}
