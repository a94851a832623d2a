/**
 * Blank Page Classification
 *
 * Layered, conservative heuristic deciding whether a page carries content.
 * Signals are consulted strongest first and every ambiguous case keeps the
 * page.
 *
 *   1. extractable text          -> keep
 *   2. declared XObjects         -> keep (scans, image-only pages)
 *   3. empty content stream      -> drop
 *   4. content below threshold   -> drop (a lone q/Q pair and the like)
 *   5. anything else             -> keep
 *
 * @module services/cleaning/classifier
 */

import type { PageClassification, PageSignals } from '../../models/cleaning.js';

/**
 * Content streams whose trimmed length is below this many bytes are treated
 * as blank. Tuned empirically; valid vector art under this size would be
 * dropped, which is an accepted risk.
 */
export const BLANK_CONTENT_THRESHOLD_BYTES = 30;

/**
 * A swappable classification strategy. Implementations must be stateless
 * across pages: the decision for one page may not depend on another.
 */
export interface BlankPagePolicy {
  readonly name: string;
  classify(signals: PageSignals): PageClassification;
}

export interface ConservativePolicyOptions {
  /** Override for BLANK_CONTENT_THRESHOLD_BYTES */
  thresholdBytes?: number;
}

/** PDF white-space characters (ISO 32000-1, 7.2.2) */
const PDF_WHITESPACE = new Set([0x00, 0x09, 0x0a, 0x0c, 0x0d, 0x20]);

/**
 * Strip leading and trailing PDF white-space from a byte payload.
 * Returns a view over the input, no copy.
 */
export function trimPdfWhitespace(bytes: Uint8Array): Uint8Array {
  let start = 0;
  let end = bytes.length;
  while (start < end && PDF_WHITESPACE.has(bytes[start])) start++;
  while (end > start && PDF_WHITESPACE.has(bytes[end - 1])) end--;
  return bytes.subarray(start, end);
}

export class ConservativeBlankPagePolicy implements BlankPagePolicy {
  readonly name = 'conservative';
  readonly thresholdBytes: number;

  constructor(options: ConservativePolicyOptions = {}) {
    const threshold = options.thresholdBytes ?? BLANK_CONTENT_THRESHOLD_BYTES;
    if (!Number.isInteger(threshold) || threshold < 0) {
      throw new Error(`thresholdBytes must be a non-negative integer, got ${threshold}`);
    }
    this.thresholdBytes = threshold;
  }

  classify(signals: PageSignals): PageClassification {
    const { pageIndex } = signals;

    if (signals.text.trim() !== '') {
      return { pageIndex, keep: true, reason: 'text' };
    }

    if (signals.xObjectNames.length > 0) {
      return { pageIndex, keep: true, reason: 'resources' };
    }

    const contentBytes = trimPdfWhitespace(signals.content).length;
    if (contentBytes === 0) {
      return { pageIndex, keep: false, reason: 'empty-content', contentBytes };
    }
    if (contentBytes < this.thresholdBytes) {
      return { pageIndex, keep: false, reason: 'below-threshold', contentBytes };
    }
    return { pageIndex, keep: true, reason: 'content', contentBytes };
  }
}
