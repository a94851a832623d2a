/**
 * Blank-page cleaning models
 *
 * Per-page signals read from a PDF, the decision a policy takes on them,
 * and the aggregate statistics of one cleaning run.
 */

/**
 * Why a page was kept or dropped.
 *
 * Keep reasons, strongest first: `text`, `resources`, `content`.
 * Drop reasons: `empty-content`, `below-threshold`.
 */
export type ClassificationReason =
  | 'text'
  | 'resources'
  | 'content'
  | 'empty-content'
  | 'below-threshold';

/**
 * Everything the classifier may look at for one page.
 * Each field already holds its fallback value when extraction failed.
 */
export interface PageSignals {
  /** Zero-based position in the source document */
  pageIndex: number;
  /** Extracted text, '' when extraction failed */
  text: string;
  /** Names of XObject resources (images, forms) declared by the page */
  xObjectNames: string[];
  /** Decoded content-stream payload, all streams concatenated */
  content: Uint8Array;
  /** Number of content streams that failed to decode and were skipped */
  skippedStreams: number;
}

/**
 * Decision for a single page
 */
export interface PageClassification {
  pageIndex: number;
  keep: boolean;
  reason: ClassificationReason;
  /** Trimmed content length, present when the content stream was consulted */
  contentBytes?: number;
}

/**
 * Aggregate result of a cleaning run.
 * removed + remaining === total; remaining > 0 whenever total > 0.
 */
export interface CleanStats {
  total: number;
  removed: number;
  remaining: number;
  /** True when every page classified as blank and all pages were kept instead */
  failsafeApplied: boolean;
}

/**
 * Full result of cleanPdf()
 */
export interface CleanResult {
  stats: CleanStats;
  /** Per-page decisions as taken by the policy, before any failsafe override */
  pages: PageClassification[];
  outputPath: string;
}
