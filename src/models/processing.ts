/**
 * Processing pipeline models
 */

import type { CleanStats } from './cleaning.js';
import type { QualityProfile } from './compression.js';

export interface ProcessOptions {
  /** Run Ghostscript after cleaning (default: true) */
  compress?: boolean;
  /** Quality profile used when compressing */
  quality?: QualityProfile;
}

/**
 * Outcome of processPdf(): clean, optionally compress, copy to output
 */
export interface ProcessResult {
  outputPath: string;
  stats: CleanStats;
  compressed: boolean;
  /** Profile used, null when compression was skipped */
  quality: QualityProfile | null;
  inputBytes: number;
  outputBytes: number;
  /** Size reduction in percent, one decimal, never negative */
  reductionPct: number;
  durationMs: number;
}
