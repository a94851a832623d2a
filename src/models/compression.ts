/**
 * Compression models
 *
 * Quality profiles understood by Ghostscript's -dPDFSETTINGS switch and
 * the outcome of a single compression run.
 */

/**
 * Every profile the compressor accepts, in order of increasing quality
 */
export const QUALITY_PROFILES = ['screen', 'ebook', 'printer', 'prepress'] as const;

export type QualityProfile = (typeof QUALITY_PROFILES)[number];

/**
 * Profiles offered to interactive callers. `prepress` is only reachable
 * through the command line and the library API.
 */
export const USER_QUALITY_PROFILES = ['screen', 'ebook', 'printer'] as const;

export type UserQualityProfile = (typeof USER_QUALITY_PROFILES)[number];

export const DEFAULT_QUALITY_PROFILE: QualityProfile = 'ebook';

export function isQualityProfile(value: string): value is QualityProfile {
  return (QUALITY_PROFILES as readonly string[]).includes(value);
}

/**
 * Result of a successful (exit code 0) Ghostscript run
 */
export interface CompressionOutcome {
  /** Resolved executable that was spawned */
  executable: string;
  quality: QualityProfile;
  durationMs: number;
  stdout: string;
  stderr: string;
}
