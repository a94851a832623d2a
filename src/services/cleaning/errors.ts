/**
 * Cleaning Error Classes
 *
 * Only document-level failures surface here. Per-page extraction problems
 * are absorbed into fallback values by the signal readers.
 */

type CleaningErrorCategory = 'PDF_STRUCTURE_ERROR';

export class CleaningError extends Error {
  constructor(
    message: string,
    public readonly category: CleaningErrorCategory,
    public readonly filePath?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'CleaningError';
  }
}

/**
 * The input could not be parsed as a PDF document (bad header, broken
 * cross-reference data, encryption that prevents reading).
 * Not retriable without a different input.
 */
export class StructuralReadError extends CleaningError {
  constructor(message: string, filePath: string, options?: ErrorOptions) {
    super(message, 'PDF_STRUCTURE_ERROR', filePath, options);
    this.name = 'StructuralReadError';
  }
}
