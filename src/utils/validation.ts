/**
 * pdf-sweep - Zod Validation Schemas
 *
 * Input validation for every MCP tool, for quality profiles and for
 * environment-driven configuration. Each schema includes:
 * - Type validation
 * - Constraint validation (min/max, patterns, etc.)
 * - Descriptive error messages
 * - Default values where appropriate
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as path from 'path';
import { homedir, tmpdir } from 'os';
import { QUALITY_PROFILES, USER_QUALITY_PROFILES } from '../models/compression.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

/**
 * Split a comma-separated directory list, dropping blanks
 */
export function parseDirList(value: string): string[] {
  return value
    .split(',')
    .map((d) => d.trim())
    .filter((d) => d.length > 0);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS AND BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Every Ghostscript -dPDFSETTINGS profile
 */
export const QualityProfileSchema = z.enum(QUALITY_PROFILES);

/**
 * Profiles offered through the MCP tools
 */
export const UserQualityProfileSchema = z.enum(USER_QUALITY_PROFILES);

/**
 * Configuration keys that can be read and set at runtime
 */
export const ConfigKey = z.enum([
  'default_quality',
  'blank_threshold_bytes',
  'ghostscript_path',
  'ghostscript_timeout_ms',
  'expose_tool_diagnostics',
]);

const InputPdfPath = z
  .string()
  .min(1, 'input_path is required')
  .refine((p) => p.toLowerCase().endsWith('.pdf'), 'input_path must name a .pdf file');

const OutputPath = z.string().min(1, 'output_path is required');

const Overwrite = z
  .boolean()
  .default(false)
  .describe('Replace output_path if it already exists (default false)');

// ═══════════════════════════════════════════════════════════════════════════════
// PDF TOOL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const PdfCleanInput = z.object({
  input_path: InputPdfPath.describe('Path of the PDF to clean'),
  output_path: OutputPath.describe('Where to write the cleaned PDF'),
  overwrite: Overwrite,
});

export const PdfCompressInput = z.object({
  input_path: InputPdfPath.describe('Path of the PDF to recompress'),
  output_path: OutputPath.describe('Where to write the compressed PDF'),
  quality: UserQualityProfileSchema.optional().describe(
    'Ghostscript quality profile (default: configured default_quality)'
  ),
  overwrite: Overwrite,
});

export const PdfProcessInput = z.object({
  input_path: InputPdfPath.describe('Path of the PDF to clean and compress'),
  output_path: OutputPath.describe('Where to write the final PDF'),
  quality: UserQualityProfileSchema.optional().describe(
    'Ghostscript quality profile (default: configured default_quality)'
  ),
  compress: z
    .boolean()
    .default(true)
    .describe('Recompress with Ghostscript after removing blank pages (default true)'),
  overwrite: Overwrite,
});

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for getting configuration
 */
export const ConfigGetInput = z.object({
  key: ConfigKey.optional(),
});

/**
 * Schema for setting configuration
 */
export const ConfigSetInput = z.object({
  key: ConfigKey,
  value: z.union([z.string(), z.number(), z.boolean()]),
});

/**
 * Environment overrides read at startup. Unset variables stay undefined.
 */
export const EnvConfigSchema = z.object({
  PDF_SWEEP_GHOSTSCRIPT_PATH: z.string().min(1).optional(),
  PDF_SWEEP_GHOSTSCRIPT_TIMEOUT_MS: z.coerce
    .number()
    .int('PDF_SWEEP_GHOSTSCRIPT_TIMEOUT_MS must be an integer')
    .min(1000, 'PDF_SWEEP_GHOSTSCRIPT_TIMEOUT_MS must be at least 1000')
    .optional(),
  PDF_SWEEP_DEFAULT_QUALITY: QualityProfileSchema.optional(),
  PDF_SWEEP_BLANK_THRESHOLD: z.coerce
    .number()
    .int('PDF_SWEEP_BLANK_THRESHOLD must be an integer')
    .min(0, 'PDF_SWEEP_BLANK_THRESHOLD must not be negative')
    .optional(),
  PDF_SWEEP_EXPOSE_TOOL_DIAGNOSTICS: z
    .enum(['true', 'false', '1', '0'])
    .transform((v) => v === 'true' || v === '1')
    .optional(),
  PDF_SWEEP_ALLOWED_DIRS: z.string().transform(parseDirList).optional(),
});

export type EnvConfig = z.infer<typeof EnvConfigSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// PATH SANITIZATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Directories file paths may resolve into: home, the temp directory, the
 * working directory, plus any extra directories configured.
 */
export function getDefaultAllowedBaseDirs(extraDirs: readonly string[] = []): string[] {
  const dirs = [path.resolve(homedir()), path.resolve(tmpdir()), path.resolve(process.cwd())];
  for (const d of extraDirs) {
    const resolved = path.resolve(d);
    if (!dirs.includes(resolved)) {
      dirs.push(resolved);
    }
  }
  return dirs;
}

/**
 * Resolve a user-supplied path and confirm it lies inside an allowed directory.
 *
 * @throws ValidationError on null bytes or a path outside the allowed directories
 */
export function sanitizePath(filePath: string, allowedBaseDirs?: string[]): string {
  if (filePath.includes('\0')) {
    throw new ValidationError('Path contains null bytes');
  }

  const resolved = path.resolve(filePath);

  const baseDirs =
    allowedBaseDirs && allowedBaseDirs.length > 0 ? allowedBaseDirs : getDefaultAllowedBaseDirs();

  const resolvedBases = baseDirs.map((d) => path.resolve(d));
  const withinAllowed = resolvedBases.some(
    (base) => resolved === base || resolved.startsWith(base + path.sep)
  );
  if (!withinAllowed) {
    throw new ValidationError(
      `Path "${resolved}" is outside allowed directories: ${resolvedBases.join(', ')}. ` +
        `To allow this path, set the PDF_SWEEP_ALLOWED_DIRS environment variable ` +
        `(comma-separated list of directories).`
    );
  }

  return resolved;
}
