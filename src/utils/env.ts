/**
 * .env loading shared by the MCP server and the command line
 *
 * @module utils/env
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Load the first .env found (first found wins):
 * 1. PDF_SWEEP_ENV_FILE env var (explicit override)
 * 2. CWD/.env (project-local)
 * 3. Package root/.env (from src/ in development, dist/src/ when built)
 *
 * @returns The file loaded, or null when none exists
 */
export function loadEnvFile(): string | null {
  const envCandidates = [
    process.env.PDF_SWEEP_ENV_FILE,
    path.resolve(process.cwd(), '.env'),
    path.resolve(__dirname, '..', '..', '.env'),
    path.resolve(__dirname, '..', '..', '..', '.env'),
  ].filter((p): p is string => typeof p === 'string');

  for (const envPath of envCandidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, quiet: true });
      return envPath;
    }
  }
  return null;
}
