/**
 * Executable Locator
 *
 * Finds the first of an ordered list of executable names on the search path,
 * the way a shell would. On Windows each name is tried with the PATHEXT
 * extensions.
 *
 * @module services/compression/locator
 */

import fs from 'fs';
import path from 'path';

/**
 * Ghostscript binary names in probe order: the Unix name first, then the
 * Windows console builds (64-bit before 32-bit).
 */
export const GHOSTSCRIPT_CANDIDATES: readonly string[] = ['gs', 'gswin64c', 'gswin32c'];

const DEFAULT_WINDOWS_PATHEXT = '.COM;.EXE;.BAT;.CMD';

export interface LocateOptions {
  /** Search path (default: process.env.PATH) */
  pathEnv?: string;
  /** Platform rules to apply (default: process.platform) */
  platform?: NodeJS.Platform;
  /** Windows executable extensions (default: process.env.PATHEXT) */
  pathExt?: string;
}

/**
 * True when filePath is a regular file this process may execute.
 * Windows has no execute bit; existence as a file is enough there.
 */
export function isExecutableFile(filePath: string, platform: NodeJS.Platform = process.platform): boolean {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(filePath);
  } catch {
    return false;
  }
  if (!stats.isFile()) return false;
  if (platform === 'win32') return true;
  try {
    fs.accessSync(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function executableNames(candidate: string, platform: NodeJS.Platform, pathExt: string): string[] {
  if (platform !== 'win32') return [candidate];
  const extensions = pathExt
    .split(';')
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0);
  const lower = candidate.toLowerCase();
  if (extensions.some((ext) => lower.endsWith(ext))) return [candidate];
  return extensions.map((ext) => candidate + ext);
}

/**
 * Resolve the first candidate found on the search path.
 *
 * Candidates are tried in order; for each candidate every search-path
 * directory is tried in order. Returns the absolute path, or null.
 */
export function findExecutable(
  candidates: readonly string[],
  options: LocateOptions = {}
): string | null {
  const platform = options.platform ?? process.platform;
  const pathEnv = options.pathEnv ?? process.env.PATH ?? '';
  const pathExt = options.pathExt ?? process.env.PATHEXT ?? DEFAULT_WINDOWS_PATHEXT;
  const delimiter = platform === 'win32' ? ';' : ':';

  const directories = pathEnv
    .split(delimiter)
    .map((dir) => dir.trim())
    .filter((dir) => dir.length > 0);

  for (const candidate of candidates) {
    for (const directory of directories) {
      for (const name of executableNames(candidate, platform, pathExt)) {
        const fullPath = path.resolve(directory, name);
        if (isExecutableFile(fullPath, platform)) {
          return fullPath;
        }
      }
    }
  }
  return null;
}
