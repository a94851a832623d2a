/**
 * Unit tests for the executable locator
 *
 * @module tests/unit/services/compression/locator
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  GHOSTSCRIPT_CANDIDATES,
  findExecutable,
  isExecutableFile,
} from '../../../../src/services/compression/locator.js';

let root: string;
let dirA: string;
let dirB: string;

function touch(dir: string, name: string, mode: number): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, '#!/bin/sh\nexit 0\n');
  fs.chmodSync(filePath, mode);
  return filePath;
}

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'test-locate-'));
  dirA = path.join(root, 'a');
  dirB = path.join(root, 'b');
  fs.mkdirSync(dirA);
  fs.mkdirSync(dirB);
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe('GHOSTSCRIPT_CANDIDATES', () => {
  it('probes gs, then the 64-bit and 32-bit Windows console builds', () => {
    expect(GHOSTSCRIPT_CANDIDATES).toEqual(['gs', 'gswin64c', 'gswin32c']);
  });
});

describe('isExecutableFile', () => {
  it.skipIf(process.platform === 'win32')('requires the execute bit on POSIX', () => {
    expect(isExecutableFile(touch(dirA, 'tool', 0o755), 'linux')).toBe(true);
    expect(isExecutableFile(touch(dirA, 'data', 0o644), 'linux')).toBe(false);
  });

  it('accepts any regular file on Windows', () => {
    expect(isExecutableFile(touch(dirA, 'gswin64c.exe', 0o644), 'win32')).toBe(true);
  });

  it('rejects directories and missing paths', () => {
    expect(isExecutableFile(dirA, 'linux')).toBe(false);
    expect(isExecutableFile(path.join(dirA, 'missing'), 'linux')).toBe(false);
  });
});

describe.skipIf(process.platform === 'win32')('findExecutable on POSIX', () => {
  it('returns the absolute path of the first match', () => {
    const gs = touch(dirB, 'gs', 0o755);
    expect(findExecutable(GHOSTSCRIPT_CANDIDATES, { pathEnv: `${dirA}:${dirB}`, platform: 'linux' })).toBe(gs);
  });

  it('prefers an earlier candidate over an earlier directory', () => {
    touch(dirA, 'gswin64c', 0o755);
    const gs = touch(dirB, 'gs', 0o755);
    expect(findExecutable(GHOSTSCRIPT_CANDIDATES, { pathEnv: `${dirA}:${dirB}`, platform: 'linux' })).toBe(gs);
  });

  it('takes the first directory when a candidate exists in several', () => {
    const first = touch(dirA, 'gs', 0o755);
    touch(dirB, 'gs', 0o755);
    expect(findExecutable(['gs'], { pathEnv: `${dirA}:${dirB}`, platform: 'linux' })).toBe(first);
  });

  it('skips files without the execute bit', () => {
    touch(dirA, 'gs', 0o644);
    const gs = touch(dirB, 'gs', 0o755);
    expect(findExecutable(['gs'], { pathEnv: `${dirA}:${dirB}`, platform: 'linux' })).toBe(gs);
  });

  it('returns null when nothing matches or the search path is empty', () => {
    expect(findExecutable(GHOSTSCRIPT_CANDIDATES, { pathEnv: `${dirA}:${dirB}`, platform: 'linux' })).toBeNull();
    expect(findExecutable(GHOSTSCRIPT_CANDIDATES, { pathEnv: '', platform: 'linux' })).toBeNull();
  });
});

describe('findExecutable with Windows rules', () => {
  it('appends lower-cased PATHEXT extensions and splits the path on semicolons', () => {
    const exe = touch(dirB, 'gswin64c.exe', 0o644);
    const found = findExecutable(GHOSTSCRIPT_CANDIDATES, {
      pathEnv: `${dirA};${dirB}`,
      platform: 'win32',
      pathExt: '.COM;.EXE',
    });
    expect(found).toBe(exe);
  });

  it('does not add an extension to a name that already has one', () => {
    const exe = touch(dirA, 'gswin32c.exe', 0o644);
    expect(findExecutable(['gswin32c.exe'], { pathEnv: dirA, platform: 'win32', pathExt: '.EXE' })).toBe(exe);
  });
});
