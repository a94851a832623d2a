/**
 * Unit tests for the processing pipeline
 *
 * The compressor is an in-process fake that writes (or fails to write) the
 * output file; cleaning runs for real on pdf-lib fixtures.
 *
 * @module tests/unit/services/pipeline/processor
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import {
  PdfProcessor,
  TEMP_DIR_PREFIX,
  compressPdf,
  processPdf,
  reductionPercent,
  verifyCompressedOutput,
} from '../../../../src/services/pipeline/processor.js';
import type { PdfCompressor } from '../../../../src/services/compression/compressor.js';
import { ToolExecutionError, ToolTimeoutError } from '../../../../src/services/compression/errors.js';
import { StructuralReadError } from '../../../../src/services/cleaning/errors.js';
import type { CompressionOutcome, QualityProfile } from '../../../../src/models/compression.js';
import { makeTempDir, pageCount, writePdf } from '../../../fixtures/pdf-fixtures.js';

let tempDir: string;
let workRoot: string;

/**
 * Fake compressor: `write` decides what lands at the output path
 */
class FakeCompressor implements PdfCompressor {
  readonly calls: Array<{ inputPath: string; outputPath: string; quality: QualityProfile }> = [];

  constructor(private readonly write: (inputPath: string, outputPath: string) => void) {}

  async compress(inputPath: string, outputPath: string, quality: QualityProfile): Promise<CompressionOutcome> {
    this.calls.push({ inputPath, outputPath, quality });
    this.write(inputPath, outputPath);
    return { executable: '/usr/bin/gs', quality, durationMs: 5, stdout: '', stderr: 'warning' };
  }
}

const copyThrough = new FakeCompressor((input, output) => fs.copyFileSync(input, output));

function workDirs(): string[] {
  return fs.readdirSync(workRoot).filter((name) => name.startsWith(TEMP_DIR_PREFIX));
}

beforeEach(() => {
  tempDir = makeTempDir('test-pipeline-');
  workRoot = path.join(tempDir, 'work');
  fs.mkdirSync(workRoot);
  copyThrough.calls.length = 0;
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('reductionPercent', () => {
  it('rounds to one decimal', () => {
    expect(reductionPercent(3000, 1000)).toBe(66.7);
    expect(reductionPercent(1000, 250)).toBe(75);
  });

  it('never goes negative when the output grew', () => {
    expect(reductionPercent(1000, 1500)).toBe(0);
  });

  it('is zero for an empty input', () => {
    expect(reductionPercent(0, 100)).toBe(0);
  });
});

describe('verifyCompressedOutput', () => {
  const outcome: CompressionOutcome = {
    executable: 'gs',
    quality: 'ebook',
    durationMs: 1,
    stdout: 'out',
    stderr: 'err',
  };

  it('returns the size of a non-empty file', async () => {
    const file = path.join(tempDir, 'ok.pdf');
    fs.writeFileSync(file, '%PDF-1.4');
    expect(await verifyCompressedOutput(file, outcome)).toBe(8);
  });

  it('rejects a missing file with ToolExecutionError', async () => {
    const error = await verifyCompressedOutput(path.join(tempDir, 'none.pdf'), outcome).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ToolExecutionError);
    expect(error).toMatchObject({ exitCode: 0, stdout: 'out', stderr: 'err' });
  });

  it('rejects an empty file with ToolExecutionError', async () => {
    const file = path.join(tempDir, 'empty.pdf');
    fs.writeFileSync(file, '');
    const error = await verifyCompressedOutput(file, outcome).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ToolExecutionError);
    expect(error).toMatchObject({
      message: `Ghostscript exited successfully but the output file is empty: ${file}`,
    });
  });
});

describe('compressPdf', () => {
  it('compresses in a work directory and copies the verified result', async () => {
    const input = await writePdf(tempDir, 'in.pdf', ['text']);
    const output = path.join(tempDir, 'out.pdf');

    const { outcome, outputBytes } = await compressPdf(copyThrough, input, output, 'printer', workRoot);

    expect(outcome.quality).toBe('printer');
    expect(outputBytes).toBe(fs.statSync(input).size);
    expect(fs.statSync(output).size).toBe(outputBytes);
    expect(path.dirname(copyThrough.calls[0].outputPath)).not.toBe(tempDir);
    expect(workDirs()).toEqual([]);
  });

  it('leaves no partial file at the output path when the compressor times out', async () => {
    const input = await writePdf(tempDir, 'in.pdf', ['text']);
    const output = path.join(tempDir, 'out.pdf');
    const partial: PdfCompressor = {
      compress: async (_in, out) => {
        fs.writeFileSync(out, '%PDF-1.4 partial');
        throw new ToolTimeoutError('Ghostscript did not finish within 10ms', 10);
      },
    };

    await expect(compressPdf(partial, input, output, 'ebook', workRoot)).rejects.toBeInstanceOf(
      ToolTimeoutError
    );
    expect(fs.existsSync(output)).toBe(false);
    expect(workDirs()).toEqual([]);
  });

  it('leaves no file at the output path when the compressor wrote an empty one', async () => {
    const input = await writePdf(tempDir, 'in.pdf', ['text']);
    const output = path.join(tempDir, 'out.pdf');
    const empty = new FakeCompressor((_in, out) => fs.writeFileSync(out, ''));

    await expect(compressPdf(empty, input, output, 'ebook', workRoot)).rejects.toBeInstanceOf(
      ToolExecutionError
    );
    expect(fs.existsSync(output)).toBe(false);
  });
});

describe('PdfProcessor', () => {
  it('cleans, compresses and copies the result, then removes its work directory', async () => {
    const input = await writePdf(tempDir, 'in.pdf', ['text', 'image', 'empty']);
    const output = path.join(tempDir, 'out.pdf');
    const processor = new PdfProcessor({ compressor: copyThrough, tempRoot: workRoot });

    const result = await processor.process(input, output, { quality: 'screen' });

    expect(result.stats).toEqual({ total: 3, removed: 1, remaining: 2, failsafeApplied: false });
    expect(result.compressed).toBe(true);
    expect(result.quality).toBe('screen');
    expect(result.outputPath).toBe(output);
    expect(result.inputBytes).toBe(fs.statSync(input).size);
    expect(result.outputBytes).toBe(fs.statSync(output).size);
    expect(result.reductionPct).toBe(reductionPercent(result.inputBytes, result.outputBytes));
    expect(await pageCount(output)).toBe(2);

    expect(copyThrough.calls).toHaveLength(1);
    expect(path.basename(copyThrough.calls[0].inputPath)).toBe('clean.pdf');
    expect(path.basename(copyThrough.calls[0].outputPath)).toBe('out.pdf');
    expect(workDirs()).toEqual([]);
  });

  it('uses the configured default quality when none is given', async () => {
    const input = await writePdf(tempDir, 'in.pdf', ['text']);
    const processor = new PdfProcessor({
      compressor: copyThrough,
      tempRoot: workRoot,
      defaultQuality: 'printer',
    });

    const result = await processor.process(input, path.join(tempDir, 'out.pdf'));

    expect(result.quality).toBe('printer');
    expect(copyThrough.calls[0].quality).toBe('printer');
  });

  it('defaults to ebook', async () => {
    const input = await writePdf(tempDir, 'in.pdf', ['text']);
    const result = await new PdfProcessor({ compressor: copyThrough, tempRoot: workRoot }).process(
      input,
      path.join(tempDir, 'out.pdf')
    );
    expect(result.quality).toBe('ebook');
  });

  it('skips compression when compress is false', async () => {
    const input = await writePdf(tempDir, 'in.pdf', ['empty', 'text']);
    const output = path.join(tempDir, 'out.pdf');
    const processor = new PdfProcessor({ compressor: copyThrough, tempRoot: workRoot });

    const result = await processor.process(input, output, { compress: false, quality: 'screen' });

    expect(result.compressed).toBe(false);
    expect(result.quality).toBeNull();
    expect(copyThrough.calls).toHaveLength(0);
    expect(await pageCount(output)).toBe(1);
  });

  it('fails when the compressor exits cleanly but writes nothing', async () => {
    const input = await writePdf(tempDir, 'in.pdf', ['text']);
    const output = path.join(tempDir, 'out.pdf');
    const silent = new FakeCompressor(() => {});
    const processor = new PdfProcessor({ compressor: silent, tempRoot: workRoot });

    const error = await processor.process(input, output).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolExecutionError);
    expect(error).toMatchObject({ stderr: 'warning' });
    expect(fs.existsSync(output)).toBe(false);
    expect(workDirs()).toEqual([]);
  });

  it('fails when the compressor writes an empty file', async () => {
    const input = await writePdf(tempDir, 'in.pdf', ['text']);
    const empty = new FakeCompressor((_in, out) => fs.writeFileSync(out, ''));
    const processor = new PdfProcessor({ compressor: empty, tempRoot: workRoot });

    await expect(processor.process(input, path.join(tempDir, 'out.pdf'))).rejects.toBeInstanceOf(
      ToolExecutionError
    );
  });

  it('propagates compressor errors and still removes the work directory', async () => {
    const input = await writePdf(tempDir, 'in.pdf', ['text']);
    const timingOut: PdfCompressor = {
      compress: async () => {
        throw new ToolTimeoutError('Ghostscript did not finish within 10ms', 10);
      },
    };
    const processor = new PdfProcessor({ compressor: timingOut, tempRoot: workRoot });

    await expect(processor.process(input, path.join(tempDir, 'out.pdf'))).rejects.toBeInstanceOf(
      ToolTimeoutError
    );
    expect(workDirs()).toEqual([]);
  });

  it('propagates StructuralReadError for unreadable input', async () => {
    const input = path.join(tempDir, 'bad.pdf');
    fs.writeFileSync(input, 'nope');
    const processor = new PdfProcessor({ compressor: copyThrough, tempRoot: workRoot });

    await expect(processor.process(input, path.join(tempDir, 'out.pdf'))).rejects.toBeInstanceOf(
      StructuralReadError
    );
    expect(copyThrough.calls).toHaveLength(0);
    expect(workDirs()).toEqual([]);
  });

  it('rejects an input that is not a regular file', async () => {
    const processor = new PdfProcessor({ compressor: copyThrough, tempRoot: workRoot });
    await expect(processor.process(tempDir, path.join(tempDir, 'out.pdf'))).rejects.toThrow(
      `Input is not a regular file: ${tempDir}`
    );
  });

  it('uses a separate work directory per run', async () => {
    const input = await writePdf(tempDir, 'in.pdf', ['text']);
    const seen: string[] = [];
    const recording = new FakeCompressor((inPath, outPath) => {
      seen.push(path.dirname(inPath));
      fs.copyFileSync(inPath, outPath);
    });
    const processor = new PdfProcessor({ compressor: recording, tempRoot: workRoot });

    await Promise.all([
      processor.process(input, path.join(tempDir, 'a.pdf')),
      processor.process(input, path.join(tempDir, 'b.pdf')),
    ]);

    expect(seen).toHaveLength(2);
    expect(seen[0]).not.toBe(seen[1]);
  });
});

describe('processPdf', () => {
  it('runs the pipeline with a one-off processor', async () => {
    const input = await writePdf(tempDir, 'in.pdf', ['text', 'empty']);
    const output = path.join(tempDir, 'out.pdf');

    const result = await processPdf(input, output, { compress: false }, { tempRoot: workRoot });

    expect(result.stats).toEqual({ total: 2, removed: 1, remaining: 1, failsafeApplied: false });
    expect(fs.existsSync(output)).toBe(true);
  });
});
