/**
 * Unit tests for the blank-page classifier
 *
 * @module tests/unit/services/cleaning/classifier
 */

import { describe, it, expect } from 'vitest';
import {
  BLANK_CONTENT_THRESHOLD_BYTES,
  ConservativeBlankPagePolicy,
  trimPdfWhitespace,
} from '../../../../src/services/cleaning/classifier.js';
import type { PageSignals } from '../../../../src/models/cleaning.js';

const encoder = new TextEncoder();

function signals(overrides: Partial<PageSignals> = {}): PageSignals {
  return {
    pageIndex: 0,
    text: '',
    xObjectNames: [],
    content: new Uint8Array(0),
    skippedStreams: 0,
    ...overrides,
  };
}

describe('trimPdfWhitespace', () => {
  it('strips every PDF whitespace byte from both ends', () => {
    const bytes = Uint8Array.from([0x00, 0x09, 0x0a, 0x0c, 0x0d, 0x20, 0x71, 0x20, 0x51, 0x0a, 0x00]);
    expect(Array.from(trimPdfWhitespace(bytes))).toEqual([0x71, 0x20, 0x51]);
  });

  it('returns an empty view for all-whitespace input', () => {
    expect(trimPdfWhitespace(encoder.encode(' \n\r\t ')).length).toBe(0);
  });

  it('keeps interior whitespace untouched', () => {
    expect(new TextDecoder().decode(trimPdfWhitespace(encoder.encode('\nq\n\nQ\n')))).toBe('q\n\nQ');
  });
});

describe('ConservativeBlankPagePolicy', () => {
  const policy = new ConservativeBlankPagePolicy();

  it('uses the 30-byte threshold by default', () => {
    expect(BLANK_CONTENT_THRESHOLD_BYTES).toBe(30);
    expect(policy.thresholdBytes).toBe(30);
    expect(policy.name).toBe('conservative');
  });

  it('keeps a page with extractable text even when its content stream is tiny', () => {
    const result = policy.classify(signals({ text: 'Hi', content: encoder.encode('q Q') }));
    expect(result).toEqual({ pageIndex: 0, keep: true, reason: 'text' });
  });

  it('ignores whitespace-only text', () => {
    const result = policy.classify(signals({ text: ' \n\t ' }));
    expect(result.keep).toBe(false);
    expect(result.reason).toBe('empty-content');
  });

  it('keeps a page declaring XObjects with no content at all', () => {
    const result = policy.classify(signals({ pageIndex: 4, xObjectNames: ['Im0'] }));
    expect(result).toEqual({ pageIndex: 4, keep: true, reason: 'resources' });
  });

  it('drops a page with an empty content stream', () => {
    const result = policy.classify(signals({ pageIndex: 2, content: encoder.encode('  \n ') }));
    expect(result).toEqual({ pageIndex: 2, keep: false, reason: 'empty-content', contentBytes: 0 });
  });

  it('drops a lone q/Q pair as below threshold', () => {
    const result = policy.classify(signals({ content: encoder.encode('q\nQ\n') }));
    expect(result).toEqual({ pageIndex: 0, keep: false, reason: 'below-threshold', contentBytes: 3 });
  });

  it('keeps content exactly at the threshold', () => {
    const content = encoder.encode('x'.repeat(30));
    const result = policy.classify(signals({ content }));
    expect(result).toEqual({ pageIndex: 0, keep: true, reason: 'content', contentBytes: 30 });
  });

  it('drops content one byte under the threshold', () => {
    const result = policy.classify(signals({ content: encoder.encode('x'.repeat(29)) }));
    expect(result.keep).toBe(false);
    expect(result.contentBytes).toBe(29);
  });

  it('measures content after trimming whitespace', () => {
    const padded = encoder.encode(`\n\n${'x'.repeat(29)}\n\n\n`);
    expect(policy.classify(signals({ content: padded })).reason).toBe('below-threshold');
  });

  it('honours a custom threshold', () => {
    const strict = new ConservativeBlankPagePolicy({ thresholdBytes: 2 });
    expect(strict.classify(signals({ content: encoder.encode('q\nQ') })).keep).toBe(true);

    const off = new ConservativeBlankPagePolicy({ thresholdBytes: 0 });
    expect(off.classify(signals({ content: encoder.encode('q') })).reason).toBe('content');
    expect(off.classify(signals()).reason).toBe('empty-content');
  });

  it('rejects a negative or fractional threshold', () => {
    expect(() => new ConservativeBlankPagePolicy({ thresholdBytes: -1 })).toThrow(
      'thresholdBytes must be a non-negative integer, got -1'
    );
    expect(() => new ConservativeBlankPagePolicy({ thresholdBytes: 1.5 })).toThrow(
      'thresholdBytes must be a non-negative integer'
    );
  });
});
