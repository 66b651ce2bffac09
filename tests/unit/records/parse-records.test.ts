import { describe, expect, it, vi } from 'vitest';

import { parseRecords } from '@/modules/records/index.js';

import { makeCardLine } from '../../fixtures/builders.js';

const first = makeCardLine();
const second = makeCardLine({ InmateNumber: '654321', Sex: '2' });
const tooLong = `${makeCardLine()}XX`;

describe('parseRecords', () => {
  it('parses every non-blank line', () => {
    const text = [first, '', second, '   ', ''].join('\n');

    const result = parseRecords(text, 'cards.txt', { policy: 'fail' });

    const parsed = result._unsafeUnwrap();
    expect(parsed.source).toBe('cards.txt');
    expect(parsed.records.map((r) => r.InmateNumber)).toEqual(['123456', '654321']);
    expect(parsed.skippedLines).toEqual([]);
  });

  it('accepts CRLF line endings', () => {
    const text = `${first}\r\n${second}\r\n`;

    const parsed = parseRecords(text, 'cards.txt', { policy: 'fail' })._unsafeUnwrap();

    expect(parsed.records).toHaveLength(2);
    expect(parsed.records[1]?.CurrentInstitution).toBe('07');
  });

  it('stops at the first malformed line under the fail policy', () => {
    const text = [first, tooLong, second].join('\n');

    const result = parseRecords(text, 'cards.txt', { policy: 'fail' });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'MalformedLineError',
      message: 'cards.txt:2: line is 82 characters, expected at most 80',
      source: 'cards.txt',
      line: 2,
    });
  });

  it('skips and reports malformed lines under the skip policy', () => {
    const onSkip = vi.fn();
    const text = [first, '', tooLong, second].join('\n');

    const result = parseRecords(text, 'cards.txt', { policy: 'skip', onSkip });

    const parsed = result._unsafeUnwrap();
    expect(parsed.records.map((r) => r.InmateNumber)).toEqual(['123456', '654321']);
    expect(parsed.skippedLines).toEqual([3]);
    expect(onSkip).toHaveBeenCalledTimes(1);
    expect(onSkip).toHaveBeenCalledWith(
      expect.objectContaining({ type: 'MalformedLineError', line: 3 })
    );
  });

  it('returns an empty table for an empty file', () => {
    const parsed = parseRecords('', 'empty.txt', { policy: 'fail' })._unsafeUnwrap();

    expect(parsed.records).toEqual([]);
  });
});
