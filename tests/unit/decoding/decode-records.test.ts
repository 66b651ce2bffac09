import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { beforeAll, describe, expect, it } from 'vitest';

import {
  DECODED_COLUMNS,
  DEFAULT_DECODE_OPTIONS,
  createDecodedRepo,
  decodeRecords,
} from '@/modules/decoding/index.js';
import { loadLookupSet, type LookupSet } from '@/modules/lookups/index.js';

import { makeInterimRecord } from '../../fixtures/builders.js';

const LOOKUPS_DIR = fileURLToPath(new URL('../../../lookups', import.meta.url));

describe('decodeRecords', () => {
  let lookups: LookupSet;

  beforeAll(async () => {
    lookups = (await loadLookupSet(LOOKUPS_DIR))._unsafeUnwrap();
  });

  it('decodes every record in order', () => {
    const records = [makeInterimRecord(), makeInterimRecord({ Sex: '2' })];

    const decoded = decodeRecords(
      records,
      'cards_rawformatted.csv',
      lookups,
      DEFAULT_DECODE_OPTIONS
    )._unsafeUnwrap();

    expect(decoded.source).toBe('cards_rawformatted.csv');
    expect(decoded.records.map((r) => r.SexName)).toEqual(['Male', 'Female']);
    expect(decoded.unresolved).toEqual([]);
  });

  it('counts unresolved codes by field and code', () => {
    const records = [
      makeInterimRecord({ Sex: '3' }),
      makeInterimRecord({ Sex: '3', Race: '8' }),
      makeInterimRecord({ Sex: '4' }),
    ];

    const decoded = decodeRecords(
      records,
      'cards_rawformatted.csv',
      lookups,
      DEFAULT_DECODE_OPTIONS
    )._unsafeUnwrap();

    expect(decoded.unresolved).toEqual([
      { field: 'Race', domain: 'race', code: '8', count: 1 },
      { field: 'Sex', domain: 'sex', code: '3', count: 2 },
      { field: 'Sex', domain: 'sex', code: '4', count: 1 },
    ]);
  });

  it('names the file and CSV line of the first unresolved code under the fail policy', () => {
    const records = [makeInterimRecord(), makeInterimRecord({ Sex: '3' })];

    const result = decodeRecords(records, 'cards_rawformatted.csv', lookups, {
      ...DEFAULT_DECODE_OPTIONS,
      unresolvedPolicy: 'fail',
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'UnresolvedCodeError',
      message: "cards_rawformatted.csv:3: code '3' in Sex has no entry in the sex table",
      field: 'Sex',
      domain: 'sex',
      code: '3',
      source: 'cards_rawformatted.csv',
      line: 3,
    });
  });
});

describe('fs decoded repo', () => {
  it('writes decoded tables under the documented header and reads them back', async () => {
    const lookups = (await loadLookupSet(LOOKUPS_DIR))._unsafeUnwrap();
    const { records } = decodeRecords(
      [makeInterimRecord(), makeInterimRecord({ CountyCommittedFrom: '24' })],
      'cards_rawformatted.csv',
      lookups,
      DEFAULT_DECODE_OPTIONS
    )._unsafeUnwrap();
    const decodedDir = path.join(await mkdtemp(path.join(tmpdir(), 'decoded-')), 'decoded');

    const repo = createDecodedRepo({ decodedDir });
    const filePath = (await repo.writeDecodedFile('cards', records))._unsafeUnwrap();

    expect(filePath).toBe(path.join(decodedDir, 'cards_decoded.csv'));
    const lines = (await readFile(filePath, 'utf8')).split('\n');
    expect(lines[0]).toBe(DECODED_COLUMNS.join(','));
    expect(lines[1]?.startsWith('Attica,Erie,County/Supreme Court – General Sessions,')).toBe(
      true
    );

    const [entry] = (await repo.listDecodedFiles())._unsafeUnwrap();
    if (entry === undefined) throw new Error('expected a decoded file');
    expect((await repo.readDecodedFile(entry))._unsafeUnwrap()).toEqual(records);
  });
});
