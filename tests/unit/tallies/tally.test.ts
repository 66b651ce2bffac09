import { describe, expect, it } from 'vitest';

import {
  buildCrossTab,
  buildDimensionTally,
  buildInstitutionCountyTally,
  buildInstitutionCourtTally,
  compareKeys,
  tally,
} from '@/modules/tallies/index.js';

import { makeDecodedRecord } from '../../fixtures/builders.js';

const records = [
  makeDecodedRecord({ Institution: 'Attica', County: 'Erie', CourtCommittedByName: 'Erie' }),
  makeDecodedRecord({ Institution: 'Sing Sing', County: 'Kings', CourtCommittedByName: 'Kings' }),
  makeDecodedRecord({ Institution: 'Attica', County: 'Erie', CourtCommittedByName: 'Erie' }),
  makeDecodedRecord({ Institution: 'Attica', County: 'Monroe', CourtCommittedByName: 'Erie' }),
  makeDecodedRecord({ Institution: 'Auburn', County: 'Erie', CourtCommittedByName: 'Unknown' }),
];

const totalCount = (rows: readonly Record<string, string | number>[]): number =>
  rows.reduce((sum, row) => sum + Number(row['Count']), 0);

describe('tally', () => {
  it('counts each distinct key once, sorted by key', () => {
    const rows = tally(['b', 'a', 'b', 'c', 'b'], (value) => [value]);

    expect(rows).toEqual([
      { key: ['a'], count: 1 },
      { key: ['b'], count: 3 },
      { key: ['c'], count: 1 },
    ]);
  });

  it('keeps tuple keys apart across element boundaries', () => {
    const rows = tally(
      [
        ['ab', 'c'],
        ['a', 'bc'],
      ],
      (pair) => pair
    );

    expect(rows).toHaveLength(2);
  });

  it('returns no rows for no records', () => {
    expect(tally([], (value: string) => [value])).toEqual([]);
  });
});

describe('compareKeys', () => {
  it('orders by code unit, then by length', () => {
    expect(compareKeys(['Zeta'], ['alpha'])).toBeLessThan(0);
    expect(compareKeys(['a'], ['a', 'b'])).toBeLessThan(0);
    expect(compareKeys(['a', 'b'], ['a', 'b'])).toBe(0);
  });
});

describe('buildInstitutionCourtTally', () => {
  it('counts identical institution and court pairs together', () => {
    const table = buildInstitutionCourtTally(records);

    expect(table.columns).toEqual(['Institution', 'Court', 'Count']);
    expect(table.rows).toEqual([
      { Institution: 'Attica', Court: 'Erie', Count: 3 },
      { Institution: 'Auburn', Court: 'Unknown', Count: 1 },
      { Institution: 'Sing Sing', Court: 'Kings', Count: 1 },
    ]);
  });

  it('produces (Attica, Erie, 2) from two matching records', () => {
    const pair = [
      makeDecodedRecord({ Institution: 'Attica', CourtCommittedByName: 'Erie' }),
      makeDecodedRecord({ Institution: 'Attica', CourtCommittedByName: 'Erie' }),
    ];

    expect(buildInstitutionCourtTally(pair).rows).toEqual([
      { Institution: 'Attica', Court: 'Erie', Count: 2 },
    ]);
  });
});

describe('buildInstitutionCountyTally', () => {
  it('cross-tabulates institution by county', () => {
    const table = buildInstitutionCountyTally(records);

    expect(table.columns).toEqual(['Institution', 'County', 'Count']);
    expect(table.rows).toEqual([
      { Institution: 'Attica', County: 'Erie', Count: 2 },
      { Institution: 'Attica', County: 'Monroe', Count: 1 },
      { Institution: 'Auburn', County: 'Erie', Count: 1 },
      { Institution: 'Sing Sing', County: 'Kings', Count: 1 },
    ]);
  });
});

describe('buildDimensionTally', () => {
  it('names the column after the field', () => {
    const table = buildDimensionTally(records, 'County');

    expect(table.columns).toEqual(['County', 'Count']);
    expect(table.rows).toEqual([
      { County: 'Erie', Count: 3 },
      { County: 'Kings', Count: 1 },
      { County: 'Monroe', Count: 1 },
    ]);
  });
});

describe('count invariant', () => {
  it('sums to the number of decoded records in every aggregate', () => {
    const tables = [
      buildDimensionTally(records, 'Institution'),
      buildInstitutionCourtTally(records),
      buildInstitutionCountyTally(records),
      buildCrossTab(records, [
        { header: 'Institution', field: 'Institution' },
        { header: 'County', field: 'County' },
        { header: 'Court', field: 'CourtCommittedByName' },
      ]),
    ];

    for (const table of tables) {
      expect(totalCount(table.rows)).toBe(records.length);
    }
  });
});
