import type { CountRow, TallyTable } from './types.js';
import type { DecodedField, DecodedRecord } from '../../decoding/index.js';

const KEY_SEPARATOR = '\u0000';

export const compareKeys = (a: readonly string[], b: readonly string[]): number => {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i] ?? '';
    const right = b[i] ?? '';
    if (left !== right) return left < right ? -1 : 1;
  }
  return a.length - b.length;
};

/**
 * Counts records per distinct key tuple in a single scan.
 * Rows come back sorted by key (code-unit order), so output is stable across runs.
 */
export const tally = <T>(
  records: readonly T[],
  keyOf: (record: T) => readonly string[]
): CountRow[] => {
  const counts = new Map<string, CountRow>();

  for (const record of records) {
    const key = keyOf(record);
    const id = key.join(KEY_SEPARATOR);
    const existing = counts.get(id);
    if (existing === undefined) {
      counts.set(id, { key, count: 1 });
    } else {
      existing.count += 1;
    }
  }

  return [...counts.values()].sort((a, b) => compareKeys(a.key, b.key));
};

export interface TallyDimension {
  header: string;
  field: DecodedField;
}

/**
 * Cross-tabulates decoded records over the given dimensions.
 * The count column is always last and named `Count`.
 */
export const buildCrossTab = (
  records: readonly DecodedRecord[],
  dimensions: readonly TallyDimension[]
): TallyTable => {
  const rows = tally(records, (record) => dimensions.map((d) => record[d.field]));

  return {
    columns: [...dimensions.map((d) => d.header), 'Count'],
    rows: rows.map((row) => {
      const out: Record<string, string | number> = {};
      dimensions.forEach((d, i) => {
        out[d.header] = row.key[i] ?? '';
      });
      out['Count'] = row.count;
      return out;
    }),
  };
};

export const buildDimensionTally = (
  records: readonly DecodedRecord[],
  field: DecodedField
): TallyTable => buildCrossTab(records, [{ header: field, field }]);

export const buildInstitutionCourtTally = (records: readonly DecodedRecord[]): TallyTable =>
  buildCrossTab(records, [
    { header: 'Institution', field: 'Institution' },
    { header: 'Court', field: 'CourtCommittedByName' },
  ]);

export const buildInstitutionCountyTally = (records: readonly DecodedRecord[]): TallyTable =>
  buildCrossTab(records, [
    { header: 'Institution', field: 'Institution' },
    { header: 'County', field: 'County' },
  ]);
