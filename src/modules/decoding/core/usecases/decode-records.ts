import { err, ok, type Result } from 'neverthrow';

import { decodeRecord } from './decode-record.js';
import { createUnresolvedCodeError, type UnresolvedCodeError } from '../errors.js';

import type { LookupSet } from '../../../lookups/index.js';
import type { InterimRecord } from '../../../records/index.js';
import type {
  DecodeOptions,
  DecodedFile,
  DecodedRecord,
  UnresolvedCodeSummary,
  UnresolvedLookup,
} from '../types.js';

const summaryKey = (entry: UnresolvedLookup): string => `${entry.field}\u0000${entry.code}`;

const compareSummaries = (a: UnresolvedCodeSummary, b: UnresolvedCodeSummary): number => {
  if (a.field !== b.field) return a.field < b.field ? -1 : 1;
  if (a.code !== b.code) return a.code < b.code ? -1 : 1;
  return 0;
};

/**
 * Decodes an interim table read from `source`.
 * Unresolved codes are counted per field and code; errors carry the CSV line (header is line 1).
 */
export const decodeRecords = (
  records: readonly InterimRecord[],
  source: string,
  lookups: LookupSet,
  options: DecodeOptions
): Result<DecodedFile, UnresolvedCodeError> => {
  const decoded: DecodedRecord[] = [];
  const counts = new Map<string, UnresolvedCodeSummary>();

  for (const [index, record] of records.entries()) {
    const result = decodeRecord(record, lookups, options);

    if (result.isErr()) {
      const { field, domain, code } = result.error;
      return err(createUnresolvedCodeError(field, domain, code, { source, line: index + 2 }));
    }

    decoded.push(result.value.record);

    for (const entry of result.value.unresolved) {
      const key = summaryKey(entry);
      const existing = counts.get(key);
      if (existing === undefined) {
        counts.set(key, { ...entry, count: 1 });
      } else {
        existing.count += 1;
      }
    }
  }

  return ok({
    source,
    records: decoded,
    unresolved: [...counts.values()].sort(compareSummaries),
  });
};
