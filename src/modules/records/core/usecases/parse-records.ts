import { err, ok, type Result } from 'neverthrow';

import { parseLine } from './parse-line.js';

import type { RecordsError } from '../errors.js';
import type { InterimRecord, MalformedLinePolicy, ParsedFile } from '../types.js';

export interface ParseRecordsOptions {
  policy: MalformedLinePolicy;
  onSkip?: (error: RecordsError) => void;
}

/**
 * Parses every non-blank line of a card file.
 *
 * Under the `skip` policy malformed lines are reported through `onSkip` and
 * left out; under `fail` the first malformed line aborts the file.
 */
export const parseRecords = (
  text: string,
  source: string,
  options: ParseRecordsOptions
): Result<ParsedFile, RecordsError> => {
  const records: InterimRecord[] = [];
  const skippedLines: number[] = [];
  const lines = text.split('\n');

  for (const [index, line] of lines.entries()) {
    if (line.trim() === '') continue;

    const lineNumber = index + 1;
    const parsed = parseLine(line, source, lineNumber);

    if (parsed.isErr()) {
      if (parsed.error.type !== 'MalformedLineError' || options.policy === 'fail') {
        return err(parsed.error);
      }
      skippedLines.push(lineNumber);
      options.onSkip?.(parsed.error);
      continue;
    }

    records.push(parsed.value);
  }

  return ok({ source, records, skippedLines });
};
