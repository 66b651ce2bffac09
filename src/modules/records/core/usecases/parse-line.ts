import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { isoYear, normalizeDate } from '../dates.js';
import { createMalformedLineError, type MalformedLineError, type RecordsError } from '../errors.js';
import { RECORD_LAYOUT, RECORD_WIDTH } from '../layout.js';
import { InterimRecordSchema, type FieldSpec, type InterimRecord } from '../types.js';

const interimValidator = TypeCompiler.Compile(InterimRecordSchema);

/**
 * Strips the line terminator and pads short lines to the record width.
 * Editors and transfer tools routinely drop trailing blanks, so a short line
 * is read as having blank trailing fields.
 */
export const toCardImage = (
  line: string,
  source: string,
  lineNumber: number
): Result<string, MalformedLineError> => {
  const stripped = line.replace(/\r$/, '');

  if (stripped.length > RECORD_WIDTH) {
    return err(
      createMalformedLineError(
        source,
        lineNumber,
        `line is ${String(stripped.length)} characters, expected at most ${String(RECORD_WIDTH)}`
      )
    );
  }

  return ok(stripped.padEnd(RECORD_WIDTH, ' '));
};

/**
 * Slices a card image into raw field values. No trimming, no date handling.
 */
export const sliceFields = (
  card: string,
  layout: readonly FieldSpec[] = RECORD_LAYOUT
): Map<string, string> => {
  const fields = new Map<string, string>();
  for (const spec of layout) {
    fields.set(spec.name, card.slice(spec.start, spec.end));
  }
  return fields;
};

/**
 * Parses one card line into an interim record.
 *
 * Dates without a century rule relative to receipt are normalized first, so
 * DateOfBirth can pivot on the already-expanded DateReceived year.
 */
export const parseLine = (
  line: string,
  source: string,
  lineNumber: number,
  layout: readonly FieldSpec[] = RECORD_LAYOUT
): Result<InterimRecord, RecordsError> => {
  const card = toCardImage(line, source, lineNumber);
  if (card.isErr()) {
    return err(card.error);
  }

  const raw = sliceFields(card.value, layout);
  const values: Record<string, string> = {};

  for (const spec of layout) {
    const value = raw.get(spec.name) ?? '';
    values[spec.name] =
      spec.date !== undefined && spec.date.century === 'fixed-1900'
        ? normalizeDate(value, spec.date.format, 'fixed-1900')
        : value;
  }

  const receivedYear = isoYear(values['DateReceived'] ?? '');

  for (const spec of layout) {
    if (spec.date?.century === 'relative-to-received') {
      values[spec.name] = normalizeDate(
        raw.get(spec.name) ?? '',
        spec.date.format,
        'relative-to-received',
        receivedYear
      );
    }
  }

  if (!interimValidator.Check(values)) {
    return err({
      type: 'LayoutMismatchError',
      message: 'Record layout does not cover every interim field',
      details: [...interimValidator.Errors(values)].map((e) => `${e.path}: ${e.message}`),
    });
  }

  return ok(values);
};
