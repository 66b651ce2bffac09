// Repository
export {
  createRecordsRepo,
  CARD_FILE_SUFFIX,
  INTERIM_FILE_SUFFIX,
  type RecordsRepoOptions,
} from './shell/repo/fs-repo.js';
export type { RecordsRepo } from './core/ports.js';

// Use cases
export { parseLine, sliceFields, toCardImage } from './core/usecases/parse-line.js';
export { parseRecords, type ParseRecordsOptions } from './core/usecases/parse-records.js';

// Layout and dates
export { RECORD_LAYOUT, RECORD_WIDTH, INTERIM_COLUMNS } from './core/layout.js';
export {
  normalizeDate,
  expandYear,
  isoYear,
  isMissingMarker,
  isValidCalendarDate,
  MISSING_MARKERS,
} from './core/dates.js';

// Types
export { InterimRecordSchema } from './core/types.js';
export type {
  InterimRecord,
  RecordField,
  FieldSpec,
  DateFormat,
  CenturyRule,
  DateFieldSpec,
  MalformedLinePolicy,
  ParsedFile,
} from './core/types.js';

// Errors
export type { RecordsError, MalformedLineError, LayoutMismatchError } from './core/errors.js';
