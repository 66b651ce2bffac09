// Repository
export {
  createDecodedRepo,
  DECODED_FILE_SUFFIX,
  type DecodedRepoOptions,
} from './shell/repo/fs-repo.js';
export type { DecodedRepo } from './core/ports.js';

// Use cases
export { decodeRecord } from './core/usecases/decode-record.js';
export { decodeRecords } from './core/usecases/decode-records.js';
export { decodeSentence } from './core/sentence.js';

// Types
export { DecodedRecordSchema, DECODED_COLUMNS, DEFAULT_DECODE_OPTIONS } from './core/types.js';
export type {
  DecodedRecord,
  DecodedField,
  DecodeOptions,
  DecodedFile,
  DecodedRecordResult,
  UnresolvedCodePolicy,
  UnresolvedLookup,
  UnresolvedCodeSummary,
} from './core/types.js';

// Errors
export type { DecodingError, UnresolvedCodeError } from './core/errors.js';
