import type { FileError } from '../../../infra/files/index.js';

export type LookupError =
  | FileError
  | { type: 'SchemaValidationError'; message: string; path: string; details: string[] };
