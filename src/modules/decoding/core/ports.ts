import type { DecodedRecord } from './types.js';
import type { FileEntry, FileError } from '../../../infra/files/index.js';
import type { Result } from 'neverthrow';

export interface DecodedRepo {
  /**
   * Persist a decoded table. Resolves with the written path.
   */
  writeDecodedFile(
    baseName: string,
    records: readonly DecodedRecord[]
  ): Promise<Result<string, FileError>>;

  /**
   * List decoded tables, sorted by name.
   */
  listDecodedFiles(): Promise<Result<FileEntry[], FileError>>;

  /**
   * Delete every decoded table. Resolves with the removed paths.
   */
  clearDecodedFiles(): Promise<Result<string[], FileError>>;

  readDecodedFile(entry: FileEntry): Promise<Result<DecodedRecord[], FileError>>;
}
