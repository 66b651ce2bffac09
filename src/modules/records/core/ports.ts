import type { InterimRecord } from './types.js';
import type { FileEntry, FileError } from '../../../infra/files/index.js';
import type { Result } from 'neverthrow';

export interface RecordsRepo {
  /**
   * List raw card files in the input directory, sorted by name.
   */
  listCardFiles(): Promise<Result<FileEntry[], FileError>>;

  readCardFile(entry: FileEntry): Promise<Result<string, FileError>>;

  /**
   * Persist an interim table. Resolves with the written path.
   */
  writeInterimFile(
    baseName: string,
    records: readonly InterimRecord[]
  ): Promise<Result<string, FileError>>;

  listInterimFiles(): Promise<Result<FileEntry[], FileError>>;

  /**
   * Delete every interim table. Resolves with the removed paths.
   */
  clearInterimFiles(): Promise<Result<string[], FileError>>;

  /**
   * Read an interim table back, validating every row against the interim schema.
   */
  readInterimFile(entry: FileEntry): Promise<Result<InterimRecord[], FileError>>;
}
