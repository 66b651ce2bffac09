import path from 'node:path';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import {
  listFiles,
  readCsvTable,
  removeFiles,
  writeCsvFile,
  type FileEntry,
  type FileError,
} from '../../../../infra/files/index.js';
import { DECODED_COLUMNS, DecodedRecordSchema, type DecodedRecord } from '../../core/types.js';

import type { DecodedRepo } from '../../core/ports.js';

export const DECODED_FILE_SUFFIX = '_decoded.csv';

const decodedValidator = TypeCompiler.Compile(DecodedRecordSchema);

export interface DecodedRepoOptions {
  decodedDir: string;
}

export const createDecodedRepo = (options: DecodedRepoOptions): DecodedRepo => ({
  async writeDecodedFile(
    baseName: string,
    records: readonly DecodedRecord[]
  ): Promise<Result<string, FileError>> {
    const filePath = path.join(options.decodedDir, `${baseName}${DECODED_FILE_SUFFIX}`);
    const written = await writeCsvFile(filePath, DECODED_COLUMNS, records);
    if (written.isErr()) {
      return err(written.error);
    }
    return ok(filePath);
  },

  async listDecodedFiles(): Promise<Result<FileEntry[], FileError>> {
    return listFiles(options.decodedDir, DECODED_FILE_SUFFIX);
  },

  async clearDecodedFiles(): Promise<Result<string[], FileError>> {
    return removeFiles(options.decodedDir, DECODED_FILE_SUFFIX);
  },

  async readDecodedFile(entry: FileEntry): Promise<Result<DecodedRecord[], FileError>> {
    return readCsvTable(entry.absolutePath, decodedValidator);
  },
});
