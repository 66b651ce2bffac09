import path from 'node:path';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import {
  listFiles,
  readCsvTable,
  readTextFile,
  removeFiles,
  writeCsvFile,
  type FileEntry,
  type FileError,
} from '../../../../infra/files/index.js';
import { INTERIM_COLUMNS } from '../../core/layout.js';
import { InterimRecordSchema, type InterimRecord } from '../../core/types.js';

import type { RecordsRepo } from '../../core/ports.js';

export const CARD_FILE_SUFFIX = '.txt';
export const INTERIM_FILE_SUFFIX = '_rawformatted.csv';

/** Card files are punched-card exports, not UTF-8. */
const CARD_ENCODING: BufferEncoding = 'latin1';

const interimValidator = TypeCompiler.Compile(InterimRecordSchema);

export interface RecordsRepoOptions {
  inputDir: string;
  interimDir: string;
}

export const createRecordsRepo = (options: RecordsRepoOptions): RecordsRepo => ({
  async listCardFiles(): Promise<Result<FileEntry[], FileError>> {
    return listFiles(options.inputDir, CARD_FILE_SUFFIX);
  },

  async readCardFile(entry: FileEntry): Promise<Result<string, FileError>> {
    return readTextFile(entry.absolutePath, CARD_ENCODING);
  },

  async writeInterimFile(
    baseName: string,
    records: readonly InterimRecord[]
  ): Promise<Result<string, FileError>> {
    const filePath = path.join(options.interimDir, `${baseName}${INTERIM_FILE_SUFFIX}`);
    const written = await writeCsvFile(filePath, INTERIM_COLUMNS, records);
    if (written.isErr()) {
      return err(written.error);
    }
    return ok(filePath);
  },

  async listInterimFiles(): Promise<Result<FileEntry[], FileError>> {
    return listFiles(options.interimDir, INTERIM_FILE_SUFFIX);
  },

  async clearInterimFiles(): Promise<Result<string[], FileError>> {
    return removeFiles(options.interimDir, INTERIM_FILE_SUFFIX);
  },

  async readInterimFile(entry: FileEntry): Promise<Result<InterimRecord[], FileError>> {
    return readCsvTable(entry.absolutePath, interimValidator);
  },
});
