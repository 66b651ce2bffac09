/**
 * File-system helpers shared by every pipeline stage.
 * Failures come back as Result values carrying the offending path.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import { type Static, type TSchema } from '@sinclair/typebox';
import { parse as parseCsv } from 'csv-parse/sync';
import { stringify as stringifyCsv } from 'csv-stringify/sync';
import { err, ok, type Result } from 'neverthrow';

import type { TypeCheck } from '@sinclair/typebox/compiler';

export type FileError =
  | { type: 'NotFound'; message: string; path: string }
  | { type: 'ReadError'; message: string; path: string }
  | { type: 'ParseError'; message: string; path: string }
  | { type: 'WriteError'; message: string; path: string }
  | { type: 'InvalidRow'; message: string; path: string; line: number; details: string[] };

export interface FileEntry {
  /** File name without the matched suffix */
  baseName: string;
  fileName: string;
  absolutePath: string;
}

export type CsvValue = string | number;

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const toReadError = (filePath: string, error: unknown, what: string): FileError => {
  const code = (error as NodeJS.ErrnoException).code;
  if (code === 'ENOENT') {
    return { type: 'NotFound', message: `${what} not found at ${filePath}`, path: filePath };
  }

  return {
    type: 'ReadError',
    message: `Failed to read ${what} at ${filePath}: ${describe(error)}`,
    path: filePath,
  };
};

/**
 * Lists files directly under `rootDir` whose name ends with `suffix`, sorted by name.
 */
export const listFiles = async (
  rootDir: string,
  suffix: string
): Promise<Result<FileEntry[], FileError>> => {
  const normalizedRoot = path.resolve(rootDir);
  let entries;

  try {
    entries = await fs.readdir(normalizedRoot, { withFileTypes: true });
  } catch (error) {
    return err(toReadError(normalizedRoot, error, 'Directory'));
  }

  const files: FileEntry[] = [];

  for (const entry of entries) {
    if (entry.isFile() && entry.name.endsWith(suffix)) {
      files.push({
        baseName: entry.name.slice(0, entry.name.length - suffix.length),
        fileName: entry.name,
        absolutePath: path.join(normalizedRoot, entry.name),
      });
    }
  }

  return ok(
    files.sort((a, b) => (a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0))
  );
};

/**
 * Deletes the files under `rootDir` whose name ends with `suffix`. A missing
 * directory has nothing to delete. Resolves with the removed paths.
 */
export const removeFiles = async (
  rootDir: string,
  suffix: string
): Promise<Result<string[], FileError>> => {
  const listed = await listFiles(rootDir, suffix);
  if (listed.isErr()) {
    return listed.error.type === 'NotFound' ? ok([]) : err(listed.error);
  }

  const removed: string[] = [];
  for (const entry of listed.value) {
    try {
      await fs.rm(entry.absolutePath, { force: true });
    } catch (error) {
      return err({
        type: 'WriteError',
        message: `Failed to remove ${entry.absolutePath}: ${describe(error)}`,
        path: entry.absolutePath,
      });
    }
    removed.push(entry.absolutePath);
  }

  return ok(removed);
};

export const readTextFile = async (
  filePath: string,
  encoding: BufferEncoding = 'utf8'
): Promise<Result<string, FileError>> => {
  try {
    return ok(await fs.readFile(filePath, encoding));
  } catch (error) {
    return err(toReadError(filePath, error, 'File'));
  }
};

/**
 * Reads a headed CSV file. Every value stays a string; rows are returned unvalidated.
 */
export const readCsvFile = async (filePath: string): Promise<Result<unknown[], FileError>> => {
  const contents = await readTextFile(filePath);
  if (contents.isErr()) {
    return err(contents.error);
  }

  let rows: unknown;
  try {
    rows = parseCsv(contents.value, {
      columns: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse CSV at ${filePath}: ${describe(error)}`,
      path: filePath,
    });
  }

  if (!Array.isArray(rows)) {
    return err({
      type: 'ParseError',
      message: `Expected a list of rows in ${filePath}`,
      path: filePath,
    });
  }

  return ok(rows);
};

/**
 * Reads a headed CSV file and checks every row against a compiled schema.
 * The first failing row is reported with its one-based file line (header is line 1).
 */
export const readCsvTable = async <T extends TSchema>(
  filePath: string,
  validator: TypeCheck<T>
): Promise<Result<Static<T>[], FileError>> => {
  const rows = await readCsvFile(filePath);
  if (rows.isErr()) {
    return err(rows.error);
  }

  const records: Static<T>[] = [];

  for (const [index, row] of rows.value.entries()) {
    if (!validator.Check(row)) {
      const line = index + 2;
      return err({
        type: 'InvalidRow',
        message: `${filePath}:${String(line)}: row does not match the expected columns`,
        path: filePath,
        line,
        details: [...validator.Errors(row)].map((e) => `${e.path}: ${e.message}`),
      });
    }
    records.push(row);
  }

  return ok(records);
};

/**
 * Writes rows under a fixed header, creating the parent directory when needed.
 */
export const writeCsvFile = async (
  filePath: string,
  columns: readonly string[],
  rows: readonly Readonly<Record<string, CsvValue>>[]
): Promise<Result<void, FileError>> => {
  try {
    const contents = stringifyCsv([...rows], { header: true, columns: [...columns] });
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, contents, 'utf8');
    return ok(undefined);
  } catch (error) {
    return err({
      type: 'WriteError',
      message: `Failed to write ${filePath}: ${describe(error)}`,
      path: filePath,
    });
  }
};
