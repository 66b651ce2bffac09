import path from 'node:path';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { readTextFile } from '../../../../infra/files/index.js';
import {
  LOOKUP_DOMAINS,
  LookupFileSchema,
  createLookupSet,
  lookupFileName,
  type LookupDomain,
  type LookupFileDTO,
  type LookupSet,
  type LookupTable,
} from '../../core/types.js';

import type { LookupError } from '../../core/errors.js';

const validator = TypeCompiler.Compile(LookupFileSchema);

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const readLookupFile = async (
  filePath: string
): Promise<Result<LookupFileDTO, LookupError>> => {
  const contents = await readTextFile(filePath);
  if (contents.isErr()) {
    return err(contents.error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents.value);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse JSON at ${filePath}: ${describeError(error)}`,
      path: filePath,
    });
  }

  if (!validator.Check(parsed)) {
    return err({
      type: 'SchemaValidationError',
      message: `Lookup file ${filePath} must map string codes to string labels`,
      path: filePath,
      details: [...validator.Errors(parsed)].map((e) => `${e.path}: ${e.message}`),
    });
  }

  return ok(parsed);
};

/**
 * Loads every domain table from `rootDir`. A single missing or malformed file fails the load.
 */
export const loadLookupSet = async (
  rootDir: string,
  domains: readonly LookupDomain[] = LOOKUP_DOMAINS
): Promise<Result<LookupSet, LookupError>> => {
  const tables = new Map<LookupDomain, LookupTable>();

  for (const domain of domains) {
    const result = await readLookupFile(path.join(rootDir, lookupFileName(domain)));
    if (result.isErr()) {
      return err(result.error);
    }
    tables.set(domain, new Map(Object.entries(result.value)));
  }

  return ok(createLookupSet(tables));
};
