/**
 * Decode stage: interim CSV tables + lookup tables → decoded CSV tables.
 */

import { err, ok, type Result } from 'neverthrow';

import { decodeRecords } from '../../../decoding/index.js';
import { INTERIM_FILE_SUFFIX } from '../../../records/index.js';
import { compareKeys } from '../../../tallies/index.js';
import { createNoInputError, createPipelineError, type PipelineError } from '../errors.js';

import type { DecodeOptions, DecodedRepo, UnresolvedCodeSummary } from '../../../decoding/index.js';
import type { LookupError, LookupSet } from '../../../lookups/index.js';
import type { RecordsRepo } from '../../../records/index.js';
import type { DecodeStageResult } from '../types.js';
import type { Logger } from 'pino';

export interface DecodeStageDeps {
  recordsRepo: RecordsRepo;
  decodedRepo: DecodedRepo;
  loadLookups: () => Promise<Result<LookupSet, LookupError>>;
  logger: Logger;
}

export interface DecodeStageInput {
  options: DecodeOptions;
  /** Shown in the no-input error */
  interimDir: string;
}

const mergeUnresolved = (
  into: Map<string, UnresolvedCodeSummary>,
  entries: readonly UnresolvedCodeSummary[]
): void => {
  for (const entry of entries) {
    const key = `${entry.field}\u0000${entry.code}`;
    const existing = into.get(key);
    if (existing === undefined) {
      into.set(key, { ...entry });
    } else {
      existing.count += entry.count;
    }
  }
};

export const runDecodeStage = async (
  deps: DecodeStageDeps,
  input: DecodeStageInput
): Promise<Result<DecodeStageResult, PipelineError>> => {
  const { recordsRepo, decodedRepo, loadLookups, logger } = deps;
  const log = logger.child({ usecase: 'runDecodeStage' });

  const lookups = await loadLookups();
  if (lookups.isErr()) {
    return err(createPipelineError('decode', lookups.error));
  }

  const listResult = await recordsRepo.listInterimFiles();
  if (listResult.isErr()) {
    return err(createPipelineError('decode', listResult.error));
  }

  const files = listResult.value;
  if (files.length === 0) {
    return err(createNoInputError('decode', input.interimDir, INTERIM_FILE_SUFFIX));
  }

  const cleared = await decodedRepo.clearDecodedFiles();
  if (cleared.isErr()) {
    return err(createPipelineError('decode', cleared.error));
  }
  if (cleared.value.length > 0) {
    log.debug({ removed: cleared.value.length }, 'Removed previous decoded files');
  }

  const written: string[] = [];
  const unresolved = new Map<string, UnresolvedCodeSummary>();
  let recordCount = 0;

  for (const file of files) {
    const interim = await recordsRepo.readInterimFile(file);
    if (interim.isErr()) {
      return err(createPipelineError('decode', interim.error));
    }

    const decoded = decodeRecords(interim.value, file.fileName, lookups.value, input.options);
    if (decoded.isErr()) {
      return err(createPipelineError('decode', decoded.error));
    }

    const writeResult = await decodedRepo.writeDecodedFile(file.baseName, decoded.value.records);
    if (writeResult.isErr()) {
      return err(createPipelineError('decode', writeResult.error));
    }

    for (const entry of decoded.value.unresolved) {
      log.warn(
        { file: file.fileName, field: entry.field, code: entry.code, count: entry.count },
        'Unresolved code'
      );
    }

    mergeUnresolved(unresolved, decoded.value.unresolved);
    recordCount += decoded.value.records.length;
    written.push(writeResult.value);

    log.info(
      { file: file.fileName, records: decoded.value.records.length, output: writeResult.value },
      'Decoded interim file'
    );
  }

  const summary = [...unresolved.values()].sort(
    (a, b) => compareKeys([a.field, a.code], [b.field, b.code])
  );

  return ok({ files: written, recordCount, unresolved: summary });
};
