/**
 * Parse stage: raw card files → interim CSV tables.
 */

import { err, ok, type Result } from 'neverthrow';

import { CARD_FILE_SUFFIX, parseRecords } from '../../../records/index.js';
import { createNoInputError, createPipelineError, type PipelineError } from '../errors.js';

import type { MalformedLinePolicy, RecordsRepo } from '../../../records/index.js';
import type { ParseStageResult } from '../types.js';
import type { Logger } from 'pino';

export interface ParseStageDeps {
  recordsRepo: RecordsRepo;
  logger: Logger;
}

export interface ParseStageInput {
  malformedLinePolicy: MalformedLinePolicy;
  /** Shown in the no-input error */
  inputDir: string;
}

export const runParseStage = async (
  deps: ParseStageDeps,
  input: ParseStageInput
): Promise<Result<ParseStageResult, PipelineError>> => {
  const { recordsRepo, logger } = deps;
  const log = logger.child({ usecase: 'runParseStage' });

  const listResult = await recordsRepo.listCardFiles();
  if (listResult.isErr()) {
    return err(createPipelineError('parse', listResult.error));
  }

  const files = listResult.value;
  if (files.length === 0) {
    return err(createNoInputError('parse', input.inputDir, CARD_FILE_SUFFIX));
  }

  // Interim tables from earlier runs must not reach the decode stage
  const cleared = await recordsRepo.clearInterimFiles();
  if (cleared.isErr()) {
    return err(createPipelineError('parse', cleared.error));
  }
  if (cleared.value.length > 0) {
    log.debug({ removed: cleared.value.length }, 'Removed previous interim files');
  }

  const written: string[] = [];
  let recordCount = 0;
  let skippedCount = 0;

  for (const file of files) {
    const text = await recordsRepo.readCardFile(file);
    if (text.isErr()) {
      return err(createPipelineError('parse', text.error));
    }

    const parsed = parseRecords(text.value, file.fileName, {
      policy: input.malformedLinePolicy,
      onSkip: (error) => {
        log.warn({ file: file.fileName, error }, 'Skipped malformed line');
      },
    });
    if (parsed.isErr()) {
      return err(createPipelineError('parse', parsed.error));
    }

    const writeResult = await recordsRepo.writeInterimFile(file.baseName, parsed.value.records);
    if (writeResult.isErr()) {
      return err(createPipelineError('parse', writeResult.error));
    }

    recordCount += parsed.value.records.length;
    skippedCount += parsed.value.skippedLines.length;
    written.push(writeResult.value);

    log.info(
      {
        file: file.fileName,
        records: parsed.value.records.length,
        skipped: parsed.value.skippedLines.length,
        output: writeResult.value,
      },
      'Parsed card file'
    );
  }

  return ok({ files: written, recordCount, skippedCount });
};
