/**
 * Aggregate stage: decoded CSV tables → tallies and histpun reports.
 */

import { err, ok, type Result } from 'neverthrow';

import { DECODED_FILE_SUFFIX } from '../../../decoding/index.js';
import {
  buildDimensionTally,
  buildHistpunReport,
  buildInstitutionCountyTally,
  buildInstitutionCourtTally,
} from '../../../tallies/index.js';
import { createNoInputError, createPipelineError, type PipelineError } from '../errors.js';

import type { DecodedField, DecodedRecord, DecodedRepo } from '../../../decoding/index.js';
import type { HistpunOptions, ReportsRepo, TallyTable } from '../../../tallies/index.js';
import type { AggregateStageResult } from '../types.js';
import type { Logger } from 'pino';

export interface AggregateStageDeps {
  decodedRepo: DecodedRepo;
  reportsRepo: ReportsRepo;
  logger: Logger;
}

export interface AggregateStageInput {
  tallyDimension: DecodedField;
  histpun: HistpunOptions;
  /** Shown in the no-input error */
  decodedDir: string;
}

interface ReportJob {
  fileName: string;
  build: (records: readonly DecodedRecord[]) => TallyTable;
}

export const reportJobs = (input: AggregateStageInput): ReportJob[] => [
  {
    fileName: `tally_${input.tallyDimension.toLowerCase()}.csv`,
    build: (records) => buildDimensionTally(records, input.tallyDimension),
  },
  { fileName: 'institution_court.csv', build: buildInstitutionCourtTally },
  { fileName: 'institution_county.csv', build: buildInstitutionCountyTally },
  {
    fileName: 'histpun_output.csv',
    build: (records) => buildHistpunReport(records, 'general', input.histpun),
  },
  {
    fileName: 'histpun_inst_court.csv',
    build: (records) => buildHistpunReport(records, 'institution-court', input.histpun),
  },
  {
    fileName: 'histpun_inst_county.csv',
    build: (records) => buildHistpunReport(records, 'institution-county', input.histpun),
  },
];

export const runAggregateStage = async (
  deps: AggregateStageDeps,
  input: AggregateStageInput
): Promise<Result<AggregateStageResult, PipelineError>> => {
  const { decodedRepo, reportsRepo, logger } = deps;
  const log = logger.child({ usecase: 'runAggregateStage' });

  const listResult = await decodedRepo.listDecodedFiles();
  if (listResult.isErr()) {
    return err(createPipelineError('aggregate', listResult.error));
  }

  const files = listResult.value;
  if (files.length === 0) {
    return err(createNoInputError('aggregate', input.decodedDir, DECODED_FILE_SUFFIX));
  }

  const records: DecodedRecord[] = [];
  for (const file of files) {
    const decoded = await decodedRepo.readDecodedFile(file);
    if (decoded.isErr()) {
      return err(createPipelineError('aggregate', decoded.error));
    }
    records.push(...decoded.value);
  }

  log.debug({ files: files.length, records: records.length }, 'Loaded decoded records');

  const reports: string[] = [];
  for (const job of reportJobs(input)) {
    const table = job.build(records);
    const written = await reportsRepo.writeReport(job.fileName, table);
    if (written.isErr()) {
      return err(createPipelineError('aggregate', written.error));
    }

    reports.push(written.value);
    log.info({ report: written.value, rows: table.rows.length }, 'Wrote report');
  }

  return ok({ recordCount: records.length, reports });
};
