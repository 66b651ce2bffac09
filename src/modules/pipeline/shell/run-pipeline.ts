/**
 * Wires the file-system repositories to the pipeline stages.
 */

import { createStageLogger } from '../../../infra/logger/index.js';
import { createDecodedRepo } from '../../decoding/index.js';
import { loadLookupSet } from '../../lookups/index.js';
import { createRecordsRepo } from '../../records/index.js';
import { createReportsRepo } from '../../tallies/index.js';
import { runPipelineStages } from '../core/usecases/run-pipeline.js';

import type { AppConfig } from '../../../infra/config/index.js';
import type { PipelineError } from '../core/errors.js';
import type { PipelineSummary } from '../core/types.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

export type PipelineConfig = Pick<AppConfig, 'paths' | 'parsing' | 'decoding' | 'reports'>;

export const runPipeline = async (
  config: PipelineConfig,
  logger: Logger
): Promise<Result<PipelineSummary, PipelineError>> => {
  const { paths } = config;

  const recordsRepo = createRecordsRepo({
    inputDir: paths.inputDir,
    interimDir: paths.interimDir,
  });
  const decodedRepo = createDecodedRepo({ decodedDir: paths.decodedDir });
  const reportsRepo = createReportsRepo({ reportsDir: paths.reportsDir });

  return runPipelineStages(
    {
      parse: { recordsRepo, logger: createStageLogger(logger, 'parse') },
      decode: {
        recordsRepo,
        decodedRepo,
        loadLookups: () => loadLookupSet(paths.lookupsDir),
        logger: createStageLogger(logger, 'decode'),
      },
      aggregate: { decodedRepo, reportsRepo, logger: createStageLogger(logger, 'aggregate') },
    },
    {
      parse: {
        malformedLinePolicy: config.parsing.malformedLinePolicy,
        inputDir: paths.inputDir,
      },
      decode: { options: config.decoding, interimDir: paths.interimDir },
      aggregate: {
        tallyDimension: config.reports.tallyDimension,
        histpun: config.reports.histpun,
        decodedDir: paths.decodedDir,
      },
    }
  );
};
