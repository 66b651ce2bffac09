/**
 * Pipeline errors.
 *
 * Every stage failure is wrapped with the stage name, plus the file, line and
 * field of the underlying error when it has them.
 */

import type { DecodingError } from '../../decoding/index.js';
import type { LookupError } from '../../lookups/index.js';
import type { RecordsError } from '../../records/index.js';

export type PipelineStage = 'parse' | 'decode' | 'aggregate';

export type StageCause = RecordsError | LookupError | DecodingError;

export interface PipelineError {
  readonly type: 'PipelineError';
  readonly stage: PipelineStage;
  readonly message: string;
  readonly file?: string;
  readonly line?: number;
  readonly field?: string;
  readonly cause: StageCause | { type: 'NoInput'; message: string; path: string };
}

const fileOf = (cause: PipelineError['cause']): string | undefined => {
  if ('path' in cause) return cause.path;
  if ('source' in cause && typeof cause.source === 'string') return cause.source;
  return undefined;
};

const lineOf = (cause: PipelineError['cause']): number | undefined =>
  'line' in cause && typeof cause.line === 'number' ? cause.line : undefined;

const fieldOf = (cause: PipelineError['cause']): string | undefined =>
  'field' in cause ? cause.field : undefined;

export const createPipelineError = (
  stage: PipelineStage,
  cause: PipelineError['cause']
): PipelineError => {
  const file = fileOf(cause);
  const line = lineOf(cause);
  const field = fieldOf(cause);

  return {
    type: 'PipelineError',
    stage,
    message: `[${stage}] ${cause.message}`,
    ...(file === undefined ? {} : { file }),
    ...(line === undefined ? {} : { line }),
    ...(field === undefined ? {} : { field }),
    cause,
  };
};

export const createNoInputError = (
  stage: PipelineStage,
  dir: string,
  pattern: string
): PipelineError =>
  createPipelineError(stage, {
    type: 'NoInput',
    message: `No files matching '*${pattern}' in ${dir}`,
    path: dir,
  });
