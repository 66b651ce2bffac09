import { err, ok, type Result } from 'neverthrow';

import {
  runAggregateStage,
  type AggregateStageDeps,
  type AggregateStageInput,
} from './aggregate-stage.js';
import { runDecodeStage, type DecodeStageDeps, type DecodeStageInput } from './decode-stage.js';
import { runParseStage, type ParseStageDeps, type ParseStageInput } from './parse-stage.js';

import type { PipelineError } from '../errors.js';
import type { PipelineSummary } from '../types.js';

export interface PipelineStageDeps {
  parse: ParseStageDeps;
  decode: DecodeStageDeps;
  aggregate: AggregateStageDeps;
}

export interface PipelineStageInput {
  parse: ParseStageInput;
  decode: DecodeStageInput;
  aggregate: AggregateStageInput;
}

/**
 * Runs parse → decode → aggregate. Each stage reads what the previous one
 * persisted; the first failing stage stops the run.
 */
export const runPipelineStages = async (
  deps: PipelineStageDeps,
  input: PipelineStageInput
): Promise<Result<PipelineSummary, PipelineError>> => {
  const parse = await runParseStage(deps.parse, input.parse);
  if (parse.isErr()) return err(parse.error);

  const decode = await runDecodeStage(deps.decode, input.decode);
  if (decode.isErr()) return err(decode.error);

  const aggregate = await runAggregateStage(deps.aggregate, input.aggregate);
  if (aggregate.isErr()) return err(aggregate.error);

  return ok({ parse: parse.value, decode: decode.value, aggregate: aggregate.value });
};
