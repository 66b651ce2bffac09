// Shell
export { runPipeline, type PipelineConfig } from './shell/run-pipeline.js';

// Use cases
export {
  runParseStage,
  type ParseStageDeps,
  type ParseStageInput,
} from './core/usecases/parse-stage.js';
export {
  runDecodeStage,
  type DecodeStageDeps,
  type DecodeStageInput,
} from './core/usecases/decode-stage.js';
export {
  runAggregateStage,
  reportJobs,
  type AggregateStageDeps,
  type AggregateStageInput,
} from './core/usecases/aggregate-stage.js';
export {
  runPipelineStages,
  type PipelineStageDeps,
  type PipelineStageInput,
} from './core/usecases/run-pipeline.js';

// Types
export type {
  AggregateStageResult,
  DecodeStageResult,
  ParseStageResult,
  PipelineSummary,
} from './core/types.js';

// Errors
export {
  createPipelineError,
  createNoInputError,
  type PipelineError,
  type PipelineStage,
  type StageCause,
} from './core/errors.js';
