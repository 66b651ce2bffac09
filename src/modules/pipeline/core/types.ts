import type { UnresolvedCodeSummary } from '../../decoding/index.js';

export interface ParseStageResult {
  /** Interim CSV paths, in input order */
  files: string[];
  recordCount: number;
  skippedCount: number;
}

export interface DecodeStageResult {
  /** Decoded CSV paths, in input order */
  files: string[];
  recordCount: number;
  /** Unresolved codes across all files, keyed by field and code */
  unresolved: UnresolvedCodeSummary[];
}

export interface AggregateStageResult {
  recordCount: number;
  /** Report paths, in write order */
  reports: string[];
}

export interface PipelineSummary {
  parse: ParseStageResult;
  decode: DecodeStageResult;
  aggregate: AggregateStageResult;
}
