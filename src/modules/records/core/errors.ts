/**
 * Domain errors for the fixed-width records module.
 */

import type { FileError } from '../../../infra/files/index.js';

export interface MalformedLineError {
  readonly type: 'MalformedLineError';
  readonly message: string;
  readonly source: string;
  readonly line: number;
}

export interface LayoutMismatchError {
  readonly type: 'LayoutMismatchError';
  readonly message: string;
  readonly details: string[];
}

export type RecordsError = MalformedLineError | LayoutMismatchError | FileError;

export const createMalformedLineError = (
  source: string,
  line: number,
  message: string
): MalformedLineError => ({
  type: 'MalformedLineError',
  message: `${source}:${String(line)}: ${message}`,
  source,
  line,
});
