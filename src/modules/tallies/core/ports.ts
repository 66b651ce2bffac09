import type { TallyTable } from './types.js';
import type { FileError } from '../../../infra/files/index.js';
import type { Result } from 'neverthrow';

export interface ReportsRepo {
  /**
   * Write a report under the reports directory. Resolves with the written path.
   */
  writeReport(fileName: string, table: TallyTable): Promise<Result<string, FileError>>;
}
