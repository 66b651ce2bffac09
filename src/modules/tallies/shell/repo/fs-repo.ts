import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { writeCsvFile, type FileError } from '../../../../infra/files/index.js';

import type { ReportsRepo } from '../../core/ports.js';
import type { TallyTable } from '../../core/types.js';

export interface ReportsRepoOptions {
  reportsDir: string;
}

export const createReportsRepo = (options: ReportsRepoOptions): ReportsRepo => ({
  async writeReport(fileName: string, table: TallyTable): Promise<Result<string, FileError>> {
    const filePath = path.join(options.reportsDir, fileName);
    const written = await writeCsvFile(filePath, table.columns, table.rows);
    if (written.isErr()) {
      return err(written.error);
    }
    return ok(filePath);
  },
});
