// Repository
export { createReportsRepo, type ReportsRepoOptions } from './shell/repo/fs-repo.js';
export type { ReportsRepo } from './core/ports.js';

// Reducers
export {
  tally,
  compareKeys,
  buildCrossTab,
  buildDimensionTally,
  buildInstitutionCourtTally,
  buildInstitutionCountyTally,
  type TallyDimension,
} from './core/tally.js';

// Histpun reports
export {
  buildHistpunReport,
  histpunColumns,
  prepareHistpunRecords,
  ageAtReception,
  classifyAge,
  crimeCategory,
  parseIsoDay,
  type HistpunRecord,
} from './core/histpun.js';

// Types
export { DEFAULT_HISTPUN_OPTIONS } from './core/types.js';
export type {
  AgeCategory,
  CountRow,
  HistpunEntry,
  HistpunOptions,
  HistpunQualifiers,
  HistpunReportKind,
  TallyTable,
} from './core/types.js';
