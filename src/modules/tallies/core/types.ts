import type { CsvValue } from '../../../infra/files/index.js';

export interface CountRow {
  key: readonly string[];
  count: number;
}

/**
 * A report ready to be written: header order plus rows keyed by header.
 */
export interface TallyTable {
  columns: string[];
  rows: Record<string, CsvValue>[];
}

export type AgeCategory = 'juvenile' | 'adult' | '';

export type HistpunReportKind = 'general' | 'institution-court' | 'institution-county';

export interface HistpunOptions {
  country: string;
  state: string;
  statistic: string;
  /** Per-year source key is `<sourcePrefix><year>` */
  sourcePrefix: string;
}

export const DEFAULT_HISTPUN_OPTIONS: HistpunOptions = {
  country: 'United States',
  state: 'New York',
  statistic: 'prisoners',
  sourcePrefix: 'NYInmateRecords',
};

/**
 * Qualifier columns of a histpun row. Unset qualifiers are written as ''.
 */
export interface HistpunQualifiers {
  Race?: string;
  Gender?: string;
  Religion?: string;
  Age?: string;
  Crime?: string;
  Institution?: string;
  Court?: string;
  County?: string;
  Complete?: string;
}

export interface HistpunEntry extends HistpunQualifiers {
  Value: number;
}
