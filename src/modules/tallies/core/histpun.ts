import { isValidCalendarDate } from '../../records/index.js';
import { tally } from './tally.js';

import type {
  AgeCategory,
  HistpunEntry,
  HistpunOptions,
  HistpunQualifiers,
  HistpunReportKind,
  TallyTable,
} from './types.js';
import type { DecodedRecord } from '../../decoding/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DAY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ADULT_AGE = 18;

export interface HistpunRecord {
  record: DecodedRecord;
  year: number;
  ageCategory: AgeCategory;
  crimeCategory: string;
}

type Section = (records: readonly HistpunRecord[]) => HistpunEntry[];

interface ReportDefinition {
  qualifierColumns: (keyof HistpunQualifiers)[];
  sections: Section[];
}

/** Milliseconds since epoch for a valid `YYYY-MM-DD`, otherwise undefined. */
export const parseIsoDay = (value: string): number | undefined => {
  const match = ISO_DAY_RE.exec(value.trim());
  if (match === null) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (!isValidCalendarDate(year, month, day)) return undefined;

  return Date.UTC(year, month - 1, day);
};

/**
 * Age in whole years at reception, counting 365-day years.
 */
export const ageAtReception = (dateOfBirth: string, dateReceived: string): number | undefined => {
  const born = parseIsoDay(dateOfBirth);
  const received = parseIsoDay(dateReceived);
  if (born === undefined || received === undefined) return undefined;

  const days = Math.floor((received - born) / DAY_MS);
  return Math.floor(days / 365);
};

export const classifyAge = (age: number | undefined): AgeCategory => {
  if (age === undefined) return '';
  return age < ADULT_AGE ? 'juvenile' : 'adult';
};

/** Text before the first comma, trimmed and lowercased: "Larceny, degree 2nd" → "larceny". */
export const crimeCategory = (crime: string): string => {
  const [head = ''] = crime.split(',', 1);
  return head.trim().toLowerCase();
};

/**
 * Attaches year, age category and crime category.
 * Records whose DateReceived is not a valid date cannot be placed in a year and are dropped.
 */
export const prepareHistpunRecords = (records: readonly DecodedRecord[]): HistpunRecord[] => {
  const prepared: HistpunRecord[] = [];

  for (const record of records) {
    const received = parseIsoDay(record.DateReceived);
    if (received === undefined) continue;

    prepared.push({
      record,
      year: new Date(received).getUTCFullYear(),
      ageCategory: classifyAge(ageAtReception(record.DateOfBirth, record.DateReceived)),
      crimeCategory: crimeCategory(record.Crime),
    });
  }

  return prepared;
};

const normalizeLabel = (value: string): string => value.trim().toLowerCase();

/**
 * Groups by the given raw values, skipping groups with a blank value,
 * and maps each group to an entry.
 */
const grouped =
  (
    keyOf: (item: HistpunRecord) => readonly string[],
    toQualifiers: (labels: readonly string[]) => HistpunQualifiers
  ): Section =>
  (records) =>
    tally(records, keyOf)
      .map((row) => ({ labels: row.key.map(normalizeLabel), count: row.count }))
      .filter(({ labels }) => labels.every((label) => label !== ''))
      .map(({ labels, count }) => ({ ...toQualifiers(labels), Value: count }));

const total: Section = (records) => [{ Value: records.length }];

const byRaceGender = grouped(
  ({ record }) => [record.RaceName, record.SexName],
  ([race = '', gender = '']) => ({ Race: race, Gender: gender, Complete: 'race,gender' })
);

const byRace = grouped(
  ({ record }) => [record.RaceName],
  ([race = '']) => ({ Race: race, Complete: 'race' })
);

const byGender = grouped(
  ({ record }) => [record.SexName],
  ([gender = '']) => ({ Gender: gender, Complete: 'gender' })
);

const byReligion = grouped(
  ({ record }) => [record.ReligionName],
  ([religion = '']) => ({ Religion: religion, Complete: 'religion' })
);

// Complete only when both categories occur in the year.
const byAge: Section = (records) => {
  const seen = new Set(records.map((item) => item.ageCategory));
  const complete = seen.has('juvenile') && seen.has('adult') ? 'age' : '';
  return grouped(
    (item) => [item.ageCategory],
    ([age = '']) => ({ Age: age, Complete: complete })
  )(records);
};

const byCrime = grouped(
  (item) => [item.crimeCategory],
  ([crime = '']) => ({ Crime: crime })
);

const byInstitution = grouped(
  ({ record }) => [record.Institution],
  ([institution = '']) => ({ Institution: institution })
);

const byInstitutionCourt = grouped(
  ({ record }) => [record.Institution, record.CourtCommittedByName],
  ([institution = '', court = '']) => ({ Institution: institution, Court: court })
);

const byInstitutionCounty = grouped(
  ({ record }) => [record.Institution, record.County],
  ([institution = '', county = '']) => ({ Institution: institution, County: county })
);

const REPORTS: Record<HistpunReportKind, ReportDefinition> = {
  general: {
    qualifierColumns: ['Race', 'Gender', 'Age', 'Crime', 'Institution', 'Complete'],
    sections: [total, byRaceGender, byAge, byCrime, byInstitution],
  },
  'institution-court': {
    qualifierColumns: ['Race', 'Gender', 'Age', 'Crime', 'Institution', 'Court', 'Complete'],
    sections: [total, byInstitutionCourt, byInstitution],
  },
  'institution-county': {
    qualifierColumns: [
      'Race',
      'Gender',
      'Religion',
      'Age',
      'Crime',
      'Institution',
      'County',
      'Complete',
    ],
    sections: [
      total,
      byRaceGender,
      byRace,
      byGender,
      byReligion,
      byAge,
      byInstitutionCounty,
      byInstitution,
    ],
  },
};

const LEADING_COLUMNS = ['Country', 'Year', 'Statistic', 'Value', 'Source', 'State'];

export const histpunColumns = (kind: HistpunReportKind): string[] => [
  ...LEADING_COLUMNS,
  ...REPORTS[kind].qualifierColumns,
];

/**
 * Builds a long-format histpun report: for each year (ascending), every
 * section of the report in order, each section sorted by its grouping key.
 */
export const buildHistpunReport = (
  records: readonly DecodedRecord[],
  kind: HistpunReportKind,
  options: HistpunOptions
): TallyTable => {
  const definition = REPORTS[kind];
  const byYear = new Map<number, HistpunRecord[]>();

  for (const item of prepareHistpunRecords(records)) {
    const bucket = byYear.get(item.year);
    if (bucket === undefined) {
      byYear.set(item.year, [item]);
    } else {
      bucket.push(item);
    }
  }

  const years = [...byYear.keys()].sort((a, b) => a - b);
  const rows: TallyTable['rows'] = [];

  for (const year of years) {
    const yearRecords = byYear.get(year) ?? [];

    for (const section of definition.sections) {
      for (const entry of section(yearRecords)) {
        const row: TallyTable['rows'][number] = {
          Country: options.country,
          Year: year,
          Statistic: options.statistic,
          Value: entry.Value,
          Source: `${options.sourcePrefix}${String(year)}`,
          State: options.state,
        };
        for (const column of definition.qualifierColumns) {
          row[column] = entry[column] ?? '';
        }
        rows.push(row);
      }
    }
  }

  return { columns: histpunColumns(kind), rows };
};
