import { type Static, Type } from '@sinclair/typebox';

import type { LookupDomain } from '../../lookups/index.js';

/**
 * Fully decoded record. Column order here is the documented CSV header order.
 */
export const DecodedRecordSchema = Type.Object({
  Institution: Type.String(),
  County: Type.String(),
  CourtCommittedByName: Type.String(),
  Crime: Type.String(),
  DateOfBirth: Type.String(),
  DateReceived: Type.String(),
  MinSentenceLabel: Type.String(),
  MaxSentenceLabel: Type.String(),
  AgeAtCommitment: Type.String(),
  RaceName: Type.String(),
  ReligionName: Type.String(),
  SexName: Type.String(),
  IdentifierNumber: Type.String(),
  CheckDigit: Type.String(),
  YearsResidenceNY: Type.String(),
  MilitaryServiceLabel: Type.String(),
  EducationLevel: Type.String(),
  OccupationName: Type.String(),
  NarcoticsUseLabel: Type.String(),
  MaritalStatusName: Type.String(),
  PrevCriminalRecordLabel: Type.String(),
  CountryOfBirthName: Type.String(),
  YearEnteredUSNum: Type.String(),
  NaturalizationStatusLabel: Type.String(),
  PsychiatricClassificationLabel: Type.String(),
  InstitutionOriginalName: Type.String(),
  OriginalMonthYear: Type.String(),
  MentalHygieneIDNum: Type.String(),
  ReturnTypeLabel: Type.String(),
  LatestReleaseDate: Type.String(),
  LatestReturnDate: Type.String(),
  CurrentInstitutionName: Type.String(),
});

export type DecodedRecord = Static<typeof DecodedRecordSchema>;

export type DecodedField = keyof DecodedRecord;

export const DECODED_COLUMNS: readonly DecodedField[] = [
  'Institution',
  'County',
  'CourtCommittedByName',
  'Crime',
  'DateOfBirth',
  'DateReceived',
  'MinSentenceLabel',
  'MaxSentenceLabel',
  'AgeAtCommitment',
  'RaceName',
  'ReligionName',
  'SexName',
  'IdentifierNumber',
  'CheckDigit',
  'YearsResidenceNY',
  'MilitaryServiceLabel',
  'EducationLevel',
  'OccupationName',
  'NarcoticsUseLabel',
  'MaritalStatusName',
  'PrevCriminalRecordLabel',
  'CountryOfBirthName',
  'YearEnteredUSNum',
  'NaturalizationStatusLabel',
  'PsychiatricClassificationLabel',
  'InstitutionOriginalName',
  'OriginalMonthYear',
  'MentalHygieneIDNum',
  'ReturnTypeLabel',
  'LatestReleaseDate',
  'LatestReturnDate',
  'CurrentInstitutionName',
];

/**
 * What to emit for a code that is present on the card but absent from its table.
 * - marker: the configured marker (UNKNOWN_CODE by default)
 * - passthrough: the raw code
 * - fail: abort decoding
 */
export type UnresolvedCodePolicy = 'marker' | 'passthrough' | 'fail';

export interface DecodeOptions {
  /** Label for blank and "not recorded" markers */
  missingLabel: string;
  unresolvedPolicy: UnresolvedCodePolicy;
  unresolvedMarker: string;
}

export const DEFAULT_DECODE_OPTIONS: DecodeOptions = {
  missingLabel: 'Unknown',
  unresolvedPolicy: 'marker',
  unresolvedMarker: 'UNKNOWN_CODE',
};

export interface UnresolvedLookup {
  /** Interim field the code was read from */
  field: string;
  domain: LookupDomain;
  code: string;
}

export interface UnresolvedCodeSummary extends UnresolvedLookup {
  count: number;
}

export interface DecodedRecordResult {
  record: DecodedRecord;
  unresolved: UnresolvedLookup[];
}

export interface DecodedFile {
  source: string;
  records: DecodedRecord[];
  unresolved: UnresolvedCodeSummary[];
}
