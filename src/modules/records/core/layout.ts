import type { FieldSpec, RecordField } from './types.js';

/**
 * Card layout, in output column order.
 * Ranges are zero-based and half-open: columns 9-13 on the card are [8, 13).
 */
export const RECORD_LAYOUT: readonly FieldSpec[] = [
  { name: 'ReceivingInstitutionCode', start: 0, end: 2 },
  { name: 'InmateNumber', start: 2, end: 8 },
  { name: 'DateReceived', start: 8, end: 13, date: { format: 'MDDYY', century: 'fixed-1900' } },
  { name: 'CrimeCategory', start: 13, end: 14 },
  { name: 'SentenceType', start: 14, end: 15 },
  {
    name: 'DateOfBirth',
    start: 15,
    end: 20,
    date: { format: 'MDDYY', century: 'relative-to-received' },
  },
  { name: 'CrimeDetails', start: 20, end: 24 },
  { name: 'MinSentence', start: 24, end: 27 },
  { name: 'MaxSentence', start: 27, end: 30 },
  { name: 'CountyCommittedFrom', start: 30, end: 32 },
  { name: 'CourtCommittedBy', start: 32, end: 33 },
  { name: 'Race', start: 33, end: 34 },
  { name: 'AgeAtCommitment', start: 34, end: 36 },
  { name: 'Religion', start: 36, end: 37 },
  { name: 'Sex', start: 37, end: 38 },
  { name: 'IdentifierNumber', start: 38, end: 44 },
  { name: 'CheckDigit', start: 44, end: 45 },
  { name: 'YearsResidenceNY', start: 45, end: 47 },
  { name: 'MilitaryService', start: 47, end: 48 },
  { name: 'Education', start: 48, end: 49 },
  { name: 'Occupation', start: 49, end: 50 },
  { name: 'NarcoticsUse', start: 50, end: 51 },
  { name: 'MaritalStatus', start: 51, end: 52 },
  { name: 'PrevCriminalRecord', start: 52, end: 54 },
  { name: 'CommitmentsProbation', start: 54, end: 55 },
  { name: 'FinesSuspensions', start: 55, end: 56 },
  { name: 'TimeSpanEarliestAdultRecord', start: 56, end: 57 },
  { name: 'MinorPoliceContacts', start: 57, end: 58 },
  { name: 'SeriousPoliceContacts', start: 58, end: 59 },
  { name: 'CountryOfBirth', start: 59, end: 61 },
  { name: 'YearEnteredUS', start: 61, end: 63 },
  { name: 'NaturalizationStatus', start: 63, end: 64 },
  { name: 'PsychiatricClassification', start: 64, end: 66 },
  { name: 'InstitutionOriginal', start: 66, end: 68 },
  { name: 'OriginalMonthYear', start: 68, end: 70, date: { format: 'MYY', century: 'fixed-1900' } },
  { name: 'MentalHygieneID', start: 70, end: 71 },
  { name: 'ReturnType', start: 71, end: 72 },
  { name: 'LatestReleaseDate', start: 72, end: 75, date: { format: 'MYY', century: 'fixed-1900' } },
  {
    name: 'LatestReturnDate',
    start: 75,
    end: 78,
    date: { format: 'MDDYY', century: 'fixed-1900' },
  },
  { name: 'CurrentInstitution', start: 78, end: 80 },
];

export const RECORD_WIDTH = 80;

export const INTERIM_COLUMNS: readonly RecordField[] = RECORD_LAYOUT.map((field) => field.name);
