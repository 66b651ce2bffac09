import { type Static, Type } from '@sinclair/typebox';

/**
 * Interim record: every layout field as a string.
 * Non-date fields are kept exactly as sliced; date fields hold ISO strings or ''.
 */
export const InterimRecordSchema = Type.Object({
  ReceivingInstitutionCode: Type.String(),
  InmateNumber: Type.String(),
  DateReceived: Type.String({ description: 'YYYY-MM-DD or empty' }),
  CrimeCategory: Type.String(),
  SentenceType: Type.String(),
  DateOfBirth: Type.String({ description: 'YYYY-MM-DD or empty' }),
  CrimeDetails: Type.String(),
  MinSentence: Type.String(),
  MaxSentence: Type.String(),
  CountyCommittedFrom: Type.String(),
  CourtCommittedBy: Type.String(),
  Race: Type.String(),
  AgeAtCommitment: Type.String(),
  Religion: Type.String(),
  Sex: Type.String(),
  IdentifierNumber: Type.String(),
  CheckDigit: Type.String(),
  YearsResidenceNY: Type.String(),
  MilitaryService: Type.String(),
  Education: Type.String(),
  Occupation: Type.String(),
  NarcoticsUse: Type.String(),
  MaritalStatus: Type.String(),
  PrevCriminalRecord: Type.String(),
  CommitmentsProbation: Type.String(),
  FinesSuspensions: Type.String(),
  TimeSpanEarliestAdultRecord: Type.String(),
  MinorPoliceContacts: Type.String(),
  SeriousPoliceContacts: Type.String(),
  CountryOfBirth: Type.String(),
  YearEnteredUS: Type.String(),
  NaturalizationStatus: Type.String(),
  PsychiatricClassification: Type.String(),
  InstitutionOriginal: Type.String(),
  OriginalMonthYear: Type.String({ description: 'YYYY-MM or empty' }),
  MentalHygieneID: Type.String(),
  ReturnType: Type.String(),
  LatestReleaseDate: Type.String({ description: 'YYYY-MM or empty' }),
  LatestReturnDate: Type.String({ description: 'YYYY-MM-DD or empty' }),
  CurrentInstitution: Type.String(),
});

export type InterimRecord = Static<typeof InterimRecordSchema>;

export type RecordField = keyof InterimRecord;

/**
 * Native date encodings found on the cards.
 * MDDYY: month (1-2 digits), day, two-digit year. MYY: month, two-digit year.
 */
export type DateFormat = 'MDDYY' | 'MYY';

/**
 * How a two-digit year is expanded.
 * - fixed-1900: always 19yy
 * - relative-to-received: 18yy when yy is later than the receipt year, else 19yy
 */
export type CenturyRule = 'fixed-1900' | 'relative-to-received';

export interface DateFieldSpec {
  format: DateFormat;
  century: CenturyRule;
}

export interface FieldSpec {
  name: RecordField;
  /** Zero-based inclusive start column */
  start: number;
  /** Zero-based exclusive end column */
  end: number;
  date?: DateFieldSpec;
}

export type MalformedLinePolicy = 'fail' | 'skip';

export interface ParsedFile {
  source: string;
  records: InterimRecord[];
  skippedLines: number[];
}
