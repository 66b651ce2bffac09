import { err, ok, type Result } from 'neverthrow';

import { MISSING_MARKERS, isoYear, normalizeDate } from '../../../records/index.js';
import { createUnresolvedCodeError, type UnresolvedCodeError } from '../errors.js';
import { decodeSentence } from '../sentence.js';

import type { LookupDomain, LookupSet } from '../../../lookups/index.js';
import type { InterimRecord, RecordField } from '../../../records/index.js';
import type { DecodeOptions, DecodedRecordResult, UnresolvedLookup } from '../types.js';

const isMissing = (code: string): boolean => MISSING_MARKERS.has(code);

/**
 * Decodes one interim record.
 *
 * Coded fields are replaced by their labels, pass-through fields are trimmed,
 * and date fields are re-normalized (a no-op for values already in ISO form).
 * Under the `fail` policy the first unresolved code is returned as an error.
 */
export const decodeRecord = (
  record: InterimRecord,
  lookups: LookupSet,
  options: DecodeOptions
): Result<DecodedRecordResult, UnresolvedCodeError> => {
  const unresolved: UnresolvedLookup[] = [];

  const unresolvedValue = (field: RecordField, domain: LookupDomain, code: string): string => {
    unresolved.push({ field, domain, code });
    return options.unresolvedPolicy === 'passthrough' ? code : options.unresolvedMarker;
  };

  const lookup = (field: RecordField, domain: LookupDomain): string => {
    const code = record[field].trim();
    // Missing markers win over the table, so '9' entries in the lookups never apply.
    if (isMissing(code)) {
      return options.missingLabel;
    }
    return lookups.resolve(domain, code) ?? unresolvedValue(field, domain, code);
  };

  // Two-character crime code followed by a one-character degree code.
  const crime = (): string => {
    const raw = record.CrimeDetails;
    const code = raw.slice(0, 2).trim();
    const degree = raw.slice(2, 3).trim();

    if (code === '' || degree === '' || code.includes('&') || degree.includes('&')) {
      return options.missingLabel;
    }

    const base = lookups.resolve('crime', code);
    if (base === undefined) {
      return unresolvedValue('CrimeDetails', 'crime', code);
    }

    const degreeLabel = lookups.resolve('crime_degree', degree);
    return degreeLabel === undefined ? base : `${base}, degree ${degreeLabel}`;
  };

  const dateReceived = normalizeDate(record.DateReceived, 'MDDYY');

  const decoded = {
    Institution: lookup('ReceivingInstitutionCode', 'institution'),
    County: lookup('CountyCommittedFrom', 'county'),
    CourtCommittedByName: lookup('CourtCommittedBy', 'court'),
    Crime: crime(),
    DateOfBirth: normalizeDate(
      record.DateOfBirth,
      'MDDYY',
      'relative-to-received',
      isoYear(dateReceived)
    ),
    DateReceived: dateReceived,
    MinSentenceLabel: decodeSentence(record.MinSentence),
    MaxSentenceLabel: decodeSentence(record.MaxSentence),
    AgeAtCommitment: record.AgeAtCommitment.trim(),
    RaceName: lookup('Race', 'race'),
    ReligionName: lookup('Religion', 'religion'),
    SexName: lookup('Sex', 'sex'),
    IdentifierNumber: record.IdentifierNumber.trim(),
    CheckDigit: record.CheckDigit.trim(),
    YearsResidenceNY: record.YearsResidenceNY.trim(),
    MilitaryServiceLabel: lookup('MilitaryService', 'military'),
    EducationLevel: lookup('Education', 'education'),
    OccupationName: lookup('Occupation', 'occupation'),
    NarcoticsUseLabel: lookup('NarcoticsUse', 'narcotics'),
    MaritalStatusName: lookup('MaritalStatus', 'marital'),
    PrevCriminalRecordLabel: lookup('PrevCriminalRecord', 'prev_record'),
    CountryOfBirthName: lookup('CountryOfBirth', 'country'),
    YearEnteredUSNum: record.YearEnteredUS.trim(),
    NaturalizationStatusLabel: lookup('NaturalizationStatus', 'naturalization'),
    PsychiatricClassificationLabel: lookup('PsychiatricClassification', 'psych'),
    InstitutionOriginalName: lookup('InstitutionOriginal', 'institution'),
    OriginalMonthYear: normalizeDate(record.OriginalMonthYear, 'MYY'),
    MentalHygieneIDNum: record.MentalHygieneID.trim(),
    ReturnTypeLabel: lookup('ReturnType', 'return_type'),
    LatestReleaseDate: normalizeDate(record.LatestReleaseDate, 'MYY'),
    LatestReturnDate: normalizeDate(record.LatestReturnDate, 'MDDYY'),
    CurrentInstitutionName: lookup('CurrentInstitution', 'institution'),
  };

  const firstUnresolved = unresolved[0];
  if (options.unresolvedPolicy === 'fail' && firstUnresolved !== undefined) {
    return err(
      createUnresolvedCodeError(firstUnresolved.field, firstUnresolved.domain, firstUnresolved.code)
    );
  }

  return ok({ record: decoded, unresolved });
};
