/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Directories
  INPUT_DIR: Type.String({ minLength: 1, default: 'data/raw' }),
  INTERIM_DIR: Type.String({ minLength: 1, default: 'data/csv_raw_formatted' }),
  DECODED_DIR: Type.String({ minLength: 1, default: 'data/csv_decoded' }),
  REPORTS_DIR: Type.String({ minLength: 1, default: 'data/reports' }),
  LOOKUPS_DIR: Type.String({ minLength: 1, default: 'lookups' }),

  // Parsing
  MALFORMED_LINE_POLICY: Type.Union([Type.Literal('fail'), Type.Literal('skip')], {
    default: 'fail',
  }),

  // Decoding
  MISSING_LABEL: Type.String({ default: 'Unknown' }),
  UNRESOLVED_CODE_POLICY: Type.Union(
    [Type.Literal('marker'), Type.Literal('passthrough'), Type.Literal('fail')],
    { default: 'marker' }
  ),
  UNRESOLVED_CODE_MARKER: Type.String({ minLength: 1, default: 'UNKNOWN_CODE' }),

  // Reports
  TALLY_DIMENSION: Type.Union(
    [
      Type.Literal('Institution'),
      Type.Literal('County'),
      Type.Literal('CourtCommittedByName'),
      Type.Literal('Crime'),
      Type.Literal('RaceName'),
      Type.Literal('ReligionName'),
      Type.Literal('SexName'),
      Type.Literal('CountryOfBirthName'),
    ],
    { default: 'Institution' }
  ),
  HISTPUN_SOURCE_PREFIX: Type.String({ minLength: 1, default: 'NYInmateRecords' }),
});

export type Env = Static<typeof EnvSchema>;

const withDefault = (value: string | undefined, fallback: string): string =>
  value !== undefined && value !== '' ? value : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: withDefault(env['NODE_ENV'], 'development'),
    LOG_LEVEL: withDefault(env['LOG_LEVEL'], 'info'),
    INPUT_DIR: withDefault(env['INPUT_DIR'], 'data/raw'),
    INTERIM_DIR: withDefault(env['INTERIM_DIR'], 'data/csv_raw_formatted'),
    DECODED_DIR: withDefault(env['DECODED_DIR'], 'data/csv_decoded'),
    REPORTS_DIR: withDefault(env['REPORTS_DIR'], 'data/reports'),
    LOOKUPS_DIR: withDefault(env['LOOKUPS_DIR'], 'lookups'),
    MALFORMED_LINE_POLICY: withDefault(env['MALFORMED_LINE_POLICY'], 'fail'),
    MISSING_LABEL: env['MISSING_LABEL'] ?? 'Unknown',
    UNRESOLVED_CODE_POLICY: withDefault(env['UNRESOLVED_CODE_POLICY'], 'marker'),
    UNRESOLVED_CODE_MARKER: withDefault(env['UNRESOLVED_CODE_MARKER'], 'UNKNOWN_CODE'),
    TALLY_DIMENSION: withDefault(env['TALLY_DIMENSION'], 'Institution'),
    HISTPUN_SOURCE_PREFIX: withDefault(env['HISTPUN_SOURCE_PREFIX'], 'NYInmateRecords'),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  paths: {
    inputDir: env.INPUT_DIR,
    interimDir: env.INTERIM_DIR,
    decodedDir: env.DECODED_DIR,
    reportsDir: env.REPORTS_DIR,
    lookupsDir: env.LOOKUPS_DIR,
  },
  parsing: {
    malformedLinePolicy: env.MALFORMED_LINE_POLICY,
  },
  decoding: {
    /** Label for blank and "not recorded" card values */
    missingLabel: env.MISSING_LABEL,
    unresolvedPolicy: env.UNRESOLVED_CODE_POLICY,
    unresolvedMarker: env.UNRESOLVED_CODE_MARKER,
  },
  reports: {
    /** Decoded column used by the single-dimension tally */
    tallyDimension: env.TALLY_DIMENSION,
    histpun: {
      country: 'United States',
      state: 'New York',
      statistic: 'prisoners',
      sourcePrefix: env.HISTPUN_SOURCE_PREFIX,
    },
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
