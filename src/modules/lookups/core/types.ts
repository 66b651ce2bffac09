import { type Static, Type } from '@sinclair/typebox';

/**
 * Coded domains, one lookup file each (`<domain>_map.json`).
 */
export const LOOKUP_DOMAINS = [
  'institution',
  'county',
  'crime',
  'crime_degree',
  'court',
  'race',
  'religion',
  'sex',
  'military',
  'education',
  'occupation',
  'narcotics',
  'marital',
  'prev_record',
  'country',
  'naturalization',
  'psych',
  'return_type',
] as const;

export type LookupDomain = (typeof LOOKUP_DOMAINS)[number];

export const LookupFileSchema = Type.Record(Type.String(), Type.String(), {
  description: 'Code to label mapping',
});

export type LookupFileDTO = Static<typeof LookupFileSchema>;

export type LookupTable = ReadonlyMap<string, string>;

export interface LookupSet {
  /**
   * Label for a code, or undefined when the domain's table has no such code.
   */
  resolve(domain: LookupDomain, code: string): string | undefined;
  table(domain: LookupDomain): LookupTable;
}

export const lookupFileName = (domain: LookupDomain): string => `${domain}_map.json`;

export const createLookupSet = (tables: ReadonlyMap<LookupDomain, LookupTable>): LookupSet => {
  const empty: LookupTable = new Map();

  return {
    resolve(domain, code) {
      return tables.get(domain)?.get(code);
    },
    table(domain) {
      return tables.get(domain) ?? empty;
    },
  };
};
