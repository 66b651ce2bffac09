import type { FileError } from '../../../infra/files/index.js';
import type { LookupDomain } from '../../lookups/index.js';

export interface UnresolvedCodeError {
  readonly type: 'UnresolvedCodeError';
  readonly message: string;
  readonly field: string;
  readonly domain: LookupDomain;
  readonly code: string;
  readonly source?: string;
  /** One-based CSV line, header included */
  readonly line?: number;
}

export type DecodingError = UnresolvedCodeError | FileError;

export const createUnresolvedCodeError = (
  field: string,
  domain: LookupDomain,
  code: string,
  location?: { source: string; line: number }
): UnresolvedCodeError => {
  const where = location === undefined ? '' : `${location.source}:${String(location.line)}: `;
  return {
    type: 'UnresolvedCodeError',
    message: `${where}code '${code}' in ${field} has no entry in the ${domain} table`,
    field,
    domain,
    code,
    ...location,
  };
};
