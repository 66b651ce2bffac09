// Repository
export { loadLookupSet, readLookupFile } from './shell/repo/fs-repo.js';

// Types
export {
  LOOKUP_DOMAINS,
  LookupFileSchema,
  createLookupSet,
  lookupFileName,
} from './core/types.js';
export type { LookupDomain, LookupFileDTO, LookupSet, LookupTable } from './core/types.js';

// Errors
export type { LookupError } from './core/errors.js';
