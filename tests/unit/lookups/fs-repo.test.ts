import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import {
  LOOKUP_DOMAINS,
  loadLookupSet,
  lookupFileName,
  readLookupFile,
} from '@/modules/lookups/index.js';

const LOOKUPS_DIR = fileURLToPath(new URL('../../../lookups', import.meta.url));

const makeTempDir = async (): Promise<string> => mkdtemp(path.join(tmpdir(), 'lookups-'));

describe('lookup tables', () => {
  it('ships one table per coded domain', async () => {
    const result = await loadLookupSet(LOOKUPS_DIR);

    const lookups = result._unsafeUnwrap();
    for (const domain of LOOKUP_DOMAINS) {
      expect(lookups.table(domain).size).toBeGreaterThan(0);
    }
    expect(lookups.table('county').size).toBe(62);
  });

  it('resolves codes to their labels', async () => {
    const lookups = (await loadLookupSet(LOOKUPS_DIR))._unsafeUnwrap();

    expect(lookups.resolve('institution', '07')).toBe('Attica');
    expect(lookups.resolve('county', '15')).toBe('Erie');
    expect(lookups.resolve('sex', '2')).toBe('Female');
    expect(lookups.resolve('crime_degree', '1')).toBe('2nd');
    expect(lookups.resolve('crime', '99')).toBeUndefined();
  });

  it('loads only the requested domains', async () => {
    const dir = await makeTempDir();
    await writeFile(path.join(dir, 'sex_map.json'), '{"1":"Male","2":"Female"}', 'utf8');

    const lookups = (await loadLookupSet(dir, ['sex']))._unsafeUnwrap();

    expect(lookups.resolve('sex', '1')).toBe('Male');
    expect(lookups.table('race').size).toBe(0);
  });

  it('fails when a domain table is missing', async () => {
    const dir = await makeTempDir();
    await writeFile(path.join(dir, 'sex_map.json'), '{"1":"Male"}', 'utf8');

    const result = await loadLookupSet(dir, ['sex', 'race']);

    const missing = path.join(dir, lookupFileName('race'));
    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'NotFound',
      message: `File not found at ${missing}`,
      path: missing,
    });
  });

  it('fails on invalid JSON', async () => {
    const dir = await makeTempDir();
    const filePath = path.join(dir, 'race_map.json');
    await writeFile(filePath, '{"1": "White",', 'utf8');

    const result = await readLookupFile(filePath);

    expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'ParseError', path: filePath });
  });

  it('fails when labels are not strings', async () => {
    const dir = await makeTempDir();
    const filePath = path.join(dir, 'race_map.json');
    await writeFile(filePath, '{"1": "White", "2": 2}', 'utf8');

    const result = await readLookupFile(filePath);

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'SchemaValidationError',
      path: filePath,
      message: `Lookup file ${filePath} must map string codes to string labels`,
    });
  });
});
