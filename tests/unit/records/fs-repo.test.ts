import { mkdir, mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { INTERIM_COLUMNS, createRecordsRepo, parseLine } from '@/modules/records/index.js';

import { makeCardLine } from '../../fixtures/builders.js';

const makeTempDirs = async (): Promise<{ inputDir: string; interimDir: string }> => {
  const root = await mkdtemp(path.join(tmpdir(), 'records-'));
  return { inputDir: path.join(root, 'raw'), interimDir: path.join(root, 'interim') };
};

describe('fs records repo', () => {
  it('lists card files by name and ignores other files', async () => {
    const root = await mkdtemp(path.join(tmpdir(), 'records-'));
    await writeFile(path.join(root, 'b.txt'), makeCardLine(), 'latin1');
    await writeFile(path.join(root, 'a.txt'), makeCardLine(), 'latin1');
    await writeFile(path.join(root, 'notes.md'), 'not a card', 'utf8');

    const repo = createRecordsRepo({ inputDir: root, interimDir: root });
    const result = await repo.listCardFiles();

    const files = result._unsafeUnwrap();
    expect(files.map((f) => f.fileName)).toEqual(['a.txt', 'b.txt']);
    expect(files.map((f) => f.baseName)).toEqual(['a', 'b']);
    expect(files[0]?.absolutePath).toBe(path.join(root, 'a.txt'));
  });

  it('reports a missing input directory', async () => {
    const { inputDir, interimDir } = await makeTempDirs();

    const repo = createRecordsRepo({ inputDir, interimDir });
    const result = await repo.listCardFiles();

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'NotFound',
      message: `Directory not found at ${inputDir}`,
      path: inputDir,
    });
  });

  it('reads card files as latin1', async () => {
    const root = await mkdtemp(path.join(tmpdir(), 'records-'));
    const line = makeCardLine({ InmateNumber: 'Ñ12345' });
    await writeFile(path.join(root, 'cards.txt'), line, 'latin1');

    const repo = createRecordsRepo({ inputDir: root, interimDir: root });
    const [entry] = (await repo.listCardFiles())._unsafeUnwrap();
    if (entry === undefined) throw new Error('expected a card file');

    const text = (await repo.readCardFile(entry))._unsafeUnwrap();

    expect(text).toBe(line);
    expect(text.length).toBe(80);
  });

  it('writes interim tables under the documented header and reads them back', async () => {
    const { inputDir, interimDir } = await makeTempDirs();
    const records = [
      parseLine(makeCardLine(), 'cards.txt', 1)._unsafeUnwrap(),
      parseLine(makeCardLine({ Sex: '2', CrimeDetails: '04,1' }), 'cards.txt', 2)._unsafeUnwrap(),
    ];

    const repo = createRecordsRepo({ inputDir, interimDir });
    const written = await repo.writeInterimFile('cards', records);

    const filePath = written._unsafeUnwrap();
    expect(filePath).toBe(path.join(interimDir, 'cards_rawformatted.csv'));

    const contents = await readFile(filePath, 'utf8');
    expect(contents.split('\n')[0]).toBe(INTERIM_COLUMNS.join(','));

    const [entry] = (await repo.listInterimFiles())._unsafeUnwrap();
    if (entry === undefined) throw new Error('expected an interim file');
    expect(entry.baseName).toBe('cards');

    const read = await repo.readInterimFile(entry);
    expect(read._unsafeUnwrap()).toEqual(records);
  });

  it('rejects interim rows missing columns', async () => {
    const { inputDir, interimDir } = await makeTempDirs();
    await mkdir(interimDir, { recursive: true });
    const filePath = path.join(interimDir, 'cards_rawformatted.csv');
    await writeFile(filePath, 'ReceivingInstitutionCode,InmateNumber\n07,123456\n', 'utf8');

    const repo = createRecordsRepo({ inputDir, interimDir });
    const [entry] = (await repo.listInterimFiles())._unsafeUnwrap();
    if (entry === undefined) throw new Error('expected an interim file');
    const result = await repo.readInterimFile(entry);

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'InvalidRow',
      path: filePath,
      line: 2,
    });
  });
});
