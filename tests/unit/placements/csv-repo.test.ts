import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { createLogger } from '@/infra/logger/index.js';
import { PLACEMENT_COLUMNS } from '@/modules/placements/core/types.js';
import { createPlacementRepo, tokenizeCsv } from '@/modules/placements/shell/repo/csv-repo.js';

const logger = createLogger({ level: 'silent', pretty: false });

const HEADER = PLACEMENT_COLUMNS.join(',');
const ROW_2023_IT = '2023,IT,100,80,20,80,12,6,3,6.5,Acme,5,,,,,Developer,,,45';
const ROW_2022_CIVIL = '2022,Civil,50,30,20,60,8,3.5,2,4,,,,,,,,,,30';

const makeTempDir = async (): Promise<string> => {
  return mkdtemp(path.join(tmpdir(), 'placements-'));
};

const writeCsv = async (dir: string, contents: string): Promise<string> => {
  const filePath = path.join(dir, 'placement_data.csv');
  await writeFile(filePath, contents, 'utf8');
  return filePath;
};

describe('tokenizeCsv', () => {
  it('splits header and rows, dropping a BOM and blank lines', () => {
    expect(tokenizeCsv('\uFEFFa,b\n1,2\n\n3,"x, y"\n')).toEqual({
      headers: ['a', 'b'],
      rows: [
        ['1', '2'],
        ['3', 'x, y'],
      ],
    });
  });

  it('returns no headers for empty input', () => {
    expect(tokenizeCsv('')).toEqual({ headers: [], rows: [] });
  });
});

describe('csv placement repo', () => {
  it('loads and sorts the dataset from disk', async () => {
    const dir = await makeTempDir();
    const filePath = await writeCsv(dir, `${HEADER}\n${ROW_2023_IT}\n${ROW_2022_CIVIL}\n`);

    const result = await createPlacementRepo({ filePath, logger }).load();

    expect(result.isOk()).toBe(true);
    const dataset = result._unsafeUnwrap();
    expect(dataset.map((r) => r.branch)).toEqual(['Civil', 'IT']);
    expect(dataset[1]?.topCompanies[0]).toEqual({ name: 'Acme', students: 5 });
  });

  it('reads the file once and serves the memoized dataset', async () => {
    const dir = await makeTempDir();
    const filePath = await writeCsv(dir, `${HEADER}\n${ROW_2023_IT}\n`);
    const repo = createPlacementRepo({ filePath, logger });

    const first = await repo.load();
    await writeCsv(dir, `${HEADER}\n${ROW_2023_IT}\n${ROW_2022_CIVIL}\n`);
    const second = await repo.load();

    expect(second._unsafeUnwrap()).toBe(first._unsafeUnwrap());
    expect(second._unsafeUnwrap()).toHaveLength(1);
  });

  it('fails with NotFound for a missing file and retries on the next load', async () => {
    const dir = await makeTempDir();
    const filePath = path.join(dir, 'placement_data.csv');
    const repo = createPlacementRepo({ filePath, logger });

    const missing = await repo.load();
    expect(missing._unsafeUnwrapErr()).toMatchObject({ type: 'NotFound', path: filePath });

    await writeCsv(dir, `${HEADER}\n${ROW_2023_IT}\n`);
    const retried = await repo.load();
    expect(retried._unsafeUnwrap()).toHaveLength(1);
  });

  it('fails with ReadError when the path is not a file', async () => {
    const dir = await makeTempDir();

    const result = await createPlacementRepo({ filePath: dir, logger }).load();

    expect(result._unsafeUnwrapErr().type).toBe('ReadError');
  });

  it('fails with ParseError on malformed CSV', async () => {
    const dir = await makeTempDir();
    const filePath = await writeCsv(dir, `${HEADER}\n2023,"IT\n`);

    const result = await createPlacementRepo({ filePath, logger }).load();

    expect(result._unsafeUnwrapErr().type).toBe('ParseError');
  });

  it('passes schema errors through', async () => {
    const dir = await makeTempDir();
    const filePath = await writeCsv(dir, 'year,branch\n2023,IT\n');

    const result = await createPlacementRepo({ filePath, logger }).load();

    expect(result._unsafeUnwrapErr().type).toBe('MissingColumns');
  });
});
