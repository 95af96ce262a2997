import fs from 'fs';
import path from 'path';
import { clearCache } from '../../src/tools/clear-cache';
import { makeWorkspace, removeWorkspace, writeFixture } from '../helpers/fixtures';

describe('clearCache', () => {
  let base: string;

  beforeEach(() => {
    base = makeWorkspace().base;
  });

  afterEach(() => {
    removeWorkspace(base);
  });

  test('removes every entry and keeps the directory', async () => {
    const cacheDir = path.join(base, 'cache');
    writeFixture(cacheDir, 'pubmed/query.json', {});
    writeFixture(cacheDir, 'a.txt', 'x');

    const result = await clearCache(cacheDir);

    expect(result).toEqual({ cacheDir, removed: ['a.txt', 'pubmed'] });
    expect(fs.readdirSync(cacheDir)).toEqual([]);
  });

  test('a missing cache directory is not an error', async () => {
    const cacheDir = path.join(base, 'no-cache');
    expect(await clearCache(cacheDir)).toEqual({ cacheDir, removed: [] });
  });
});
