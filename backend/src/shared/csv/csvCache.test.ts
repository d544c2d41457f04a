import { mkdtempSync, rmSync, utimesSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CsvFileNotFoundError, CsvTableCache } from './csvCache.js';

describe('CsvTableCache', () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'csv-cache-'));
    filePath = path.join(dir, 'ranks.csv');
    writeFileSync(filePath, 'id_employee,mark\n1,3\n');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a file once while it is unchanged', async () => {
    const cache = new CsvTableCache();
    const first = await cache.getOrLoad(filePath);
    const second = await cache.getOrLoad(filePath);
    expect(second).toBe(first);
    expect(cache.readCount).toBe(1);
  });

  it('re-reads a file after it changes on disk', async () => {
    const cache = new CsvTableCache();
    await cache.getOrLoad(filePath);
    writeFileSync(filePath, 'id_employee,mark\n1,3\n2,5\n');
    const future = new Date(Date.now() + 60_000);
    utimesSync(filePath, future, future);

    const reloaded = await cache.getOrLoad(filePath);
    expect(reloaded.rowCount).toBe(2);
    expect(cache.readCount).toBe(2);
  });

  it('re-reads after an explicit invalidation', async () => {
    const cache = new CsvTableCache();
    await cache.getOrLoad(filePath);
    cache.invalidate(filePath);
    expect(cache.has(filePath)).toBe(false);
    await cache.getOrLoad(filePath);
    expect(cache.readCount).toBe(2);
  });

  it('fails with CsvFileNotFoundError for a missing path', async () => {
    const cache = new CsvTableCache();
    await expect(cache.getOrLoad(path.join(dir, 'absent.csv'))).rejects.toBeInstanceOf(CsvFileNotFoundError);
  });
});
