import { promises as fs } from 'fs';
import { parseCsvText } from './csvParser.js';
import type { DataTable } from '../table/dataTable.js';

export class CsvFileNotFoundError extends Error {
  constructor(public readonly filePath: string) {
    super(`CSV file not found: ${filePath}`);
    this.name = 'CsvFileNotFoundError';
  }
}

interface CacheEntry {
  mtimeMs: number;
  size: number;
  table: DataTable;
}

const isMissingFileError = (error: unknown) =>
  error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');

/**
 * Memoizes parsed CSV tables by path. An entry stays valid while the file's
 * modification time and size are unchanged.
 */
export class CsvTableCache {
  private readonly entries = new Map<string, CacheEntry>();
  private reads = 0;

  async getOrLoad(filePath: string): Promise<DataTable> {
    let stats: { mtimeMs: number; size: number };
    try {
      stats = await fs.stat(filePath);
    } catch (error) {
      if (isMissingFileError(error)) {
        this.entries.delete(filePath);
        throw new CsvFileNotFoundError(filePath);
      }
      throw error;
    }

    const cached = this.entries.get(filePath);
    if (cached && cached.mtimeMs === stats.mtimeMs && cached.size === stats.size) {
      return cached.table;
    }

    const text = await fs.readFile(filePath, 'utf8');
    this.reads += 1;
    const table = parseCsvText(text);
    this.entries.set(filePath, { mtimeMs: stats.mtimeMs, size: stats.size, table });
    return table;
  }

  invalidate(filePath?: string) {
    if (filePath === undefined) {
      this.entries.clear();
      return;
    }
    this.entries.delete(filePath);
  }

  has(filePath: string) {
    return this.entries.has(filePath);
  }

  get readCount() {
    return this.reads;
  }
}
