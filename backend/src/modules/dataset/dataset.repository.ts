import { promises as fs } from 'fs';
import path from 'path';
import type { DatasetFile } from './dataset.types.js';

const CSV_EXTENSION = '.csv';

const toDatasetFile = (dataDir: string, fileName: string): DatasetFile => ({
  fileName,
  stem: path.basename(fileName, path.extname(fileName)),
  filePath: path.join(dataDir, fileName)
});

export class DatasetRepository {
  constructor(
    private readonly dataDir: string,
    private readonly rosterFileName: string
  ) {}

  get rosterName() {
    return this.rosterFileName;
  }

  getRosterFile(): DatasetFile {
    return toDatasetFile(this.dataDir, this.rosterFileName);
  }

  async rosterExists(): Promise<boolean> {
    try {
      const stats = await fs.stat(this.getRosterFile().filePath);
      return stats.isFile();
    } catch {
      return false;
    }
  }

  async listDetailFiles(): Promise<DatasetFile[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dataDir);
    } catch (error) {
      console.warn(`Data directory ${this.dataDir} is not readable:`, error);
      return [];
    }
    const candidates = entries
      .filter((name) => path.extname(name).toLowerCase() === CSV_EXTENSION && name !== this.rosterFileName)
      .sort((left, right) => (left < right ? -1 : left > right ? 1 : 0))
      .map((name) => toDatasetFile(this.dataDir, name));

    const regular = await Promise.all(candidates.map((file) => this.isRegularFile(file.filePath)));
    return candidates.filter((_, index) => regular[index]);
  }

  private async isRegularFile(filePath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile();
    } catch (error) {
      console.warn(`Skipped data file ${filePath}:`, error);
      return false;
    }
  }
}
