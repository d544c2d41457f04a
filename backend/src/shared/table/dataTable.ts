import type { CellValue, TableRecord, TableRow } from './table.types.js';

/**
 * Immutable, column-addressed table. Every transform returns a new instance
 * and leaves the source rows untouched.
 */
export class DataTable {
  private readonly columnIndex: ReadonlyMap<string, number>;

  constructor(
    readonly columns: readonly string[],
    readonly rows: readonly TableRow[]
  ) {
    this.columnIndex = new Map(columns.map((column, index) => [column, index]));
  }

  static empty(columns: readonly string[] = []) {
    return new DataTable(columns, []);
  }

  get rowCount() {
    return this.rows.length;
  }

  get isEmpty() {
    return this.rows.length === 0;
  }

  columnExists(name: string): boolean {
    return this.columnIndex.has(name);
  }

  getColumn(name: string): CellValue[] | null {
    const index = this.columnIndex.get(name);
    if (index === undefined) {
      return null;
    }
    return this.rows.map((row) => row[index] ?? null);
  }

  getCell(rowIndex: number, column: string): CellValue | undefined {
    const index = this.columnIndex.get(column);
    const row = this.rows[rowIndex];
    if (index === undefined || !row) {
      return undefined;
    }
    return row[index] ?? null;
  }

  filterRows(predicate: (record: TableRecord, index: number) => boolean): DataTable {
    const kept = this.rows.filter((row, index) => predicate(this.buildRecord(row), index));
    return new DataTable(this.columns, kept);
  }

  mapColumn(name: string, transform: (value: CellValue) => CellValue): DataTable {
    const index = this.columnIndex.get(name);
    if (index === undefined) {
      return this;
    }
    const mapped = this.rows.map((row) => {
      const next = [...row];
      next[index] = transform(row[index] ?? null);
      return next;
    });
    return new DataTable(this.columns, mapped);
  }

  emptyLike(): DataTable {
    return DataTable.empty(this.columns);
  }

  recordAt(rowIndex: number): TableRecord | null {
    const row = this.rows[rowIndex];
    return row ? this.buildRecord(row) : null;
  }

  toRecords(): TableRecord[] {
    return this.rows.map((row) => this.buildRecord(row));
  }

  private buildRecord(row: TableRow): TableRecord {
    const record: TableRecord = {};
    this.columns.forEach((column, index) => {
      record[column] = row[index] ?? null;
    });
    return record;
  }
}
