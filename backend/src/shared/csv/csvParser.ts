import * as XLSX from 'xlsx';
import { DataTable } from '../table/dataTable.js';
import { isBlankCell, toNullableNumber } from '../table/cellCoercion.js';
import type { CellValue } from '../table/table.types.js';

const BOM = '\uFEFF';

const normalizeCell = (value: unknown): CellValue => {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const text = typeof value === 'string' ? value : String(value);
  return text.trim() === '' ? null : text;
};

// Blank headers get positional names and repeated ones get numeric suffixes,
// so every column stays addressable by a unique name.
const buildColumnNames = (headerRow: unknown[]): string[] => {
  const seen = new Map<string, number>();
  return headerRow.map((cell, index) => {
    const raw = normalizeCell(cell);
    const base = raw === null ? `Unnamed: ${index}` : `${raw}`.trim();
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
};

const inferColumn = (values: CellValue[]): CellValue[] => {
  const numeric = values.every((value) => isBlankCell(value) || toNullableNumber(value) !== null);
  if (!numeric) {
    return values;
  }
  return values.map((value) => toNullableNumber(value));
};

export const parseCsvText = (text: string): DataTable => {
  const source = text.startsWith(BOM) ? text.slice(BOM.length) : text;
  if (!source.trim()) {
    return DataTable.empty();
  }

  const workbook = XLSX.read(source, { type: 'string', raw: true, FS: ',' });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    return DataTable.empty();
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    blankrows: false,
    defval: null,
    raw: true
  });

  const [headerRow, ...bodyRows] = matrix;
  if (!headerRow) {
    return DataTable.empty();
  }

  const columns = buildColumnNames(headerRow);
  const rawRows = bodyRows
    .map((row) => columns.map((_, index) => normalizeCell(row[index])))
    .filter((row) => row.some((cell) => cell !== null));

  const typedColumns = columns.map((_, columnIndex) => inferColumn(rawRows.map((row) => row[columnIndex] ?? null)));
  const rows = rawRows.map((_, rowIndex) => typedColumns.map((column) => column[rowIndex] ?? null));

  return new DataTable(columns, rows);
};
