import * as XLSX from 'xlsx';
import type { CellValue, DetailTab } from '../../../shared/types/dashboard';

const SHEET_NAME_LIMIT = 31;

export const buildSheetRows = (columns: string[], rows: CellValue[][]): CellValue[][] => [
  columns,
  ...rows.map((row) => columns.map((_, index) => row[index] ?? null))
];

export const buildExportFileName = (tab: DetailTab, employeeId: number) => {
  const base = tab.fileName.replace(/\.csv$/i, '');
  return `${base}_${employeeId}.xlsx`;
};

export const exportDetailTab = (tab: DetailTab, employeeId: number) => {
  const workbook = XLSX.utils.book_new();
  const sheet = XLSX.utils.aoa_to_sheet(buildSheetRows(tab.columns, tab.rows));
  XLSX.utils.book_append_sheet(workbook, sheet, tab.label.slice(0, SHEET_NAME_LIMIT));
  XLSX.writeFile(workbook, buildExportFileName(tab, employeeId));
};
