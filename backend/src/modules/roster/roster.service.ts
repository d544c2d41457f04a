import { DataTable } from '../../shared/table/dataTable.js';
import { cellToText, isBlankCell, toNullableInteger } from '../../shared/table/cellCoercion.js';
import type { TableRecord } from '../../shared/table/table.types.js';
import {
  EMPLOYEE_AREA_COLUMN,
  EMPLOYEE_ID_COLUMN,
  EMPLOYEE_NAME_COLUMN,
  type EmployeeCard,
  type EmployeeCardMetric,
  type EmployeeOption,
  type SummaryEntry
} from './roster.types.js';

const UNNAMED_EMPLOYEE = 'Без имени';

// Score columns shown on the card, as they appear in the roster export
const CARD_METRICS: Array<{ column: string; label: string }> = [
  { column: '7', label: 'Сумма' },
  { column: 'Unnamed: 10', label: 'Сумма / 10' }
];

const nameCollator = new Intl.Collator('ru', { sensitivity: 'base', numeric: true });

/**
 * Drops roster rows without a usable employee id and truncates the remaining
 * ids to integers. A roster without the id column normalizes to no rows.
 */
export const normalizeRoster = (table: DataTable): DataTable => {
  if (!table.columnExists(EMPLOYEE_ID_COLUMN)) {
    return table.emptyLike();
  }
  const withIds = table.filterRows((record) => toNullableInteger(record[EMPLOYEE_ID_COLUMN]) !== null);
  const skipped = table.rowCount - withIds.rowCount;
  if (skipped > 0) {
    console.warn(`Skipped ${skipped} roster row(s) without ${EMPLOYEE_ID_COLUMN}.`);
  }
  return withIds.mapColumn(EMPLOYEE_ID_COLUMN, (value) => toNullableInteger(value));
};

const readEmployeeId = (record: TableRecord): number | null => {
  const value = record[EMPLOYEE_ID_COLUMN];
  return typeof value === 'number' ? value : null;
};

const readEmployeeName = (record: TableRecord): string => {
  const value = record[EMPLOYEE_NAME_COLUMN];
  return isBlankCell(value) ? UNNAMED_EMPLOYEE : cellToText(value).trim();
};

export const employeeLabel = (name: string, id: number) => `${name} (${id})`;

export const buildEmployeeOptions = (roster: DataTable): EmployeeOption[] =>
  roster
    .toRecords()
    .flatMap((record) => {
      const id = readEmployeeId(record);
      if (id === null) {
        return [];
      }
      const name = readEmployeeName(record);
      return [{ id, name, label: employeeLabel(name, id) }];
    })
    .sort((left, right) => nameCollator.compare(left.name, right.name) || left.id - right.id);

export const findEmployeeRecord = (roster: DataTable, employeeId: number): TableRecord | null => {
  const match = roster.filterRows((record) => readEmployeeId(record) === employeeId);
  return match.recordAt(0);
};

export const buildEmployeeCard = (record: TableRecord): EmployeeCard => {
  const area = record[EMPLOYEE_AREA_COLUMN];
  const metrics: EmployeeCardMetric[] = CARD_METRICS.flatMap(({ column, label }) => {
    const value = record[column];
    return value === undefined || isBlankCell(value) ? [] : [{ label, value }];
  });

  return {
    id: readEmployeeId(record) ?? 0,
    name: isBlankCell(record[EMPLOYEE_NAME_COLUMN]) ? '' : cellToText(record[EMPLOYEE_NAME_COLUMN]),
    area: area === undefined || isBlankCell(area) ? null : cellToText(area),
    metrics
  };
};

export const transposeRecord = (record: TableRecord, columns: readonly string[]): SummaryEntry[] =>
  columns.map((column) => ({ indicator: column, value: record[column] ?? null }));
