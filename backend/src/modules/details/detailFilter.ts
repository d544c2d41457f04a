import type { DataTable } from '../../shared/table/dataTable.js';
import { toNullableNumber } from '../../shared/table/cellCoercion.js';
import { EMPLOYEE_ID_COLUMN } from '../roster/roster.types.js';

/**
 * Rows of a detail table that belong to one employee. Ids stored as text are
 * compared numerically; unparseable ids never match. A table without the id
 * column yields an empty table with the same columns.
 */
export const filterByEmployee = (table: DataTable, employeeId: number): DataTable => {
  if (!table.columnExists(EMPLOYEE_ID_COLUMN)) {
    return table.emptyLike();
  }
  return table
    .mapColumn(EMPLOYEE_ID_COLUMN, (value) => toNullableNumber(value))
    .filterRows((record) => record[EMPLOYEE_ID_COLUMN] === employeeId);
};
