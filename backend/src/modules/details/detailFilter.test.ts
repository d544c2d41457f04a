import { describe, expect, it } from 'vitest';
import { DataTable } from '../../shared/table/dataTable.js';
import { filterByEmployee } from './detailFilter.js';

describe('filterByEmployee', () => {
  it('keeps only rows of the requested employee', () => {
    const table = new DataTable(
      ['id_employee', 'mark'],
      [
        [1, 3],
        [2, 4],
        [1, 5]
      ]
    );
    const filtered = filterByEmployee(table, 1);
    expect(filtered.getColumn('mark')).toEqual([3, 5]);
    expect(filtered.getColumn('id_employee')).toEqual([1, 1]);
    expect(filtered.columns).toEqual(table.columns);
  });

  it('matches ids stored as text', () => {
    const table = new DataTable(
      ['id_employee', 'area'],
      [
        ['12', 'A'],
        [' 12 ', 'B'],
        ['13', 'C'],
        ['n/a', 'D']
      ]
    );
    expect(filterByEmployee(table, 12).getColumn('area')).toEqual(['A', 'B']);
  });

  it('returns an empty table with the same columns when the id column is missing', () => {
    const table = new DataTable(['employee', 'mark'], [[1, 3]]);
    const filtered = filterByEmployee(table, 1);
    expect(filtered.rowCount).toBe(0);
    expect(filtered.columns).toEqual(['employee', 'mark']);
  });

  it('leaves the source table untouched', () => {
    const table = new DataTable(['id_employee'], [['7'], ['8']]);
    filterByEmployee(table, 7);
    expect(table.getColumn('id_employee')).toEqual(['7', '8']);
  });
});
