import { describe, expect, it } from 'vitest';
import type { DetailTab } from '../../../shared/types/dashboard';
import { buildExportFileName, buildSheetRows } from './tableExport';

describe('table export helpers', () => {
  it('puts the header first and pads short rows', () => {
    expect(buildSheetRows(['id_employee', 'mark', 'note'], [[2, 4], [2, 5, 'повтор']])).toEqual([
      ['id_employee', 'mark', 'note'],
      [2, 4, null],
      [2, 5, 'повтор']
    ]);
  });

  it('names the file after the source table and employee', () => {
    const tab: DetailTab = {
      fileName: 'detail_ranks_apr_dec2025.csv',
      label: 'Разряды',
      caption: 'Фильтр: id_employee = 2',
      error: null,
      lines: [],
      breakdowns: [],
      wideColumns: [],
      columns: [],
      rows: []
    };
    expect(buildExportFileName(tab, 2)).toBe('detail_ranks_apr_dec2025_2.xlsx');
  });
});
