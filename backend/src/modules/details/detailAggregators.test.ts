import { describe, expect, it } from 'vitest';
import { DataTable } from '../../shared/table/dataTable.js';
import {
  countBy,
  formatNumber,
  presentSummary,
  resolveDetailTable,
  summarizeDetail,
  summarizeDiscipline,
  summarizeErrors,
  summarizePerformance,
  summarizeRanks
} from './detailAggregators.js';

describe('resolveDetailTable', () => {
  it('matches known stems case-insensitively', () => {
    expect(resolveDetailTable('Detail_Errors_Apr_Dec2025')?.kind).toBe('errors');
    expect(resolveDetailTable('performance_metrics_apr_dec2025')?.label).toBe('Производительность');
  });

  it('returns null for unknown tables', () => {
    expect(resolveDetailTable('overtime')).toBeNull();
  });
});

describe('discipline', () => {
  it('sums discipline points', () => {
    const table = new DataTable(['id_employee', 'discipline_points'], [[1, 2], [1, '3'], [1, null]]);
    expect(summarizeDiscipline(table).totalPoints).toBe(5);
  });

  it('is zero for an empty table or a missing column', () => {
    expect(summarizeDiscipline(DataTable.empty(['id_employee', 'discipline_points'])).totalPoints).toBe(0);
    expect(summarizeDiscipline(new DataTable(['id_employee'], [[1]])).totalPoints).toBe(0);
  });

  it('renders the total line', () => {
    const summary = summarizeDiscipline(new DataTable(['discipline_points'], [[1.5], [1]]));
    expect(presentSummary(summary).lines).toEqual(['Итого косяков (сумма discipline_points): 2.5']);
  });
});

describe('errors', () => {
  const errors = new DataTable(
    ['id_employee', 'area', 'product', 'description'],
    [
      [1, 'Сборка', 'Насос', 'Перепутана маркировка'],
      [1, null, 'Насос', 'Не закреплён кабель'],
      [1, 'Сборка', 'Клапан', 'Царапина на корпусе']
    ]
  );

  it('counts rows and groups by area and product', () => {
    const summary = summarizeErrors(errors);
    expect(summary.count).toBe(3);
    expect(summary.byArea).toEqual([
      { value: 'Сборка', count: 2 },
      { value: 'Не указано', count: 1 }
    ]);
    expect(summary.byArea.reduce((sum, row) => sum + row.count, 0)).toBe(3);
    expect(summary.byProduct).toEqual([
      { value: 'Насос', count: 2 },
      { value: 'Клапан', count: 1 }
    ]);
  });

  it('puts every row under "Не указано" when the column is missing', () => {
    const table = new DataTable(['id_employee'], [[1], [1]]);
    expect(countBy(table, 'area')).toEqual([{ value: 'Не указано', count: 2 }]);
  });

  it('presents breakdowns only when errors exist', () => {
    const presentation = presentSummary(summarizeErrors(errors));
    expect(presentation.lines).toEqual(['Итого ошибок (кол-во записей): 3']);
    expect(presentation.breakdowns.map((item) => item.column)).toEqual(['area', 'product']);
    expect(presentation.wideColumns).toEqual(['description']);

    const empty = presentSummary(summarizeErrors(errors.emptyLike()));
    expect(empty.lines).toEqual(['Итого ошибок (кол-во записей): 0']);
    expect(empty.breakdowns).toEqual([]);
  });
});

describe('ranks', () => {
  it('averages marks to two decimals', () => {
    const table = new DataTable(['id_employee', 'mark'], [[1, 3], [1, 4], [1, 5]]);
    const summary = summarizeRanks(table);
    expect(summary.averageMark).toBe(4);
    expect(presentSummary(summary).lines).toEqual(['Средний разряд (среднее mark): 4.00']);
  });

  it('reports no data without marks', () => {
    expect(presentSummary(summarizeRanks(new DataTable(['id_employee'], [[1]]))).lines).toEqual([
      'Средний разряд (среднее mark): нет данных'
    ]);
    expect(summarizeRanks(DataTable.empty(['mark'])).averageMark).toBeNull();
  });
});

describe('performance', () => {
  it('reads performance points from the first row', () => {
    const table = new DataTable(
      ['id_employee', 'performance_points'],
      [
        [1, 18.4],
        [1, 3]
      ]
    );
    const summary = summarizePerformance(table);
    expect(summary.score).toBe(18.4);
    expect(presentSummary(summary).lines).toEqual(['Итоговый балл: 18.40']);
  });

  it('reports no data for a missing column or no rows', () => {
    expect(summarizePerformance(new DataTable(['id_employee', 'avg_complexity'], [[1, 2]])).score).toBeNull();
    expect(presentSummary(summarizeDetail('performance', DataTable.empty(['performance_points']))).lines).toEqual([
      'Итоговый балл: нет данных'
    ]);
  });
});

describe('formatNumber', () => {
  it('prints integers plainly and rounds fractions', () => {
    expect(formatNumber(3)).toBe('3');
    expect(formatNumber(2.5)).toBe('2.5');
    expect(formatNumber(10 / 3)).toBe('3.33');
  });
});
