import type { DataTable } from '../../shared/table/dataTable.js';
import { cellToText, isBlankCell, toNullableNumber } from '../../shared/table/cellCoercion.js';
import type {
  Breakdown,
  BreakdownRow,
  DetailKind,
  DetailPresentation,
  DetailSummary,
  DetailTableDefinition,
  DisciplineSummary,
  ErrorsSummary,
  PerformanceSummary,
  RanksSummary
} from './details.types.js';

export const DISCIPLINE_POINTS_COLUMN = 'discipline_points';
export const ERROR_AREA_COLUMN = 'area';
export const ERROR_PRODUCT_COLUMN = 'product';
export const ERROR_DESCRIPTION_COLUMN = 'description';
export const RANK_MARK_COLUMN = 'mark';
export const PERFORMANCE_POINTS_COLUMN = 'performance_points';

export const NOT_SPECIFIED = 'Не указано';
export const NO_DATA = 'нет данных';

export const DETAIL_TABLES: DetailTableDefinition[] = [
  { kind: 'discipline', stem: 'detail_discipline_apr_dec2025', label: 'Дисциплина' },
  { kind: 'errors', stem: 'detail_errors_apr_dec2025', label: 'Ошибки' },
  { kind: 'ranks', stem: 'detail_ranks_apr_dec2025', label: 'Разряды' },
  { kind: 'performance', stem: 'performance_metrics_apr_dec2025', label: 'Производительность' }
];

export const resolveDetailTable = (stem: string): DetailTableDefinition | null => {
  const normalized = stem.trim().toLowerCase();
  return DETAIL_TABLES.find((definition) => definition.stem === normalized) ?? null;
};

const numericValues = (table: DataTable, column: string): number[] =>
  (table.getColumn(column) ?? []).flatMap((value) => {
    const parsed = toNullableNumber(value);
    return parsed === null ? [] : [parsed];
  });

export const formatNumber = (value: number): string =>
  Number.isInteger(value) ? `${value}` : `${Number(value.toFixed(2))}`;

export const summarizeDiscipline = (table: DataTable): DisciplineSummary => ({
  kind: 'discipline',
  totalPoints: numericValues(table, DISCIPLINE_POINTS_COLUMN).reduce((sum, value) => sum + value, 0)
});

export const countBy = (table: DataTable, column: string): BreakdownRow[] => {
  const counts = new Map<string, number>();
  const values = table.getColumn(column) ?? table.rows.map(() => null);
  values.forEach((value) => {
    const key = isBlankCell(value) ? NOT_SPECIFIED : cellToText(value).trim();
    counts.set(key, (counts.get(key) ?? 0) + 1);
  });
  return Array.from(counts.entries())
    .map(([value, count]) => ({ value, count }))
    .sort((left, right) => right.count - left.count || left.value.localeCompare(right.value, 'ru'));
};

export const summarizeErrors = (table: DataTable): ErrorsSummary => {
  if (table.isEmpty) {
    return { kind: 'errors', count: 0, byArea: [], byProduct: [] };
  }
  return {
    kind: 'errors',
    count: table.rowCount,
    byArea: countBy(table, ERROR_AREA_COLUMN),
    byProduct: countBy(table, ERROR_PRODUCT_COLUMN)
  };
};

export const summarizeRanks = (table: DataTable): RanksSummary => {
  const marks = numericValues(table, RANK_MARK_COLUMN);
  if (!marks.length) {
    return { kind: 'ranks', averageMark: null };
  }
  return { kind: 'ranks', averageMark: marks.reduce((sum, value) => sum + value, 0) / marks.length };
};

// The precomputed performance_points column is authoritative; the score is
// read from the employee's first row as-is.
export const summarizePerformance = (table: DataTable): PerformanceSummary => ({
  kind: 'performance',
  score: table.isEmpty ? null : toNullableNumber(table.getCell(0, PERFORMANCE_POINTS_COLUMN))
});

export const summarizeDetail = (kind: DetailKind, table: DataTable): DetailSummary => {
  switch (kind) {
    case 'discipline':
      return summarizeDiscipline(table);
    case 'errors':
      return summarizeErrors(table);
    case 'ranks':
      return summarizeRanks(table);
    case 'performance':
      return summarizePerformance(table);
  }
};

export const presentSummary = (summary: DetailSummary): DetailPresentation => {
  switch (summary.kind) {
    case 'discipline':
      return {
        lines: [`Итого косяков (сумма ${DISCIPLINE_POINTS_COLUMN}): ${formatNumber(summary.totalPoints)}`],
        breakdowns: [],
        wideColumns: []
      };
    case 'errors': {
      const breakdowns: Breakdown[] = summary.count
        ? [
            { column: ERROR_AREA_COLUMN, title: 'Ошибки по участкам', rows: summary.byArea },
            { column: ERROR_PRODUCT_COLUMN, title: 'Ошибки по продуктам', rows: summary.byProduct }
          ]
        : [];
      return {
        lines: [`Итого ошибок (кол-во записей): ${summary.count}`],
        breakdowns,
        wideColumns: [ERROR_DESCRIPTION_COLUMN]
      };
    }
    case 'ranks':
      return {
        lines: [
          `Средний разряд (среднее ${RANK_MARK_COLUMN}): ${
            summary.averageMark === null ? NO_DATA : summary.averageMark.toFixed(2)
          }`
        ],
        breakdowns: [],
        wideColumns: []
      };
    case 'performance':
      return {
        lines: [`Итоговый балл: ${summary.score === null ? NO_DATA : summary.score.toFixed(2)}`],
        breakdowns: [],
        wideColumns: []
      };
  }
};
