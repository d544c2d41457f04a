export type DetailKind = 'discipline' | 'errors' | 'ranks' | 'performance';

export interface DetailTableDefinition {
  kind: DetailKind;
  stem: string;
  label: string;
}

export interface BreakdownRow {
  value: string;
  count: number;
}

export interface Breakdown {
  column: string;
  title: string;
  rows: BreakdownRow[];
}

export interface DisciplineSummary {
  kind: 'discipline';
  totalPoints: number;
}

export interface ErrorsSummary {
  kind: 'errors';
  count: number;
  byArea: BreakdownRow[];
  byProduct: BreakdownRow[];
}

export interface RanksSummary {
  kind: 'ranks';
  averageMark: number | null;
}

export interface PerformanceSummary {
  kind: 'performance';
  score: number | null;
}

export type DetailSummary = DisciplineSummary | ErrorsSummary | RanksSummary | PerformanceSummary;

export interface DetailPresentation {
  lines: string[];
  breakdowns: Breakdown[];
  wideColumns: string[];
}
