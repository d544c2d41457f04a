export type CellValue = string | number | null;

export interface EmployeeOption {
  id: number;
  name: string;
  label: string;
}

export interface EmployeeCard {
  id: number;
  name: string;
  area: string | null;
  metrics: Array<{ label: string; value: CellValue }>;
}

export interface SummaryEntry {
  indicator: string;
  value: CellValue;
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

export interface DetailTab {
  fileName: string;
  label: string;
  caption: string;
  error: string | null;
  lines: string[];
  breakdowns: Breakdown[];
  wideColumns: string[];
  columns: string[];
  rows: CellValue[][];
}

export type DetailTabsView =
  | { status: 'empty'; message: string }
  | { status: 'ready'; tabs: DetailTab[] };

export type DashboardView =
  | { status: 'missing-roster'; level: 'error'; message: string }
  | { status: 'empty-roster'; level: 'warning'; message: string }
  | {
      status: 'selection-missing';
      level: 'warning';
      message: string;
      employees: EmployeeOption[];
      selectedId: number;
    }
  | {
      status: 'ready';
      employees: EmployeeOption[];
      selectedId: number;
      card: EmployeeCard;
      summary: SummaryEntry[];
      details: DetailTabsView;
    };
