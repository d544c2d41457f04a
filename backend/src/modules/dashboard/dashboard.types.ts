import type { CellValue } from '../../shared/table/table.types.js';
import type { Breakdown } from '../details/details.types.js';
import type { EmployeeCard, EmployeeOption, SummaryEntry } from '../roster/roster.types.js';

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
