import type { CellValue } from '../../shared/table/table.types.js';

export const EMPLOYEE_ID_COLUMN = 'id_employee';
export const EMPLOYEE_NAME_COLUMN = 'fio_employee';
export const EMPLOYEE_AREA_COLUMN = 'Участок';

export interface EmployeeOption {
  id: number;
  name: string;
  label: string;
}

export interface EmployeeCardMetric {
  label: string;
  value: CellValue;
}

export interface EmployeeCard {
  id: number;
  name: string;
  area: string | null;
  metrics: EmployeeCardMetric[];
}

export interface SummaryEntry {
  indicator: string;
  value: CellValue;
}
