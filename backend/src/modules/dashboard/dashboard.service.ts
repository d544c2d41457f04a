import { CsvFileNotFoundError } from '../../shared/csv/csvCache.js';
import type { DataTable } from '../../shared/table/dataTable.js';
import type { DatasetRepository } from '../dataset/dataset.repository.js';
import type { DatasetFile } from '../dataset/dataset.types.js';
import type { DashboardSession } from '../sessions/dashboardSession.js';
import { filterByEmployee } from '../details/detailFilter.js';
import { presentSummary, resolveDetailTable, summarizeDetail } from '../details/detailAggregators.js';
import {
  buildEmployeeCard,
  buildEmployeeOptions,
  findEmployeeRecord,
  normalizeRoster,
  transposeRecord
} from '../roster/roster.service.js';
import { EMPLOYEE_ID_COLUMN } from '../roster/roster.types.js';
import type { DashboardView, DetailTab, DetailTabsView } from './dashboard.types.js';

export class DashboardService {
  constructor(private readonly dataset: DatasetRepository) {}

  async buildView(session: DashboardSession): Promise<DashboardView> {
    const roster = await this.loadRoster(session);
    if (!roster) {
      return {
        status: 'missing-roster',
        level: 'error',
        message: `Файл ${this.dataset.rosterName} не найден.`
      };
    }
    if (roster.isEmpty) {
      return {
        status: 'empty-roster',
        level: 'warning',
        message: `Нет данных сотрудников в ${this.dataset.rosterName}.`
      };
    }

    const employees = buildEmployeeOptions(roster);
    const [firstEmployee] = employees;
    if (session.selectedEmployeeId === null && firstEmployee) {
      session.selectEmployee(firstEmployee.id);
    }
    const selectedId = session.selectedEmployeeId ?? firstEmployee?.id ?? 0;

    const record = findEmployeeRecord(roster, selectedId);
    if (!record) {
      return {
        status: 'selection-missing',
        level: 'warning',
        message: 'Выбранный сотрудник не найден.',
        employees,
        selectedId
      };
    }

    return {
      status: 'ready',
      employees,
      selectedId,
      card: buildEmployeeCard(record),
      summary: transposeRecord(record, roster.columns),
      details: await this.buildDetailTabs(session, selectedId)
    };
  }

  async selectEmployee(session: DashboardSession, employeeId: number): Promise<DashboardView> {
    if (!Number.isInteger(employeeId)) {
      throw new Error('INVALID_INPUT');
    }
    const roster = await this.loadRoster(session);
    if (!roster || !findEmployeeRecord(roster, employeeId)) {
      throw new Error('UNKNOWN_EMPLOYEE');
    }
    session.selectEmployee(employeeId);
    return this.buildView(session);
  }

  private async loadRoster(session: DashboardSession): Promise<DataTable | null> {
    if (!(await this.dataset.rosterExists())) {
      return null;
    }
    try {
      const raw = await session.tables.getOrLoad(this.dataset.getRosterFile().filePath);
      return normalizeRoster(raw);
    } catch (error) {
      if (error instanceof CsvFileNotFoundError) {
        return null;
      }
      throw error;
    }
  }

  private async buildDetailTabs(session: DashboardSession, employeeId: number): Promise<DetailTabsView> {
    const files = await this.dataset.listDetailFiles();
    if (!files.length) {
      return { status: 'empty', message: 'Дополнительные CSV файлы не найдены.' };
    }
    const tabs = await Promise.all(files.map((file) => this.buildDetailTab(session, file, employeeId)));
    return { status: 'ready', tabs };
  }

  private async buildDetailTab(session: DashboardSession, file: DatasetFile, employeeId: number): Promise<DetailTab> {
    const caption = `Фильтр: ${EMPLOYEE_ID_COLUMN} = ${employeeId}`;
    const definition = resolveDetailTable(file.stem);
    const label = definition?.label ?? file.stem;

    let table: DataTable;
    try {
      table = await session.tables.getOrLoad(file.filePath);
    } catch (error) {
      console.error(`Failed to load detail table ${file.fileName}:`, error);
      return {
        fileName: file.fileName,
        label,
        caption,
        error: `Не удалось прочитать файл ${file.fileName}.`,
        lines: [],
        breakdowns: [],
        wideColumns: [],
        columns: [],
        rows: []
      };
    }

    const filtered = filterByEmployee(table, employeeId);
    const presentation = definition
      ? presentSummary(summarizeDetail(definition.kind, filtered))
      : { lines: [], breakdowns: [], wideColumns: [] };

    return {
      fileName: file.fileName,
      label,
      caption,
      error: null,
      lines: presentation.lines,
      breakdowns: presentation.breakdowns,
      wideColumns: presentation.wideColumns.filter((column) => filtered.columnExists(column)),
      columns: [...filtered.columns],
      rows: filtered.rows.map((row) => [...row])
    };
  }
}
