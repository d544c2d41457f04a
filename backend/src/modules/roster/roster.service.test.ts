import { describe, expect, it, vi } from 'vitest';
import { DataTable } from '../../shared/table/dataTable.js';
import {
  buildEmployeeCard,
  buildEmployeeOptions,
  findEmployeeRecord,
  normalizeRoster,
  transposeRecord
} from './roster.service.js';

const rawRoster = () =>
  new DataTable(
    ['id_employee', 'fio_employee', 'Участок', '7', 'Unnamed: 10'],
    [
      [2, 'Петров', 'Сборка', 35, 3.5],
      [null, 'Без табеля', null, 10, 1],
      ['1.0', 'Иванов', null, 42, 4.2],
      ['x', 'Сидоров', null, null, null]
    ]
  );

describe('normalizeRoster', () => {
  it('keeps only rows with integer ids', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const roster = normalizeRoster(rawRoster());
    const ids = roster.getColumn('id_employee') ?? [];
    expect(ids).toEqual([2, 1]);
    expect(ids.every((id) => typeof id === 'number' && Number.isInteger(id))).toBe(true);
    expect(roster.rowCount).toBeLessThanOrEqual(rawRoster().rowCount);
  });

  it('returns no rows when the id column is absent', () => {
    const roster = normalizeRoster(new DataTable(['fio_employee'], [['Иванов']]));
    expect(roster.isEmpty).toBe(true);
    expect(roster.columns).toEqual(['fio_employee']);
  });
});

describe('roster views', () => {
  it('sorts employee options by name and labels them with ids', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const options = buildEmployeeOptions(normalizeRoster(rawRoster()));
    expect(options).toEqual([
      { id: 1, name: 'Иванов', label: 'Иванов (1)' },
      { id: 2, name: 'Петров', label: 'Петров (2)' }
    ]);
  });

  it('labels employees without a name', () => {
    const roster = new DataTable(['id_employee', 'fio_employee'], [[5, null]]);
    expect(buildEmployeeOptions(roster)[0]?.label).toBe('Без имени (5)');
  });

  it('builds the card with area and score metrics', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const roster = normalizeRoster(rawRoster());
    const record = findEmployeeRecord(roster, 2);
    expect(record).not.toBeNull();
    if (!record) {
      return;
    }
    expect(buildEmployeeCard(record)).toEqual({
      id: 2,
      name: 'Петров',
      area: 'Сборка',
      metrics: [
        { label: 'Сумма', value: 35 },
        { label: 'Сумма / 10', value: 3.5 }
      ]
    });
  });

  it('omits a missing area', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const record = findEmployeeRecord(normalizeRoster(rawRoster()), 1);
    expect(record && buildEmployeeCard(record).area).toBeNull();
  });

  it('transposes a record into indicator/value pairs', () => {
    const roster = new DataTable(['id_employee', 'fio_employee', '7'], [[1, 'Иванов', 42]]);
    const record = findEmployeeRecord(roster, 1);
    expect(record && transposeRecord(record, roster.columns)).toEqual([
      { indicator: 'id_employee', value: 1 },
      { indicator: 'fio_employee', value: 'Иванов' },
      { indicator: '7', value: 42 }
    ]);
  });
});
