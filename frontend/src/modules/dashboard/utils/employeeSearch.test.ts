import { describe, expect, it } from 'vitest';
import type { EmployeeOption } from '../../../shared/types/dashboard';
import { filterEmployeeOptions } from './employeeSearch';

const options: EmployeeOption[] = [
  { id: 1, name: 'Иванов Пётр', label: 'Иванов Пётр (1)' },
  { id: 2, name: 'Петров Иван', label: 'Петров Иван (2)' },
  { id: 13, name: 'Сидорова Анна', label: 'Сидорова Анна (13)' }
];

describe('filterEmployeeOptions', () => {
  it('returns every option for an empty query', () => {
    expect(filterEmployeeOptions(options, '   ', null)).toEqual(options);
  });

  it('matches all query words case-insensitively', () => {
    expect(filterEmployeeOptions(options, 'иванов пётр', null).map((option) => option.id)).toEqual([1]);
  });

  it('treats ё and е as the same letter', () => {
    expect(filterEmployeeOptions(options, 'петр', null).map((option) => option.id)).toEqual([1, 2]);
  });

  it('matches by id and keeps the selected option', () => {
    expect(filterEmployeeOptions(options, '(13)', 2).map((option) => option.id)).toEqual([2, 13]);
  });
});
