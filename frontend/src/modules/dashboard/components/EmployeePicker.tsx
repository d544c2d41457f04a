import { useMemo, useState } from 'react';
import { Search } from 'lucide-react';
import styles from '../../../styles/DashboardScreen.module.css';
import type { EmployeeOption } from '../../../shared/types/dashboard';
import { filterEmployeeOptions } from '../utils/employeeSearch';

interface EmployeePickerProps {
  employees: EmployeeOption[];
  selectedId: number;
  disabled?: boolean;
  onSelect: (employeeId: number) => void;
}

export const EmployeePicker = ({ employees, selectedId, disabled, onSelect }: EmployeePickerProps) => {
  const [query, setQuery] = useState('');
  const visible = useMemo(
    () => filterEmployeeOptions(employees, query, selectedId),
    [employees, query, selectedId]
  );

  return (
    <div className={styles.picker}>
      <label className={styles.pickerLabel} htmlFor="employee-select">
        Выберите сотрудника
      </label>
      <div className={styles.searchField}>
        <Search size={16} aria-hidden />
        <input
          className={styles.searchInput}
          placeholder="Поиск по ФИО или id"
          value={query}
          onChange={(event) => setQuery(event.target.value)}
        />
      </div>
      <select
        id="employee-select"
        className={styles.select}
        value={selectedId}
        disabled={disabled}
        onChange={(event) => onSelect(Number(event.target.value))}
      >
        {visible.map((employee) => (
          <option key={employee.id} value={employee.id}>
            {employee.label}
          </option>
        ))}
      </select>
    </div>
  );
};
