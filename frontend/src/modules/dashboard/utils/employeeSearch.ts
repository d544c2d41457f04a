import type { EmployeeOption } from '../../../shared/types/dashboard';

const normalize = (value: string) => value.trim().toLocaleLowerCase('ru').replace(/ё/g, 'е');

/**
 * Options whose label contains every word of the query. The currently selected
 * option is always kept so the picker never loses its value.
 */
export const filterEmployeeOptions = (
  options: EmployeeOption[],
  query: string,
  selectedId: number | null
): EmployeeOption[] => {
  const terms = normalize(query).split(/\s+/).filter(Boolean);
  if (!terms.length) {
    return options;
  }
  return options.filter((option) => {
    if (option.id === selectedId) {
      return true;
    }
    const label = normalize(option.label);
    return terms.every((term) => label.includes(term));
  });
};
