import type { CellValue } from '../../../shared/types/dashboard';

const numberFormatter = new Intl.NumberFormat('ru-RU', { maximumFractionDigits: 2 });

export const formatCell = (value: CellValue): string => {
  if (value === null) {
    return '—';
  }
  if (typeof value === 'number') {
    return numberFormatter.format(value);
  }
  return value;
};
