import type { SummaryEntry } from '../../../shared/types/dashboard';
import { DataGrid } from './DataGrid';

export const SummaryTable = ({ entries }: { entries: SummaryEntry[] }) => (
  <DataGrid columns={['Показатель', 'Значение']} rows={entries.map((entry) => [entry.indicator, entry.value])} />
);
