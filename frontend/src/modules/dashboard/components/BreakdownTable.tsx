import styles from '../../../styles/DashboardScreen.module.css';
import type { Breakdown } from '../../../shared/types/dashboard';
import { DataGrid } from './DataGrid';

export const BreakdownTable = ({ breakdown }: { breakdown: Breakdown }) => (
  <div className={styles.breakdown}>
    <h4 className={styles.breakdownTitle}>{breakdown.title}</h4>
    <DataGrid columns={[breakdown.column, 'Количество']} rows={breakdown.rows.map((row) => [row.value, row.count])} />
  </div>
);
