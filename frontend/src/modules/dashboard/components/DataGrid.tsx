import styles from '../../../styles/DashboardScreen.module.css';
import type { CellValue } from '../../../shared/types/dashboard';
import { formatCell } from '../utils/cellFormat';

interface DataGridProps {
  columns: string[];
  rows: CellValue[][];
  wideColumns?: string[];
  emptyText?: string;
}

export const DataGrid = ({ columns, rows, wideColumns = [], emptyText = 'Нет записей.' }: DataGridProps) => {
  if (!rows.length) {
    return <p className={styles.caption}>{emptyText}</p>;
  }

  return (
    <div className={styles.tableWrapper}>
      <table className={styles.table}>
        <thead>
          <tr>
            {columns.map((column) => (
              <th key={column} className={wideColumns.includes(column) ? styles.wideCell : undefined}>
                {column}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {rows.map((row, rowIndex) => (
            <tr key={rowIndex}>
              {columns.map((column, columnIndex) => (
                <td key={column} className={wideColumns.includes(column) ? styles.wideCell : undefined}>
                  {formatCell(row[columnIndex] ?? null)}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
};
