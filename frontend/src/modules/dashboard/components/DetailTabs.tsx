import { useEffect, useState } from 'react';
import { Download } from 'lucide-react';
import styles from '../../../styles/DashboardScreen.module.css';
import type { DetailTab } from '../../../shared/types/dashboard';
import { exportDetailTab } from '../utils/tableExport';
import { BreakdownTable } from './BreakdownTable';
import { DataGrid } from './DataGrid';
import { StatusBanner } from './StatusBanner';

interface DetailTabsProps {
  tabs: DetailTab[];
  employeeId: number;
}

export const DetailTabs = ({ tabs, employeeId }: DetailTabsProps) => {
  const [activeFile, setActiveFile] = useState(tabs[0]?.fileName ?? '');

  useEffect(() => {
    if (!tabs.some((tab) => tab.fileName === activeFile)) {
      setActiveFile(tabs[0]?.fileName ?? '');
    }
  }, [tabs, activeFile]);

  const active = tabs.find((tab) => tab.fileName === activeFile) ?? tabs[0];

  return (
    <div>
      <div className={styles.tabList} role="tablist">
        {tabs.map((tab) => (
          <button
            key={tab.fileName}
            type="button"
            role="tab"
            aria-selected={tab.fileName === active?.fileName}
            className={tab.fileName === active?.fileName ? styles.tabActive : styles.tab}
            onClick={() => setActiveFile(tab.fileName)}
          >
            {tab.label}
          </button>
        ))}
      </div>

      {active && (
        <div className={styles.tabPanel} role="tabpanel">
          <div className={styles.tabHeader}>
            <p className={styles.caption}>{active.caption}</p>
            <button
              type="button"
              className={styles.linkButton}
              onClick={() => exportDetailTab(active, employeeId)}
              disabled={!active.rows.length}
            >
              <Download size={14} aria-hidden /> Скачать .xlsx
            </button>
          </div>
          {active.error && <StatusBanner level="error" message={active.error} />}
          {active.lines.map((line) => (
            <p key={line} className={styles.aggregateLine}>
              {line}
            </p>
          ))}
          {active.breakdowns.length > 0 && (
            <div className={styles.breakdownRow}>
              {active.breakdowns.map((breakdown) => (
                <BreakdownTable key={breakdown.column} breakdown={breakdown} />
              ))}
            </div>
          )}
          {!active.error && (
            <DataGrid columns={active.columns} rows={active.rows} wideColumns={active.wideColumns} />
          )}
        </div>
      )}
    </div>
  );
};
