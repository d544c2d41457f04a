import { useCallback } from 'react';
import styles from '../../styles/DashboardScreen.module.css';
import { useAuth } from '../auth/AuthContext';
import { useDashboardView } from './hooks/useDashboardView';
import { DetailTabs } from './components/DetailTabs';
import { EmployeeCard } from './components/EmployeeCard';
import { EmployeePicker } from './components/EmployeePicker';
import { StatusBanner } from './components/StatusBanner';
import { SummaryTable } from './components/SummaryTable';

export const DashboardScreen = () => {
  const { token, restartSession } = useAuth();
  const handleSessionLost = useCallback(() => {
    void restartSession();
  }, [restartSession]);
  const { view, loading, error, select } = useDashboardView(token, handleSessionLost);

  const handleSelect = useCallback(
    (employeeId: number) => {
      void select(employeeId);
    },
    [select]
  );

  if (!view) {
    return error ? <StatusBanner level="error" message={error} /> : <p className={styles.caption}>Загрузка...</p>;
  }

  if (view.status === 'missing-roster' || view.status === 'empty-roster') {
    return <StatusBanner level={view.level} message={view.message} />;
  }

  return (
    <div className={styles.wrapper}>
      {error && <StatusBanner level="error" message={error} />}
      <EmployeePicker
        employees={view.employees}
        selectedId={view.selectedId}
        disabled={loading}
        onSelect={handleSelect}
      />

      {view.status === 'selection-missing' ? (
        <StatusBanner level={view.level} message={view.message} />
      ) : (
        <>
          <EmployeeCard card={view.card} />

          <section>
            <h2 className={styles.sectionTitle}>Итоговая оценка</h2>
            <SummaryTable entries={view.summary} />
          </section>

          <section>
            <h2 className={styles.sectionTitle}>Детализация по выбранному сотруднику</h2>
            {view.details.status === 'empty' ? (
              <StatusBanner level="info" message={view.details.message} />
            ) : (
              <DetailTabs tabs={view.details.tabs} employeeId={view.selectedId} />
            )}
          </section>
        </>
      )}
    </div>
  );
};
