import styles from '../../../styles/DashboardScreen.module.css';
import type { EmployeeCard as EmployeeCardModel } from '../../../shared/types/dashboard';
import { formatCell } from '../utils/cellFormat';

export const EmployeeCard = ({ card }: { card: EmployeeCardModel }) => (
  <section className={styles.card}>
    <h2 className={styles.sectionTitle}>Сотрудник</h2>
    <p className={styles.cardName}>{card.name}</p>
    <p className={styles.caption}>ID: {card.id}</p>
    {card.area && <p>{card.area}</p>}
    {card.metrics.map((metric) => (
      <p key={metric.label}>
        {metric.label}: {formatCell(metric.value)}
      </p>
    ))}
  </section>
);
