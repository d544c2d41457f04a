import { ReactNode } from 'react';
import styles from '../styles/AppLayout.module.css';

export const AppLayout = ({ children }: { children: ReactNode }) => (
  <div className={styles.container}>
    <header className={styles.header}>
      <h1 className={styles.title}>Панель аттестации сотрудников</h1>
    </header>
    <main className={styles.content}>{children}</main>
  </div>
);
