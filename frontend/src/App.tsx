import { AppLayout } from './app/AppLayout';
import { AuthProvider, useAuth } from './modules/auth/AuthContext';
import { LoginScreen } from './modules/auth/LoginScreen';
import { DashboardScreen } from './modules/dashboard/DashboardScreen';
import styles from './styles/AppLayout.module.css';

const AppContent = () => {
  const { status, restartSession } = useAuth();

  if (status === 'initializing') {
    return <p className={styles.placeholder}>Загрузка...</p>;
  }

  if (status === 'unavailable') {
    return (
      <div className={styles.placeholder}>
        <p>Сервер недоступен.</p>
        <button type="button" onClick={() => void restartSession()}>
          Повторить
        </button>
      </div>
    );
  }

  if (status === 'unauthenticated') {
    return <LoginScreen />;
  }

  return <DashboardScreen />;
};

export const App = () => (
  <AuthProvider>
    <AppLayout>
      <AppContent />
    </AppLayout>
  </AuthProvider>
);
