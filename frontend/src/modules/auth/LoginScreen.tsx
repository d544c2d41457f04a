import { FormEvent, useCallback, useState } from 'react';
import styles from '../../styles/LoginScreen.module.css';
import { LoginError, useAuth } from './AuthContext';

const mapLoginError = (error: LoginError) => {
  switch (error) {
    case 'invalid':
      return 'Неверный логин или пароль.';
    case 'session':
      return 'Сессия истекла. Попробуйте войти ещё раз.';
    default:
      return 'Не удалось выполнить вход. Повторите попытку позже.';
  }
};

export const LoginScreen = () => {
  const { login } = useAuth();
  const [username, setUsername] = useState('');
  const [password, setPassword] = useState('');
  const [error, setError] = useState<string | null>(null);
  const [isSubmitting, setIsSubmitting] = useState(false);

  const handleSubmit = useCallback(
    async (event: FormEvent<HTMLFormElement>) => {
      event.preventDefault();
      setIsSubmitting(true);
      const result = await login(username, password);
      setIsSubmitting(false);
      if (!result.ok) {
        setError(mapLoginError(result.error));
        setPassword('');
        return;
      }
      setError(null);
    },
    [login, username, password]
  );

  return (
    <section className={styles.wrapper}>
      <div className={styles.card}>
        <h1 className={styles.title}>Вход</h1>
        <p className={styles.subtitle}>Панель аттестации сотрудников</p>

        {error && <div className={styles.errorBanner}>{error}</div>}

        <form className={styles.form} onSubmit={handleSubmit} noValidate>
          <label className={styles.label}>
            Логин
            <input
              className={styles.input}
              autoComplete="username"
              value={username}
              onChange={(event) => setUsername(event.target.value)}
              disabled={isSubmitting}
            />
          </label>
          <label className={styles.label}>
            Пароль
            <input
              className={styles.input}
              type="password"
              autoComplete="current-password"
              value={password}
              onChange={(event) => setPassword(event.target.value)}
              disabled={isSubmitting}
            />
          </label>
          <button className={styles.primaryButton} type="submit" disabled={isSubmitting}>
            {isSubmitting ? 'Вход...' : 'Войти'}
          </button>
        </form>
      </div>
    </section>
  );
};
