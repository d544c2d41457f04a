import { useCallback, useEffect, useState } from 'react';
import { ApiError } from '../../../shared/api/httpClient';
import type { DashboardView } from '../../../shared/types/dashboard';
import { dashboardApi } from '../services/dashboardApi';

interface HookState {
  view: DashboardView | null;
  loading: boolean;
  error: string | null;
  select: (employeeId: number) => Promise<void>;
}

const describeError = (error: unknown) => {
  if (error instanceof ApiError && error.status === 400) {
    return error.message;
  }
  return 'Не удалось загрузить данные. Обновите страницу.';
};

export const useDashboardView = (token: string | null, onSessionLost: () => void): HookState => {
  const [view, setView] = useState<DashboardView | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const run = useCallback(
    async (request: (sessionToken: string) => Promise<DashboardView>) => {
      if (!token) {
        return;
      }
      setLoading(true);
      try {
        setView(await request(token));
        setError(null);
      } catch (err) {
        if (err instanceof ApiError && (err.status === 401 || err.status === 403)) {
          onSessionLost();
          return;
        }
        console.error('Failed to load the dashboard view:', err);
        setError(describeError(err));
      } finally {
        setLoading(false);
      }
    },
    [token, onSessionLost]
  );

  const load = useCallback(() => run((sessionToken) => dashboardApi.getView(sessionToken)), [run]);

  const select = useCallback(
    (employeeId: number) => run((sessionToken) => dashboardApi.selectEmployee(sessionToken, employeeId)),
    [run]
  );

  useEffect(() => {
    void load();
  }, [load]);

  return { view, loading, error, select };
};
