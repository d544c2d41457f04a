import { createContext, ReactNode, useCallback, useContext, useEffect, useMemo, useState } from 'react';
import { ApiError } from '../../shared/api/httpClient';
import { authApi } from './services/authApi';

export type AuthStatus = 'initializing' | 'unauthenticated' | 'authenticated' | 'unavailable';

export type LoginError = 'invalid' | 'session' | 'unknown';

interface LoginSuccess {
  ok: true;
}

interface LoginFailure {
  ok: false;
  error: LoginError;
}

export type LoginResult = LoginSuccess | LoginFailure;

interface AuthContextValue {
  status: AuthStatus;
  token: string | null;
  login: (username: string, password: string) => Promise<LoginResult>;
  restartSession: () => Promise<void>;
}

// Each browser tab keeps its own dashboard session.
const SESSION_STORAGE_KEY = 'attestation:session-token';

const isBrowserEnvironment = () => typeof window !== 'undefined';

const readStoredToken = (): string | null => {
  if (!isBrowserEnvironment()) {
    return null;
  }
  return window.sessionStorage.getItem(SESSION_STORAGE_KEY)?.trim() || null;
};

const storeToken = (token: string | null) => {
  if (!isBrowserEnvironment()) {
    return;
  }
  if (token) {
    window.sessionStorage.setItem(SESSION_STORAGE_KEY, token);
  } else {
    window.sessionStorage.removeItem(SESSION_STORAGE_KEY);
  }
};

const AuthContext = createContext<AuthContextValue | null>(null);

export const AuthProvider = ({ children }: { children: ReactNode }) => {
  const [status, setStatus] = useState<AuthStatus>('initializing');
  const [token, setToken] = useState<string | null>(null);

  const openFreshSession = useCallback(async () => {
    const session = await authApi.openSession();
    storeToken(session.token);
    setToken(session.token);
    setStatus(session.authenticated ? 'authenticated' : 'unauthenticated');
  }, []);

  const restartSession = useCallback(async () => {
    setStatus('initializing');
    try {
      await openFreshSession();
    } catch (error) {
      console.error('Failed to open a dashboard session:', error);
      setStatus('unavailable');
    }
  }, [openFreshSession]);

  useEffect(() => {
    let cancelled = false;

    const restore = async () => {
      const stored = readStoredToken();
      if (stored) {
        try {
          const state = await authApi.getSession(stored);
          if (!cancelled) {
            setToken(stored);
            setStatus(state.authenticated ? 'authenticated' : 'unauthenticated');
          }
          return;
        } catch (error) {
          if (!(error instanceof ApiError && error.status === 401)) {
            throw error;
          }
          storeToken(null);
        }
      }
      if (!cancelled) {
        await openFreshSession();
      }
    };

    restore().catch((error: unknown) => {
      console.error('Failed to restore the dashboard session:', error);
      if (!cancelled) {
        setStatus('unavailable');
      }
    });

    return () => {
      cancelled = true;
    };
  }, [openFreshSession]);

  const login = useCallback<AuthContextValue['login']>(
    async (username, password) => {
      if (!token) {
        return { ok: false, error: 'session' };
      }
      try {
        const response = await authApi.login(token, username, password);
        setStatus(response.authenticated ? 'authenticated' : 'unauthenticated');
        return response.authenticated ? { ok: true } : { ok: false, error: 'invalid' };
      } catch (error) {
        if (error instanceof ApiError) {
          if (error.code === 'invalid-credentials') {
            return { ok: false, error: 'invalid' };
          }
          if (error.status === 401) {
            await restartSession();
            return { ok: false, error: 'session' };
          }
        }
        console.error('Failed to sign in:', error);
        return { ok: false, error: 'unknown' };
      }
    },
    [token, restartSession]
  );

  const value = useMemo<AuthContextValue>(
    () => ({
      status,
      token,
      login,
      restartSession
    }),
    [status, token, login, restartSession]
  );

  return <AuthContext.Provider value={value}>{children}</AuthContext.Provider>;
};

export const useAuth = () => {
  const context = useContext(AuthContext);
  if (!context) {
    throw new Error('AuthContext is missing. Wrap the app in AuthProvider.');
  }
  return context;
};
