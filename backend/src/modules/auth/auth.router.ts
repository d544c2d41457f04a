import { Router } from 'express';
import type { AuthService } from './auth.service.js';
import { createSessionGuard, getSession } from './auth.middleware.js';

export const createAuthRouter = (authService: AuthService) => {
  const router = Router();
  const requireSession = createSessionGuard(authService, { requireAuthentication: false });

  router.post('/session', (_req, res) => {
    const session = authService.openSession();
    res.status(201).json({ token: session.token, authenticated: session.authenticated });
  });

  router.get('/session', requireSession, (_req, res) => {
    const session = getSession(res);
    res.json({ authenticated: session.authenticated });
  });

  router.post('/login', requireSession, (req, res) => {
    const { username, password } = (req.body ?? {}) as { username?: unknown; password?: unknown };
    try {
      const state = authService.login(
        getSession(res),
        typeof username === 'string' ? username : '',
        typeof password === 'string' ? password : ''
      );
      res.json({ authenticated: state.authenticated });
    } catch (error) {
      if (error instanceof Error && error.message === 'INVALID_CREDENTIALS') {
        res.status(401).json({ code: 'invalid-credentials', message: 'Неверный логин или пароль.' });
        return;
      }
      console.error('Failed to process login:', error);
      res.status(500).json({ code: 'unknown', message: 'Не удалось выполнить вход.' });
    }
  });

  return router;
};
