import type { NextFunction, Request, Response } from 'express';
import type { AuthService } from './auth.service.js';
import { DashboardSession } from '../sessions/dashboardSession.js';

const BEARER_PREFIX = 'bearer ';

export const readBearerToken = (header: string | undefined): string | null => {
  if (!header || !header.toLowerCase().startsWith(BEARER_PREFIX)) {
    return null;
  }
  const token = header.slice(BEARER_PREFIX.length).trim();
  return token || null;
};

export const getSession = (res: Response): DashboardSession => {
  const session: unknown = res.locals.session;
  if (!(session instanceof DashboardSession)) {
    throw new Error('SESSION_NOT_FOUND');
  }
  return session;
};

export const createSessionGuard =
  (authService: AuthService, options: { requireAuthentication: boolean }) =>
  (req: Request, res: Response, next: NextFunction) => {
    const token = readBearerToken(req.header('authorization'));
    if (!token) {
      res.status(401).json({ code: 'session-missing', message: 'Сессия не найдена. Обновите страницу.' });
      return;
    }
    let session: DashboardSession;
    try {
      session = authService.resolveSession(token);
    } catch (error) {
      if (!(error instanceof Error) || error.message !== 'SESSION_NOT_FOUND') {
        next(error);
        return;
      }
      res.status(401).json({ code: 'session-missing', message: 'Сессия не найдена. Обновите страницу.' });
      return;
    }
    if (options.requireAuthentication && !session.authenticated) {
      res.status(403).json({ code: 'not-authenticated', message: 'Требуется вход в систему.' });
      return;
    }
    res.locals.session = session;
    next();
  };
