import { Router, type Response } from 'express';
import type { AuthService } from '../auth/auth.service.js';
import { createSessionGuard, getSession } from '../auth/auth.middleware.js';
import type { DashboardService } from './dashboard.service.js';

const handleError = (error: unknown, res: Response) => {
  if (!(error instanceof Error)) {
    res.status(500).json({ code: 'unknown', message: 'Unexpected error.' });
    return;
  }
  switch (error.message) {
    case 'INVALID_INPUT':
      res.status(400).json({ code: 'invalid-input', message: 'Укажите числовой id сотрудника.' });
      return;
    case 'UNKNOWN_EMPLOYEE':
      res.status(400).json({ code: 'unknown-employee', message: 'Сотрудник не найден в final.csv.' });
      return;
    default:
      console.error('Failed to build the dashboard view:', error);
      res.status(500).json({ code: 'unknown', message: 'Не удалось загрузить данные.' });
  }
};

const parseEmployeeId = (value: unknown): number => {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim()) {
    return Number(value.trim());
  }
  return Number.NaN;
};

export const createDashboardRouter = (authService: AuthService, dashboardService: DashboardService) => {
  const router = Router();
  router.use(createSessionGuard(authService, { requireAuthentication: true }));

  router.get('/', async (_req, res) => {
    try {
      const view = await dashboardService.buildView(getSession(res));
      res.json(view);
    } catch (error) {
      handleError(error, res);
    }
  });

  router.put('/selection', async (req, res) => {
    const payload = (req.body ?? {}) as { employeeId?: unknown };
    try {
      const view = await dashboardService.selectEmployee(getSession(res), parseEmployeeId(payload.employeeId));
      res.json(view);
    } catch (error) {
      handleError(error, res);
    }
  });

  return router;
};
