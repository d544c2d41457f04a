import type { Application } from 'express';
import { healthRouter } from '../shared/health.router.js';
import { createAuthRouter } from '../modules/auth/auth.router.js';
import { createDashboardRouter } from '../modules/dashboard/dashboard.router.js';
import type { AppModules } from './appModules.js';

export const registerAppRoutes = (app: Application, modules: AppModules) => {
  app.use('/health', healthRouter);
  app.use('/auth', createAuthRouter(modules.authService));
  app.use('/dashboard', createDashboardRouter(modules.authService, modules.dashboardService));
};
