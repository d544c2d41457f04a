import type { AppConfig } from '../shared/config/appConfig.js';
import { createAuthModule } from '../modules/auth/auth.module.js';
import { createDashboardModule } from '../modules/dashboard/dashboard.module.js';
import { SessionsRepository } from '../modules/sessions/sessions.repository.js';

export const buildAppModules = (config: AppConfig) => {
  const sessionsRepository = new SessionsRepository(config.sessionIdleMs);
  const { authService } = createAuthModule(config.credentials, sessionsRepository);
  const { dashboardService } = createDashboardModule(config.dataDir, config.rosterFileName);
  return { authService, dashboardService };
};

export type AppModules = ReturnType<typeof buildAppModules>;
