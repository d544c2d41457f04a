import express from 'express';
import cors from 'cors';
import type { AppConfig } from '../shared/config/appConfig.js';
import { buildAppModules } from './appModules.js';
import { registerAppRoutes } from './setupRoutes.js';

export const createApp = (config: AppConfig) => {
  const app = express();
  app.use(cors(config.corsOrigin ? { origin: config.corsOrigin } : undefined));
  app.use(express.json({ limit: '1mb' }));

  registerAppRoutes(app, buildAppModules(config));

  return app;
};
