import { DatasetRepository } from '../dataset/dataset.repository.js';
import { DashboardService } from './dashboard.service.js';

export const createDashboardModule = (dataDir: string, rosterFileName: string) => {
  const repository = new DatasetRepository(dataDir, rosterFileName);
  return { dashboardService: new DashboardService(repository) };
};
