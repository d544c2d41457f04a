import { apiRequest } from '../../../shared/api/httpClient';
import type { DashboardView } from '../../../shared/types/dashboard';

export const dashboardApi = {
  getView: async (token: string) => apiRequest<DashboardView>('/dashboard', { token }),
  selectEmployee: async (token: string, employeeId: number) =>
    apiRequest<DashboardView>('/dashboard/selection', {
      method: 'PUT',
      token,
      body: { employeeId }
    })
};
