import { apiRequest } from '../../../shared/api/httpClient';

interface OpenSessionResponse {
  token: string;
  authenticated: boolean;
}

interface SessionStateResponse {
  authenticated: boolean;
}

export const authApi = {
  openSession: async () => apiRequest<OpenSessionResponse>('/auth/session', { method: 'POST' }),
  getSession: async (token: string) => apiRequest<SessionStateResponse>('/auth/session', { token }),
  login: async (token: string, username: string, password: string) =>
    apiRequest<SessionStateResponse>('/auth/login', {
      method: 'POST',
      token,
      body: { username, password }
    })
};
