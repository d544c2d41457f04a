import type { AuthCredentials } from '../../shared/config/appConfig.js';
import type { SessionsRepository } from '../sessions/sessions.repository.js';
import { AuthService } from './auth.service.js';

export const createAuthModule = (credentials: AuthCredentials, sessions: SessionsRepository) => ({
  authService: new AuthService(credentials, sessions)
});
