import type { AuthCredentials } from '../../shared/config/appConfig.js';
import type { DashboardSession } from '../sessions/dashboardSession.js';
import type { SessionsRepository } from '../sessions/sessions.repository.js';
import type { SessionState } from '../sessions/sessions.types.js';

export class AuthService {
  constructor(
    private readonly credentials: AuthCredentials,
    private readonly sessions: SessionsRepository
  ) {}

  openSession(): SessionState {
    return this.sessions.create().toState();
  }

  resolveSession(token: string): DashboardSession {
    const session = this.sessions.find(token);
    if (!session) {
      throw new Error('SESSION_NOT_FOUND');
    }
    return session;
  }

  // Plain comparison on purpose: the dashboard is protected by a single shared pair.
  login(session: DashboardSession, username: string, password: string): SessionState {
    if (username !== this.credentials.username || password !== this.credentials.password) {
      throw new Error('INVALID_CREDENTIALS');
    }
    session.markAuthenticated();
    return session.toState();
  }
}
