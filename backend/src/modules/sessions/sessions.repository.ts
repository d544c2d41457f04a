import { DashboardSession } from './dashboardSession.js';

export class SessionsRepository {
  private readonly sessions = new Map<string, DashboardSession>();

  constructor(
    private readonly idleTimeoutMs: number,
    private readonly clock: () => number = Date.now
  ) {}

  create(): DashboardSession {
    this.purgeExpired();
    const session = new DashboardSession(undefined, this.clock());
    this.sessions.set(session.token, session);
    return session;
  }

  find(token: string): DashboardSession | null {
    const session = this.sessions.get(token);
    if (!session) {
      return null;
    }
    const now = this.clock();
    if (now - session.lastSeenAt > this.idleTimeoutMs) {
      this.sessions.delete(token);
      console.warn('Discarded an expired dashboard session.');
      return null;
    }
    session.touch(now);
    return session;
  }

  get size() {
    return this.sessions.size;
  }

  private purgeExpired() {
    const now = this.clock();
    for (const [token, session] of this.sessions) {
      if (now - session.lastSeenAt > this.idleTimeoutMs) {
        this.sessions.delete(token);
      }
    }
  }
}
