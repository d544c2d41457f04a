import { randomUUID } from 'crypto';
import { CsvTableCache } from '../../shared/csv/csvCache.js';
import type { SessionState } from './sessions.types.js';

/**
 * State owned by one interactive session. Nothing here is shared between
 * sessions, including the parsed CSV tables.
 */
export class DashboardSession {
  readonly tables = new CsvTableCache();
  private authenticatedFlag = false;
  private selection: number | null = null;
  private lastSeen: number;

  constructor(
    readonly token: string = randomUUID(),
    now: number = Date.now()
  ) {
    this.lastSeen = now;
  }

  get authenticated() {
    return this.authenticatedFlag;
  }

  get selectedEmployeeId() {
    return this.selection;
  }

  get lastSeenAt() {
    return this.lastSeen;
  }

  // There is no way back: a session stays signed in until it expires.
  markAuthenticated() {
    this.authenticatedFlag = true;
  }

  selectEmployee(employeeId: number) {
    this.selection = employeeId;
  }

  touch(now: number = Date.now()) {
    this.lastSeen = now;
  }

  toState(): SessionState {
    return {
      token: this.token,
      authenticated: this.authenticatedFlag,
      selectedEmployeeId: this.selection
    };
  }
}
