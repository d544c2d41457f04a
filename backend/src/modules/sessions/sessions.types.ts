export interface SessionState {
  token: string;
  authenticated: boolean;
  selectedEmployeeId: number | null;
}
