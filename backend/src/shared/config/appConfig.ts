import path from 'path';
import { fileURLToPath } from 'url';

export interface AuthCredentials {
  username: string;
  password: string;
}

export interface AppConfig {
  port: number;
  dataDir: string;
  rosterFileName: string;
  credentials: AuthCredentials;
  sessionIdleMs: number;
  corsOrigin: string | null;
}

type Environment = Record<string, string | undefined>;

const DEFAULT_PORT = 4000;
const DEFAULT_ROSTER_FILE = 'final.csv';
const DEFAULT_SESSION_IDLE_MINUTES = 720;

// backend/src/shared/config -> backend/data
const defaultDataDir = () =>
  path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..', '..', 'data');

const readPositiveNumber = (value: string | undefined, fallback: number) => {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const readTrimmed = (value: string | undefined) => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

export const readAppConfig = (env: Environment = process.env): AppConfig => {
  // Credentials are compared verbatim, so the raw values are kept without trimming
  const username = env.AUTH_USERNAME;
  const password = env.AUTH_PASSWORD;

  const missing = [
    ['AUTH_USERNAME', username],
    ['AUTH_PASSWORD', password]
  ]
    .filter(([, value]) => !value)
    .map(([key]) => key);

  if (missing.length || !username || !password) {
    throw new Error(`Dashboard configuration is missing required env vars: ${missing.join(', ')}.`);
  }

  const dataDir = readTrimmed(env.DATA_DIR);

  return {
    port: readPositiveNumber(env.PORT, DEFAULT_PORT),
    dataDir: dataDir ? path.resolve(dataDir) : defaultDataDir(),
    rosterFileName: readTrimmed(env.ROSTER_FILE_NAME) ?? DEFAULT_ROSTER_FILE,
    credentials: { username, password },
    sessionIdleMs: readPositiveNumber(env.SESSION_IDLE_MINUTES, DEFAULT_SESSION_IDLE_MINUTES) * 60 * 1000,
    corsOrigin: readTrimmed(env.CORS_ORIGIN)
  };
};
