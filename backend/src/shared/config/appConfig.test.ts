import path from 'path';
import { describe, expect, it } from 'vitest';
import { readAppConfig } from './appConfig.js';

describe('readAppConfig', () => {
  it('reads credentials and defaults', () => {
    const config = readAppConfig({ AUTH_USERNAME: 'viewer', AUTH_PASSWORD: 'test-secret' });
    expect(config.credentials).toEqual({ username: 'viewer', password: 'test-secret' });
    expect(config.port).toBe(4000);
    expect(config.rosterFileName).toBe('final.csv');
    expect(config.sessionIdleMs).toBe(720 * 60 * 1000);
    expect(config.corsOrigin).toBeNull();
    expect(path.basename(config.dataDir)).toBe('data');
  });

  it('applies overrides', () => {
    const config = readAppConfig({
      AUTH_USERNAME: 'viewer',
      AUTH_PASSWORD: 'test-secret',
      PORT: '5050',
      DATA_DIR: '/srv/attestation',
      ROSTER_FILE_NAME: 'roster.csv',
      SESSION_IDLE_MINUTES: '5'
    });
    expect(config.port).toBe(5050);
    expect(config.dataDir).toBe(path.resolve('/srv/attestation'));
    expect(config.rosterFileName).toBe('roster.csv');
    expect(config.sessionIdleMs).toBe(300_000);
  });

  it('lists missing credentials', () => {
    expect(() => readAppConfig({ AUTH_USERNAME: 'viewer' })).toThrow(
      'Dashboard configuration is missing required env vars: AUTH_PASSWORD.'
    );
  });
});
