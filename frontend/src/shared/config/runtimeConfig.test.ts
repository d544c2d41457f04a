import { describe, expect, it } from 'vitest';
import { buildApiUrl, resolveApiBaseUrl } from './runtimeConfig';

describe('resolveApiBaseUrl', () => {
  it('falls back to the local backend', () => {
    expect(resolveApiBaseUrl(undefined, undefined)).toBe('http://localhost:4000');
  });

  it('prefers the env value and trims trailing slashes', () => {
    expect(resolveApiBaseUrl('https://api.example.com/', 'https://meta.example.com')).toBe('https://api.example.com');
  });

  it('uses the meta tag when env is empty', () => {
    expect(resolveApiBaseUrl('  ', 'https://meta.example.com')).toBe('https://meta.example.com');
  });
});

describe('buildApiUrl', () => {
  it('joins the base and path', () => {
    expect(buildApiUrl('/dashboard/selection', 'http://localhost:4000')).toBe(
      'http://localhost:4000/dashboard/selection'
    );
  });
});
