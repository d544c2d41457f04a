// Resolves the API base URL: build-time env first, then the page's meta tag,
// then the local development backend.

const DEFAULT_API_URL = 'http://localhost:4000';

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, '');

const isBrowserEnvironment = () => typeof window !== 'undefined' && typeof document !== 'undefined';

const ensureAbsoluteUrl = (value: string, fallbackOrigin: string) => {
  if (/^[a-zA-Z][a-zA-Z\d+\-.]*:/.test(value)) {
    return value;
  }
  const normalizedPath = value.startsWith('/') ? value : `/${value}`;
  return new URL(normalizedPath, fallbackOrigin).toString();
};

const looksLikePlaceholder = (value: string) => /^%.*%$/.test(value) && value.includes('VITE_API_URL');

const readMetaContent = (name: string): string | undefined => {
  if (!isBrowserEnvironment()) {
    return undefined;
  }
  const content = document.querySelector(`meta[name="${name}"]`)?.getAttribute('content')?.trim();
  if (!content || looksLikePlaceholder(content)) {
    return undefined;
  }
  return content;
};

export const resolveApiBaseUrl = (envValue: string | undefined, metaValue: string | undefined): string => {
  const fallbackOrigin = isBrowserEnvironment() ? window.location.origin : DEFAULT_API_URL;
  const candidate = envValue?.trim() || metaValue?.trim();
  if (!candidate) {
    return DEFAULT_API_URL;
  }
  return trimTrailingSlash(ensureAbsoluteUrl(candidate, fallbackOrigin));
};

const API_BASE_URL = resolveApiBaseUrl(import.meta.env.VITE_API_URL, readMetaContent('attestation:api-base'));

export const getApiBaseUrl = () => API_BASE_URL;

export const buildApiUrl = (path: string, base: string = getApiBaseUrl()) => {
  const normalizedBase = base.endsWith('/') ? base : `${base}/`;
  return new URL(path.replace(/^\//, ''), normalizedBase).toString();
};
