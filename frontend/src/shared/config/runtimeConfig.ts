// Resolves the API origin for client-side requests.

const DEFAULT_API_BASE_URL = 'http://localhost:4000';

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, '');

const isBrowserEnvironment = () => typeof window !== 'undefined' && typeof document !== 'undefined';

const readMetaContent = (name: string): string | undefined => {
  if (!isBrowserEnvironment()) {
    return undefined;
  }
  const content = document.querySelector(`meta[name="${name}"]`)?.getAttribute('content')?.trim();
  // Unreplaced build placeholders look like %VITE_API_URL%.
  if (!content || /^%.*%$/.test(content)) {
    return undefined;
  }
  return content;
};

const resolveApiBaseUrl = (): string => {
  const fromEnv = import.meta.env.VITE_API_URL?.trim();
  if (fromEnv) {
    return trimTrailingSlash(fromEnv);
  }

  const fromMeta = readMetaContent('dashboard:api-base');
  if (fromMeta) {
    return trimTrailingSlash(fromMeta);
  }

  if (import.meta.env.PROD) {
    console.warn('API base URL is not configured. Falling back to %s.', DEFAULT_API_BASE_URL);
  }
  return DEFAULT_API_BASE_URL;
};

const API_BASE_URL = resolveApiBaseUrl();

export const getApiBaseUrl = () => API_BASE_URL;

export const buildApiUrl = (path: string) => {
  const base = getApiBaseUrl();
  const normalizedBase = base.endsWith('/') ? base : `${base}/`;
  return new URL(path.replace(/^\//, ''), normalizedBase).toString();
};
