import { buildApiUrl } from '../config/runtimeConfig';

export class ApiError extends Error {
  constructor(
    public status: number,
    public code: string | undefined,
    message: string
  ) {
    super(message);
  }
}

const readErrorPayload = (payload: unknown): { code?: string; message?: string } => {
  if (!payload || typeof payload !== 'object') {
    return {};
  }
  const code = 'code' in payload && typeof payload.code === 'string' ? payload.code : undefined;
  const message = 'message' in payload && typeof payload.message === 'string' ? payload.message : undefined;
  return { code, message };
};

export const apiRequest = async <T>(path: string, init: RequestInit = {}): Promise<T> => {
  const headers = new Headers(init.headers);
  if (!headers.has('Accept')) {
    headers.set('Accept', 'application/json');
  }
  const response = await fetch(buildApiUrl(path), { ...init, headers });

  const text = await response.text();
  let payload: unknown = null;

  if (text) {
    try {
      payload = JSON.parse(text);
    } catch {
      if (!response.ok) {
        throw new ApiError(response.status, undefined, 'Request failed.');
      }
      const snippet = text.slice(0, 120).trim();
      throw new Error(`The server returned an unexpected response: ${snippet}. Check the API configuration.`);
    }
  }

  if (!response.ok) {
    const { code, message } = readErrorPayload(payload);
    throw new ApiError(response.status, code, message ?? 'Request failed.');
  }

  return payload as T;
};
