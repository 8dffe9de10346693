import type { AuthProvider } from './auth.js';
import { AuthFailedError, HttpError, RateLimitedError } from './errors.js';
import { RequestPacer, computeDelayMsFromRetryAfter } from './rate-limiting.js';

export type QueryParams = Readonly<Record<string, string | number>>;

/**
 * Minimal JSON transport the platform adapters talk to. Non-2xx responses reject.
 */
export interface HttpClient {
  get(url: string, params?: QueryParams): Promise<unknown>;
  put(url: string, body: unknown): Promise<unknown>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type HttpClientOptions = Readonly<{
  platform: string;
  auth: AuthProvider;
  /** Maps the bearer credential to the platform's auth header(s). */
  authHeaders: (accessToken: string) => Record<string, string>;
  headers?: Record<string, string>;
  requestIntervalMs?: number;
  fetchImpl?: FetchLike;
}>;

export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) return url;
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.set(key, String(value));
  }
  const query = search.toString();
  if (!query) return url;
  return `${url}${url.includes('?') ? '&' : '?'}${query}`;
}

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

export function createHttpClient(options: HttpClientOptions): HttpClient {
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));
  const pacer = new RequestPacer({ intervalMs: options.requestIntervalMs ?? 0 });

  const send = async (method: 'GET' | 'PUT', url: string, body?: unknown): Promise<unknown> => {
    await pacer.acquire();
    const accessToken = await options.auth.getAccessToken();

    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...options.headers,
      ...options.authHeaders(accessToken),
    };
    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(body);
    }

    const response = await fetchImpl(url, init);
    const payload = parseBody(await response.text());

    if (response.ok) return payload;

    const httpError = new HttpError({ status: response.status, method, url, body: payload });
    if (response.status === 401 || response.status === 403) {
      throw new AuthFailedError({
        platform: options.platform,
        message: `Authorization rejected by ${options.platform} (HTTP ${response.status})`,
        cause: httpError,
      });
    }
    if (response.status === 429) {
      throw new RateLimitedError({
        delayMs: computeDelayMsFromRetryAfter(response.headers),
        message: `${options.platform} rate limited ${method} ${url}`,
      });
    }
    throw httpError;
  };

  return {
    get: (url, params) => send('GET', buildUrl(url, params)),
    put: (url, body) => send('PUT', url, body),
  };
}
