type HeaderGetter = {
  get(name: string): string | null | undefined;
};

type HeadersLike = HeaderGetter | Record<string, string | string[] | undefined>;

function hasGetter(headers: HeadersLike): headers is HeaderGetter {
  return typeof headers['get'] === 'function';
}

function getHeader(headers: HeadersLike, name: string): string | null {
  if (hasGetter(headers)) {
    return headers.get(name) ?? headers.get(name.toLowerCase()) ?? null;
  }

  const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
  if (!key) return null;
  const value = headers[key];
  if (Array.isArray(value)) return value[0] ?? null;
  return typeof value === 'string' ? value : null;
}

export const RATE_LIMIT_FALLBACK_DELAY_MS = 60_000;

export function parseRetryAfterSeconds(headers: HeadersLike): number | null {
  const raw = getHeader(headers, 'Retry-After');
  if (!raw) return null;

  // Retry-After can be seconds or an HTTP date. We handle seconds only.
  const seconds = Number(raw);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds;

  return null;
}

export function computeDelayMsFromRetryAfter(headers: HeadersLike): number {
  const seconds = parseRetryAfterSeconds(headers);
  if (seconds == null) return RATE_LIMIT_FALLBACK_DELAY_MS;
  return Math.ceil(seconds * 1000);
}

/**
 * Keeps a minimum interval between consecutive requests to one platform.
 * Waiters are chained, so concurrent callers are released one interval apart.
 */
export class RequestPacer {
  private readonly intervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private nextSlotAt = 0;

  constructor(options: {
    intervalMs: number;
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
  }) {
    this.intervalMs = Math.max(0, Math.floor(options.intervalMs));
    this.sleep =
      options.sleep ?? ((ms) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
    this.now = options.now ?? Date.now;
  }

  async acquire(): Promise<void> {
    if (this.intervalMs === 0) return;
    const now = this.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.intervalMs;
    const waitMs = slot - now;
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
  }
}
