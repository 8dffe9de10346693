export class HttpError extends Error {
  public readonly status: number;
  public readonly method: string;
  public readonly url: string;
  public readonly body: unknown;

  constructor(options: { status: number; method: string; url: string; body: unknown }) {
    super(`HTTP ${options.status} on ${options.method} ${options.url}`);
    Object.setPrototypeOf(this, HttpError.prototype);
    this.name = 'HttpError';
    this.status = options.status;
    this.method = options.method;
    this.url = options.url;
    this.body = options.body;
  }
}

export class AuthFailedError extends Error {
  public readonly platform: string;

  constructor(options: { platform: string; message?: string; cause?: unknown }) {
    super(options.message ?? `Authorization failed for ${options.platform}`, {
      cause: options.cause,
    });
    Object.setPrototypeOf(this, AuthFailedError.prototype);
    this.name = 'AuthFailedError';
    this.platform = options.platform;
  }
}

export class RateLimitedError extends Error {
  public readonly delayMs: number;

  constructor(options: { delayMs: number; message?: string }) {
    const delayMs = Math.max(0, Math.floor(options.delayMs));
    super(`${options.message ?? 'Platform rate limited the request'}; retry after ${delayMs} ms`);
    Object.setPrototypeOf(this, RateLimitedError.prototype);
    this.name = 'RateLimitedError';
    this.delayMs = delayMs;
  }
}

export class ProtocolError extends Error {
  public readonly platform: string;

  constructor(options: { platform: string; message: string; cause?: unknown }) {
    super(options.message, { cause: options.cause });
    Object.setPrototypeOf(this, ProtocolError.prototype);
    this.name = 'ProtocolError';
    this.platform = options.platform;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof HttpError) {
    const detail = typeof error.body === 'string' ? error.body : JSON.stringify(error.body);
    return detail ? `${error.message}: ${detail.slice(0, 300)}` : error.message;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}
