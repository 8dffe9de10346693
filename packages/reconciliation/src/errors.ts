export class FetchFailedError extends Error {
  public readonly platform: string;
  /** 1-based page on which the listing broke. */
  public readonly page: number;

  constructor(options: { platform: string; page: number; message: string; cause?: unknown }) {
    super(options.message, { cause: options.cause });
    Object.setPrototypeOf(this, FetchFailedError.prototype);
    this.name = 'FetchFailedError';
    this.platform = options.platform;
    this.page = options.page;
  }
}
