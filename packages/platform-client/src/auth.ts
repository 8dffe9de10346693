import { AuthFailedError } from './errors.js';

/** Supplies a valid bearer credential for one platform. May reject with AuthFailedError. */
export interface AuthProvider {
  getAccessToken(): Promise<string>;
}

/**
 * Credential loaded once from configuration. Token refresh is handled outside this tool
 * (the operator rotates the env value), so an empty token is an authorization failure.
 */
export class StaticTokenAuthProvider implements AuthProvider {
  private readonly platform: string;
  private readonly accessToken: string;

  constructor(platform: string, accessToken: string) {
    this.platform = platform;
    this.accessToken = accessToken.trim();
  }

  getAccessToken(): Promise<string> {
    if (!this.accessToken) {
      return Promise.reject(
        new AuthFailedError({
          platform: this.platform,
          message: `No access token configured for ${this.platform}`,
        })
      );
    }
    return Promise.resolve(this.accessToken);
  }
}
