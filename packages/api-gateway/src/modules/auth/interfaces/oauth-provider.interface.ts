export interface OAuthTokenSet {
  accessToken: string;
  tokenType: string;
  refreshToken: string | null;
  idToken: string | null;
  expiresIn: number | null;
  scope: string | null;
}

export interface OAuthProfile {
  id: string;
  email: string | null;
  emailVerified: boolean;
  name: string;
  firstName: string | null;
  lastName: string | null;
  picture: string | null;
}

export interface OAuthProvider {
  readonly id: string;
  isConfigured(): boolean;
  buildAuthorizationUrl(state: string): string;
  exchangeCode(code: string): Promise<OAuthTokenSet>;
  fetchProfile(accessToken: string): Promise<OAuthProfile>;
}

export enum OAuthProviderErrorCode {
  /** The provider answered with an HTTP error (bad code, revoked token, ...) */
  PROVIDER_REJECTED = 'PROVIDER_REJECTED',
  /** Timeout, DNS or connection failure, or a 5xx from the provider */
  PROVIDER_UNREACHABLE = 'PROVIDER_UNREACHABLE',
  /** The provider answered 2xx with a body we cannot use */
  INVALID_RESPONSE = 'INVALID_RESPONSE',
}

export class OAuthProviderError extends Error {
  constructor(
    message: string,
    readonly code: OAuthProviderErrorCode,
    readonly provider: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'OAuthProviderError';
  }
}
