/**
 * OAuth2 token endpoint response (authorization_code and refresh_token grants)
 */
export interface TokenResponse {
  access_token: string;
  refresh_token?: string;
  expires_in?: number | string;
  token_type?: string;
  scope?: string;
}

/**
 * The active OAuth credential. Replaced as a whole, never patched.
 */
export interface Credential {
  readonly accessToken: string;
  readonly refreshToken: string;
  /** Unix timestamp (ms) */
  readonly expiresAt: number;
  /** Company file GUID captured from the authorization redirect */
  readonly businessId?: string;
  readonly scopes: readonly string[];
}

/**
 * On-disk form of a Credential
 */
export interface StoredCredential {
  access_token: string;
  refresh_token: string;
  /** ISO 8601 */
  expires_at: string;
  business_id?: string;
  scope: string;
}

/**
 * An authorization attempt waiting for its redirect
 */
export interface PendingAuthorization {
  readonly state: string;
  /** Unix timestamp (ms) */
  readonly issuedAt: number;
}

export interface AuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scopes: readonly string[];
}

export interface AuthStatus {
  authorized: boolean;
  /** ISO 8601 */
  expiresAt?: string;
  expiresInSeconds?: number;
  businessId?: string;
  scopes: readonly string[];
  hasRefreshToken: boolean;
  authorizationPending: boolean;
}

export interface AuthorizationRequest {
  url: string;
  state: string;
  issuedAt: number;
}
