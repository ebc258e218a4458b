/**
 * Token Manager
 * OAuth2 authorization-code flow and refresh-token lifecycle for the MYOB API.
 * Owns the active credential; nothing else reads or writes it.
 */

import { execFile } from 'node:child_process';
import { randomBytes, timingSafeEqual } from 'node:crypto';
import { ofetch, FetchError } from 'ofetch';
import { AuthError, toExcerpt } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { tokenRefreshesTotal } from '../lib/metrics.js';
import { assertGuid } from '../lib/odata.js';
import type { TokenStore } from './token-store.js';
import type {
  AuthConfig,
  AuthorizationRequest,
  AuthStatus,
  Credential,
  PendingAuthorization,
  TokenResponse,
} from '../types/auth.js';

export const AUTHORIZE_ENDPOINT = 'https://secure.myob.com/oauth2/account/authorize';
export const TOKEN_ENDPOINT = 'https://secure.myob.com/oauth2/v1/authorize';

// refresh this long before the server-side expiry
export const REFRESH_BUFFER_MS = 60 * 1000;
export const AUTHORIZATION_TIMEOUT_MS = 120 * 1000;
const TOKEN_TIMEOUT_MS = 30 * 1000;
const DEFAULT_EXPIRES_IN_S = 1200;

type Grant = 'authorization_code' | 'refresh_token';

export interface TokenManagerOptions {
  /** Clock (ms) */
  now?: () => number;
  /** Opens the authorization URL for the user */
  openUrl?: (url: string) => void;
}

/**
 * What the request executor needs from the token manager
 */
export interface CredentialProvider {
  getAccessToken(): Promise<string>;
  refreshNow(rejectedToken?: string): Promise<string>;
  getBusinessId(): Promise<string | undefined>;
}

function isTokenResponse(value: unknown): value is TokenResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'access_token' in value &&
    typeof value.access_token === 'string' &&
    value.access_token.length > 0
  );
}

function sameState(received: string, expected: string): boolean {
  const a = Buffer.from(received);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Launch the platform browser; the URL is printed by the caller as well
 */
export function openInBrowser(url: string): void {
  const [command, args]: [string, string[]] =
    process.platform === 'darwin'
      ? ['open', [url]]
      : process.platform === 'win32'
        ? ['cmd', ['/c', 'start', '', url]]
        : ['xdg-open', [url]];

  const child = execFile(command, args, (error) => {
    if (error) {
      loggers.auth.warn('Could not open a browser', { reason: error.message });
    }
  });
  child.unref();
}

export class TokenManager implements CredentialProvider {
  private readonly config: AuthConfig;
  private readonly store: TokenStore;
  private readonly now: () => number;
  private readonly openUrl: (url: string) => void;

  private credential: Credential | null = null;
  private loaded = false;
  private loading: Promise<void> | null = null;
  private pending: PendingAuthorization | null = null;

  // single-flight refresh: concurrent callers await the same promise
  private inFlightRefresh: Promise<Credential> | null = null;
  // bumped on login/logout so a refresh that started earlier doesn't overwrite them
  private generation = 0;

  constructor(config: AuthConfig, store: TokenStore, options: TokenManagerOptions = {}) {
    this.config = config;
    this.store = store;
    this.now = options.now ?? Date.now;
    this.openUrl = options.openUrl ?? openInBrowser;
  }

  /**
   * Start an authorization: new random state, authorization URL, browser
   */
  beginAuthorization(options: { openBrowser?: boolean } = {}): AuthorizationRequest {
    if (this.pending && !this.isPendingExpired(this.pending)) {
      throw new AuthError('An authorization is already in progress. Finish it or wait for it to time out.');
    }

    const pending: PendingAuthorization = {
      state: randomBytes(32).toString('base64url'),
      issuedAt: this.now(),
    };
    this.pending = pending;

    const url = new URL(AUTHORIZE_ENDPOINT);
    url.searchParams.set('client_id', this.config.clientId);
    url.searchParams.set('redirect_uri', this.config.redirectUri);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('scope', this.config.scopes.join(' '));
    url.searchParams.set('prompt', 'consent');
    url.searchParams.set('state', pending.state);

    loggers.auth.info('Authorization started', { redirectUri: this.config.redirectUri });
    if (options.openBrowser !== false) {
      this.openUrl(url.toString());
    }

    return { url: url.toString(), state: pending.state, issuedAt: pending.issuedAt };
  }

  /**
   * Finish an authorization from the redirect's query parameters.
   * The pending authorization is consumed whatever the outcome.
   */
  async completeAuthorization(code: string, state: string, businessId?: string): Promise<AuthStatus> {
    const pending = this.pending;
    this.pending = null;

    if (!pending) {
      throw new AuthError('No authorization in progress');
    }
    if (!sameState(state, pending.state)) {
      loggers.auth.warn('OAuth callback state mismatch');
      throw new AuthError('state mismatch');
    }
    if (this.isPendingExpired(pending)) {
      throw new AuthError('Authorization expired. Start it again.');
    }
    if (!code) {
      throw new AuthError('No authorization code in callback');
    }
    if (businessId !== undefined) {
      assertGuid(businessId, 'businessId');
    }

    await this.current();
    const response = await this.requestToken('authorization_code', {
      code,
      redirect_uri: this.config.redirectUri,
    });
    const credential = this.toCredential(response, null, businessId);

    this.generation++;
    this.credential = credential;
    await this.persist(credential);

    loggers.auth.info('Authorization completed', { businessId: credential.businessId });
    return this.describe(credential);
  }

  /**
   * Drop the pending authorization (callback listener gave up)
   */
  cancelAuthorization(): void {
    this.pending = null;
  }

  /**
   * A currently valid access token, refreshed first when inside the buffer window
   */
  async getAccessToken(): Promise<string> {
    const credential = await this.requireCredential();
    if (!this.needsRefresh(credential)) {
      return credential.accessToken;
    }
    const refreshed = await this.refreshSingleFlight();
    return refreshed.accessToken;
  }

  /**
   * Force a refresh. With `rejectedToken`, a token that has already been
   * replaced by another caller's refresh is not refreshed again.
   */
  async refreshNow(rejectedToken?: string): Promise<string> {
    const credential = await this.requireCredential();
    if (
      rejectedToken !== undefined &&
      credential.accessToken !== rejectedToken &&
      !this.needsRefresh(credential)
    ) {
      return credential.accessToken;
    }
    const refreshed = await this.refreshSingleFlight();
    return refreshed.accessToken;
  }

  async getBusinessId(): Promise<string | undefined> {
    const credential = await this.current();
    return credential?.businessId;
  }

  async status(): Promise<AuthStatus> {
    const credential = await this.current();
    if (!credential) {
      return {
        authorized: false,
        scopes: [],
        hasRefreshToken: false,
        authorizationPending: this.pending !== null && !this.isPendingExpired(this.pending),
      };
    }
    return this.describe(credential);
  }

  async logout(): Promise<void> {
    await this.current();
    this.generation++;
    this.credential = null;
    this.pending = null;
    await this.store.clear();
    loggers.auth.info('Credential removed');
  }

  private describe(credential: Credential): AuthStatus {
    return {
      authorized: true,
      expiresAt: new Date(credential.expiresAt).toISOString(),
      expiresInSeconds: Math.max(0, Math.floor((credential.expiresAt - this.now()) / 1000)),
      businessId: credential.businessId,
      scopes: credential.scopes,
      hasRefreshToken: credential.refreshToken.length > 0,
      authorizationPending: this.pending !== null && !this.isPendingExpired(this.pending),
    };
  }

  private needsRefresh(credential: Credential): boolean {
    return this.now() + REFRESH_BUFFER_MS >= credential.expiresAt;
  }

  private isPendingExpired(pending: PendingAuthorization): boolean {
    return this.now() - pending.issuedAt > AUTHORIZATION_TIMEOUT_MS;
  }

  private async requireCredential(): Promise<Credential> {
    const credential = await this.current();
    if (!credential) {
      throw new AuthError('Not authorized. Run `myob auth login` first.');
    }
    return credential;
  }

  /**
   * Lazily load the persisted credential on first use
   */
  private async current(): Promise<Credential | null> {
    if (!this.loaded) {
      if (!this.loading) {
        this.loading = this.store
          .load()
          .then((stored) => {
            if (this.credential === null) {
              this.credential = stored;
            }
            this.loaded = true;
          })
          .finally(() => {
            this.loading = null;
          });
      }
      await this.loading;
    }
    return this.credential;
  }

  private refreshSingleFlight(): Promise<Credential> {
    if (!this.inFlightRefresh) {
      this.inFlightRefresh = this.performRefresh().finally(() => {
        this.inFlightRefresh = null;
      });
    }
    return this.inFlightRefresh;
  }

  private async performRefresh(): Promise<Credential> {
    const previous = await this.requireCredential();
    const generation = this.generation;

    const response = await this.requestToken('refresh_token', {
      refresh_token: previous.refreshToken,
    });
    const next = this.toCredential(response, previous, previous.businessId);

    if (generation !== this.generation) {
      throw new AuthError('Credential changed while refreshing; retry the request.');
    }
    this.credential = next;
    await this.persist(next);

    loggers.auth.info('Access token refreshed', { expiresAt: new Date(next.expiresAt).toISOString() });
    return next;
  }

  private toCredential(response: TokenResponse, previous: Credential | null, businessId?: string): Credential {
    const refreshToken = response.refresh_token ?? previous?.refreshToken;
    if (!refreshToken) {
      throw new AuthError('Token endpoint returned no refresh_token');
    }

    const expiresIn = Number(response.expires_in ?? DEFAULT_EXPIRES_IN_S);
    const lifetimeSeconds = Number.isFinite(expiresIn) && expiresIn > 0 ? expiresIn : DEFAULT_EXPIRES_IN_S;
    const scopes = response.scope
      ? response.scope.split(/\s+/).filter(Boolean)
      : previous?.scopes ?? [...this.config.scopes];

    return {
      accessToken: response.access_token,
      refreshToken,
      expiresAt: this.now() + lifetimeSeconds * 1000,
      businessId,
      scopes,
    };
  }

  private async requestToken(grant: Grant, params: Record<string, string>): Promise<TokenResponse> {
    const body = new URLSearchParams({
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
      grant_type: grant,
      ...params,
    }).toString();

    let data: unknown;
    try {
      data = await ofetch<unknown>(TOKEN_ENDPOINT, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body,
        timeout: TOKEN_TIMEOUT_MS,
        retry: false,
      });
    } catch (error) {
      tokenRefreshesTotal.inc({ grant, status: 'failed' });
      throw this.toAuthError(grant, error);
    }

    if (!isTokenResponse(data)) {
      tokenRefreshesTotal.inc({ grant, status: 'failed' });
      throw new AuthError(`Token endpoint returned an unexpected response for ${grant}: ${toExcerpt(data)}`);
    }

    tokenRefreshesTotal.inc({ grant, status: 'success' });
    return data;
  }

  private toAuthError(grant: Grant, error: unknown): AuthError {
    const action = grant === 'refresh_token' ? 'Token refresh' : 'Token exchange';
    if (error instanceof FetchError) {
      const status: number | undefined = error.status ?? error.statusCode;
      const detail = toExcerpt(error.data) || error.message;
      loggers.auth.error(`${action} failed`, error, { statusCode: status });
      return new AuthError(`${action} failed${status ? ` (${status})` : ''}: ${detail}`, { status, cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    loggers.auth.error(`${action} failed`, error instanceof Error ? error : null);
    return new AuthError(`${action} failed: ${message}`, { cause: error });
  }

  private async persist(credential: Credential): Promise<void> {
    try {
      await this.store.save(credential);
    } catch (error) {
      // the in-memory credential stays usable for this process
      loggers.auth.error(
        'Failed to persist credential',
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }
}
