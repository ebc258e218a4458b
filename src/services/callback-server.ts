/**
 * OAuth Callback Listener
 * One-shot local HTTP server that receives the authorization redirect and
 * hands code, state and businessId to the token manager.
 */

import { createServer } from 'node:http';
import type { ServerResponse } from 'node:http';
import { AuthError, ValidationError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { AUTHORIZATION_TIMEOUT_MS } from './auth.js';
import type { TokenManager } from './auth.js';
import type { AuthStatus } from '../types/auth.js';

export type AuthorizationCompleter = Pick<TokenManager, 'completeAuthorization' | 'cancelAuthorization'>;

export interface CallbackServerOptions {
  tokens: AuthorizationCompleter;
  port: number;
  /** Default: 127.0.0.1 */
  host?: string;
  /** Default: /callback */
  callbackPath?: string;
  /** Default: AUTHORIZATION_TIMEOUT_MS */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CallbackServer {
  /** Resolves with the bound port */
  listening: Promise<number>;
  /** Settles on the first callback, on timeout, or on close() */
  result: Promise<AuthStatus>;
  close(): Promise<void>;
}

/**
 * Port, host and path to listen on for a redirect URI
 * @example callbackTarget('http://localhost:33333/callback') => { host: 'localhost', port: 33333, path: '/callback' }
 */
export function callbackTarget(redirectUri: string): { host: string; port: number; path: string } {
  let url: URL;
  try {
    url = new URL(redirectUri);
  } catch {
    throw new ValidationError(`Invalid redirectUri: '${redirectUri}'`, 'redirectUri');
  }
  if (url.protocol !== 'http:') {
    throw new ValidationError(`redirectUri must be a local http:// URL, got '${redirectUri}'`, 'redirectUri');
  }
  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : 80,
    path: url.pathname || '/',
  };
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

function page(res: ServerResponse, status: number, title: string, detail: string): void {
  res.writeHead(status, { 'Content-Type': 'text/html; charset=utf-8' });
  res.end(
    `<!DOCTYPE html><html><body style="font-family:sans-serif;text-align:center;padding:40px"><h1>${escapeHtml(title)}</h1><p>${escapeHtml(detail)}</p></body></html>`
  );
}

export function startCallbackServer(options: CallbackServerOptions): CallbackServer {
  const { tokens, port, signal } = options;
  const host = options.host ?? '127.0.0.1';
  const callbackPath = options.callbackPath ?? '/callback';
  const timeoutMs = options.timeoutMs ?? AUTHORIZATION_TIMEOUT_MS;

  const server = createServer();
  let timer: NodeJS.Timeout | undefined;
  let settled = false;
  let received = false;
  let closing: Promise<void> | null = null;

  let resolveResult: (status: AuthStatus) => void = () => undefined;
  let rejectResult: (error: unknown) => void = () => undefined;
  const result = new Promise<AuthStatus>((resolve, reject) => {
    resolveResult = resolve;
    rejectResult = reject;
  });

  const shutdown = (): Promise<void> => {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
    if (!server.listening) {
      return closing ?? Promise.resolve();
    }
    closing = new Promise((resolve) => {
      server.close(() => resolve());
      server.closeIdleConnections();
    });
    return closing;
  };

  const settle = (outcome: { status: AuthStatus } | { error: unknown }): void => {
    if (settled) return;
    settled = true;
    if ('status' in outcome) {
      resolveResult(outcome.status);
    } else {
      rejectResult(outcome.error);
    }
    void shutdown();
  };

  const abandon = (error: AuthError): void => {
    if (settled) return;
    tokens.cancelAuthorization();
    settle({ error });
  };

  const onAbort = (): void => abandon(new AuthError('Authorization cancelled'));

  const handleCallback = async (url: URL, res: ServerResponse): Promise<void> => {
    const error = url.searchParams.get('error');
    if (error) {
      const description = url.searchParams.get('error_description') || error;
      tokens.cancelAuthorization();
      page(res, 400, 'Authorization failed', description);
      settle({ error: new AuthError(`Authorization denied: ${description}`) });
      return;
    }

    const code = url.searchParams.get('code') ?? '';
    const state = url.searchParams.get('state') ?? '';
    const businessId = url.searchParams.get('businessId') ?? undefined;

    try {
      const status = await tokens.completeAuthorization(code, state, businessId);
      page(res, 200, 'Authorization complete', 'You can close this window and return to the terminal.');
      settle({ status });
    } catch (completionError) {
      const message = completionError instanceof Error ? completionError.message : String(completionError);
      page(res, 400, 'Authorization failed', message);
      settle({ error: completionError });
    }
  };

  server.on('request', (req, res) => {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    if (req.method !== 'GET' || url.pathname !== callbackPath) {
      res.writeHead(404, { 'Content-Type': 'text/plain' });
      res.end('Not found');
      return;
    }
    if (received || settled) {
      page(res, 410, 'Authorization already handled', 'Start a new login from the terminal.');
      return;
    }
    loggers.auth.debug('OAuth callback received', { path: url.pathname });
    received = true;
    clearTimeout(timer);
    void handleCallback(url, res);
  });

  const listening = new Promise<number>((resolve, reject) => {
    // stays attached after the bind: a later socket error ends the authorization
    server.on('error', (error) => {
      const failure = server.listening
        ? new AuthError(`OAuth callback listener failed: ${error.message}`, { cause: error })
        : new AuthError(`Could not listen for the OAuth callback on ${host}:${port}: ${error.message}`, { cause: error });
      loggers.auth.error('OAuth callback listener error', error, { host, port });
      reject(failure);
      abandon(failure);
    });
    server.listen(port, host, () => {
      const address = server.address();
      const boundPort = typeof address === 'object' && address !== null ? address.port : port;
      if (settled) {
        // cancelled before the socket was bound
        void shutdown();
        resolve(boundPort);
        return;
      }
      timer = setTimeout(() => {
        abandon(new AuthError(`Timed out waiting for the OAuth callback after ${Math.round(timeoutMs / 1000)} seconds`));
      }, timeoutMs);
      loggers.auth.info('OAuth callback listener started', { host, port: boundPort, path: callbackPath });
      resolve(boundPort);
    });
  });

  if (signal?.aborted) {
    onAbort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  return {
    listening,
    result,
    close: async () => {
      abandon(new AuthError('Authorization cancelled'));
      await shutdown();
    },
  };
}
