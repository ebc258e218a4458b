/**
 * MYOB Request Executor
 * Authenticated requests against the AccountRight API with throttling, retries,
 * response caching and pagination draining.
 */

import { ofetch } from 'ofetch';
import { ApiError, AuthError, RateLimitError, ValidationError, toExcerpt } from '../lib/errors.js';
import { loggers, generateRequestId } from '../lib/logger.js';
import { apiRequestDurationSeconds, apiRequestsTotal, retryAttemptsTotal } from '../lib/metrics.js';
import { assertGuid } from '../lib/odata.js';
import { ResponseCache, fingerprint, resourceFamily, ttlFor } from './cache.js';
import type { ResourceFamily } from './cache.js';
import { RateLimiter } from './rate-limiter.js';
import {
  DEFAULT_BACKOFF_CONFIG,
  calculateBackoff,
  isRetryableStatus,
  parseRetryAfter,
  sleep,
  type BackoffConfig,
  type RetryReason,
} from './retry.js';
import type { CredentialProvider } from './auth.js';
import type { JsonObject, PagedResponse } from '../types/api.js';

export const API_BASE = 'https://api.myob.com/accountright';
export const API_VERSION = 'v2';
export const MAX_ATTEMPTS = 4;
export const REQUEST_TIMEOUT_MS = 30 * 1000;
export const PAGE_SIZE = 400;
export const DEFAULT_MAX_ITEMS = 1000;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface ExecuteOptions {
  query?: Record<string, string>;
  body?: JsonObject;
  /** Read-through cache key (GET only), usually from fingerprint() */
  cacheKey?: string;
  /** Defaults to the family TTL */
  cacheTtlMs?: number;
  companyFileId?: string;
  /** Company list calls are made outside any company file (default: true) */
  requireCompanyFile?: boolean;
  /** Further families a successful write leaves stale, besides its own */
  invalidates?: readonly ResourceFamily[];
  signal?: AbortSignal;
}

export interface PagedOptions extends Omit<ExecuteOptions, 'body'> {
  maxItems?: number;
  pageSize?: number;
}

/**
 * Where a resource-service call runs: company file and cancellation
 */
export interface RequestScope {
  companyFileId?: string;
  signal?: AbortSignal;
}

/**
 * Options for a cached paged read; `top` caps the number of items returned
 */
export function pagedRead(
  path: string,
  query: Record<string, string>,
  scope: RequestScope,
  top?: number
): PagedOptions {
  if (top !== undefined && (!Number.isInteger(top) || top <= 0)) {
    throw new ValidationError(`Invalid top: '${top}'. Expected a positive integer.`, 'top');
  }
  const pageSize = top !== undefined ? Math.min(top, PAGE_SIZE) : PAGE_SIZE;
  const maxItems = top ?? DEFAULT_MAX_ITEMS;
  return {
    ...scope,
    query,
    pageSize,
    maxItems,
    cacheKey: `${fingerprint('GET', path, { ...query, $top: String(pageSize) })}&max=${maxItems}`,
  };
}

/**
 * Outcome of a POST/PUT/DELETE. MYOB answers creates with 201 and a Location header.
 */
export interface WriteResult {
  status: number;
  location?: string;
  uid?: string;
  data?: unknown;
}

export interface RequestExecutorOptions {
  /** Developer key, sent as x-myobapi-key */
  clientId: string;
  credentials: CredentialProvider;
  defaultCompanyFileId?: string;
  cache?: ResponseCache;
  rateLimiter?: RateLimiter;
  backoff?: Partial<BackoffConfig>;
  maxAttempts?: number;
  timeoutMs?: number;
  baseUrl?: string;
}

interface PreparedRequest {
  requestId: string;
  method: HttpMethod;
  url: string;
  /** Company-file-relative path, used in errors and logs */
  path: string;
  family: string;
  query?: Record<string, string>;
  body?: JsonObject;
  invalidates: readonly string[];
  signal?: AbortSignal;
}

interface Exchange<T> {
  status: number;
  data: T | undefined;
  location?: string;
}

type PageBody<T> = T[] | PagedResponse<T> | T;

const LOCATION_UID = /([0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12})\/?$/;

function isAbsoluteUrl(path: string): boolean {
  return /^https?:\/\//i.test(path);
}

function pageItems<T extends object>(data: PageBody<T> | undefined): T[] {
  if (data === undefined || data === null) {
    return [];
  }
  if (Array.isArray(data)) {
    return data;
  }
  if ('Items' in data) {
    return Array.isArray(data.Items) ? data.Items : [];
  }
  return [data];
}

function nextPageLink(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'NextPageLink' in data) {
    const link = data.NextPageLink;
    return typeof link === 'string' && link.length > 0 ? link : undefined;
  }
  return undefined;
}

export class RequestExecutor {
  private readonly clientId: string;
  private readonly credentials: CredentialProvider;
  private readonly defaultCompanyFileId?: string;
  private readonly cache: ResponseCache;
  private readonly rateLimiter: RateLimiter;
  private readonly backoff: BackoffConfig;
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;

  constructor(options: RequestExecutorOptions) {
    this.clientId = options.clientId;
    this.credentials = options.credentials;
    this.defaultCompanyFileId = options.defaultCompanyFileId;
    this.cache = options.cache ?? new ResponseCache();
    this.rateLimiter = options.rateLimiter ?? new RateLimiter();
    this.backoff = { ...DEFAULT_BACKOFF_CONFIG, ...options.backoff };
    this.maxAttempts = options.maxAttempts ?? MAX_ATTEMPTS;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.baseUrl = (options.baseUrl ?? API_BASE).replace(/\/+$/, '');
  }

  /**
   * One request with a response body. Reads given a cacheKey are served from
   * and stored into the response cache.
   */
  async execute<T = unknown>(method: HttpMethod, path: string, options: ExecuteOptions = {}): Promise<T> {
    const request = await this.prepare(method, path, options);
    const cacheKey = method === 'GET' ? this.scopedKey(options.cacheKey, request.url) : undefined;

    if (cacheKey !== undefined) {
      const cached = this.cache.get<T>(cacheKey);
      if (cached !== undefined) {
        loggers.cache.debug('Cache hit', { requestId: request.requestId, key: cacheKey });
        return cached;
      }
    }

    const epoch = this.cache.epoch();
    const { status, data } = await this.run<T>(request);
    if (data === undefined) {
      throw new ApiError(status, request.path, 'Empty response body');
    }

    if (cacheKey !== undefined) {
      this.store(cacheKey, data, epoch, options.cacheTtlMs ?? ttlFor(request.family));
    }
    return data;
  }

  /**
   * A mutation. On success every cached read of the same resource family is
   * dropped before this resolves.
   */
  async executeWrite(method: Exclude<HttpMethod, 'GET'>, path: string, options: ExecuteOptions = {}): Promise<WriteResult> {
    const request = await this.prepare(method, path, options);
    const { status, data, location } = await this.run<unknown>(request);
    const uid = location ? LOCATION_UID.exec(location)?.[1] : undefined;
    return { status, location, uid, data };
  }

  /**
   * Drain a paginated GET: follows NextPageLink, else pages with $skip while
   * pages come back full, and stops at maxItems.
   */
  async executePaged<T extends object = JsonObject>(path: string, options: PagedOptions = {}): Promise<T[]> {
    const pageSize = options.pageSize ?? PAGE_SIZE;
    const maxItems = options.maxItems ?? DEFAULT_MAX_ITEMS;
    const baseQuery: Record<string, string> = { ...options.query, $top: String(pageSize) };

    const first = await this.prepare('GET', path, { ...options, query: baseQuery });
    const cacheKey = this.scopedKey(options.cacheKey, first.url);

    if (cacheKey !== undefined) {
      const cached = this.cache.get<T[]>(cacheKey);
      if (cached !== undefined) {
        loggers.cache.debug('Cache hit', { requestId: first.requestId, key: cacheKey });
        return cached;
      }
    }

    const epoch = this.cache.epoch();
    const items: T[] = [];
    let request: PreparedRequest = first;

    for (;;) {
      const { data } = await this.run<PageBody<T>>(request);
      const page = pageItems(data);
      items.push(...page);

      if (items.length >= maxItems) {
        break;
      }

      const link = nextPageLink(data);
      if (link !== undefined) {
        request = { ...first, url: this.followLink(link, first.path), query: undefined };
        continue;
      }
      if (page.length < pageSize) {
        break;
      }
      request = { ...first, query: { ...baseQuery, $skip: String(items.length) } };
    }

    const result = items.slice(0, maxItems);
    if (cacheKey !== undefined) {
      this.store(cacheKey, result, epoch, options.cacheTtlMs ?? ttlFor(first.family));
    }
    return result;
  }

  private store(key: string, value: unknown, epoch: number, ttlMs: number | undefined): void {
    if (ttlMs === undefined) {
      return;
    }
    // an invalidation ran while this read was in flight; its result may be stale
    if (this.cache.epoch() !== epoch) {
      loggers.cache.debug('Skipping cache store after invalidation', { key });
      return;
    }
    this.cache.set(key, value, ttlMs);
  }

  /**
   * Cache keys are per company file
   */
  private scopedKey(cacheKey: string | undefined, url: string): string | undefined {
    if (cacheKey === undefined) {
      return undefined;
    }
    const scope = url.slice(this.baseUrl.length + 1).split('/')[0];
    return scope ? `${cacheKey}#${scope}` : cacheKey;
  }

  private async prepare(method: HttpMethod, path: string, options: ExecuteOptions): Promise<PreparedRequest> {
    if (isAbsoluteUrl(path)) {
      throw new ValidationError(`Expected a path relative to the company file, got '${path}'`, 'path');
    }
    const relative = path.startsWith('/') ? path : `/${path}`;
    const companyFileId =
      options.requireCompanyFile === false ? undefined : await this.resolveCompanyFile(options.companyFileId);

    return {
      requestId: generateRequestId(),
      method,
      url: companyFileId ? `${this.baseUrl}/${companyFileId}${relative}` : `${this.baseUrl}${relative}`,
      path: relative,
      family: resourceFamily(relative),
      query: options.query,
      body: options.body,
      invalidates: method === 'GET' ? [] : [...new Set([resourceFamily(relative), ...(options.invalidates ?? [])])],
      signal: options.signal,
    };
  }

  private async resolveCompanyFile(explicit: string | undefined): Promise<string> {
    const companyFileId = explicit ?? this.defaultCompanyFileId ?? (await this.credentials.getBusinessId());
    if (!companyFileId) {
      throw new ValidationError(
        'No company file selected. Pass --company-file or set defaultCompanyFileId.',
        'companyFileId'
      );
    }
    return assertGuid(companyFileId, 'companyFileId');
  }

  private followLink(link: string, path: string): string {
    if (!link.toLowerCase().startsWith(`${this.baseUrl.toLowerCase()}/`)) {
      throw new ApiError(0, path, `Refusing to follow NextPageLink outside ${this.baseUrl}: ${link}`);
    }
    return link;
  }

  private headers(accessToken: string, hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${accessToken}`,
      'x-myobapi-key': this.clientId,
      'x-myobapi-version': API_VERSION,
      Accept: 'application/json',
    };
    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }
    return headers;
  }

  /**
   * Attempt loop. The resend after a token refresh does not count as an attempt.
   */
  private async run<T>(request: PreparedRequest): Promise<Exchange<T>> {
    const { requestId, method, path, family, signal } = request;
    const endTimer = apiRequestDurationSeconds.startTimer({ method, family });
    const startTime = Date.now();

    loggers.api.debug('API request started', { requestId, method, path, query: request.query });

    try {
      let token = await this.credentials.getAccessToken();
      let headers = this.headers(token, request.body !== undefined);
      let refreshed = false;
      let attempt = 0;

      for (;;) {
        attempt++;
        signal?.throwIfAborted();
        await this.rateLimiter.acquire(signal);

        let response: Response & { _data?: T };
        try {
          response = await ofetch.raw<T>(request.url, {
            method,
            headers,
            query: request.query,
            body: request.body,
            retry: false,
            ignoreResponseError: true,
            signal: signal
              ? AbortSignal.any([signal, AbortSignal.timeout(this.timeoutMs)])
              : AbortSignal.timeout(this.timeoutMs),
          });
        } catch (error) {
          signal?.throwIfAborted();
          apiRequestsTotal.inc({ method, family, status: 'network' });
          const reason = error instanceof Error ? error.message : String(error);
          if (attempt >= this.maxAttempts) {
            throw new ApiError(0, path, `Request failed after ${attempt} attempts: ${reason}`, { cause: error });
          }
          await this.backOff('network', attempt, calculateBackoff(attempt, this.backoff), request, reason);
          continue;
        }

        const status = response.status;
        apiRequestsTotal.inc({ method, family, status: String(status) });

        if (response.ok) {
          for (const stale of request.invalidates) {
            this.cache.invalidate(`${stale}:`);
          }
          loggers.api.info('API request completed', {
            requestId,
            method,
            path,
            statusCode: status,
            attempt,
            duration: Date.now() - startTime,
          });
          return { status, data: response._data, location: response.headers.get('location') ?? undefined };
        }

        const excerpt = toExcerpt(response._data);

        if (status === 401) {
          if (refreshed) {
            throw new AuthError(`Unauthorized after token refresh on ${path}${excerpt ? `: ${excerpt}` : ''}`, {
              status: 401,
            });
          }
          refreshed = true;
          attempt--;
          retryAttemptsTotal.inc({ reason: 'unauthorized' });
          loggers.retry.info('Got 401, refreshing token and retrying', { requestId, path });
          token = await this.credentials.refreshNow(token);
          headers = this.headers(token, request.body !== undefined);
          continue;
        }

        if (status === 429) {
          const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'));
          if (attempt >= this.maxAttempts) {
            throw new RateLimitError(path, excerpt, retryAfterMs);
          }
          const delay = retryAfterMs ?? calculateBackoff(attempt, this.backoff);
          await this.backOff('rate_limited', attempt, delay, request, `HTTP 429`);
          continue;
        }

        if (isRetryableStatus(status) && attempt < this.maxAttempts) {
          await this.backOff('server_error', attempt, calculateBackoff(attempt, this.backoff), request, `HTTP ${status}`);
          continue;
        }

        throw new ApiError(status, path, excerpt);
      }
    } catch (error) {
      loggers.api.error('API request failed', error instanceof Error ? error : new Error(String(error)), {
        requestId,
        method,
        path,
        duration: Date.now() - startTime,
        statusCode: error instanceof ApiError || error instanceof AuthError ? error.status : undefined,
      });
      throw error;
    } finally {
      endTimer();
    }
  }

  private async backOff(
    reason: RetryReason,
    attempt: number,
    delayMs: number,
    request: PreparedRequest,
    detail: string
  ): Promise<void> {
    retryAttemptsTotal.inc({ reason });
    loggers.retry.warn('Retrying request', {
      requestId: request.requestId,
      method: request.method,
      path: request.path,
      attempt,
      reason,
      detail,
      delayMs: Math.round(delayMs),
    });
    await sleep(delayMs, request.signal);
  }
}
