/**
 * Error Taxonomy
 * Typed errors raised by the token manager, request executor and filter builder
 */

/** Longest response-body excerpt carried by an error */
export const MAX_EXCERPT_LENGTH = 500;

export type ErrorCode = 'AUTH_ERROR' | 'VALIDATION_ERROR' | 'API_ERROR' | 'RATE_LIMITED';

/**
 * Base class for every error this tool raises on purpose
 */
export abstract class MyobError extends Error {
  public abstract readonly code: ErrorCode;

  toJSON(): Record<string, unknown> {
    return { code: this.code, message: this.message };
  }
}

/**
 * No usable credential, state mismatch on callback, or token endpoint rejection
 */
export class AuthError extends MyobError {
  public readonly code = 'AUTH_ERROR';
  public readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'AuthError';
    this.status = options.status;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), status: this.status };
  }
}

/**
 * Local input validation failure, raised before anything reaches the network
 */
export class ValidationError extends MyobError {
  public readonly code = 'VALIDATION_ERROR';
  public readonly param?: string;

  constructor(message: string, param?: string) {
    super(message);
    this.name = 'ValidationError';
    this.param = param;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), param: this.param };
  }
}

/**
 * Non-2xx response (or network failure, status 0) after retries are exhausted
 */
export class ApiError extends MyobError {
  public readonly code: ErrorCode = 'API_ERROR';
  public readonly status: number;
  public readonly path: string;
  public readonly excerpt: string;

  constructor(status: number, path: string, excerpt: string, options: { cause?: unknown } = {}) {
    const detail = excerpt ? `: ${excerpt}` : '';
    super(`MYOB API error ${status} on ${path}${detail}`, { cause: options.cause });
    this.name = 'ApiError';
    this.status = status;
    this.path = path;
    this.excerpt = excerpt;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), status: this.status, path: this.path, excerpt: this.excerpt };
  }
}

/**
 * Still rate limited after the last allowed attempt
 */
export class RateLimitError extends ApiError {
  public override readonly code: ErrorCode = 'RATE_LIMITED';
  public readonly retryAfterMs?: number;

  constructor(path: string, excerpt: string, retryAfterMs?: number) {
    super(429, path, excerpt);
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Render any response body as a bounded single-line excerpt
 */
export function toExcerpt(body: unknown, maxLength: number = MAX_EXCERPT_LENGTH): string {
  if (body === undefined || body === null || body === '') {
    return '';
  }
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  const flattened = text.replace(/\s+/g, ' ').trim();
  if (flattened.length <= maxLength) {
    return flattened;
  }
  return `${flattened.slice(0, maxLength)}…`;
}
