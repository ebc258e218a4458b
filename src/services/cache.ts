/**
 * Response Cache
 * In-memory TTL cache for idempotent reads, keyed by request fingerprint.
 * Keys start with the resource family so a mutation can drop its whole family.
 */

import { loggers } from '../lib/logger.js';
import { cacheHitsTotal, cacheInvalidationsTotal, cacheMissesTotal } from '../lib/metrics.js';

export type ResourceFamily =
  | 'contacts'
  | 'invoices'
  | 'sales-orders'
  | 'customer-payments'
  | 'bills'
  | 'accounts'
  | 'tax-codes'
  | 'jobs'
  | 'bank-accounts'
  | 'bank-transactions'
  | 'company-files';

/**
 * Path prefix (relative to the company file) of each resource family.
 * Mutations invalidate every cached read of the same family.
 */
export const RESOURCE_FAMILIES: Readonly<Record<ResourceFamily, string>> = {
  contacts: '/Contact',
  invoices: '/Sale/Invoice',
  'sales-orders': '/Sale/Order',
  'customer-payments': '/Sale/CustomerPayment',
  bills: '/Purchase/Bill',
  accounts: '/GeneralLedger/Account',
  'tax-codes': '/GeneralLedger/TaxCode',
  jobs: '/GeneralLedger/Job',
  'bank-accounts': '/Banking/BankAccount',
  'bank-transactions': '/Banking',
  'company-files': '/',
};

const MINUTE_MS = 60 * 1000;

/** Reads of families without an entry here are not cached */
export const CACHE_TTL_MS: Partial<Record<ResourceFamily, number>> = {
  accounts: 30 * MINUTE_MS,
  'tax-codes': 30 * MINUTE_MS,
  contacts: 15 * MINUTE_MS,
  jobs: 15 * MINUTE_MS,
  'company-files': 60 * MINUTE_MS,
};

const OTHER_FAMILY = 'other';

// longest prefix first so /Banking/BankAccount wins over /Banking
const FAMILIES_BY_PREFIX = Object.entries(RESOURCE_FAMILIES)
  .map(([family, prefix]) => ({ family, prefix }))
  .sort((a, b) => b.prefix.length - a.prefix.length);

/**
 * Resource family of a company-file-relative path
 * @example resourceFamily('/Sale/Invoice/Item') => 'invoices'
 */
export function resourceFamily(path: string): string {
  const normalized = path === '' ? '/' : path;
  for (const { family, prefix } of FAMILIES_BY_PREFIX) {
    if (prefix === '/') {
      if (normalized === '/') return family;
    } else if (normalized === prefix || normalized.startsWith(`${prefix}/`)) {
      return family;
    }
  }
  return OTHER_FAMILY;
}

export function isResourceFamily(value: string): value is ResourceFamily {
  return Object.hasOwn(RESOURCE_FAMILIES, value);
}

export function ttlFor(family: string): number | undefined {
  return isResourceFamily(family) ? CACHE_TTL_MS[family] : undefined;
}

/**
 * Stable cache key: family, method, path and the query sorted by name
 * @example fingerprint('GET', '/Contact', { $top: '400', $filter: 'x' })
 *          => 'contacts:GET /Contact?$filter=x&$top=400'
 */
export function fingerprint(
  method: string,
  path: string,
  query: Record<string, string> = {}
): string {
  const search = Object.keys(query)
    .sort()
    .map((name) => `${name}=${query[name]}`)
    .join('&');
  return `${resourceFamily(path)}:${method.toUpperCase()} ${path}?${search}`;
}

interface CacheEntry {
  value: unknown;
  expiresAt: number;
}

export class ResponseCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly now: () => number;
  private invalidations = 0;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Live value for the key; expired entries are dropped and read as absent
   */
  get<T = unknown>(key: string): T | undefined {
    const family = familyOf(key);
    const entry = this.entries.get(key);
    if (!entry) {
      cacheMissesTotal.inc({ family });
      return undefined;
    }
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      cacheMissesTotal.inc({ family });
      return undefined;
    }
    cacheHitsTotal.inc({ family });
    return entry.value as T;
  }

  set(key: string, value: unknown, ttlMs: number): void {
    if (ttlMs <= 0) {
      return;
    }
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  /**
   * Remove every key starting with `prefix` ('' clears everything)
   * @returns Number of entries removed
   */
  invalidate(prefix: string): number {
    this.invalidations++;

    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      cacheInvalidationsTotal.inc({ family: prefix ? familyOf(prefix) : 'all' }, removed);
    }
    loggers.cache.debug('Cache invalidated', { prefix, removed });
    return removed;
  }

  /**
   * Invalidation counter. A read that saw a different epoch when it started
   * must not store its result.
   */
  epoch(): number {
    return this.invalidations;
  }
}

function familyOf(key: string): string {
  const separator = key.indexOf(':');
  return separator === -1 ? key : key.slice(0, separator);
}
