/**
 * Prometheus Metrics
 * Request, retry, cache and token counters on a dedicated registry
 */

import { Registry, Counter, Histogram } from 'prom-client';

export const registry = new Registry();

export const apiRequestsTotal = new Counter({
  name: 'myob_api_requests_total',
  help: 'HTTP attempts sent to the MYOB API',
  labelNames: ['method', 'family', 'status'] as const,
  registers: [registry],
});

export const apiRequestDurationSeconds = new Histogram({
  name: 'myob_api_request_duration_seconds',
  help: 'Executor call duration including retries (seconds)',
  labelNames: ['method', 'family'] as const,
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [registry],
});

export const retryAttemptsTotal = new Counter({
  name: 'myob_retry_attempts_total',
  help: 'Retries scheduled by the executor',
  labelNames: ['reason'] as const, // 'unauthorized' | 'rate_limited' | 'server_error' | 'network'
  registers: [registry],
});

export const cacheHitsTotal = new Counter({
  name: 'myob_cache_hits_total',
  help: 'Response cache hits',
  labelNames: ['family'] as const,
  registers: [registry],
});

export const cacheMissesTotal = new Counter({
  name: 'myob_cache_misses_total',
  help: 'Response cache misses',
  labelNames: ['family'] as const,
  registers: [registry],
});

export const cacheInvalidationsTotal = new Counter({
  name: 'myob_cache_invalidations_total',
  help: 'Entries removed by mutation-driven invalidation',
  labelNames: ['family'] as const,
  registers: [registry],
});

export const tokenRefreshesTotal = new Counter({
  name: 'myob_token_refreshes_total',
  help: 'Token endpoint calls by grant and outcome',
  labelNames: ['grant', 'status'] as const, // status: 'success' | 'failed'
  registers: [registry],
});

export async function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}
