import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type CacheResult = 'hit' | 'miss' | 'joined';
export type UpstreamOutcome =
  | 'ok'
  | 'rate_limited'
  | 'unavailable'
  | 'http_error'
  | 'network_error';

const registry = new Registry();

collectDefaultMetrics({ register: registry });

const upstreamRequests = new Counter({
  name: 'uphere_requests_total',
  help: 'Requests sent to the UpHere API, one per attempt',
  labelNames: ['endpoint', 'outcome'] as const,
  registers: [registry]
});

const upstreamLatency = new Histogram({
  name: 'uphere_request_duration_ms',
  help: 'Latency of a single UpHere API attempt',
  labelNames: ['endpoint'] as const,
  buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000],
  registers: [registry]
});

const rateLimitRetries = new Counter({
  name: 'uphere_rate_limit_retries_total',
  help: 'Retries scheduled after a 429 response',
  labelNames: ['endpoint'] as const,
  registers: [registry]
});

const cacheLookups = new Counter({
  name: 'satellite_cache_lookups_total',
  help: 'Satellite cache lookups by result',
  labelNames: ['kind', 'result'] as const,
  registers: [registry]
});

export const metricsContentType = registry.contentType;

export function recordUpstreamAttempt(
  endpoint: string,
  outcome: UpstreamOutcome,
  durationMs: number
): void {
  upstreamRequests.inc({ endpoint, outcome });
  upstreamLatency.observe({ endpoint }, durationMs);
}

export function recordRateLimitRetry(endpoint: string): void {
  rateLimitRetries.inc({ endpoint });
}

export function recordCacheLookup(kind: string, result: CacheResult): void {
  cacheLookups.inc({ kind, result });
}

export async function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}
