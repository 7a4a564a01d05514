import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from 'prom-client';

export const metricsRegistry = new Registry();

// Node.js process metrics (memory, CPU, event loop)
collectDefaultMetrics({ register: metricsRegistry });

// Admission runs before any handler work, so most of it is sub-10ms
const LATENCY_BUCKETS = [
  0.0005, 0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1,
];

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestsTotal = new Counter({
  name: 'tenant_gate_http_requests_total',
  help: 'Total number of HTTP requests received',
  labelNames: ['tenant_id', 'method', 'route', 'status_code'] as const,
  registers: [metricsRegistry],
});

export const httpRequestDurationSeconds = new Histogram({
  name: 'tenant_gate_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['tenant_id', 'method', 'route'] as const,
  buckets: LATENCY_BUCKETS,
  registers: [metricsRegistry],
});

// ============================================================================
// Admission Metrics
// ============================================================================

/**
 * Pipeline outcomes. `stage` is the stage that rejected, or `complete`.
 */
export const admissionDecisionsTotal = new Counter({
  name: 'tenant_gate_admission_decisions_total',
  help: 'Admission pipeline outcomes by stage and code',
  labelNames: ['outcome', 'stage', 'code'] as const,
  registers: [metricsRegistry],
});

export const admissionDurationSeconds = new Histogram({
  name: 'tenant_gate_admission_duration_seconds',
  help: 'Time spent in the admission pipeline in seconds',
  labelNames: ['outcome'] as const,
  buckets: LATENCY_BUCKETS,
  registers: [metricsRegistry],
});

export const tenantCacheLookupsTotal = new Counter({
  name: 'tenant_gate_tenant_cache_lookups_total',
  help: 'Tenant cache lookups by result (hit, miss, error)',
  labelNames: ['result'] as const,
  registers: [metricsRegistry],
});

// ============================================================================
// Rate Limiting Metrics
// ============================================================================

/**
 * Requests denied because the tenant bucket was empty
 */
export const rateLimitHitsTotal = new Counter({
  name: 'tenant_gate_rate_limit_hits_total',
  help: 'Total number of requests blocked by rate limiting',
  labelNames: ['tenant_id'] as const,
  registers: [metricsRegistry],
});

export const rateLimitRemaining = new Gauge({
  name: 'tenant_gate_rate_limit_remaining',
  help: 'Whole tokens left in the tenant bucket after the last check',
  labelNames: ['tenant_id'] as const,
  registers: [metricsRegistry],
});

/**
 * Checks resolved by the degradation policy because the store was unreachable
 */
export const rateLimitDegradedTotal = new Counter({
  name: 'tenant_gate_rate_limit_degraded_total',
  help: 'Rate limit checks decided by the degradation policy',
  labelNames: ['policy'] as const,
  registers: [metricsRegistry],
});

/**
 * Reset all metrics (useful for testing)
 */
export function resetMetrics(): void {
  metricsRegistry.resetMetrics();
}

export async function getMetrics(): Promise<string> {
  return metricsRegistry.metrics();
}

export function getMetricsContentType(): string {
  return metricsRegistry.contentType;
}
