/**
 * Prometheus Metrics
 *
 * Provides application metrics for monitoring:
 * - HTTP request counters and duration histograms
 * - Namecheap API call counters
 */

import { Registry, Counter, Histogram } from 'prom-client';

/**
 * Prometheus registry
 */
export const register = new Registry();

/**
 * HTTP request counter
 * Labels: route, method, status
 */
export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['route', 'method', 'status'],
  registers: [register],
});

/**
 * HTTP request duration histogram
 * Labels: route, method
 */
export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['route', 'method'],
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [register],
});

/**
 * Provider API call counter
 * Labels: provider, command, status (success/error)
 */
export const providerCallsTotal = new Counter({
  name: 'provider_calls_total',
  help: 'Total number of provider API calls',
  labelNames: ['provider', 'command', 'status'],
  registers: [register],
});

export function incHttpRequest(route: string, method: string, status: number): void {
  httpRequestsTotal.inc({
    route,
    method,
    status: String(status),
  });
}

export function observeHttpDuration(route: string, method: string, durationSeconds: number): void {
  httpRequestDuration.observe({ route, method }, durationSeconds);
}

export function incProviderCall(provider: string, command: string, status: 'success' | 'error'): void {
  providerCallsTotal.inc({
    provider,
    command,
    status,
  });
}

/**
 * Get metrics in Prometheus format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Reset all metric values (for testing)
 */
export function resetMetrics(): void {
  register.resetMetrics();
}
