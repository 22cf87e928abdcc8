/**
 * Prometheus metrics using `prom-client`.
 *
 * Metrics:
 * - `subsweep_source_requests_total{source,outcome}` (Counter)
 * - `subsweep_fetch_attempts_total{outcome}` (Counter)
 * - `subsweep_subdomains_discovered_total{source}` (Counter)
 * - `subsweep_source_duration_seconds{source}` (Histogram)
 *
 * Embedders can expose `register.metrics()` for scraping.
 */

import { Counter, Histogram, register } from 'prom-client';
import type { SourceName, SourceStatus } from './types';

export type AttemptOutcome = 'success' | 'bad_status' | 'error';

export const sourceRequestsTotal = new Counter({
  name: 'subsweep_source_requests_total',
  help: 'Source queries by final outcome',
  labelNames: ['source', 'outcome'] as const,
});

export const fetchAttemptsTotal = new Counter({
  name: 'subsweep_fetch_attempts_total',
  help: 'Individual HTTP attempts made by the retrying fetcher',
  labelNames: ['outcome'] as const,
});

export const subdomainsDiscoveredTotal = new Counter({
  name: 'subsweep_subdomains_discovered_total',
  help: 'Unique subdomains accepted, by the source that reported them first',
  labelNames: ['source'] as const,
});

export const sourceDuration = new Histogram({
  name: 'subsweep_source_duration_seconds',
  help: 'Wall time spent per source, retries included',
  labelNames: ['source'] as const,
  buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 20, 30],
});

export function incSourceRequest(source: SourceName, outcome: SourceStatus): void {
  sourceRequestsTotal.inc({ source, outcome });
}

export function incFetchAttempt(outcome: AttemptOutcome): void {
  fetchAttemptsTotal.inc({ outcome });
}

export function incDiscovered(source: SourceName): void {
  subdomainsDiscoveredTotal.inc({ source });
}

export function observeSourceDuration(source: SourceName, seconds: number): void {
  if (!isFinite(seconds) || seconds < 0) return;
  sourceDuration.observe({ source }, seconds);
}

export { register };
