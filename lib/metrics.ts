/**
 * Prometheus metrics using `prom-client`.
 *
 * Metrics:
 * - `<prefix>dns_queries_total` (Counter, labels: record_type, outcome, mode)
 * - `<prefix>dns_query_duration_seconds` (Histogram, labels: record_type, mode)
 * - `<prefix>verdicts_total` (Counter, label: verdict)
 *
 * The CLI prints `register.metrics()` when run with `--metrics`.
 */

import { Counter, Histogram, register } from 'prom-client';
import { CONFIG } from './config';
import type { OutcomeKind, RecordType, Verdict } from './types';

export type QueryMode = 'system' | 'direct';

export const dnsQueriesTotal = new Counter({
  name: `${CONFIG.METRICS_PREFIX}dns_queries_total`,
  help: 'DNS queries issued, by record type, outcome and resolver mode',
  labelNames: ['record_type', 'outcome', 'mode'] as const,
});

export const dnsQueryDuration = new Histogram({
  name: `${CONFIG.METRICS_PREFIX}dns_query_duration_seconds`,
  help: 'Histogram of DNS query latency in seconds',
  labelNames: ['record_type', 'mode'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
});

export const verdictsTotal = new Counter({
  name: `${CONFIG.METRICS_PREFIX}verdicts_total`,
  help: 'Completed delegation checks, by verdict',
  labelNames: ['verdict'] as const,
});

export function recordQuery(type: RecordType, mode: QueryMode, outcome: OutcomeKind, seconds: number): void {
  dnsQueriesTotal.inc({ record_type: type, outcome, mode });
  if (!isFinite(seconds) || seconds < 0) return;
  dnsQueryDuration.observe({ record_type: type, mode }, seconds);
}

export function recordVerdict(verdict: Verdict): void {
  verdictsTotal.inc({ verdict });
}

export { register };
const metrics = { register, recordQuery, recordVerdict };
export default metrics;
