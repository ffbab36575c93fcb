import { RequestOutcome, RunTotals, SummaryRow } from '../types.js';
import { CsvCell } from './csv.js';

export const DETAIL_COLUMNS = [
  'timestamp',
  'request_index',
  'target',
  'group',
  'query',
  'status_code',
  'response_time_s',
  'content_size_kb',
  'success',
  'error_message',
  'captured',
  'cleanup',
] as const;

export function detailRow(outcome: RequestOutcome): CsvCell[] {
  return [
    outcome.timestamp,
    outcome.index,
    outcome.targetId,
    outcome.group,
    outcome.label,
    outcome.status,
    (outcome.elapsedMs / 1000).toFixed(6),
    outcome.sizeBytes === undefined ? undefined : (outcome.sizeBytes / 1024).toFixed(3),
    outcome.classification.ok,
    outcome.error,
    outcome.captured ? JSON.stringify(outcome.captured) : undefined,
    outcome.cleanup,
  ];
}

export const SUMMARY_COLUMNS = [
  'target',
  'group',
  'total_requests',
  'concurrency',
  'seconds_per_request',
  'success_count',
  'success_rate_pct',
  'mean_latency_s',
  'p50_latency_s',
  'p95_latency_s',
  'p99_latency_s',
  'span_s',
  'run_span_s',
  'mean_size_kb',
  'failures',
] as const;

const seconds = (ms: number): string => (ms / 1000).toFixed(4);

export function summaryRow(row: SummaryRow, totals: RunTotals): CsvCell[] {
  return [
    row.targetId,
    row.group,
    row.totalRequests,
    totals.concurrency,
    row.secondsPerRequest.toFixed(4),
    row.successCount,
    row.successRate.toFixed(2),
    seconds(row.meanLatencyMs),
    seconds(row.latency.p50),
    seconds(row.latency.p95),
    seconds(row.latency.p99),
    seconds(row.spanMs),
    seconds(totals.spanMs),
    (row.meanSizeBytes / 1024).toFixed(2),
    Object.entries(row.failures)
      .map(([code, count]) => `${code}=${count}`)
      .join('; '),
  ];
}
