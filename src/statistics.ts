import { LatencyStats, SummaryRow, TargetAggregate } from './types.js';

export function calculateLatencyStats(latencies: readonly number[]): LatencyStats {
  if (latencies.length === 0) {
    return { min: 0, max: 0, avg: 0, p50: 0, p95: 0, p99: 0 };
  }

  const sorted = [...latencies].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);

  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: sum / sorted.length,
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
  };
}

// Nearest-rank on an ascending array.
export function percentile(sorted: readonly number[], p: number): number {
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, index)];
}

/** Ratio with a zero denominator reported as 0. */
export function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

export function spanOf(aggregate: Readonly<TargetAggregate>): number {
  if (aggregate.firstDispatchAt === undefined || aggregate.lastCompletionAt === undefined) {
    return 0;
  }
  return Math.max(0, aggregate.lastCompletionAt - aggregate.firstDispatchAt);
}

/**
 * Projects a finalized aggregate onto its summary row. Pure: reads the
 * aggregate, never writes it, and returns a frozen row.
 */
export function summarizeTarget(aggregate: Readonly<TargetAggregate>): SummaryRow {
  const spanMs = spanOf(aggregate);
  const failures: Record<string, number> = {};
  for (const [code, count] of [...aggregate.failuresByReason].sort(([a], [b]) => a.localeCompare(b))) {
    failures[code] = count;
  }

  return Object.freeze({
    targetId: aggregate.targetId,
    group: aggregate.group,
    totalRequests: aggregate.totalRequests,
    successCount: aggregate.successCount,
    failureCount: aggregate.failureCount,
    successRate: ratio(aggregate.successCount, aggregate.totalRequests) * 100,
    secondsPerRequest: ratio(spanMs / 1000, aggregate.totalRequests),
    meanLatencyMs: ratio(aggregate.successLatencySumMs, aggregate.successCount),
    spanMs,
    meanSizeBytes: ratio(aggregate.successSizeSumBytes, aggregate.successCount),
    latency: Object.freeze(calculateLatencyStats(aggregate.successLatencies)),
    failures: Object.freeze(failures),
    cleanupFailures: aggregate.cleanupFailures,
  });
}

export function summarize(aggregates: Iterable<Readonly<TargetAggregate>>): SummaryRow[] {
  return [...aggregates].map(summarizeTarget);
}
