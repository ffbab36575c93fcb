import chalk from 'chalk';
import { SUMMARY_COLUMNS, summaryRow } from './export/columns.js';
import { toCsvLine } from './export/csv.js';
import { ProgressSnapshot, RunReport, SummaryRow } from './types.js';

export type OutputFormat = 'pretty' | 'json' | 'csv';

export interface ReporterOptions {
  format: OutputFormat;
  title?: string;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatLatency(ms: number): string {
  return Math.round(ms).toString();
}

function formatRate(rate: number): string {
  const text = `${rate.toFixed(1)}%`;
  if (rate >= 99) return chalk.green(text);
  if (rate >= 90) return chalk.yellow(text);
  return chalk.red(text);
}

export function printResults(report: RunReport, options: ReporterOptions = { format: 'pretty' }): void {
  switch (options.format) {
    case 'json':
      printJson(report);
      break;
    case 'csv':
      printCsv(report);
      break;
    default:
      printPretty(report, options.title ?? 'Latency Benchmark Results');
  }
}

function printTarget(row: SummaryRow): void {
  console.log(chalk.bold(row.targetId) + (row.group !== row.targetId ? chalk.gray(` (${row.group})`) : ''));
  console.log(
    `  Requests:     ${row.totalRequests}  ok ${chalk.green(row.successCount)}  failed ${chalk.red(row.failureCount)}  (${formatRate(row.successRate)})`
  );
  if (row.successCount > 0) {
    const { latency } = row;
    console.log(
      `  Latency (ms): avg ${formatLatency(row.meanLatencyMs)}  min ${formatLatency(latency.min)}  ` +
        `p50 ${formatLatency(latency.p50)}  p95 ${formatLatency(latency.p95)}  p99 ${formatLatency(latency.p99)}  max ${formatLatency(latency.max)}`
    );
    console.log(`  Avg size:     ${(row.meanSizeBytes / 1024).toFixed(2)} KB`);
  }
  console.log(`  Span:         ${formatDuration(row.spanMs)}  (${row.secondsPerRequest.toFixed(4)} s/req)`);
  for (const [code, count] of Object.entries(row.failures)) {
    console.log(`  ${chalk.red(code)}:  ${count}`);
  }
  if (row.cleanupFailures > 0) {
    console.log(chalk.yellow(`  Connection cleanup failures: ${row.cleanupFailures}`));
  }
}

function printPretty(report: RunReport, title: string): void {
  const successRate = report.totalRequests > 0 ? (report.succeeded / report.totalRequests) * 100 : 0;
  const throughput = report.spanMs > 0 ? report.totalRequests / (report.spanMs / 1000) : 0;

  console.log('');
  console.log(chalk.bold(title));
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log(`${chalk.cyan('Duration:')}      ${formatDuration(report.spanMs)}`);
  console.log(`${chalk.cyan('Concurrency:')}   ${report.concurrency}`);
  console.log(`${chalk.cyan('Requests:')}      ${report.totalRequests}`);
  console.log(`${chalk.cyan('Succeeded:')}     ${chalk.green(report.succeeded)} (${successRate.toFixed(1)}%)`);
  console.log(`${chalk.cyan('Failed:')}        ${chalk.red(report.failed)}`);
  if (report.cancelled) {
    console.log(chalk.yellow('Run was cancelled; undispatched requests are counted as failures.'));
  }
  console.log('');

  for (const row of report.summary) {
    printTarget(row);
    console.log('');
  }

  if (report.detailWriteFailures > 0) {
    console.log(chalk.yellow(`Detail log: ${report.detailWriteFailures} batch(es) failed to write`));
  }
  console.log(`${chalk.cyan('Throughput:')}   ${chalk.bold(throughput.toFixed(1))} req/s`);
  console.log(chalk.gray('══════════════════════════════════════'));
  console.log('');
}

export function toJson(report: RunReport): Record<string, unknown> {
  return {
    duration_ms: Math.round(report.spanMs),
    concurrency: report.concurrency,
    cancelled: report.cancelled,
    requests: {
      total: report.totalRequests,
      succeeded: report.succeeded,
      failed: report.failed,
    },
    targets: report.summary.map(row => ({
      target: row.targetId,
      group: row.group,
      total: row.totalRequests,
      succeeded: row.successCount,
      failed: row.failureCount,
      success_rate: row.successRate,
      seconds_per_request: row.secondsPerRequest,
      span_ms: Math.round(row.spanMs),
      mean_size_bytes: Math.round(row.meanSizeBytes),
      latency_ms: {
        avg: Math.round(row.meanLatencyMs),
        min: Math.round(row.latency.min),
        max: Math.round(row.latency.max),
        p50: Math.round(row.latency.p50),
        p95: Math.round(row.latency.p95),
        p99: Math.round(row.latency.p99),
      },
      errors: row.failures,
    })),
    throughput_rps: report.spanMs > 0 ? report.totalRequests / (report.spanMs / 1000) : 0,
  };
}

function printJson(report: RunReport): void {
  console.log(JSON.stringify(toJson(report), null, 2));
}

function printCsv(report: RunReport): void {
  console.log(toCsvLine(SUMMARY_COLUMNS));
  for (const row of report.summary) {
    console.log(toCsvLine(summaryRow(row, report)));
  }
}

export function printProgress(snapshot: ProgressSnapshot): void {
  const percent = snapshot.total > 0 ? Math.round((snapshot.completed / snapshot.total) * 100) : 100;
  console.error(
    chalk.gray(
      `[monitor] ${new Date().toLocaleTimeString()}  ${snapshot.completed}/${snapshot.total} (${percent}%)  ` +
        `in flight ${snapshot.inFlight}  ok ${snapshot.succeeded}`
    )
  );
}
