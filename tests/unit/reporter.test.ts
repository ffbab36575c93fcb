/**
 * Unit Tests: console report formats, logger routing and error helpers.
 */
import { describe, it, expect, afterEach, vi } from 'vitest';
import { ConfigurationError, errorCode, errorMessage, truncateError } from '../../src/errors.js';
import { createConsoleLogger } from '../../src/logger.js';
import { formatDuration, printResults, toJson } from '../../src/reporter.js';
import { RunReport } from '../../src/types.js';

const REPORT: RunReport = {
  spanMs: 2000,
  totalRequests: 4,
  succeeded: 3,
  failed: 1,
  concurrency: 2,
  cancelled: false,
  detailWriteFailures: 0,
  summary: [
    {
      targetId: 'google',
      group: 'search',
      totalRequests: 4,
      successCount: 3,
      failureCount: 1,
      successRate: 75,
      secondsPerRequest: 0.5,
      meanLatencyMs: 120.4,
      spanMs: 2000,
      meanSizeBytes: 2048.6,
      latency: { min: 100, max: 140, avg: 120.4, p50: 121, p95: 140, p99: 140 },
      failures: { 'http:429': 1 },
      cleanupFailures: 0,
    },
  ],
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('reporter', () => {
  it('formats durations', () => {
    expect(formatDuration(250.4)).toBe('250ms');
    expect(formatDuration(2500)).toBe('2.5s');
  });

  it('builds the JSON report', () => {
    expect(toJson(REPORT)).toEqual({
      duration_ms: 2000,
      concurrency: 2,
      cancelled: false,
      requests: { total: 4, succeeded: 3, failed: 1 },
      targets: [
        {
          target: 'google',
          group: 'search',
          total: 4,
          succeeded: 3,
          failed: 1,
          success_rate: 75,
          seconds_per_request: 0.5,
          span_ms: 2000,
          mean_size_bytes: 2049,
          latency_ms: { avg: 120, min: 100, max: 140, p50: 121, p95: 140, p99: 140 },
          errors: { 'http:429': 1 },
        },
      ],
      throughput_rps: 2,
    });
  });

  it('prints the summary table as CSV', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    printResults(REPORT, { format: 'csv' });

    expect(log.mock.calls.map(call => call[0])).toEqual([
      'target,group,total_requests,concurrency,seconds_per_request,success_count,success_rate_pct,mean_latency_s,' +
        'p50_latency_s,p95_latency_s,p99_latency_s,span_s,run_span_s,mean_size_kb,failures',
      'google,search,4,2,0.5000,3,75.00,0.1204,0.1210,0.1400,0.1400,2.0000,2.0000,2.00,http:429=1',
    ]);
  });

  it('prints every target in the pretty report', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    printResults(REPORT, { format: 'pretty', title: 'Run' });

    const output = log.mock.calls.map(call => String(call[0])).join('\n');
    expect(output).toContain('google');
    expect(output).toContain('http:429');
  });
});

describe('createConsoleLogger', () => {
  it('hides debug output unless verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    createConsoleLogger().debug('hidden');
    createConsoleLogger({ verbose: true }).debug('shown');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(expect.stringContaining('shown'));
  });

  it('sends warnings to stderr and info to stderr when asked', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    const logger = createConsoleLogger({ stderr: true });
    logger.info('progress');
    logger.warn('careful');

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenNthCalledWith(1, 'progress');
    expect(error).toHaveBeenNthCalledWith(2, expect.stringContaining('careful'));
  });
});

describe('errors', () => {
  it('tags configuration errors', () => {
    const err = new ConfigurationError('bad');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ConfigurationError');
    expect(err.code).toBe('INVALID_CONFIGURATION');
  });

  it('keeps the first line and caps its length', () => {
    expect(truncateError('first\nsecond')).toBe('first');
    expect(truncateError('x'.repeat(305))).toBe(`${'x'.repeat(300)}...`);
  });

  it('reads messages and codes from unknown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
    expect(errorCode(Object.assign(new Error('x'), { code: 'ECONNRESET' }))).toBe('ECONNRESET');
    expect(errorCode({ code: 7 })).toBeUndefined();
    expect(errorCode(null)).toBeUndefined();
  });
});
