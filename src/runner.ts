import { Clock, monotonicClock, Sleep } from './clock.js';
import { Dispatcher } from './dispatcher.js';
import { ConfigurationError } from './errors.js';
import { BodyDecoder, createExecutor, RequestExecutor } from './executor.js';
import { Logger, silentLogger } from './logger.js';
import { createRateLimiter } from './rate-limiter.js';
import { ResultSink } from './sink.js';
import { summarize } from './statistics.js';
import {
  DetailWriter,
  ProgressSnapshot,
  RunParameters,
  RunReport,
  RunTotals,
  SummaryWriter,
  TargetDescriptor,
} from './types.js';
import { expandWork, requestCountFor, TokenFactory } from './work-queue.js';

export interface RunnerOptions {
  targets: TargetDescriptor[];
  params: RunParameters;
  detailWriter?: DetailWriter;
  summaryWriter?: SummaryWriter;
  /** Replaces the HTTP executor, e.g. with an in-process stand-in. */
  executor?: RequestExecutor;
  decode?: BodyDecoder;
  clock?: Clock;
  sleep?: Sleep;
  tokenFactory?: TokenFactory;
  logger?: Logger;
  signal?: AbortSignal;
  onProgress?: (snapshot: ProgressSnapshot) => void;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

export function validateRunParameters(params: RunParameters, targets: readonly TargetDescriptor[]): void {
  if (!isPositiveInteger(params.concurrency)) {
    throw new ConfigurationError(`concurrency must be a positive integer, got ${params.concurrency}`);
  }
  if (!Number.isFinite(params.ratePerSecond) || params.ratePerSecond < 0) {
    throw new ConfigurationError(`rate must be >= 0 requests/second, got ${params.ratePerSecond}`);
  }
  if (!isNonNegativeInteger(params.requestsPerTarget)) {
    throw new ConfigurationError(`requests per target must be a non-negative integer, got ${params.requestsPerTarget}`);
  }
  if (!isPositive(params.timeouts.connectMs) || !isPositive(params.timeouts.readMs)) {
    throw new ConfigurationError('connect and read timeouts must be greater than 0');
  }
  if (!isPositiveInteger(params.batchSize)) {
    throw new ConfigurationError(`batch size must be a positive integer, got ${params.batchSize}`);
  }
  if (params.monitorIntervalMs !== undefined && !isPositive(params.monitorIntervalMs)) {
    throw new ConfigurationError('monitor interval must be greater than 0');
  }
  if (targets.length === 0) {
    throw new ConfigurationError('at least one target is required');
  }

  const seen = new Set<string>();
  for (const target of targets) {
    if (!target.id) {
      throw new ConfigurationError('target id must not be empty');
    }
    if (seen.has(target.id)) {
      throw new ConfigurationError(`duplicate target id: ${target.id}`);
    }
    seen.add(target.id);

    if (target.requestCount !== undefined && !isNonNegativeInteger(target.requestCount)) {
      throw new ConfigurationError(`${target.id}: request count must be a non-negative integer`);
    }
    if (target.ratePerSecond !== undefined && (!Number.isFinite(target.ratePerSecond) || target.ratePerSecond < 0)) {
      throw new ConfigurationError(`${target.id}: rate must be >= 0 requests/second`);
    }
    const { connectMs, readMs } = target.timeouts ?? {};
    if ((connectMs !== undefined && !isPositive(connectMs)) || (readMs !== undefined && !isPositive(readMs))) {
      throw new ConfigurationError(`${target.id}: timeouts must be greater than 0`);
    }
  }
}

/**
 * Runs one benchmark: expand, dispatch, aggregate, summarize. Resolves after
 * every work item has one recorded outcome and the summary has been handed to
 * the summary writer. Only configuration problems reject before work starts.
 */
export async function runBenchmark(options: RunnerOptions): Promise<RunReport> {
  const { targets, params, onProgress } = options;
  validateRunParameters(params, targets);

  const logger = options.logger ?? silentLogger;
  const clock = options.clock ?? monotonicClock;

  const executor =
    options.executor ??
    createExecutor(targets, {
      timeouts: params.timeouts,
      insecureTls: params.insecureTls,
      clock,
      decode: options.decode,
      logger,
    });

  const sink = new ResultSink({
    detailWriter: params.detailLogging ? options.detailWriter : undefined,
    batchSize: params.batchSize,
    logger,
  });
  for (const target of targets) {
    sink.register(target.id, target.group ?? target.id);
  }

  const perTarget = new Map<string, number>();
  for (const target of targets) {
    if (target.ratePerSecond) perTarget.set(target.id, target.ratePerSecond);
  }
  const rateLimiter = createRateLimiter({
    ratePerSecond: params.ratePerSecond,
    perTarget,
    clock,
    sleep: options.sleep,
  });

  const items = expandWork(targets, params.requestsPerTarget, options.tokenFactory);
  const dispatcher = new Dispatcher(executor, outcome => sink.submit(outcome), {
    concurrency: params.concurrency,
    rateLimiter,
    clock,
    signal: options.signal,
  });

  const snapshot = (): ProgressSnapshot => ({
    total: items.length,
    completed: sink.completed,
    inFlight: dispatcher.inFlight,
    succeeded: sink.successes,
  });

  logger.debug(
    `[runner] ${items.length} requests across ${targets.length} targets ` +
      `(${targets.map(t => `${t.id}=${requestCountFor(t, params.requestsPerTarget)}`).join(', ')})`
  );

  let monitor: NodeJS.Timeout | undefined;
  if (onProgress && params.monitorIntervalMs) {
    monitor = setInterval(() => onProgress(snapshot()), params.monitorIntervalMs);
    monitor.unref();
  }

  const startTime = clock.now();
  let cancelled = 0;
  try {
    ({ cancelled } = await dispatcher.run(items));
  } finally {
    if (monitor) clearInterval(monitor);
    await sink.close();
  }
  const spanMs = clock.now() - startTime;

  onProgress?.(snapshot());

  const summary = summarize(sink.results().values());
  const totals: RunTotals = {
    spanMs,
    totalRequests: sink.completed,
    succeeded: sink.successes,
    failed: sink.completed - sink.successes,
    concurrency: params.concurrency,
    cancelled: cancelled > 0,
  };

  await options.summaryWriter?.write(summary, totals);

  return {
    ...totals,
    summary,
    detailWriteFailures: sink.detailWriteFailures,
  };
}
