import { reasonCode } from './classifier.js';
import { errorMessage } from './errors.js';
import { Logger, silentLogger } from './logger.js';
import { DetailWriter, RequestOutcome, TargetAggregate } from './types.js';

export interface ResultSinkOptions {
  detailWriter?: DetailWriter;
  batchSize?: number;
  logger?: Logger;
}

export function createAggregate(targetId: string, group: string): TargetAggregate {
  return {
    targetId,
    group,
    totalRequests: 0,
    successCount: 0,
    failureCount: 0,
    failuresByReason: new Map(),
    successLatencySumMs: 0,
    successSizeSumBytes: 0,
    successLatencies: [],
    cleanupFailures: 0,
  };
}

/**
 * Sole owner of the per-target aggregates. Every outcome is applied by one
 * synchronous `submit` call, so updates for a target never interleave no
 * matter how many executions are in flight.
 */
export class ResultSink {
  private aggregates: Map<string, TargetAggregate> = new Map();
  private buffer: RequestOutcome[] = [];
  private flushChain: Promise<void> = Promise.resolve();
  private closed = false;
  private recorded = 0;
  private succeeded = 0;
  private failedBatches = 0;
  private readonly batchSize: number;
  private readonly detailWriter?: DetailWriter;
  private readonly logger: Logger;

  constructor(options: ResultSinkOptions = {}) {
    this.detailWriter = options.detailWriter;
    this.batchSize = options.batchSize ?? 1000;
    this.logger = options.logger ?? silentLogger;
  }

  /** Registers a target up front so it reports even if it never gets an outcome. */
  register(targetId: string, group: string): void {
    if (!this.aggregates.has(targetId)) {
      this.aggregates.set(targetId, createAggregate(targetId, group));
    }
  }

  submit(outcome: RequestOutcome): void {
    if (this.closed) {
      throw new Error(`ResultSink is closed; outcome ${outcome.targetId}#${outcome.index} arrived late`);
    }

    let aggregate = this.aggregates.get(outcome.targetId);
    if (!aggregate) {
      aggregate = createAggregate(outcome.targetId, outcome.group);
      this.aggregates.set(outcome.targetId, aggregate);
    }

    aggregate.totalRequests++;
    if (outcome.classification.ok) {
      aggregate.successCount++;
      aggregate.successLatencySumMs += outcome.elapsedMs;
      aggregate.successSizeSumBytes += outcome.sizeBytes ?? 0;
      aggregate.successLatencies.push(outcome.elapsedMs);
      this.succeeded++;
    } else {
      const code = reasonCode(outcome.classification.reason);
      aggregate.failureCount++;
      aggregate.failuresByReason.set(code, (aggregate.failuresByReason.get(code) ?? 0) + 1);
    }
    if (outcome.cleanup === 'failed') {
      aggregate.cleanupFailures++;
    }

    if (aggregate.firstDispatchAt === undefined || outcome.dispatchedAt < aggregate.firstDispatchAt) {
      aggregate.firstDispatchAt = outcome.dispatchedAt;
    }
    if (aggregate.lastCompletionAt === undefined || outcome.endedAt > aggregate.lastCompletionAt) {
      aggregate.lastCompletionAt = outcome.endedAt;
    }

    this.recorded++;

    if (this.detailWriter) {
      this.buffer.push(outcome);
      if (this.buffer.length >= this.batchSize) {
        this.flush();
      }
    }
  }

  get completed(): number {
    return this.recorded;
  }

  get successes(): number {
    return this.succeeded;
  }

  get detailWriteFailures(): number {
    return this.failedBatches;
  }

  /** Writes the final partial batch and waits for every pending write. */
  async close(): Promise<void> {
    if (this.closed) {
      return this.flushChain;
    }
    this.closed = true;
    this.flush();
    await this.flushChain;
  }

  /** Finalized aggregates; only available once the sink is closed. */
  results(): ReadonlyMap<string, Readonly<TargetAggregate>> {
    if (!this.closed) {
      throw new Error('ResultSink.results() called before close()');
    }
    return this.aggregates;
  }

  private flush(): void {
    const writer = this.detailWriter;
    if (!writer || this.buffer.length === 0) {
      return;
    }

    const batch = this.buffer;
    this.buffer = [];
    const total = this.recorded;

    this.flushChain = this.flushChain.then(async () => {
      try {
        await writer.write(batch);
        this.logger.debug(`[sink] wrote ${batch.length} rows (total ${total})`);
      } catch (error) {
        this.failedBatches++;
        this.logger.error(`[sink] detail write of ${batch.length} rows failed: ${errorMessage(error)}`);
      }
    });
  }
}
