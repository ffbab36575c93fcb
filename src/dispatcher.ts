import { Clock, monotonicClock } from './clock.js';
import { ConcurrencyGate } from './concurrency-gate.js';
import { describeReason } from './classifier.js';
import { errorMessage, truncateError } from './errors.js';
import { ExecuteContext, RequestExecutor } from './executor.js';
import { RateLimiter } from './rate-limiter.js';
import { FailureReason, RequestOutcome, WorkItem } from './types.js';

export interface DispatchOptions {
  concurrency: number;
  rateLimiter?: RateLimiter;
  clock?: Clock;
  /** Stops admitting new work; items never dispatched are reported as cancelled. */
  signal?: AbortSignal;
  onDispatch?: (item: WorkItem, dispatchedAt: number) => void;
}

export interface DispatchResult {
  dispatched: number;
  cancelled: number;
}

/** Outcome for an item that never produced one of its own. */
export function failedOutcome(item: WorkItem, reason: FailureReason, at: number, dispatchedAt = at): RequestOutcome {
  return {
    targetId: item.targetId,
    group: item.group,
    index: item.index,
    token: item.token,
    label: item.request.label,
    timestamp: new Date().toISOString(),
    dispatchedAt,
    startedAt: at,
    endedAt: at,
    elapsedMs: 0,
    classification: { ok: false, reason },
    error: truncateError(describeReason(reason)),
    cleanup: 'not-opened',
  };
}

/**
 * Drains `items` through the rate limiter and a `concurrency`-permit gate,
 * handing every item to `execute` exactly once and every outcome to
 * `onOutcome` exactly once. Resolves after all in-flight work has finished.
 */
export class Dispatcher {
  private gate: ConcurrencyGate;
  private clock: Clock;
  private inFlightTasks: Set<Promise<void>> = new Set();
  private failure: unknown;

  constructor(
    private execute: RequestExecutor,
    private onOutcome: (outcome: RequestOutcome) => void,
    private options: DispatchOptions
  ) {
    this.gate = new ConcurrencyGate(options.concurrency);
    this.clock = options.clock ?? monotonicClock;
  }

  get inFlight(): number {
    return this.gate.inUse;
  }

  get peakInFlight(): number {
    return this.gate.highWater;
  }

  async run(items: readonly WorkItem[]): Promise<DispatchResult> {
    const { rateLimiter, signal } = this.options;
    let dispatched = 0;
    let cancelled = 0;

    const cancel = (item: WorkItem) => {
      this.onOutcome(failedOutcome(item, { kind: 'cancelled' }, this.clock.now()));
      cancelled++;
    };

    for (const item of items) {
      if (signal?.aborted) {
        cancel(item);
        continue;
      }

      // Both waits can be long; re-check the signal after each one.
      await rateLimiter?.acquire(item.targetId, signal);
      if (signal?.aborted) {
        cancel(item);
        continue;
      }

      await this.gate.acquire();
      if (signal?.aborted) {
        this.gate.release();
        cancel(item);
        continue;
      }

      const dispatchedAt = this.clock.now();
      rateLimiter?.record(item.targetId, dispatchedAt);
      this.options.onDispatch?.(item, dispatchedAt);
      dispatched++;

      this.track(this.runOne(item, { dispatchedAt }));
    }

    await Promise.allSettled(this.inFlightTasks);
    if (this.failure !== undefined) {
      throw this.failure;
    }
    return { dispatched, cancelled };
  }

  // Settled tasks leave the set so long runs do not pile up promises. A task
  // only rejects when recording its outcome failed, which is a bug worth
  // surfacing from run().
  private track(task: Promise<void>): void {
    this.inFlightTasks.add(task);
    void task.then(
      () => this.inFlightTasks.delete(task),
      (error: unknown) => {
        this.inFlightTasks.delete(task);
        this.failure ??= error;
      }
    );
  }

  // Holds one permit, already acquired by `run`, and always gives it back.
  private async runOne(item: WorkItem, context: ExecuteContext): Promise<void> {
    let outcome: RequestOutcome;
    try {
      outcome = await this.execute(item, context);
    } catch (error) {
      const message = truncateError(errorMessage(error));
      outcome = failedOutcome(item, { kind: 'internal', message }, this.clock.now(), context.dispatchedAt);
    } finally {
      this.gate.release();
    }
    this.onOutcome(outcome);
  }
}
