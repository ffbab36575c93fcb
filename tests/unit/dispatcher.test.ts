/**
 * Unit Tests: dispatch bounds, exactly-once delivery, isolation, cancellation.
 */
import { describe, it, expect } from 'vitest';
import { reasonCode } from '../../src/classifier.js';
import { Dispatcher } from '../../src/dispatcher.js';
import { createRateLimiter } from '../../src/rate-limiter.js';
import { RequestOutcome } from '../../src/types.js';
import { expandWork } from '../../src/work-queue.js';
import { fakeExecutor, ManualClock, testTarget } from '../helpers/fakes.js';

const key = (o: { targetId: string; index: number }) => `${o.targetId}#${o.index}`;

describe('Dispatcher', () => {
  it('executes and records every item exactly once', async () => {
    const items = expandWork([testTarget('a'), testTarget('b'), testTarget('c')], 7);
    const fake = fakeExecutor({ latencyMs: item => 1 + (item.index % 4) });
    const outcomes: RequestOutcome[] = [];

    const result = await new Dispatcher(fake.execute, o => outcomes.push(o), { concurrency: 4 }).run(items);

    expect(result).toEqual({ dispatched: 21, cancelled: 0 });
    expect(fake.calls).toHaveLength(21);
    expect(outcomes).toHaveLength(21);
    expect(new Set(outcomes.map(key)).size).toBe(21);
    expect(new Set(fake.calls.map(key))).toEqual(new Set(items.map(key)));
  });

  it('never has more than `concurrency` requests in flight', async () => {
    const items = expandWork([testTarget('a')], 20);
    const fake = fakeExecutor({ latencyMs: 15 });
    const dispatcher = new Dispatcher(fake.execute, () => {}, { concurrency: 5 });

    await dispatcher.run(items);

    expect(fake.peak).toBe(5);
    expect(dispatcher.peakInFlight).toBe(5);
    expect(dispatcher.inFlight).toBe(0);
  });

  it('spaces dispatch starts by the rate limit interval', async () => {
    const clock = new ManualClock();
    const items = expandWork([testTarget('a'), testTarget('b')], 3);
    const fake = fakeExecutor({ latencyMs: 1 });
    const starts: number[] = [];

    await new Dispatcher(fake.execute, () => {}, {
      concurrency: 10,
      clock,
      rateLimiter: createRateLimiter({ ratePerSecond: 10, clock, sleep: clock.sleep }),
      onDispatch: (_item, at) => starts.push(at),
    }).run(items);

    expect(starts).toEqual([0, 100, 200, 300, 400, 500]);
    expect(fake.contexts).toEqual(starts.map(dispatchedAt => ({ dispatchedAt })));
  });

  it('turns a thrown executor error into an internal failure for that item only', async () => {
    const items = expandWork([testTarget('a')], 5);
    const fake = fakeExecutor({ throwFor: item => item.index === 2 });
    const outcomes: RequestOutcome[] = [];

    await new Dispatcher(fake.execute, o => outcomes.push(o), { concurrency: 2 }).run(items);

    const failed = outcomes.filter(o => !o.classification.ok);
    expect(outcomes).toHaveLength(5);
    expect(failed.map(key)).toEqual(['a#2']);
    expect(failed[0].error).toBe('Internal error: boom a#2');
    expect(failed[0].cleanup).toBe('not-opened');
  });

  it('records cancelled outcomes for items not yet dispatched after abort', async () => {
    const controller = new AbortController();
    const items = expandWork([testTarget('a')], 5);
    const fake = fakeExecutor({ latencyMs: 5 });
    const outcomes: RequestOutcome[] = [];

    const result = await new Dispatcher(fake.execute, o => outcomes.push(o), {
      concurrency: 1,
      signal: controller.signal,
      onDispatch: item => {
        if (item.index === 1) controller.abort();
      },
    }).run(items);

    expect(result).toEqual({ dispatched: 2, cancelled: 3 });
    expect(fake.calls.map(key)).toEqual(['a#0', 'a#1']);
    expect(outcomes).toHaveLength(5);
    expect(
      outcomes
        .filter(o => !o.classification.ok)
        .map(o => (o.classification.ok ? 'ok' : reasonCode(o.classification.reason)))
    ).toEqual(['cancelled', 'cancelled', 'cancelled']);
  });

  it('stops waiting on the rate limit as soon as the run is aborted', async () => {
    const controller = new AbortController();
    const items = expandWork([testTarget('a')], 3);
    const fake = fakeExecutor({ latencyMs: 1 });
    const outcomes: RequestOutcome[] = [];
    const abortTimer = setTimeout(() => controller.abort(), 100);

    const startedAt = performance.now();
    const result = await new Dispatcher(fake.execute, o => outcomes.push(o), {
      concurrency: 1,
      signal: controller.signal,
      rateLimiter: createRateLimiter({ ratePerSecond: 0.25 }),
    }).run(items);
    const elapsed = performance.now() - startedAt;
    clearTimeout(abortTimer);

    expect(result).toEqual({ dispatched: 1, cancelled: 2 });
    expect(elapsed).toBeLessThan(1000);
    expect(outcomes.map(key)).toEqual(['a#0', 'a#1', 'a#2']);
  });

  it('surfaces a failure to record an outcome after in-flight work settles', async () => {
    const items = expandWork([testTarget('a')], 3);
    const fake = fakeExecutor({ latencyMs: 1 });
    let seen = 0;

    const run = new Dispatcher(
      fake.execute,
      () => {
        seen++;
        if (seen === 1) throw new Error('sink closed');
      },
      { concurrency: 3 }
    ).run(items);

    await expect(run).rejects.toThrow('sink closed');
    expect(seen).toBe(3);
  });
});
