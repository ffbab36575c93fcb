/**
 * Unit Tests: result sink aggregation and batched detail writes.
 */
import { describe, it, expect } from 'vitest';
import { ResultSink } from '../../src/sink.js';
import { makeOutcome, MemoryDetailWriter } from '../helpers/fakes.js';

describe('ResultSink aggregation', () => {
  it('counts successes, failures and latency sums per target', async () => {
    const sink = new ResultSink();
    sink.submit(makeOutcome({ elapsedMs: 100, sizeBytes: 1000, dispatchedAt: 0 }));
    sink.submit(makeOutcome({ elapsedMs: 200, sizeBytes: 3000, dispatchedAt: 50 }));
    sink.submit(makeOutcome({ elapsedMs: 100, dispatchedAt: 100, reason: { kind: 'status', status: 503 } }));
    await sink.close();

    const google = sink.results().get('google');
    expect(google).toMatchObject({
      totalRequests: 3,
      successCount: 2,
      failureCount: 1,
      successLatencySumMs: 300,
      successSizeSumBytes: 4000,
      successLatencies: [100, 200],
      firstDispatchAt: 0,
      lastCompletionAt: 250,
    });
    expect(google?.failuresByReason).toEqual(new Map([['http:503', 1]]));
    expect(sink.completed).toBe(3);
    expect(sink.successes).toBe(2);
  });

  it('reports registered targets with no outcomes', async () => {
    const sink = new ResultSink();
    sink.register('bing', 'search');
    await sink.close();

    expect(sink.results().get('bing')).toMatchObject({ group: 'search', totalRequests: 0 });
  });

  it('counts connection cleanup failures', async () => {
    const sink = new ResultSink();
    sink.submit(makeOutcome({ cleanup: 'failed' }));
    sink.submit(makeOutcome({ cleanup: 'released' }));
    await sink.close();

    expect(sink.results().get('google')?.cleanupFailures).toBe(1);
  });

  it('rejects outcomes after close and results before close', async () => {
    const sink = new ResultSink();
    expect(() => sink.results()).toThrow('before close()');

    await sink.close();
    expect(() => sink.submit(makeOutcome())).toThrow('ResultSink is closed');
  });
});

describe('ResultSink detail batches', () => {
  it('writes full batches as they fill and the remainder on close', async () => {
    const writer = new MemoryDetailWriter();
    const sink = new ResultSink({ detailWriter: writer, batchSize: 2 });

    for (let index = 0; index < 5; index++) {
      sink.submit(makeOutcome({ index }));
    }
    await sink.close();

    expect(writer.batches.map(batch => batch.length)).toEqual([2, 2, 1]);
    expect(writer.rows.map(row => row.index)).toEqual([0, 1, 2, 3, 4]);
  });

  it('writes nothing when there is nothing buffered', async () => {
    const writer = new MemoryDetailWriter();
    const sink = new ResultSink({ detailWriter: writer, batchSize: 2 });
    sink.submit(makeOutcome({ index: 0 }));
    sink.submit(makeOutcome({ index: 1 }));
    await sink.close();

    expect(writer.batches).toHaveLength(1);
  });

  it('counts a failed batch and keeps going', async () => {
    const writer = new MemoryDetailWriter();
    writer.failNext = true;
    const sink = new ResultSink({ detailWriter: writer, batchSize: 1 });

    sink.submit(makeOutcome({ index: 0 }));
    sink.submit(makeOutcome({ index: 1 }));
    await sink.close();

    expect(sink.detailWriteFailures).toBe(1);
    expect(writer.rows.map(row => row.index)).toEqual([1]);
    expect(sink.results().get('google')?.totalRequests).toBe(2);
  });
});
