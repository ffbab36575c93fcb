/**
 * Unit Tests: counting admission gate.
 */
import { describe, it, expect } from 'vitest';
import { ConcurrencyGate } from '../../src/concurrency-gate.js';
import { delay } from '../helpers/fakes.js';

describe('ConcurrencyGate', () => {
  it('rejects invalid permit counts', () => {
    expect(() => new ConcurrencyGate(0)).toThrow(RangeError);
    expect(() => new ConcurrencyGate(1.5)).toThrow(RangeError);
  });

  it('admits up to the permit count and queues the rest in order', async () => {
    const gate = new ConcurrencyGate(2);
    const admitted: number[] = [];

    await gate.acquire();
    await gate.acquire();
    const third = gate.acquire().then(() => admitted.push(3));
    const fourth = gate.acquire().then(() => admitted.push(4));

    await delay(5);
    expect(admitted).toEqual([]);
    expect(gate.inUse).toBe(2);

    gate.release();
    await third;
    expect(admitted).toEqual([3]);

    gate.release();
    await fourth;
    expect(admitted).toEqual([3, 4]);
    expect(gate.inUse).toBe(2);
    expect(gate.highWater).toBe(2);
  });

  it('throws when releasing a permit that is not held', () => {
    const gate = new ConcurrencyGate(1);
    expect(() => gate.release()).toThrow('without a held permit');
  });

  it('run() returns the permit when the task throws', async () => {
    const gate = new ConcurrencyGate(1);

    await expect(gate.run(async () => Promise.reject(new Error('task failed')))).rejects.toThrow('task failed');

    expect(gate.inUse).toBe(0);
    await expect(gate.run(async () => 'next')).resolves.toBe('next');
  });

  it('never exceeds the permit count under load', async () => {
    const gate = new ConcurrencyGate(3);
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 12 }, (_, i) =>
        gate.run(async () => {
          active++;
          peak = Math.max(peak, active);
          await delay(2 + (i % 3));
          active--;
        })
      )
    );

    expect(peak).toBe(3);
    expect(gate.highWater).toBe(3);
    expect(gate.inUse).toBe(0);
  });
});
