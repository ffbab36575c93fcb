/**
 * Unit Tests: work expansion and cache-busting tokens.
 */
import { describe, it, expect } from 'vitest';
import { defaultTokenFactory, expandWork } from '../../src/work-queue.js';
import { testTarget } from '../helpers/fakes.js';

describe('expandWork', () => {
  it('expands target-major with 0-based indexes', () => {
    const items = expandWork([testTarget('a'), testTarget('b', { requestCount: 1 })], 2, (id, i) => `${id}-${i}`);

    expect(items.map(item => `${item.targetId}#${item.index}`)).toEqual(['a#0', 'a#1', 'b#0']);
    expect(items.map(item => item.token)).toEqual(['a-0', 'a-1', 'b-0']);
  });

  it('builds each request once and freezes it', () => {
    let built = 0;
    const target = testTarget('a', {
      group: 'search',
      buildRequest: ({ index, token }) => {
        built++;
        return { url: `http://127.0.0.1:1/?t=${token}`, label: `q${index}` };
      },
    });

    const [item] = expandWork([target], 1, () => 'tok');

    expect(built).toBe(1);
    expect(item.group).toBe('search');
    expect(item.request).toEqual({ url: 'http://127.0.0.1:1/?t=tok', label: 'q0' });
    expect(Object.isFrozen(item)).toBe(true);
    expect(Object.isFrozen(item.request)).toBe(true);
  });

  it('defaults the group to the target id', () => {
    const [item] = expandWork([testTarget('google')], 1);
    expect(item.group).toBe('google');
  });

  it('produces no items for a zero count', () => {
    expect(expandWork([testTarget('a')], 0)).toEqual([]);
  });
});

describe('defaultTokenFactory', () => {
  it('is unique per call and ends with the index', () => {
    const tokens = new Set(Array.from({ length: 50 }, (_, i) => defaultTokenFactory('google', i)));
    expect(tokens.size).toBe(50);
    expect(defaultTokenFactory('google', 7)).toMatch(/^\d+\.\d{6}_[0-9a-f]{8}_7$/);
  });
});
