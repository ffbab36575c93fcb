import { randomUUID } from 'crypto';
import { TargetDescriptor, WorkItem } from './types.js';

export type TokenFactory = (targetId: string, index: number) => string;

/** Cache-busting token: wall-clock seconds plus a random suffix and the index. */
export const defaultTokenFactory: TokenFactory = (_targetId, index) =>
  `${(Date.now() / 1000).toFixed(6)}_${randomUUID().slice(0, 8)}_${index}`;

export function requestCountFor(target: TargetDescriptor, defaultCount: number): number {
  return target.requestCount ?? defaultCount;
}

/**
 * Expands descriptors × counts into a flat, target-major list of immutable
 * work items. The request for each item is built here, once.
 */
export function expandWork(
  targets: readonly TargetDescriptor[],
  defaultCount: number,
  tokenFactory: TokenFactory = defaultTokenFactory
): WorkItem[] {
  const items: WorkItem[] = [];

  for (const target of targets) {
    const count = requestCountFor(target, defaultCount);
    const group = target.group ?? target.id;

    for (let index = 0; index < count; index++) {
      const token = tokenFactory(target.id, index);
      const request = Object.freeze({ ...target.buildRequest({ index, token }) });
      items.push(Object.freeze({ targetId: target.id, group, index, token, request }));
    }
  }

  return items;
}
