import { seekCost } from './seek.js';
import type { ScheduleResult } from './types.js';

/**
 * Shortest-seek-time-first: greedily service the pending request closest
 * to the current head position.
 *
 * Ties go to the request that comes first in the pending list, so the
 * result is deterministic but not the globally shortest path.
 */
export function scheduleSstf(
  requests: readonly number[],
  head: number,
  _diskSize?: number,
): ScheduleResult {
  const pending = [...requests];
  const order = [head];
  let current = head;

  while (pending.length > 0) {
    let nearest = 0;
    for (let i = 1; i < pending.length; i++) {
      if (Math.abs(pending[i] - current) < Math.abs(pending[nearest] - current)) {
        nearest = i;
      }
    }
    const [next] = pending.splice(nearest, 1);
    order.push(next);
    current = next;
  }

  return { order, totalSeek: seekCost(order) };
}
