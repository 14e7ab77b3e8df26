import { seekCost } from './seek.js';
import type { ScheduleResult } from './types.js';

/**
 * First-come-first-served: requests are serviced in arrival order.
 */
export function scheduleFcfs(
  requests: readonly number[],
  head: number,
  _diskSize?: number,
): ScheduleResult {
  const order = [head, ...requests];
  return { order, totalSeek: seekCost(order) };
}
