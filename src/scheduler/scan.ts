/**
 * Elevator-style sweeps: SCAN and C-SCAN.
 *
 * Both sweep toward the high end first and always touch the last cylinder
 * (`diskSize - 1`) before handling requests below the head, whether or not
 * a request sits on the boundary.
 */

import { seekCost } from './seek.js';
import type { ScheduleResult } from './types.js';

export interface HeadPartition {
  /** Requests strictly below the head, ascending. */
  left: number[];
  /** Requests at or above the head, ascending. */
  right: number[];
}

/**
 * Split requests around the head position. The input is not modified.
 */
export function partitionAroundHead(requests: readonly number[], head: number): HeadPartition {
  const ascending = (a: number, b: number) => a - b;
  return {
    left: requests.filter((r) => r < head).sort(ascending),
    right: requests.filter((r) => r >= head).sort(ascending),
  };
}

/**
 * SCAN: sweep up to the outer boundary, then reverse and sweep down.
 */
export function scheduleScan(
  requests: readonly number[],
  head: number,
  diskSize: number,
): ScheduleResult {
  if (requests.length === 0) {
    return { order: [head], totalSeek: 0 };
  }

  const { left, right } = partitionAroundHead(requests, head);
  const order = [head, ...right, diskSize - 1, ...left.reverse()];
  return { order, totalSeek: seekCost(order) };
}

/**
 * C-SCAN: sweep up to the outer boundary, jump to cylinder 0, and keep
 * sweeping up through the requests that were below the head.
 *
 * The jump counts as head movement. Both boundaries are visited even when
 * nothing is left below the head.
 */
export function scheduleCScan(
  requests: readonly number[],
  head: number,
  diskSize: number,
): ScheduleResult {
  if (requests.length === 0) {
    return { order: [head], totalSeek: 0 };
  }

  const { left, right } = partitionAroundHead(requests, head);
  const order = [head, ...right, diskSize - 1, 0, ...left];
  return { order, totalSeek: seekCost(order) };
}
