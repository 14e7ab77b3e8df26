/**
 * Derived per-run metrics: total, average seek and throughput.
 *
 * Throughput here is requests serviced per cylinder of head movement,
 * not per unit of wall-clock time.
 */

import { SchedulerError } from '../utils/errors.js';
import type { ScheduleResult } from '../scheduler/types.js';

export interface SeekMetrics {
  total: number;
  average: number;
  /** `0` when the run cost nothing; callers treat it as "cost-free", not "no throughput". */
  throughput: number;
}

function requireRequests(requestCount: number, metric: string): void {
  if (requestCount <= 0) {
    throw new SchedulerError(`${metric} is undefined for an empty request list`, 'EMPTY_INPUT');
  }
}

export function averageSeek(total: number, requestCount: number): number {
  requireRequests(requestCount, 'Average seek time');
  return total / requestCount;
}

export function throughput(total: number, requestCount: number): number {
  requireRequests(requestCount, 'Throughput');
  return total === 0 ? 0 : requestCount / total;
}

/**
 * Compute all metrics for a schedule of `requestCount` requests.
 *
 * @throws SchedulerError with code `EMPTY_INPUT` when `requestCount` is 0
 */
export function computeMetrics(result: ScheduleResult, requestCount: number): SeekMetrics {
  return {
    total: result.totalSeek,
    average: averageSeek(result.totalSeek, requestCount),
    throughput: throughput(result.totalSeek, requestCount),
  };
}
